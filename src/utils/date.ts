function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Formats a date as YYYYMMDD_HHMMSS in the local timezone. */
export function fileTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}
