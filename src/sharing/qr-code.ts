import fs from 'node:fs/promises';
import qrcode from 'qrcode-generator';

const CELL_SIZE = 10;
const QUIET_ZONE_MODULES = 4;
const DATA_URL_PREFIX = /^data:image\/[a-z]+;base64,/;

// Byte mode defaults to Latin-1; page URLs may carry any file name, so the
// library's UTF-8 encoder replaces the default for every code built here.
const utf8ToBytes = qrcode.stringToBytesFuncs['UTF-8'];
if (utf8ToBytes) qrcode.stringToBytes = utf8ToBytes;

function buildQr(content: string): ReturnType<typeof qrcode> {
  // type 0 picks the smallest version that fits
  const qr = qrcode(0, 'H');
  qr.addData(content);
  qr.make();
  return qr;
}

/** Encodes `content` and writes it as a GIF image. */
export async function writeQrCode(content: string, filePath: string): Promise<void> {
  const dataUrl = buildQr(content).createDataURL(CELL_SIZE, CELL_SIZE * QUIET_ZONE_MODULES);
  const base64 = dataUrl.replace(DATA_URL_PREFIX, '');
  await fs.writeFile(filePath, Buffer.from(base64, 'base64'));
}

/** Terminal rendering of the same code, two characters per module. */
export function renderQrAscii(content: string): string {
  return buildQr(content).createASCII(2, 2);
}
