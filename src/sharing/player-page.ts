import fs from 'node:fs';
import fsp from 'node:fs/promises';
import path from 'node:path';
import type { PlayerPageInput } from '../types/index.js';
import { fileTimestamp } from '../utils/date.js';
import { logger } from '../utils/logger.js';

const TEMPLATE_PATH = new URL('../../templates/player.html', import.meta.url);

const MIME_TYPES: Record<string, string> = {
  '.mp4': 'video/mp4',
  '.m4v': 'video/mp4',
  '.mov': 'video/quicktime',
  '.mkv': 'video/x-matroska',
  '.webm': 'video/webm',
};

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

let template: string | null = null;

function loadTemplate(): string {
  template ??= fs.readFileSync(TEMPLATE_PATH, 'utf-8');
  return template;
}

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function videoMimeType(fileName: string): string {
  return MIME_TYPES[path.extname(fileName).toLowerCase()] ?? 'video/mp4';
}

/** `/`-prefixed POSIX path of the video relative to the repository root. */
export function videoSourcePath(root: string, videoPath: string): string {
  const relative = path.relative(root, videoPath).split(path.sep).join('/');
  return `/${relative}`;
}

export function renderPlayerPage(input: PlayerPageInput): string {
  const values: Record<string, string> = {
    title: input.title,
    videoSrc: input.videoSrc,
    mimeType: input.mimeType,
  };
  return loadTemplate().replace(/\{\{(\w+)\}\}/g, (placeholder, key: string) => {
    const value = values[key];
    return value === undefined ? placeholder : escapeHtml(value);
  });
}

export function pageFileName(videoName: string, now: Date, attempt = 1): string {
  const stem = path.parse(videoName).name;
  const suffix = attempt > 1 ? `_${attempt}` : '';
  return `${fileTimestamp(now)}_${stem}${suffix}.html`;
}

/**
 * Writes the page under a fresh `<timestamp>_<stem>.html` name. A name already
 * taken within the same second gets a `_2`, `_3`, ... suffix.
 */
export async function writePlayerPage(
  pagesDir: string,
  videoName: string,
  html: string,
  now: Date = new Date(),
): Promise<string> {
  for (let attempt = 1; ; attempt++) {
    const pagePath = path.join(pagesDir, pageFileName(videoName, now, attempt));
    try {
      await fsp.writeFile(pagePath, html, { encoding: 'utf-8', flag: 'wx' });
      logger.debug({ pagePath }, 'Player page written');
      return pagePath;
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'EEXIST') continue;
      throw err;
    }
  }
}
