import crypto from 'node:crypto';
import { constants as fsConstants } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { GitClient } from '../git/git-client.js';
import { runCommand, type CommandRunner } from '../git/command-runner.js';
import type { ShareResult, Workspace } from '../types/index.js';
import { renderPlayerPage, videoMimeType, videoSourcePath, writePlayerPage } from './player-page.js';
import { writeQrCode } from './qr-code.js';
import { ShareError, VideoNotFoundError, errorMessage } from '../utils/errors.js';
import { statOrNull } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

export interface ShareOptions {
  runner?: CommandRunner;
  gitBin?: string;
  now?: Date;
}

function toPosix(relativePath: string): string {
  return relativePath.split(path.sep).join('/');
}

export function pageUrlFor(workspace: Workspace, pagePath: string): string {
  return `${workspace.pagesBaseUrl}/${toPosix(path.relative(workspace.root, pagePath))}`;
}

async function fileDigest(filePath: string): Promise<string> {
  return crypto.createHash('sha256').update(await fs.readFile(filePath)).digest('hex');
}

async function sameContent(a: string, b: string): Promise<boolean> {
  const [statA, statB] = await Promise.all([fs.stat(a), fs.stat(b)]);
  if (statA.size !== statB.size) return false;
  return (await fileDigest(a)) === (await fileDigest(b));
}

export function videoFileName(videoName: string, attempt = 1): string {
  if (attempt === 1) return videoName;
  const { name, ext } = path.parse(videoName);
  return `${name}_${attempt}${ext}`;
}

/**
 * Copies the video into `videosDir` without touching an earlier copy. An
 * identical file already there is reused; a different one with the same name
 * pushes the copy to `<stem>_2<ext>`, `<stem>_3<ext>`, ...
 */
export async function copyVideo(source: string, videosDir: string): Promise<string> {
  const videoName = path.basename(source);
  const { atime, mtime } = await fs.stat(source);

  for (let attempt = 1; ; attempt++) {
    const target = path.join(videosDir, videoFileName(videoName, attempt));
    if (path.resolve(source) === path.resolve(target)) {
      logger.info({ target }, 'Video already in videos folder, not copying');
      return target;
    }
    try {
      await fs.copyFile(source, target, fsConstants.COPYFILE_EXCL);
    } catch (err) {
      if (!(err instanceof Error && 'code' in err && err.code === 'EEXIST')) throw err;
      if (await sameContent(source, target)) {
        logger.info({ target }, 'Identical video already shared, reusing it');
        return target;
      }
      continue;
    }
    await fs.utimes(target, atime, mtime);
    return target;
  }
}

export async function shareVideo(
  workspace: Workspace,
  videoPath: string,
  options: ShareOptions = {},
): Promise<ShareResult> {
  const sourceStat = await statOrNull(videoPath);
  if (!sourceStat?.isFile()) throw new VideoNotFoundError(videoPath);

  const git = new GitClient(workspace.root, options.runner ?? runCommand, options.gitBin);
  const videoName = path.basename(videoPath);
  const now = options.now ?? new Date();

  try {
    const targetPath = await copyVideo(videoPath, workspace.videosDir);
    logger.info({ source: videoPath, target: targetPath }, 'Video copied');

    const html = renderPlayerPage({
      title: videoName,
      videoSrc: videoSourcePath(workspace.root, targetPath),
      mimeType: videoMimeType(videoName),
    });
    const pagePath = await writePlayerPage(workspace.pagesDir, path.basename(targetPath), html, now);

    const pageUrl = pageUrlFor(workspace, pagePath);
    const qrPath = path.join(workspace.qrcodesDir, `${path.parse(pagePath).name}_qr.gif`);
    await writeQrCode(pageUrl, qrPath);
    logger.info({ pageUrl, qrPath }, 'QR code written');

    await git.addAll();
    await git.commit(`Add video: ${videoName}`);

    return { videoPath: targetPath, pagePath, pageUrl, qrPath, qrContent: pageUrl };
  } catch (err) {
    throw new ShareError(errorMessage(err), { cause: err });
  }
}
