import path from 'node:path';
import type { CommandRunner } from '../git/command-runner.js';
import { setupWorkspace } from '../workspace/workspace.js';
import { shareVideo } from '../sharing/video-share.js';
import { renderQrAscii } from '../sharing/qr-code.js';
import type { ShareResult } from '../types/index.js';
import { VideoNotFoundError } from '../utils/errors.js';
import { statOrNull } from '../utils/fs.js';
import { cleanPathInput, type Prompter } from './prompter.js';

export const REPO_QUESTION = 'Local path of the GitHub repository: ';
export const VIDEO_QUESTION = '\nVideo file path (drag the file in): ';

export interface RunOptions {
  prompter: Prompter;
  print: (line: string) => void;
  repoPath?: string;
  pagesBaseUrl?: string;
  gitBin?: string;
  runner?: CommandRunner;
}

export function formatSummary(result: ShareResult): string[] {
  return [
    '\n=== Shared! ===',
    `Video:    ${result.videoPath}`,
    `Page:     ${result.pagePath}`,
    `URL:      ${result.pageUrl}`,
    `QR code:  ${result.qrPath}`,
    '',
    renderQrAscii(result.qrContent),
    '',
    'Note: push to GitHub and enable GitHub Pages before the link works',
    '1. git push origin main',
    '2. enable GitHub Pages in the repository settings',
  ];
}

/** A typed relative video path is taken relative to the repository; absolute paths are kept. */
export function resolveVideoPath(repoPath: string, videoInput: string): string {
  return videoInput ? path.resolve(repoPath, videoInput) : '';
}

/** The interactive share flow: ask, validate, set up, share, report. */
export async function runShare(options: RunOptions): Promise<ShareResult> {
  const { prompter, print } = options;
  print('=== GitHub LFS video share ===\n');

  const repoPath = options.repoPath ?? cleanPathInput(await prompter.ask(REPO_QUESTION));
  if (!repoPath) throw new Error('a repository path is required');

  const videoInput = cleanPathInput(await prompter.ask(VIDEO_QUESTION));
  const videoPath = resolveVideoPath(repoPath, videoInput);
  const videoStat = videoPath ? await statOrNull(videoPath) : null;
  if (!videoStat?.isFile()) throw new VideoNotFoundError(videoInput);

  const workspace = await setupWorkspace(repoPath, {
    prompter,
    runner: options.runner,
    gitBin: options.gitBin,
    pagesBaseUrl: options.pagesBaseUrl,
  });

  print('\nProcessing...');
  const result = await shareVideo(workspace, videoPath, {
    runner: options.runner,
    gitBin: options.gitBin,
  });

  for (const line of formatSummary(result)) print(line);
  return result;
}
