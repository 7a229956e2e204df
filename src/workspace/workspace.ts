import fs from 'node:fs/promises';
import path from 'node:path';
import { GitClient } from '../git/git-client.js';
import { runCommand, type CommandRunner } from '../git/command-runner.js';
import { resolvePagesBaseUrl } from '../hosting/pages-url.js';
import type { Prompter } from '../cli/prompter.js';
import type { Workspace } from '../types/index.js';
import { ensureLfsAttributes } from './lfs-attributes.js';
import { SetupError, errorMessage } from '../utils/errors.js';
import { statOrNull } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

export const VIDEOS_DIR = 'videos';
export const PAGES_DIR = 'pages';
export const QRCODES_DIR = 'qrcodes';

export interface SetupOptions {
  prompter: Prompter;
  runner?: CommandRunner;
  gitBin?: string;
  /** Skips remote derivation and the prompt */
  pagesBaseUrl?: string;
}

/**
 * Prepares the working directory: creates the artifact folders, initialises
 * git with LFS tracking when `.git` is missing, and resolves the pages URL.
 */
export async function setupWorkspace(rootPath: string, options: SetupOptions): Promise<Workspace> {
  const root = path.resolve(rootPath);
  const git = new GitClient(root, options.runner ?? runCommand, options.gitBin);

  try {
    const rootStat = await statOrNull(root);
    if (rootStat && !rootStat.isDirectory()) {
      throw new Error(`${root} is not a directory`);
    }

    const videosDir = path.join(root, VIDEOS_DIR);
    const pagesDir = path.join(root, PAGES_DIR);
    const qrcodesDir = path.join(root, QRCODES_DIR);
    for (const dir of [videosDir, pagesDir, qrcodesDir]) {
      await fs.mkdir(dir, { recursive: true });
    }

    if (!(await statOrNull(path.join(root, '.git')))) {
      logger.info({ root }, 'Initialising git repository');
      await git.init();
      const added = await ensureLfsAttributes(root);
      logger.debug({ added }, 'LFS attributes written');
      await git.installLfs();
    }

    const pagesBaseUrl = await resolvePagesBaseUrl(git, options.prompter, options.pagesBaseUrl);

    return { root, videosDir, pagesDir, qrcodesDir, pagesBaseUrl };
  } catch (err) {
    throw new SetupError(errorMessage(err), { cause: err });
  }
}
