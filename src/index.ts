#!/usr/bin/env node
import { createConsolePrompter } from './cli/prompter.js';
import { runShare } from './cli/run.js';
import { config } from './config.js';
import { errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const prompter = createConsolePrompter();
  try {
    await runShare({
      prompter,
      print: (line) => console.log(line),
      repoPath: config.VIDEO_SHARE_REPO,
      pagesBaseUrl: config.PAGES_BASE_URL,
      gitBin: config.GIT_BIN,
    });
  } finally {
    prompter.close();
  }
}

main().catch((err: unknown) => {
  logger.debug({ err }, 'Video share failed');
  console.error(`\nError: ${errorMessage(err)}`);
  process.exitCode = 1;
});
