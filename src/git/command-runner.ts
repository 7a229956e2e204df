import { spawn } from 'node:child_process';
import { CommandError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface RunOptions {
  cwd: string;
}

/** Runs a command with a fixed argument list and resolves with its trimmed stdout. */
export type CommandRunner = (command: string, args: string[], options: RunOptions) => Promise<string>;

export const runCommand: CommandRunner = (command, args, { cwd }) => {
  logger.debug({ command, args, cwd }, 'Running command');

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd, stdio: ['ignore', 'pipe', 'pipe'] });
    const chunks: Buffer[] = [];
    const errors: Buffer[] = [];
    child.stdout.on('data', (chunk: Buffer) => chunks.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => errors.push(chunk));
    child.on('error', (err) => {
      reject(new CommandError([command, ...args], null, err.message, { cause: err }));
    });
    child.on('close', (code) => {
      if (code === 0) {
        resolve(Buffer.concat(chunks).toString('utf-8').trim());
      } else {
        reject(new CommandError([command, ...args], code, Buffer.concat(errors).toString('utf-8')));
      }
    });
  });
};
