import type { CommandRunner } from './command-runner.js';
import { logger } from '../utils/logger.js';

export class GitClient {
  constructor(
    private readonly cwd: string,
    private readonly run: CommandRunner,
    private readonly bin = 'git',
  ) {}

  async init(): Promise<void> {
    await this.git('init');
  }

  async installLfs(): Promise<void> {
    await this.git('lfs', 'install');
  }

  /** `remote.origin.url`, or null when no origin is configured. */
  async getRemoteUrl(): Promise<string | null> {
    try {
      const url = await this.git('config', '--get', 'remote.origin.url');
      return url || null;
    } catch (err) {
      logger.debug({ err, cwd: this.cwd }, 'No origin remote configured');
      return null;
    }
  }

  async addAll(): Promise<void> {
    await this.git('add', '.');
  }

  async commit(message: string): Promise<void> {
    await this.git('commit', '-m', message);
  }

  private git(...args: string[]): Promise<string> {
    return this.run(this.bin, args, { cwd: this.cwd });
  }
}
