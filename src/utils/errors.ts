export class SetupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`setup failed: ${message}`, options);
    this.name = 'SetupError';
  }
}

export class CommandError extends Error {
  readonly command: string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(command: string[], exitCode: number | null, stderr: string, options?: { cause?: unknown }) {
    const output = stderr.trim() || (exitCode === null ? 'process did not start' : `exit code ${exitCode}`);
    super(`command failed: ${command.join(' ')}: ${output}`, options);
    this.name = 'CommandError';
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class ShareError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`share failed: ${message}`, options);
    this.name = 'ShareError';
  }
}

export class VideoNotFoundError extends Error {
  readonly videoPath: string;

  constructor(videoPath: string) {
    super(`video file does not exist: ${videoPath}`);
    this.name = 'VideoNotFoundError';
    this.videoPath = videoPath;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
