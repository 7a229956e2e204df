import { createInterface } from 'node:readline/promises';

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

export function createConsolePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  const rl = createInterface({ input, output });
  return {
    async ask(question) {
      return (await rl.question(question)).trim();
    },
    close() {
      rl.close();
    },
  };
}

/** Strips whitespace and the quotes a terminal adds to a dragged-in path. */
export function cleanPathInput(raw: string): string {
  return raw.trim().replace(/^(["'])(.*)\1$/, '$2').trim();
}
