import { createInterface } from 'node:readline/promises';

/**
 * Source of human answers for AskUserQuestion.
 */
export interface Prompter {
  /** Whether a human can currently answer */
  isAvailable(): boolean;
  /** Show the question (and numbered options) and return the raw answer line */
  ask(question: string, options: readonly string[]): Promise<string>;
}

/**
 * Prompter reading from stdin; available only when stdin is a TTY.
 */
export function createReadlinePrompter(
  input: NodeJS.ReadableStream & { isTTY?: boolean } = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  return {
    isAvailable: () => input.isTTY === true,
    async ask(question, options) {
      const rl = createInterface({ input, output });
      try {
        output.write(`${question}\n`);
        if (options.length > 0) {
          options.forEach((option, i) => output.write(`${i + 1}. ${option}\n`));
          return await rl.question('Enter choice number (default 1): ');
        }
        return await rl.question('Answer (default: yes): ');
      } finally {
        rl.close();
      }
    },
  };
}
