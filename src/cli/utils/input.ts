/**
 * Line input for interactive sessions.
 */

import readline from 'node:readline';
import type { InputReader } from '../types.js';

/**
 * Creates a readline-based input reader.
 *
 * Lines that arrive before they are asked for are buffered, so piped input
 * works the same as a terminal. Once the stream closes every pending and
 * later read resolves with null. Ctrl+C closes the reader.
 *
 * @param input - Stream to read from.
 * @param output - Stream prompts are written to.
 */
export function createInputReader(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): InputReader {
  const rl = readline.createInterface({ input, output, terminal: false });
  const buffered: string[] = [];
  const waiting: ((line: string | null) => void)[] = [];
  let closed = false;

  rl.on('line', (line) => {
    const next = waiting.shift();
    if (next !== undefined) {
      next(line);
    } else {
      buffered.push(line);
    }
  });

  rl.on('SIGINT', () => {
    rl.close();
  });

  rl.on('close', () => {
    closed = true;
    for (const next of waiting.splice(0)) {
      next(null);
    }
  });

  return {
    readLine(prompt: string): Promise<string | null> {
      const line = buffered.shift();
      if (line !== undefined) {
        output.write(prompt);
        return Promise.resolve(line);
      }
      if (closed) {
        return Promise.resolve(null);
      }
      output.write(prompt);
      return new Promise((resolve) => {
        waiting.push(resolve);
      });
    },
    close(): void {
      rl.close();
    },
  };
}

/**
 * Reads lines until one is non-blank.
 *
 * @returns The trimmed line, or null once input ends.
 */
export async function readNonEmptyLine(
  reader: InputReader,
  prompt: string
): Promise<string | null> {
  for (;;) {
    const line = await reader.readLine(prompt);
    if (line === null) {
      return null;
    }
    const trimmed = line.trim();
    if (trimmed !== '') {
      return trimmed;
    }
  }
}
