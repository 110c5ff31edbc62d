/**
 * Prompt loading.
 *
 * System prompts live as markdown files in the `prompts/` directory at the
 * package root. A configured directory takes their place when set.
 *
 * @packageDocumentation
 */

import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { safeReadTextFile } from '../utils/safe-fs.js';

/**
 * Directory holding the bundled prompts.
 */
export const DEFAULT_PROMPTS_DIR = fileURLToPath(new URL('../../prompts/', import.meta.url));

/**
 * Error thrown when a prompt file cannot be read.
 */
export class PromptLoadError extends Error {
  /** The file that was requested. */
  public readonly promptFile: string;
  /** The underlying cause if available. */
  public override readonly cause: Error | undefined;

  constructor(promptFile: string, message: string, cause?: Error) {
    super(message);
    this.name = 'PromptLoadError';
    this.promptFile = promptFile;
    this.cause = cause;
  }
}

/**
 * Reads prompt files and caches their text.
 *
 * @example
 * ```typescript
 * const prompts = new PromptLoader(config.paths.prompts);
 * const system = await prompts.load('observer.md');
 * ```
 */
export class PromptLoader {
  private readonly directory: string;
  private readonly cache = new Map<string, string>();

  /**
   * @param directory - Prompt directory; empty selects the bundled prompts.
   */
  constructor(directory = '') {
    this.directory = directory === '' ? DEFAULT_PROMPTS_DIR : directory;
  }

  getDirectory(): string {
    return this.directory;
  }

  /**
   * Loads a prompt file.
   *
   * @throws PromptLoadError if the file is missing, empty, or outside the directory.
   */
  async load(promptFile: string): Promise<string> {
    const cached = this.cache.get(promptFile);
    if (cached !== undefined) {
      return cached;
    }

    const root = path.resolve(this.directory);
    const filePath = path.resolve(root, promptFile);
    if (path.relative(root, filePath).startsWith('..')) {
      throw new PromptLoadError(promptFile, `Prompt '${promptFile}' is outside ${root}`);
    }

    let text: string;
    try {
      text = (await safeReadTextFile(filePath)).trim();
    } catch (error) {
      throw new PromptLoadError(
        promptFile,
        `Failed to load prompt '${promptFile}' from ${root}: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined
      );
    }
    if (text === '') {
      throw new PromptLoadError(promptFile, `Prompt '${promptFile}' is empty`);
    }

    this.cache.set(promptFile, text);
    return text;
  }
}
