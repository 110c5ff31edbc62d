/**
 * CLI types and interfaces for the interview-coach CLI.
 */

import type { DisplayOptions } from './utils/displayUtils.js';

/**
 * Configuration options for the CLI application.
 */
export interface CliConfig extends DisplayOptions {
  /**
   * Whether to use colors in output.
   */
  colors: boolean;

  /**
   * Whether to use Unicode box-drawing characters.
   */
  unicode: boolean;
}

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * Command-line arguments following the command name.
   */
  args: string[];

  /**
   * CLI configuration.
   */
  config: CliConfig;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;

  /**
   * Optional message to display.
   */
  message?: string;
}

/**
 * CLI command handler function.
 */
export type CliCommandHandler = (context: CliContext) => Promise<CliCommandResult>;

/**
 * Line-based source of user input.
 */
export interface InputReader {
  /**
   * Shows the prompt and resolves with the next line, or null once input ends.
   */
  readLine(prompt: string): Promise<string | null>;

  /**
   * Releases the underlying stream.
   */
  close(): void;
}

/**
 * Destination for user-facing lines.
 */
export type OutputWriter = (line: string) => void;
