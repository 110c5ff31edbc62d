/**
 * Shared error handling utilities for CLI commands.
 *
 * Provides a wrapper function that standardizes error handling
 * across command handlers.
 */

import { errorContextFor, formatErrorWithSuggestions } from '../errors.js';
import type { CliCommandResult } from '../types.js';
import type { DisplayOptions } from './displayUtils.js';

/**
 * Wraps a command handler with standard error handling.
 *
 * Executes the provided function (sync or async) and handles any errors:
 * - On success: prints the result message, if any, and exits with its code
 * - On error: prints `Error: <message>` with suggestions and exits with 1
 *
 * @param fn - The function to wrap (sync or async).
 * @param options - Command name and display options for error output.
 */
export function withErrorHandling(
  fn: () => CliCommandResult | Promise<CliCommandResult>,
  options: { command?: string; display?: DisplayOptions } = {}
): void {
  void (async () => {
    try {
      const result = await fn();
      if (result.message !== undefined) {
        console.log(result.message);
      }
      process.exit(result.exitCode);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(
        formatErrorWithSuggestions(
          message,
          errorContextFor(error, options.command),
          options.display ?? { colors: false, unicode: false }
        )
      );
      process.exit(1);
    }
  })();
}
