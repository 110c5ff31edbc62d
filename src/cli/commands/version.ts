/**
 * Version command handler for the interview-coach CLI.
 *
 * Displays the CLI version by reading it directly from package.json.
 */

import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { readFileSync } from 'node:fs';
import type { CliCommandResult } from '../types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Reads the version from package.json.
 *
 * @param packageJsonPath - Location of package.json.
 * @returns The version string, or '(unknown)' if not found.
 */
export function getVersionFromPackageJson(
  packageJsonPath = join(__dirname, '../../../package.json')
): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  } catch {
    return '(unknown)';
  }
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed) {
    return typeof parsed.version === 'string' ? parsed.version : '(unknown)';
  }
  return '(unknown)';
}

/**
 * Handles the version command.
 */
export function handleVersionCommand(): CliCommandResult {
  return { exitCode: 0, message: `interview-coach v${getVersionFromPackageJson()}` };
}
