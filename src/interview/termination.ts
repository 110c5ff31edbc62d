/**
 * Termination policy.
 *
 * @packageDocumentation
 */

import { DEFAULT_STOP_COMMANDS } from '../config/defaults.js';

/**
 * Normalizes a message for stop-command comparison.
 */
export function normalizeCommand(message: string): string {
  return message.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Checks whether a candidate message asks to end the interview.
 *
 * Matching is exact after trimming, whitespace collapsing and lower-casing.
 *
 * @example
 * ```typescript
 * isStopCommand('  Стоп  Интервью '); // true
 * isStopCommand('stop and think');    // false
 * ```
 */
export function isStopCommand(
  message: string,
  stopCommands: readonly string[] = DEFAULT_STOP_COMMANDS
): boolean {
  const normalized = normalizeCommand(message);
  if (normalized === '') {
    return false;
  }
  return stopCommands.some((command) => normalizeCommand(command) === normalized);
}

/**
 * Checks whether a turn budget has been used up.
 *
 * A budget of zero or less means unlimited.
 */
export function isTurnBudgetExhausted(turnCount: number, maxTurns: number): boolean {
  return maxTurns > 0 && turnCount >= maxTurns;
}
