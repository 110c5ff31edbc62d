/**
 * Difficulty controller.
 *
 * @packageDocumentation
 */

import {
  MAX_DIFFICULTY,
  MIN_DIFFICULTY,
  type DifficultyLevel,
  type ObserverFlagName,
  type ObserverFlags,
} from './types.js';

/**
 * Quality thresholds on the 0-5 answer scale.
 */
export interface DifficultyThresholds {
  /** Quality at or above which difficulty goes up. */
  readonly raise: number;
  /** Quality at or below which difficulty goes down. */
  readonly lower: number;
}

/**
 * Default thresholds.
 */
export const DEFAULT_DIFFICULTY_THRESHOLDS: DifficultyThresholds = {
  raise: 4,
  lower: 2,
};

/**
 * Flags that hold difficulty where it is for the turn.
 */
export const FREEZING_FLAGS: readonly ObserverFlagName[] = [
  'off_topic',
  'hallucination',
  'role_reversal',
] as const;

/**
 * Clamps any number to a valid difficulty rank.
 */
export function clampDifficulty(value: number): DifficultyLevel {
  const rounded = Math.round(value);
  if (Number.isNaN(rounded) || rounded <= MIN_DIFFICULTY) {
    return MIN_DIFFICULTY;
  }
  if (rounded >= MAX_DIFFICULTY) {
    return MAX_DIFFICULTY;
  }
  switch (rounded) {
    case 2:
      return 2;
    case 3:
      return 3;
    default:
      return 4;
  }
}

/**
 * Computes the difficulty for the next question.
 *
 * Moves one rank up for a strong answer and one rank down for a weak one,
 * unless a freezing flag is set. The result stays within 1..5.
 *
 * @param difficulty - Current rank.
 * @param answerQuality - Observer quality score.
 * @param flags - This turn's flags.
 * @param thresholds - Raise and lower thresholds.
 */
export function adjustDifficulty(
  difficulty: DifficultyLevel,
  answerQuality: number,
  flags: ObserverFlags,
  thresholds: DifficultyThresholds = DEFAULT_DIFFICULTY_THRESHOLDS
): DifficultyLevel {
  if (FREEZING_FLAGS.some((flag) => flags[flag])) {
    return difficulty;
  }
  if (answerQuality >= thresholds.raise) {
    return clampDifficulty(difficulty + 1);
  }
  if (answerQuality <= thresholds.lower) {
    return clampDifficulty(difficulty - 1);
  }
  return difficulty;
}
