/**
 * Skill ledger: running per-skill scores with their evidence trail.
 *
 * All operations are pure and return new ledgers.
 *
 * @packageDocumentation
 */

import type { SkillEvidence, SkillLedger, SkillLedgerEntry } from './types.js';

/**
 * Largest magnitude a single delta may have.
 */
export const MAX_SKILL_DELTA = 0.4;

/**
 * Default neutral prior for a skill's first evidence.
 */
export const DEFAULT_INITIAL_SKILL_SCORE = 0.5;

/**
 * Error thrown when a delta cannot be applied.
 */
export class SkillLedgerError extends Error {
  /** Skill whose delta was rejected. */
  public readonly skill: string;
  /** The rejected value. */
  public readonly delta: number;

  constructor(message: string, skill: string, delta: number) {
    super(message);
    this.name = 'SkillLedgerError';
    this.skill = skill;
    this.delta = delta;
  }
}

/**
 * Clamps a value to the closed unit interval.
 */
export function clampScore(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Stores a value under a skill id as an own property.
 *
 * Skill ids come from model output, so `__proto__` is a possible id. Plain
 * assignment would replace the record's prototype instead of adding a key.
 */
export function setSkillValue<T>(record: Record<string, T>, skill: string, value: T): void {
  Object.defineProperty(record, skill, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * Reads a skill's entry, ignoring anything inherited.
 */
export function getSkillEntry(ledger: SkillLedger, skill: string): SkillLedgerEntry | undefined {
  return Object.hasOwn(ledger, skill) ? ledger[skill] : undefined;
}

/**
 * Options for applying deltas.
 */
export interface ApplySkillDeltaOptions {
  /** Score assumed for skills without an entry. */
  readonly initialScore?: number | undefined;
}

/**
 * Applies one turn's skill deltas to the ledger.
 *
 * Each mentioned skill gets `clamp(old + delta)` and an evidence entry holding
 * the raw, unclamped delta. Unmentioned skills keep their entries unchanged.
 *
 * @param ledger - Current ledger.
 * @param skillsDelta - Skill id to signed delta.
 * @param turnId - Turn the evidence belongs to.
 * @param note - Short justification stored with the evidence.
 * @param options - Neutral prior for unseen skills.
 * @returns A new ledger.
 * @throws SkillLedgerError if a delta is not a finite number.
 *
 * @example
 * ```typescript
 * const next = applySkillDelta({}, { testing: 0.2 }, 3, 'explained fixtures');
 * next.testing?.score; // 0.7
 * ```
 */
export function applySkillDelta(
  ledger: SkillLedger,
  skillsDelta: Readonly<Record<string, number>>,
  turnId: number,
  note: string,
  options: ApplySkillDeltaOptions = {}
): SkillLedger {
  const initialScore = options.initialScore ?? DEFAULT_INITIAL_SKILL_SCORE;
  const next: Record<string, SkillLedgerEntry> = { ...ledger };

  for (const [skill, delta] of Object.entries(skillsDelta)) {
    if (!Number.isFinite(delta)) {
      throw new SkillLedgerError(
        `Delta for skill '${skill}' must be a finite number, got ${String(delta)}`,
        skill,
        delta
      );
    }

    const previous = getSkillEntry(next, skill);
    const evidence: SkillEvidence = { turn_id: turnId, delta, note };
    setSkillValue(next, skill, {
      score: clampScore((previous?.score ?? initialScore) + delta),
      evidence: [...(previous?.evidence ?? []), evidence],
    });
  }

  return next;
}

/**
 * Lists skills with evidence whose score is at or above the threshold.
 */
export function confirmedSkills(ledger: SkillLedger, threshold: number): string[] {
  return Object.entries(ledger)
    .filter(([, entry]) => entry.evidence.length > 0 && entry.score >= threshold)
    .map(([skill]) => skill);
}

/**
 * Lists skills with evidence whose score is at or below the threshold.
 */
export function gapSkills(ledger: SkillLedger, threshold: number): string[] {
  return Object.entries(ledger)
    .filter(([, entry]) => entry.evidence.length > 0 && entry.score <= threshold)
    .map(([skill]) => skill);
}

/**
 * Total number of evidence entries across all skills.
 */
export function evidenceCount(ledger: SkillLedger): number {
  return Object.values(ledger).reduce((sum, entry) => sum + entry.evidence.length, 0);
}

/**
 * Compact skill id to score view, rounded to two decimals.
 */
export function skillScores(ledger: SkillLedger): Record<string, number> {
  const scores: Record<string, number> = {};
  for (const [skill, entry] of Object.entries(ledger)) {
    setSkillValue(scores, skill, Math.round(entry.score * 100) / 100);
  }
  return scores;
}
