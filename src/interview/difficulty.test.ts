import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { adjustDifficulty, clampDifficulty, FREEZING_FLAGS } from './difficulty.js';
import { createEmptyFlags, isDifficultyLevel, type DifficultyLevel } from './types.js';

const levels: DifficultyLevel[] = [1, 2, 3, 4, 5];

describe('clampDifficulty', () => {
  it('rounds and clamps to 1..5', () => {
    expect(clampDifficulty(0)).toBe(1);
    expect(clampDifficulty(2.4)).toBe(2);
    expect(clampDifficulty(3.6)).toBe(4);
    expect(clampDifficulty(9)).toBe(5);
    expect(clampDifficulty(Number.NaN)).toBe(1);
  });
});

describe('adjustDifficulty', () => {
  it('raises on a strong answer', () => {
    expect(adjustDifficulty(3, 5, createEmptyFlags())).toBe(4);
    expect(adjustDifficulty(3, 4, createEmptyFlags())).toBe(4);
  });

  it('lowers on a weak answer', () => {
    expect(adjustDifficulty(3, 2, createEmptyFlags())).toBe(2);
    expect(adjustDifficulty(3, 0, createEmptyFlags())).toBe(2);
  });

  it('holds on a middling answer', () => {
    expect(adjustDifficulty(3, 3, createEmptyFlags())).toBe(3);
  });

  it('stays at the boundaries', () => {
    expect(adjustDifficulty(5, 5, createEmptyFlags())).toBe(5);
    expect(adjustDifficulty(1, 1, createEmptyFlags())).toBe(1);
  });

  it('freezes on off-topic, hallucination and role reversal', () => {
    for (const flag of FREEZING_FLAGS) {
      const flags = { ...createEmptyFlags(), [flag]: true };
      expect(adjustDifficulty(3, 5, flags)).toBe(3);
      expect(adjustDifficulty(3, 1, flags)).toBe(3);
    }
  });

  it('does not freeze on a contradiction', () => {
    expect(adjustDifficulty(3, 1, { ...createEmptyFlags(), contradiction: true })).toBe(2);
  });

  it('uses the given thresholds', () => {
    expect(adjustDifficulty(3, 3, createEmptyFlags(), { raise: 3, lower: 1 })).toBe(4);
  });

  it('moves at most one rank and stays in range (property-based)', () => {
    fc.assert(
      fc.property(
        fc.constantFrom(...levels),
        fc.double({ min: 0, max: 5, noNaN: true }),
        fc.boolean(),
        (level, quality, contradiction) => {
          const next = adjustDifficulty(level, quality, { ...createEmptyFlags(), contradiction });
          expect(isDifficultyLevel(next)).toBe(true);
          expect(Math.abs(next - level)).toBeLessThanOrEqual(1);
        }
      )
    );
  });
});
