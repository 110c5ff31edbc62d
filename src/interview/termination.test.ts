import { describe, it, expect } from 'vitest';
import { isStopCommand, isTurnBudgetExhausted, normalizeCommand } from './termination.js';

describe('isStopCommand', () => {
  it('matches the default commands regardless of case and spacing', () => {
    expect(isStopCommand('stop')).toBe(true);
    expect(isStopCommand('  STOP ')).toBe(true);
    expect(isStopCommand('Стоп')).toBe(true);
    expect(isStopCommand('стоп   интервью')).toBe(true);
  });

  it('does not match messages that merely contain a command', () => {
    expect(isStopCommand('stop and think')).toBe(false);
    expect(isStopCommand('I would stop the worker')).toBe(false);
    expect(isStopCommand('')).toBe(false);
  });

  it('uses configured commands', () => {
    expect(isStopCommand('finish', ['finish'])).toBe(true);
    expect(isStopCommand('stop', ['finish'])).toBe(false);
  });
});

describe('normalizeCommand', () => {
  it('trims, collapses whitespace and lower-cases', () => {
    expect(normalizeCommand('  Стоп \t Интервью\n')).toBe('стоп интервью');
  });
});

describe('isTurnBudgetExhausted', () => {
  it('compares the turn count with the budget', () => {
    expect(isTurnBudgetExhausted(39, 40)).toBe(false);
    expect(isTurnBudgetExhausted(40, 40)).toBe(true);
    expect(isTurnBudgetExhausted(1000, 0)).toBe(false);
  });
});
