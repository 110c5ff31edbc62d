/**
 * Tests for interview data model helpers.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  EXPERT_ROLES,
  GRADE_TARGETS,
  MAX_DIFFICULTY,
  MIN_DIFFICULTY,
  activeFlags,
  createEmptyFlags,
  createInitialInterviewState,
  currentTopic,
  isDifficultyLevel,
  isValidExpertRole,
  isValidGradeTarget,
} from './types.js';
import { TEST_INTAKE, TEST_TOPICS } from '../../test-fixtures/interview/collaborators.js';

describe('grade targets', () => {
  it('accepts every listed grade', () => {
    for (const grade of GRADE_TARGETS) {
      expect(isValidGradeTarget(grade)).toBe(true);
    }
  });

  it('rejects unknown and differently cased grades', () => {
    expect(isValidGradeTarget('lead')).toBe(false);
    expect(isValidGradeTarget('Middle')).toBe(false);
    expect(isValidGradeTarget('')).toBe(false);
  });
});

describe('expert roles', () => {
  it('accepts the five roles only', () => {
    expect(EXPERT_ROLES).toHaveLength(5);
    expect(isValidExpertRole('tech_lead')).toBe(true);
    expect(isValidExpertRole('manager')).toBe(false);
  });
});

describe('observer flags', () => {
  it('creates a new cleared set on every call', () => {
    const first = createEmptyFlags();
    const second = createEmptyFlags();

    expect(first).toEqual({
      off_topic: false,
      hallucination: false,
      role_reversal: false,
      contradiction: false,
    });
    expect(first).not.toBe(second);
    expect(activeFlags(first)).toEqual([]);
  });

  it('lists set flags in declaration order', () => {
    const flags = { ...createEmptyFlags(), role_reversal: true, off_topic: true };

    expect(activeFlags(flags)).toEqual(['off_topic', 'role_reversal']);
  });
});

describe('isDifficultyLevel', () => {
  it('accepts exactly the integer ranks between the bounds', () => {
    fc.assert(
      fc.property(fc.double({ min: -10, max: 10, noNaN: true }), (value) => {
        const expected = Number.isInteger(value) && value >= MIN_DIFFICULTY && value <= MAX_DIFFICULTY;
        expect(isDifficultyLevel(value)).toBe(expected);
      })
    );
  });
});

describe('createInitialInterviewState', () => {
  it('starts at the first topic with an empty log', () => {
    const state = createInitialInterviewState(TEST_INTAKE, TEST_TOPICS, 3);

    expect(state).toMatchObject({
      current_topic_index: 0,
      difficulty: 3,
      skill_ledger: {},
      turn_log: [],
      pending_expert_roles: [],
      stop_requested: false,
      last_question: '',
      final_feedback: null,
    });
    expect(state.planned_topics).toEqual(TEST_TOPICS);
    expect(state.planned_topics).not.toBe(TEST_TOPICS);
  });
});

describe('currentTopic', () => {
  it('returns the topic at the index and the last topic once exhausted', () => {
    const topics = ['a', 'b', 'c'];

    expect(currentTopic({ planned_topics: topics, current_topic_index: 1 })).toBe('b');
    expect(currentTopic({ planned_topics: topics, current_topic_index: 3 })).toBe('c');
    expect(currentTopic({ planned_topics: [], current_topic_index: 0 })).toBe('');
  });
});
