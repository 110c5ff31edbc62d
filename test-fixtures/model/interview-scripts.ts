/**
 * Model replies for running a whole interview on the model-backed agents.
 */

import type { ModelAlias } from '../../src/model/types.js';
import type { ObserverOutput } from '../../src/interview/types.js';
import { TEST_TOPICS, makeObserverOutput } from '../interview/collaborators.js';
import type { ScriptedReply } from './router.js';

export const TEST_QUESTION = 'Как вы используете asyncio в своих проектах?';

export const TEST_NARRATIVE = {
  clarity: 'Отвечал коротко и по делу.',
  honesty: 'Честно признавал пробелы.',
  engagement: 'Задавал уточняющие вопросы.',
  next_steps: ['Разобрать устройство event loop.'],
};

/**
 * Scripts per alias: a ten-topic plan, the given observer outputs (neutral
 * by default), one interviewer question and a narrative rewrite.
 */
export function interviewScripts(
  observer: readonly ObserverOutput[] = [makeObserverOutput()]
): Partial<Record<ModelAlias, readonly ScriptedReply[]>> {
  return {
    planner: [JSON.stringify({ topics: TEST_TOPICS })],
    observer: observer.map((output) => JSON.stringify(output)),
    interviewer: [TEST_QUESTION],
    reporter: [JSON.stringify(TEST_NARRATIVE)],
  };
}
