import { describe, it, expect, beforeEach } from 'vitest';
import { InterviewEngine, InterviewEngineError } from './engine.js';
import type { Observer, ObserverContext } from './collaborators.js';
import { parseInternalThoughts } from './thoughts.js';
import { evidenceCount } from './skill-ledger.js';
import { createEmptyFlags, type ObserverOutput } from './types.js';
import { getDefaultConfig } from '../config/parser.js';
import type { Config } from '../config/types.js';
import { Logger } from '../utils/logger.js';
import {
  TEST_INTAKE,
  TEST_TOPICS,
  createFakeCollaborators,
  makeObserverOutput,
  scriptedObserver,
  type FakeCollaborators,
} from '../../test-fixtures/interview/collaborators.js';

interface LoggedEvent {
  level: string;
  event: string;
  data?: Record<string, unknown>;
}

function setup(
  options: { observer?: Observer; topics?: readonly string[]; configure?: (config: Config) => void } = {}
): { engine: InterviewEngine; fakes: FakeCollaborators; events: LoggedEvent[] } {
  const config = getDefaultConfig();
  options.configure?.(config);
  const fakes = createFakeCollaborators({
    ...(options.observer !== undefined ? { observer: options.observer } : {}),
    ...(options.topics !== undefined ? { topics: options.topics } : {}),
  });
  const events: LoggedEvent[] = [];
  const logger = new Logger({
    component: 'InterviewEngine',
    sink: (line) => {
      const entry: LoggedEvent = JSON.parse(line);
      events.push(entry);
    },
  });
  return { engine: new InterviewEngine({ collaborators: fakes, config, logger }), fakes, events };
}

function eventNames(events: readonly LoggedEvent[]): string[] {
  return events.map((entry) => entry.event);
}

function sources(thoughts: string): string[] {
  return parseInternalThoughts(thoughts).map((fragment) => fragment.source);
}

const strongAnswer = makeObserverOutput({
  decision: { advance_topic: true },
  report: {
    answer_quality: 5,
    recommended_next_action: 'CHANGE_TOPIC',
    skills_delta: { python_basics: 0.3 },
    fact_check_notes: 'Correct explanation of the GIL',
  },
});

describe('InterviewEngine.start', () => {
  it('plans the topics and seals the kickoff turn', async () => {
    const { engine, fakes, events } = setup();

    const outcome = await engine.start(TEST_INTAKE);

    expect(outcome.kind).toBe('question');
    if (outcome.kind !== 'question') return;
    expect(outcome.turn).toMatchObject({
      turn_id: 1,
      user_message: '',
      topic: 'Python basics',
      difficulty_before: 3,
      difficulty_after: 3,
      answer_quality: null,
      strategy: 'kickoff',
      expert_roles: [],
      skills_delta: {},
    });
    expect(outcome.turn.agent_visible_message).toBe('Вопрос 1 по теме «Python basics» (kickoff)?');
    expect(sources(outcome.turn.internal_thoughts)).toEqual(['Observer', 'Interviewer']);

    const state = engine.getState();
    expect(state?.planned_topics).toEqual(TEST_TOPICS);
    expect(state?.last_question).toBe(outcome.turn.agent_visible_message);
    expect(state?.pending_expert_roles).toEqual([]);
    expect(fakes.observer.observe).toHaveBeenCalledWith(expect.objectContaining({ kickoff: true }));
    expect(eventNames(events)).toEqual(['session_started', 'turn_sealed']);
  });

  it('imposes kickoff defaults whatever the observer says', async () => {
    const noisy: Observer = {
      observe: () =>
        Promise.resolve(
          makeObserverOutput({
            decision: { expert_roles: ['qa'], advance_topic: true },
            report: {
              answer_quality: 0,
              flags: { ...createEmptyFlags(), hallucination: true },
              skills_delta: { async: -0.4 },
            },
          })
        ),
    };
    const { engine, fakes } = setup({ observer: noisy });

    const outcome = await engine.start(TEST_INTAKE);

    expect(outcome.kind === 'question' ? outcome.turn.flags : null).toEqual(createEmptyFlags());
    expect(fakes.expert.evaluate).not.toHaveBeenCalled();
    expect(engine.getState()?.skill_ledger).toEqual({});
    expect(engine.getState()?.current_topic_index).toBe(0);
  });

  it('still produces a kickoff turn when the observer fails', async () => {
    const failing: Observer = { observe: () => Promise.reject(new Error('model down')) };
    const { engine, events } = setup({ observer: failing });

    const outcome = await engine.start(TEST_INTAKE);

    expect(outcome.kind).toBe('question');
    expect(events.find((entry) => entry.event === 'observer_fallback')?.data).toEqual({
      kickoff: true,
      error: 'model down',
    });
  });

  it('refuses a plan without exactly ten topics', async () => {
    const { engine } = setup({ topics: TEST_TOPICS.slice(0, 9) });

    const error: unknown = await engine.start(TEST_INTAKE).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InterviewEngineError);
    expect(error).toMatchObject({ code: 'INVALID_TOPIC_PLAN', details: ['expected 10 topics, got 9'] });
    expect(engine.getState()).toBeNull();
    await expect(engine.submit('hello')).rejects.toMatchObject({ code: 'ENGINE_NOT_STARTED' });
  });

  it('refuses to start twice', async () => {
    const { engine } = setup();
    await engine.start(TEST_INTAKE);

    await expect(engine.start(TEST_INTAKE)).rejects.toMatchObject({ code: 'ALREADY_STARTED' });
  });
});

describe('InterviewEngine.submit', () => {
  it('raises difficulty and advances the topic after a strong answer', async () => {
    const { engine, events } = setup({ observer: scriptedObserver([strongAnswer]) });
    await engine.start(TEST_INTAKE);

    const outcome = await engine.submit('The GIL serializes bytecode execution.');

    expect(outcome.kind).toBe('question');
    if (outcome.kind !== 'question') return;
    expect(outcome.turn).toMatchObject({
      turn_id: 2,
      user_message: 'The GIL serializes bytecode execution.',
      topic: 'Async',
      difficulty_before: 3,
      difficulty_after: 4,
      answer_quality: 5,
      strategy: 'change_topic',
      skills_delta: { python_basics: 0.3 },
    });
    const state = engine.getState();
    expect(state?.current_topic_index).toBe(1);
    expect(state?.difficulty).toBe(4);
    expect(state?.skill_ledger.python_basics?.evidence).toEqual([
      { turn_id: 2, delta: 0.3, note: 'Correct explanation of the GIL' },
    ]);
    expect(eventNames(events)).toContain('difficulty_adjusted');
    expect(eventNames(events)).toContain('topic_advanced');
  });

  it('dispatches a repeated expert once', async () => {
    const repeated = makeObserverOutput({ decision: { expert_roles: ['qa', 'qa'] } });
    const { engine, fakes } = setup({ observer: scriptedObserver([repeated]) });
    await engine.start(TEST_INTAKE);

    const outcome = await engine.submit('I would add retries.');

    expect(fakes.expert.evaluate).toHaveBeenCalledTimes(1);
    expect(fakes.expert.evaluate.mock.calls[0]?.[0]).toBe('qa');
    if (outcome.kind !== 'question') throw new Error('expected a question');
    expect(outcome.turn.expert_roles).toEqual(['qa']);
  });

  it('drains selected experts and records them in the hidden thoughts', async () => {
    const withExperts = makeObserverOutput({ decision: { expert_roles: ['tech_lead', 'qa'] } });
    const { engine, fakes } = setup({ observer: scriptedObserver([withExperts]) });
    await engine.start(TEST_INTAKE);

    const outcome = await engine.submit('I would add retries.');

    expect(fakes.expert.evaluate).toHaveBeenCalledTimes(2);
    expect(fakes.expert.evaluate.mock.calls.map(([role]) => role)).toEqual(['tech_lead', 'qa']);
    if (outcome.kind !== 'question') throw new Error('expected a question');
    expect(outcome.turn.expert_roles).toEqual(['tech_lead', 'qa']);
    expect(parseInternalThoughts(outcome.turn.internal_thoughts)).toContainEqual({
      source: 'Expert:qa',
      content: 'qa comment Уточняющий вопрос: qa follow-up?',
    });
    expect(sources(outcome.turn.internal_thoughts)).toEqual([
      'Observer',
      'Expert:tech_lead',
      'Expert:qa',
      'Interviewer',
    ]);
    expect(engine.getState()?.pending_expert_roles).toEqual([]);
    expect(fakes.questionGenerator.generate).toHaveBeenLastCalledWith(
      expect.objectContaining({
        expert_evaluations: [
          { role: 'tech_lead', comment: 'tech_lead comment', question: 'tech_lead follow-up?' },
          { role: 'qa', comment: 'qa comment', question: 'qa follow-up?' },
        ],
      })
    );
  });

  it('does not carry flags into the next turn', async () => {
    const flagged = makeObserverOutput({
      report: {
        answer_quality: 1,
        flags: { ...createEmptyFlags(), hallucination: true },
        recommended_next_action: 'HANDLE_HALLUCINATION',
      },
    });
    const { engine } = setup({ observer: scriptedObserver([flagged, makeObserverOutput()]) });
    await engine.start(TEST_INTAKE);

    const second = await engine.submit('Python 4 removed the GIL.');
    const third = await engine.submit('Sorry, I meant 3.13 free-threading.');

    if (second.kind !== 'question' || third.kind !== 'question') throw new Error('expected questions');
    expect(second.turn.flags.hallucination).toBe(true);
    expect(second.turn.strategy).toBe('handle_hallucination');
    expect(second.turn.difficulty_after).toBe(3);
    expect(third.turn.flags).toEqual(createEmptyFlags());
  });

  it('falls back to a generic question when the generated one is invalid', async () => {
    const { engine, fakes, events } = setup();
    await engine.start(TEST_INTAKE);
    fakes.questionGenerator.generate.mockResolvedValueOnce('Why? And how?');

    const outcome = await engine.submit('An answer.');

    expect(outcome.kind === 'question' ? outcome.turn.agent_visible_message : '').toBe(
      'Какой у вас практический опыт в теме «Python basics»?'
    );
    expect(eventNames(events)).toContain('question_fallback');
  });

  it('passes only the recent turns window to collaborators', async () => {
    const { engine, fakes } = setup({ configure: (config) => (config.interview.recent_turns_window = 2) });
    await engine.start(TEST_INTAKE);
    await engine.submit('one');
    await engine.submit('two');
    await engine.submit('three');

    const lastContext = fakes.observer.observe.mock.calls.at(-1)?.[0];
    expect(lastContext?.recent_turns.map((turn) => turn.turn_id)).toEqual([2, 3]);
  });
});

describe('InterviewEngine termination', () => {
  let fakes: FakeCollaborators;
  let engine: InterviewEngine;

  beforeEach(async () => {
    ({ engine, fakes } = setup({ observer: scriptedObserver([strongAnswer]) }));
    await engine.start(TEST_INTAKE);
    await engine.submit('An answer.');
  });

  it('finalizes exactly once on a stop command', async () => {
    const outcome = await engine.submit('  Стоп ');

    expect(outcome).toMatchObject({ kind: 'finalized', reason: 'stop_requested' });
    expect(fakes.reportWriter.write).toHaveBeenCalledTimes(1);
    expect(engine.getState()?.turn_log).toHaveLength(2);
    expect(engine.isFinalized()).toBe(true);
    await expect(engine.submit('more')).rejects.toMatchObject({ code: 'INTERVIEW_COMPLETE' });
    expect(fakes.reportWriter.write).toHaveBeenCalledTimes(1);
  });

  it('does not observe the stop message', async () => {
    const callsBefore = fakes.observer.observe.mock.calls.length;

    await engine.submit('stop');

    expect(fakes.observer.observe.mock.calls.length).toBe(callsBefore);
  });

  it('falls back to the synthesizer when the report writer fails', async () => {
    fakes.reportWriter.write.mockRejectedValueOnce(new Error('model down'));

    const outcome = await engine.submit('stop');

    if (outcome.kind !== 'finalized') throw new Error('expected finalization');
    expect(outcome.feedback.hard_skills.confirmed.length).toBeGreaterThanOrEqual(3);
    expect(engine.getState()?.final_feedback).toBe(outcome.feedback);
  });
});

describe('InterviewEngine stop handling', () => {
  it('applies a stop requested during a cycle on the next cycle', async () => {
    let engineRef: InterviewEngine | undefined;
    const observer: Observer = {
      observe: (context: ObserverContext): Promise<ObserverOutput> => {
        if (!context.kickoff) {
          engineRef?.requestStop();
        }
        return Promise.resolve(makeObserverOutput());
      },
    };
    const { engine } = setup({ observer });
    engineRef = engine;
    await engine.start(TEST_INTAKE);

    const during = await engine.submit('An answer.');
    const after = await engine.submit('Another answer.');

    expect(during.kind).toBe('question');
    expect(after).toMatchObject({ kind: 'finalized', reason: 'stop_requested' });
    expect(engine.getState()?.turn_log).toHaveLength(2);
  });

  it('finishes without a candidate message when input ends', async () => {
    const { engine, fakes } = setup();
    await engine.start(TEST_INTAKE);

    const outcome = await engine.finish();

    expect(outcome).toMatchObject({ kind: 'finalized', reason: 'stop_requested' });
    expect(engine.getState()?.turn_log).toHaveLength(1);
    expect(fakes.reportWriter.write).toHaveBeenCalledTimes(1);
    await expect(engine.finish()).rejects.toMatchObject({ code: 'INTERVIEW_COMPLETE' });
  });

  it('stops once the turn budget is used up', async () => {
    const { engine, events } = setup({ configure: (config) => (config.interview.max_turns = 2) });
    await engine.start(TEST_INTAKE);

    expect((await engine.submit('first')).kind).toBe('question');
    expect((await engine.submit('second')).kind).toBe('finalized');
    expect(eventNames(events)).toContain('turn_budget_exhausted');
  });

  it('rejects a submit while a cycle is running', async () => {
    const gate: { release?: () => void } = {};
    const observer: Observer = {
      observe: (context: ObserverContext): Promise<ObserverOutput> =>
        context.kickoff
          ? Promise.resolve(makeObserverOutput())
          : new Promise((resolve) => {
              gate.release = () => resolve(makeObserverOutput());
            }),
    };
    const { engine } = setup({ observer });
    await engine.start(TEST_INTAKE);

    const pending = engine.submit('slow answer');
    await expect(engine.submit('impatient')).rejects.toMatchObject({ code: 'CYCLE_IN_PROGRESS' });
    gate.release?.();

    expect((await pending).kind).toBe('question');
  });
});

describe('InterviewEngine plan exhaustion', () => {
  it('finalizes after the last topic and discards the final delta', async () => {
    const { engine, fakes, events } = setup({
      observer: scriptedObserver([
        makeObserverOutput({
          decision: { advance_topic: true },
          report: { recommended_next_action: 'CHANGE_TOPIC', skills_delta: { testing: 0.1 } },
        }),
      ]),
    });
    await engine.start(TEST_INTAKE);

    for (let i = 0; i < 10; i++) {
      expect((await engine.submit(`answer ${String(i + 1)}`)).kind).toBe('question');
    }
    expect(engine.getState()?.current_topic_index).toBe(10);

    const outcome = await engine.submit('answer 11');

    expect(outcome).toMatchObject({ kind: 'finalized', reason: 'plan_exhausted' });
    const state = engine.getState();
    expect(state?.turn_log).toHaveLength(11);
    expect(state?.turn_log.map((turn) => turn.turn_id)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11]);
    expect(evidenceCount(state?.skill_ledger ?? {})).toBe(10);
    expect(fakes.reportWriter.write).toHaveBeenCalledTimes(1);
    expect(events.find((entry) => entry.event === 'final_delta_discarded')?.data).toEqual({
      skills_delta: { testing: 0.1 },
    });
  });
});
