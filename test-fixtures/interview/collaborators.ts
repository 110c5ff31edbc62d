/**
 * In-process collaborators for engine and scenario tests.
 *
 * Every collaborator is a `vi.fn` so tests can count and inspect calls.
 */

import { vi, type Mock } from 'vitest';
import type {
  Expert,
  InterviewCollaborators,
  Observer,
  ObserverContext,
  Planner,
  QuestionContext,
  QuestionGenerator,
  ReportWriter,
} from '../../src/interview/collaborators.js';
import { synthesize } from '../../src/interview/report.js';
import {
  createEmptyFlags,
  type ExpertRole,
  type InterviewIntake,
  type ObserverDecision,
  type ObserverOutput,
  type ObserverReport,
} from '../../src/interview/types.js';

export const TEST_TOPICS: readonly string[] = [
  'Python basics',
  'Async',
  'Databases',
  'Queues',
  'Observability',
  'Architecture',
  'Testing',
  'Caching',
  'Security',
  'RAG',
];

export const TEST_INTAKE: InterviewIntake = {
  participant_name: 'Test Candidate',
  position: 'Backend Developer',
  grade_target: 'middle',
  experience_summary: 'Three years building services',
};

/**
 * Builds a valid observer output with neutral defaults.
 */
export function makeObserverOutput(
  overrides: { decision?: Partial<ObserverDecision>; report?: Partial<ObserverReport> } = {}
): ObserverOutput {
  return {
    decision: {
      ask_deeper: false,
      advance_topic: false,
      expert_roles: [],
      ...overrides.decision,
    },
    report: {
      detected_topic: 'Python basics',
      answer_quality: 3,
      confidence: 0.8,
      flags: createEmptyFlags(),
      recommended_next_action: 'ASK_DEEPER',
      recommended_question_style: 'neutral',
      skills_delta: {},
      ...overrides.report,
    },
  };
}

/**
 * Observer that answers kickoff with defaults and replays the scripted
 * outputs for answered turns, repeating the last one when they run out.
 */
export function scriptedObserver(
  outputs: readonly ObserverOutput[]
): Observer & { observe: Mock<Observer['observe']> } {
  let index = 0;
  return {
    observe: vi.fn<Observer['observe']>((context: ObserverContext) => {
      if (context.kickoff) {
        return Promise.resolve(makeObserverOutput());
      }
      const output = outputs[Math.min(index, outputs.length - 1)] ?? makeObserverOutput();
      index++;
      return Promise.resolve(output);
    }),
  };
}

export interface FakeCollaborators extends InterviewCollaborators {
  readonly observer: Observer & { observe: Mock<Observer['observe']> };
  readonly planner: Planner & { plan: Mock<Planner['plan']> };
  readonly expert: Expert & { evaluate: Mock<Expert['evaluate']> };
  readonly questionGenerator: QuestionGenerator & { generate: Mock<QuestionGenerator['generate']> };
  readonly reportWriter: ReportWriter & { write: Mock<ReportWriter['write']> };
}

/**
 * Creates a full collaborator set.
 *
 * Questions are numbered so each turn's visible message is distinct; the
 * report writer runs the deterministic synthesizer. A given observer is
 * wrapped so its calls can be inspected too.
 */
export function createFakeCollaborators(
  options: { observer?: Observer; topics?: readonly string[] } = {}
): FakeCollaborators {
  let questionCount = 0;
  const observer = options.observer ?? scriptedObserver([]);
  return {
    planner: { plan: vi.fn<Planner['plan']>(() => Promise.resolve(options.topics ?? TEST_TOPICS)) },
    observer: {
      observe: vi.fn<Observer['observe']>((context: ObserverContext) => observer.observe(context)),
    },
    expert: {
      evaluate: vi.fn<Expert['evaluate']>((role: ExpertRole) =>
        Promise.resolve({ role, comment: `${role} comment`, question: `${role} follow-up?` })
      ),
    },
    questionGenerator: {
      generate: vi.fn<QuestionGenerator['generate']>((context: QuestionContext) => {
        questionCount++;
        return Promise.resolve(
          `Вопрос ${String(questionCount)} по теме «${context.current_topic}» (${context.strategy})?`
        );
      }),
    },
    reportWriter: {
      write: vi.fn<ReportWriter['write']>((snapshot, turnLog, context) =>
        Promise.resolve(synthesize(turnLog, snapshot, context))
      ),
    },
  };
}
