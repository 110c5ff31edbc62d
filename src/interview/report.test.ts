import { describe, it, expect } from 'vitest';
import { ReportSynthesisError, lowerGrade, summarizeFeedback, synthesize } from './report.js';
import type { ReportContext } from './collaborators.js';
import {
  createEmptyFlags,
  type FinalFeedback,
  type ObserverFlags,
  type SkillLedger,
  type TurnRecord,
} from './types.js';

const planned = [
  'Python basics',
  'Async',
  'Databases',
  'Queues',
  'Testing',
  'Observability',
  'Architecture',
  'Caching',
  'Security',
  'RAG',
];

function turn(
  id: number,
  topic: string,
  quality: number | null,
  flags: Partial<ObserverFlags> = {}
): TurnRecord {
  return {
    turn_id: id,
    agent_visible_message: `Question ${String(id)}?`,
    user_message: quality === null ? '' : `Answer ${String(id)}`,
    internal_thoughts: '[Observer]: x\n[Interviewer]: y',
    topic,
    difficulty_before: 3,
    difficulty_after: 3,
    flags: { ...createEmptyFlags(), ...flags },
    skills_delta: {},
    answer_quality: quality,
    strategy: 'deepen',
    expert_roles: [],
  };
}

function context(overrides: Partial<ReportContext> = {}): ReportContext {
  return {
    intake: {
      participant_name: 'Test Candidate',
      position: 'Backend Developer',
      grade_target: 'middle',
      experience_summary: 'Services and queues',
    },
    planned_topics: planned,
    current_topic_index: 2,
    topics_covered: [],
    confirmed_threshold: 0.6,
    gap_threshold: 0.2,
    ...overrides,
  };
}

const turnLog: TurnRecord[] = [
  turn(1, 'Python basics', null),
  turn(2, 'Python basics', 5),
  turn(3, 'Async', 2, { hallucination: true }),
  turn(4, 'Databases', 4),
];

const ledger: SkillLedger = {
  python_basics: { score: 0.8, evidence: [{ turn_id: 2, delta: 0.3, note: 'Explained the GIL' }] },
  async: {
    score: 0.1,
    evidence: [{ turn_id: 3, delta: -0.4, note: 'asyncio.run creates a new event loop' }],
  },
  db_modeling: {
    score: 0.45,
    evidence: [
      { turn_id: 4, delta: 0.1, note: 'Normalized schema' },
      { turn_id: 4, delta: -0.15, note: 'Missed index' },
    ],
  },
};

function citedTurnIds(feedback: FinalFeedback): number[] {
  return [
    ...feedback.hard_skills.confirmed.flatMap((item) => item.turn_ids),
    ...feedback.hard_skills.gaps.flatMap((item) => item.turn_ids),
    ...feedback.soft_skills.examples.flatMap((item) => item.turn_ids),
  ];
}

describe('synthesize', () => {
  const feedback = synthesize(turnLog, ledger, context());

  it('draws strengths from confirmed skills, positive evidence and clean answers', () => {
    expect(feedback.hard_skills.confirmed).toEqual([
      {
        subject: 'python_basics',
        statement: 'Confirmed python_basics (score 0.80).',
        basis: 'confirmed_skill',
        turn_ids: [2],
      },
      {
        subject: 'db_modeling',
        statement: 'Showed progress in db_modeling: Normalized schema',
        basis: 'positive_evidence',
        turn_ids: [4],
      },
      {
        subject: 'Python basics',
        statement: 'Gave a solid answer on Python basics.',
        basis: 'clean_answer',
        turn_ids: [2],
      },
      {
        subject: 'Databases',
        statement: 'Gave a solid answer on Databases.',
        basis: 'clean_answer',
        turn_ids: [4],
      },
    ]);
  });

  it('draws gaps from gap skills, negative evidence, flagged answers and unreached topics', () => {
    expect(
      feedback.hard_skills.gaps.map((gap) => [gap.subject, gap.basis, gap.turn_ids, gap.correct_answer])
    ).toEqual([
      ['async', 'skill_gap', [3], 'asyncio.run creates a new event loop'],
      ['db_modeling', 'negative_evidence', [4], 'Missed index'],
      [
        'Async',
        'flagged_answer',
        [3],
        'Check claims about Async against official documentation before stating them.',
      ],
      ['Queues', 'unreached_topic', [4], 'Prepare Queues for the next interview.'],
      ['Testing', 'unreached_topic', [4], 'Prepare Testing for the next interview.'],
    ]);
  });

  it('decides from the mean evidenced score', () => {
    expect(feedback.decision).toEqual({
      grade: 'junior',
      recommendation: 'lean_no_hire',
      confidence_score: 0.4,
    });
  });

  it('describes soft skills with turn references', () => {
    expect(feedback.soft_skills).toEqual({
      clarity: 'Answers were mostly clear, with some gaps in structure.',
      honesty: 'Made unsupported claims in 1 answer(s).',
      engagement: 'Stayed engaged with the questions.',
      examples: [{ statement: 'Turn 3: hallucination on Async.', turn_ids: [3] }],
    });
  });

  it('only cites turns that exist', () => {
    const ids = new Set(turnLog.map((t) => t.turn_id));
    expect(citedTurnIds(feedback).every((id) => ids.has(id))).toBe(true);
  });

  it('is deterministic', () => {
    expect(synthesize(turnLog, ledger, context())).toEqual(feedback);
  });

  it('pads thin sessions with insufficient-evidence items citing the latest turn', () => {
    const thin = synthesize([turn(1, 'Python basics', null)], {}, context({ current_topic_index: 0 }));

    expect(thin.hard_skills.confirmed.map((item) => [item.subject, item.basis, item.turn_ids])).toEqual([
      ['insufficient_evidence_1', 'insufficient_evidence', [1]],
      ['insufficient_evidence_2', 'insufficient_evidence', [1]],
      ['insufficient_evidence_3', 'insufficient_evidence', [1]],
    ]);
    expect(thin.hard_skills.gaps.map((item) => item.subject)).toEqual([
      'Async',
      'Databases',
      'Queues',
      'Testing',
      'Observability',
    ]);
    expect(thin.decision).toEqual({
      grade: 'junior',
      recommendation: 'lean_no_hire',
      confidence_score: 0,
    });
    expect(thin.soft_skills.clarity).toBe('Not enough answers to judge clarity.');
    expect(thin.soft_skills.examples).toEqual([
      { statement: 'Only the opening question was asked.', turn_ids: [1] },
    ]);
  });

  it('recommends hiring at the target grade for strong evidence', () => {
    const strong: SkillLedger = {
      testing: { score: 0.9, evidence: [{ turn_id: 2, delta: 0.4, note: 'a' }] },
      sql: { score: 0.7, evidence: [{ turn_id: 2, delta: 0.2, note: 'b' }] },
    };

    expect(synthesize(turnLog, strong, context()).decision).toEqual({
      grade: 'middle',
      recommendation: 'hire',
      confidence_score: 0.2,
    });
  });

  it('rejects an empty log', () => {
    expect(() => synthesize([], {}, context())).toThrow(ReportSynthesisError);
  });
});

describe('lowerGrade', () => {
  it('steps down one grade and stops at intern', () => {
    expect(lowerGrade('senior')).toBe('middle');
    expect(lowerGrade('intern')).toBe('intern');
  });
});

describe('summarizeFeedback', () => {
  it('renders a single paragraph', () => {
    expect(summarizeFeedback(synthesize(turnLog, ledger, context()))).toBe(
      'Grade: junior. Recommendation: lean_no_hire. Confidence: 0.40. ' +
        'Confirmed: python_basics, db_modeling, Python basics, Databases. ' +
        'Gaps: async, db_modeling, Async, Queues, Testing. ' +
        'Next steps: asyncio.run creates a new event loop; Missed index; ' +
        'Check claims about Async against official documentation before stating them; ' +
        'Prepare Queues for the next interview; Prepare Testing for the next interview.'
    );
  });
});
