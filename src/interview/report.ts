/**
 * Report synthesizer.
 *
 * Turns the turn log and the skill ledger into the final evaluation. The
 * result depends only on its inputs: the same session always yields the same
 * feedback, and every statement cites turns that exist in the log.
 *
 * @packageDocumentation
 */

import type { ReportContext } from './collaborators.js';
import { confirmedSkills, evidenceCount, gapSkills, getSkillEntry } from './skill-ledger.js';
import {
  GRADE_TARGETS,
  activeFlags,
  type FeedbackItem,
  type FinalFeedback,
  type GapItem,
  type GradeTarget,
  type HiringRecommendation,
  type ObserverFlagName,
  type SkillEvidence,
  type SkillLedger,
  type SoftSkillExample,
  type TurnRecord,
} from './types.js';

/**
 * Fewest items in a strength or gap list.
 */
export const MIN_FEEDBACK_ITEMS = 3;

/**
 * Most items in a strength or gap list.
 */
export const MAX_FEEDBACK_ITEMS = 5;

/**
 * Evidence count at which confidence reaches 1.
 */
export const FULL_CONFIDENCE_EVIDENCE = 10;

/**
 * Answer quality a flag-free turn needs to count as a strength.
 */
export const CLEAN_ANSWER_QUALITY = 4;

/**
 * Error thrown when feedback cannot be synthesized.
 */
export class ReportSynthesisError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReportSynthesisError';
  }
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function uniqueSorted(ids: readonly number[]): number[] {
  return [...new Set(ids)].sort((a, b) => a - b);
}

function evidenceTurns(evidence: readonly SkillEvidence[], sign: 1 | -1): number[] {
  const matching = evidence.filter((item) => Math.sign(item.delta) === sign);
  return uniqueSorted((matching.length > 0 ? matching : evidence).map((item) => item.turn_id));
}

function strongestNote(evidence: readonly SkillEvidence[], sign: 1 | -1): string {
  let best: SkillEvidence | undefined;
  for (const item of evidence) {
    if (Math.sign(item.delta) !== sign || item.note.trim() === '') {
      continue;
    }
    if (best === undefined || Math.abs(item.delta) > Math.abs(best.delta)) {
      best = item;
    }
  }
  return best?.note.trim() ?? '';
}

function studyNote(skill: string): string {
  return `Review the fundamentals of ${skill} and practise explaining them with a concrete example.`;
}

const FLAG_CORRECTIONS: Readonly<Record<ObserverFlagName, (topic: string) => string>> = {
  hallucination: (topic) =>
    `Check claims about ${topic} against official documentation before stating them.`,
  off_topic: (topic) => `Answer the question asked about ${topic} before widening the discussion.`,
  role_reversal: (topic) => `Answer the question about ${topic} first, then ask about the team.`,
  contradiction: (topic) => `Keep statements about ${topic} consistent across answers.`,
};

function pushUnique<T extends FeedbackItem>(items: T[], item: T): void {
  if (items.length < MAX_FEEDBACK_ITEMS && !items.some((existing) => existing.subject === item.subject)) {
    items.push(item);
  }
}

function collectStrengths(turnLog: readonly TurnRecord[], ledger: SkillLedger, threshold: number): FeedbackItem[] {
  const items: FeedbackItem[] = [];
  const confirmed = confirmedSkills(ledger, threshold).sort(
    (a, b) =>
      (getSkillEntry(ledger, b)?.score ?? 0) - (getSkillEntry(ledger, a)?.score ?? 0) ||
      a.localeCompare(b)
  );

  for (const skill of confirmed) {
    const entry = getSkillEntry(ledger, skill);
    if (entry === undefined) {
      continue;
    }
    pushUnique(items, {
      subject: skill,
      statement: `Confirmed ${skill} (score ${entry.score.toFixed(2)}).`,
      basis: 'confirmed_skill',
      turn_ids: evidenceTurns(entry.evidence, 1),
    });
  }

  for (const [skill, entry] of Object.entries(ledger).sort(([a], [b]) => a.localeCompare(b))) {
    if (confirmed.includes(skill) || !entry.evidence.some((item) => item.delta > 0)) {
      continue;
    }
    const note = strongestNote(entry.evidence, 1);
    pushUnique(items, {
      subject: skill,
      statement: note === '' ? `Showed progress in ${skill}.` : `Showed progress in ${skill}: ${note}`,
      basis: 'positive_evidence',
      turn_ids: evidenceTurns(entry.evidence, 1),
    });
  }

  for (const turn of turnLog) {
    if (
      turn.answer_quality !== null &&
      turn.answer_quality >= CLEAN_ANSWER_QUALITY &&
      activeFlags(turn.flags).length === 0
    ) {
      pushUnique(items, {
        subject: turn.topic,
        statement: `Gave a solid answer on ${turn.topic}.`,
        basis: 'clean_answer',
        turn_ids: [turn.turn_id],
      });
    }
  }

  return items;
}

function collectGaps(
  turnLog: readonly TurnRecord[],
  ledger: SkillLedger,
  context: ReportContext,
  latestTurnId: number
): GapItem[] {
  const items: GapItem[] = [];
  const gaps = gapSkills(ledger, context.gap_threshold).sort(
    (a, b) =>
      (getSkillEntry(ledger, a)?.score ?? 0) - (getSkillEntry(ledger, b)?.score ?? 0) ||
      a.localeCompare(b)
  );

  for (const skill of gaps) {
    const entry = getSkillEntry(ledger, skill);
    if (entry === undefined) {
      continue;
    }
    const note = strongestNote(entry.evidence, -1);
    pushUnique(items, {
      subject: skill,
      statement: `Weak ${skill} (score ${entry.score.toFixed(2)}).`,
      basis: 'skill_gap',
      turn_ids: evidenceTurns(entry.evidence, -1),
      correct_answer: note === '' ? studyNote(skill) : note,
    });
  }

  for (const [skill, entry] of Object.entries(ledger).sort(([a], [b]) => a.localeCompare(b))) {
    if (gaps.includes(skill) || !entry.evidence.some((item) => item.delta < 0)) {
      continue;
    }
    const note = strongestNote(entry.evidence, -1);
    pushUnique(items, {
      subject: skill,
      statement: `Struggled with parts of ${skill}.`,
      basis: 'negative_evidence',
      turn_ids: evidenceTurns(entry.evidence, -1),
      correct_answer: note === '' ? studyNote(skill) : note,
    });
  }

  for (const turn of turnLog) {
    const [firstFlag, ...otherFlags] = activeFlags(turn.flags);
    if (firstFlag === undefined) {
      continue;
    }
    pushUnique(items, {
      subject: turn.topic,
      statement: `Answer on ${turn.topic} was flagged: ${[firstFlag, ...otherFlags].join(', ')}.`,
      basis: 'flagged_answer',
      turn_ids: [turn.turn_id],
      correct_answer: FLAG_CORRECTIONS[firstFlag](turn.topic),
    });
  }

  for (const topic of context.planned_topics.slice(context.current_topic_index + 1)) {
    pushUnique(items, {
      subject: topic,
      statement: `Topic not reached: ${topic}.`,
      basis: 'unreached_topic',
      turn_ids: [latestTurnId],
      correct_answer: `Prepare ${topic} for the next interview.`,
    });
  }

  return items;
}

function padItems<T extends FeedbackItem>(items: T[], makePad: (index: number) => T): T[] {
  const padded = [...items];
  while (padded.length < MIN_FEEDBACK_ITEMS) {
    padded.push(makePad(padded.length + 1));
  }
  return padded;
}

function decide(
  ledger: SkillLedger,
  gradeTarget: GradeTarget
): FinalFeedback['decision'] {
  const evidenced = Object.values(ledger).filter((entry) => entry.evidence.length > 0);
  const count = evidenceCount(ledger);
  if (evidenced.length === 0) {
    return { grade: lowerGrade(gradeTarget), recommendation: 'lean_no_hire', confidence_score: 0 };
  }

  const mean = evidenced.reduce((sum, entry) => sum + entry.score, 0) / evidenced.length;
  let recommendation: HiringRecommendation;
  if (mean >= 0.65) {
    recommendation = 'hire';
  } else if (mean >= 0.5) {
    recommendation = 'lean_hire';
  } else if (mean >= 0.35) {
    recommendation = 'lean_no_hire';
  } else {
    recommendation = 'no_hire';
  }

  const positive = recommendation === 'hire' || recommendation === 'lean_hire';
  return {
    grade: positive ? gradeTarget : lowerGrade(gradeTarget),
    recommendation,
    confidence_score: round2(Math.min(1, count / FULL_CONFIDENCE_EVIDENCE)),
  };
}

/**
 * Returns the grade one step below, stopping at intern.
 */
export function lowerGrade(grade: GradeTarget): GradeTarget {
  const index = GRADE_TARGETS.indexOf(grade);
  return GRADE_TARGETS[Math.max(0, index - 1)] ?? grade;
}

function flaggedTurns(turnLog: readonly TurnRecord[], flag: ObserverFlagName): TurnRecord[] {
  return turnLog.filter((turn) => turn.flags[flag]);
}

function describeSoftSkills(
  turnLog: readonly TurnRecord[],
  latestTurnId: number
): FinalFeedback['soft_skills'] {
  const answered = turnLog.filter((turn) => turn.answer_quality !== null);
  const qualities = answered.map((turn) => turn.answer_quality ?? 0);
  const meanQuality =
    qualities.length > 0 ? qualities.reduce((sum, value) => sum + value, 0) / qualities.length : 0;

  let clarity: string;
  if (answered.length === 0) {
    clarity = 'Not enough answers to judge clarity.';
  } else if (meanQuality >= 4) {
    clarity = 'Answers were clear and well structured.';
  } else if (meanQuality >= 2.5) {
    clarity = 'Answers were mostly clear, with some gaps in structure.';
  } else {
    clarity = 'Answers were often unclear or incomplete.';
  }

  const hallucinations = flaggedTurns(turnLog, 'hallucination').length;
  const contradictions = flaggedTurns(turnLog, 'contradiction').length;
  let honesty =
    hallucinations === 0
      ? 'No unsupported claims detected.'
      : `Made unsupported claims in ${String(hallucinations)} answer(s).`;
  if (contradictions > 0) {
    honesty += ` Contradicted earlier statements in ${String(contradictions)} answer(s).`;
  }

  const reversals = flaggedTurns(turnLog, 'role_reversal').length;
  const drifts = flaggedTurns(turnLog, 'off_topic').length;
  const engagementParts: string[] = [];
  if (reversals > 0) {
    engagementParts.push('Asked about the team and the role, showing interest in the position.');
  }
  if (drifts > 0) {
    engagementParts.push(`Drifted off topic in ${String(drifts)} answer(s).`);
  }
  const engagement =
    engagementParts.length > 0 ? engagementParts.join(' ') : 'Stayed engaged with the questions.';

  const examples: SoftSkillExample[] = turnLog
    .filter((turn) => activeFlags(turn.flags).length > 0)
    .slice(0, 3)
    .map((turn) => ({
      statement: `Turn ${String(turn.turn_id)}: ${activeFlags(turn.flags).join(', ')} on ${turn.topic}.`,
      turn_ids: [turn.turn_id],
    }));

  if (examples.length === 0) {
    const best = [...answered].sort(
      (a, b) => (b.answer_quality ?? 0) - (a.answer_quality ?? 0) || a.turn_id - b.turn_id
    )[0];
    examples.push(
      best === undefined
        ? { statement: 'Only the opening question was asked.', turn_ids: [latestTurnId] }
        : {
            statement: `Turn ${String(best.turn_id)}: strongest answer, on ${best.topic}.`,
            turn_ids: [best.turn_id],
          }
    );
  }

  return { clarity, honesty, engagement, examples };
}

/**
 * Builds the final evaluation.
 *
 * Strengths come from confirmed skills, then other positive evidence, then
 * clean answers. Growth areas come from gap skills, then negative evidence,
 * then flagged answers, then planned topics never reached. Both lists hold
 * three to five items; missing items are filled with insufficient-evidence
 * entries that cite the latest turn.
 *
 * @param turnLog - Sealed turns, at least one.
 * @param ledger - Skill ledger snapshot.
 * @param context - Intake, plan position and thresholds.
 * @throws ReportSynthesisError if the log is empty.
 */
export function synthesize(
  turnLog: readonly TurnRecord[],
  ledger: SkillLedger,
  context: ReportContext
): FinalFeedback {
  const latest = turnLog.at(-1);
  if (latest === undefined) {
    throw new ReportSynthesisError('Cannot synthesize feedback without any turns');
  }
  const latestTurnId = latest.turn_id;

  const confirmed = padItems(
    collectStrengths(turnLog, ledger, context.confirmed_threshold),
    (index): FeedbackItem => ({
      subject: `insufficient_evidence_${String(index)}`,
      statement: 'Not enough evidence was collected to name another strength.',
      basis: 'insufficient_evidence',
      turn_ids: [latestTurnId],
    })
  );

  const gaps = padItems(
    collectGaps(turnLog, ledger, context, latestTurnId),
    (index): GapItem => ({
      subject: `insufficient_evidence_${String(index)}`,
      statement: 'Not enough evidence was collected to name another growth area.',
      basis: 'insufficient_evidence',
      turn_ids: [latestTurnId],
      correct_answer: `Practise ${context.intake.position} interview questions at the ${context.intake.grade_target} level.`,
    })
  );

  const nextSteps = [
    ...new Set(
      gaps.filter((gap) => gap.basis !== 'insufficient_evidence').map((gap) => gap.correct_answer)
    ),
  ];

  return {
    decision: decide(ledger, context.intake.grade_target),
    hard_skills: { confirmed, gaps },
    soft_skills: describeSoftSkills(turnLog, latestTurnId),
    roadmap: {
      next_steps:
        nextSteps.length > 0
          ? nextSteps
          : [`Keep deepening ${context.intake.grade_target}-level ${context.intake.position} skills.`],
    },
  };
}

/**
 * Renders the feedback as one paragraph for display.
 *
 * @example
 * ```typescript
 * summarizeFeedback(feedback);
 * // 'Grade: middle. Recommendation: lean_hire. Confidence: 0.40. Confirmed: sql, async, testing. ...'
 * ```
 */
export function summarizeFeedback(feedback: FinalFeedback): string {
  const subjects = (items: readonly FeedbackItem[]): string =>
    items.map((item) => item.subject).join(', ');
  return [
    `Grade: ${feedback.decision.grade}.`,
    `Recommendation: ${feedback.decision.recommendation}.`,
    `Confidence: ${feedback.decision.confidence_score.toFixed(2)}.`,
    `Confirmed: ${subjects(feedback.hard_skills.confirmed)}.`,
    `Gaps: ${subjects(feedback.hard_skills.gaps)}.`,
    `Next steps: ${feedback.roadmap.next_steps.map((step) => step.replace(/\.$/, '')).join('; ')}.`,
  ].join(' ');
}
