/**
 * Boundary validation for collaborator output.
 *
 * Collaborators are outside the engine's control. Whatever they return is
 * checked here and reduced to safe defaults when it is malformed, so the turn
 * cycle never stalls on bad output and the candidate never sees an error.
 *
 * @packageDocumentation
 */

import { dedupeRoles } from './expert-queue.js';
import { MAX_SKILL_DELTA, setSkillValue } from './skill-ledger.js';
import { checkSchema } from './schemas.js';
import {
  PLANNED_TOPIC_COUNT,
  createEmptyFlags,
  type ObserverDecision,
  type ObserverOutput,
  type ObserverReport,
} from './types.js';

/**
 * Quality assumed when there is no usable assessment.
 */
export const NEUTRAL_QUALITY = 3;

/**
 * Most skills a single report may move.
 */
export const MAX_SKILLS_PER_REPORT = 3;

/**
 * Most distinct expert roles one decision may select.
 */
export const MAX_EXPERT_ROLES = 2;

/**
 * Decision used when the observer's decision is unusable.
 */
export const SAFE_DECISION: ObserverDecision = {
  ask_deeper: false,
  advance_topic: false,
  expert_roles: [],
};

/**
 * Observer output after normalization, with what had to be repaired.
 */
export interface NormalizedObserverOutput {
  readonly output: ObserverOutput;
  /** Empty when the raw output was fully valid. */
  readonly issues: readonly string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Builds a minimal report for a turn with no usable assessment.
 */
export function createSyntheticReport(topic: string): ObserverReport {
  return {
    detected_topic: topic,
    answer_quality: NEUTRAL_QUALITY,
    confidence: 0,
    flags: createEmptyFlags(),
    recommended_next_action: 'ASK_DEEPER',
    recommended_question_style: 'neutral',
    skills_delta: {},
  };
}

/**
 * Keeps finite deltas, clamps them to the allowed magnitude and keeps at most
 * three skills.
 */
export function normalizeSkillsDelta(
  skillsDelta: Readonly<Record<string, number>>
): { readonly delta: Record<string, number>; readonly issues: string[] } {
  const delta: Record<string, number> = {};
  const issues: string[] = [];
  for (const [skill, value] of Object.entries(skillsDelta)) {
    if (skill.trim() === '' || !Number.isFinite(value)) {
      issues.push(`skills_delta/${skill}: dropped non-finite or unnamed delta`);
      continue;
    }
    if (Object.keys(delta).length >= MAX_SKILLS_PER_REPORT) {
      issues.push(`skills_delta/${skill}: dropped, more than ${String(MAX_SKILLS_PER_REPORT)} skills`);
      continue;
    }
    const clamped = Math.min(MAX_SKILL_DELTA, Math.max(-MAX_SKILL_DELTA, value));
    if (clamped !== value) {
      issues.push(`skills_delta/${skill}: clamped ${String(value)} to ${String(clamped)}`);
    }
    setSkillValue(delta, skill, clamped);
  }
  return { delta, issues };
}

function normalizeDecision(raw: unknown): { decision: ObserverDecision; issues: string[] } {
  const check = checkSchema('observer-decision', raw);
  if (check.valid) {
    const { value } = check;
    // A repeated role counts once; the limit applies to distinct roles.
    const roles = dedupeRoles(value.expert_roles);
    const tooMany = roles.length > MAX_EXPERT_ROLES;
    return {
      decision: {
        ask_deeper: value.ask_deeper,
        advance_topic: value.advance_topic,
        expert_roles: tooMany ? [] : roles,
        reasoning_notes: value.reasoning_notes,
      },
      issues: tooMany
        ? [
            `decision/expert_roles: expected at most ${String(MAX_EXPERT_ROLES)} distinct roles, got ${String(roles.length)}`,
          ]
        : [],
    };
  }

  const issues = check.errors.map((error) => `decision${error}`);
  if (!isRecord(raw)) {
    return { decision: SAFE_DECISION, issues };
  }
  // Keep the usable booleans; an invalid role set collapses to no experts.
  const notes = raw.reasoning_notes;
  return {
    decision: {
      ask_deeper: raw.ask_deeper === true,
      advance_topic: raw.advance_topic === true,
      expert_roles: [],
      reasoning_notes: typeof notes === 'string' ? notes : undefined,
    },
    issues,
  };
}

function normalizeReport(raw: unknown, topic: string): { report: ObserverReport; issues: string[] } {
  const check = checkSchema('observer-report', raw);
  if (!check.valid) {
    return {
      report: createSyntheticReport(topic),
      issues: check.errors.map((error) => `report${error}`),
    };
  }

  const { value } = check;
  const skills = normalizeSkillsDelta(value.skills_delta);
  return {
    report: {
      detected_topic: value.detected_topic.trim() === '' ? topic : value.detected_topic,
      answer_quality: value.answer_quality,
      confidence: value.confidence,
      flags: {
        ...createEmptyFlags(),
        off_topic: value.flags.off_topic,
        hallucination: value.flags.hallucination,
        role_reversal: value.flags.role_reversal,
        contradiction: value.flags.contradiction,
      },
      recommended_next_action: value.recommended_next_action,
      recommended_question_style: value.recommended_question_style,
      fact_check_notes: value.fact_check_notes,
      skills_delta: skills.delta,
    },
    issues: skills.issues.map((issue) => `report/${issue}`),
  };
}

/**
 * Validates raw observer output and repairs what it can.
 *
 * The decision and report are checked separately: a bad expert list only
 * empties the expert set, a bad report is replaced by a synthetic one.
 * Flags are always copied into a new object.
 *
 * @param raw - Parsed observer reply.
 * @param topic - Current planned topic, used when the report has none.
 */
export function normalizeObserverOutput(raw: unknown, topic: string): NormalizedObserverOutput {
  if (!isRecord(raw)) {
    return {
      output: { decision: SAFE_DECISION, report: createSyntheticReport(topic) },
      issues: ['/: must be object'],
    };
  }
  const decision = normalizeDecision(raw.decision);
  const report = normalizeReport(raw.report, topic);
  return {
    output: { decision: decision.decision, report: report.report },
    issues: [...decision.issues, ...report.issues],
  };
}

/**
 * Applies the fixed kickoff defaults to an observer output.
 *
 * The opening turn has no answer to assess: the observer may only name the
 * topic and suggest a question style.
 */
export function normalizeKickoffOutput(output: ObserverOutput, topic: string): ObserverOutput {
  return {
    decision: {
      ask_deeper: true,
      advance_topic: false,
      expert_roles: [],
      reasoning_notes: output.decision.reasoning_notes,
    },
    report: {
      ...createSyntheticReport(topic),
      confidence: output.report.confidence,
      recommended_question_style: output.report.recommended_question_style,
    },
  };
}

/**
 * Lists problems with a generated question. Empty means usable.
 */
export function validateQuestion(question: string, maxChars: number): string[] {
  const issues: string[] = [];
  const trimmed = question.trim();
  if (trimmed === '') {
    issues.push('question is empty');
  }
  if (trimmed.length > maxChars) {
    issues.push(`question has ${String(trimmed.length)} characters, limit is ${String(maxChars)}`);
  }
  const marks = trimmed.split('?').length - 1;
  if (marks !== 1) {
    issues.push(`question must contain exactly one '?', found ${String(marks)}`);
  }
  return issues;
}

/**
 * Generic clarifying question about a topic, kept within the budget.
 */
export function fallbackQuestion(topic: string, maxChars: number): string {
  const prefix = 'Какой у вас практический опыт в теме «';
  const suffix = '»?';
  const cleanTopic = topic.replace(/\?/g, '').trim() || 'текущая тема';
  const room = Math.max(0, maxChars - prefix.length - suffix.length);
  return `${prefix}${cleanTopic.slice(0, room)}${suffix}`;
}

/**
 * Checks a topic plan and returns the trimmed topics with any problems.
 */
export function validateTopicPlan(topics: readonly string[]): {
  readonly topics: string[];
  readonly issues: string[];
} {
  const trimmed = topics.map((topic) => topic.trim());
  const issues: string[] = [];
  if (trimmed.length !== PLANNED_TOPIC_COUNT) {
    issues.push(`expected ${String(PLANNED_TOPIC_COUNT)} topics, got ${String(trimmed.length)}`);
  }
  trimmed.forEach((topic, index) => {
    if (topic === '') {
      issues.push(`topic ${String(index + 1)} is empty`);
    }
  });
  return { topics: trimmed, issues };
}
