/**
 * Hidden reflection formatting.
 *
 * A turn's `internal_thoughts` is built from structured fragments, one per
 * line in the form `[Source]: content`. The same format is parsed back by
 * tooling, so content never spans lines.
 *
 * @packageDocumentation
 */

import type {
  DifficultyLevel,
  ExpertEvaluation,
  ExpertRole,
  InterviewStrategy,
  ObserverDecision,
  ObserverReport,
} from './types.js';
import { OBSERVER_FLAG_NAMES } from './types.js';

/**
 * Component a fragment came from.
 */
export type ThoughtSource = 'Observer' | 'Interviewer' | 'Router' | `Expert:${ExpertRole}`;

/**
 * One piece of hidden reflection.
 */
export interface ThoughtFragment {
  readonly source: string;
  readonly content: string;
}

/**
 * Sources every sealed turn must carry.
 */
export const REQUIRED_THOUGHT_SOURCES: readonly ThoughtSource[] = ['Observer', 'Interviewer'];

const FRAGMENT_PATTERN = /^\[([^\]\n]+)\]: ?(.*)$/;

/**
 * Label shown before an expert's follow-up question.
 */
export const EXPERT_QUESTION_LABEL = 'Уточняющий вопрос:';

function singleLine(text: string): string {
  return text.replace(/\s*\n\s*/g, ' ').trim();
}

/**
 * Renders fragments as `[Source]: content` lines.
 */
export function formatInternalThoughts(fragments: readonly ThoughtFragment[]): string {
  return fragments
    .map((fragment) => `[${singleLine(fragment.source)}]: ${singleLine(fragment.content)}`)
    .join('\n');
}

/**
 * Recovers fragments from formatted text. Lines that do not match are skipped.
 */
export function parseInternalThoughts(text: string): ThoughtFragment[] {
  const fragments: ThoughtFragment[] = [];
  for (const line of text.split('\n')) {
    const match = FRAGMENT_PATTERN.exec(line);
    const source = match?.[1];
    const content = match?.[2];
    if (source !== undefined && content !== undefined) {
      fragments.push({ source, content });
    }
  }
  return fragments;
}

/**
 * Checks that the text holds an Observer and an Interviewer fragment.
 */
export function hasRequiredThoughts(text: string): boolean {
  const sources = new Set(parseInternalThoughts(text).map((fragment) => fragment.source));
  return REQUIRED_THOUGHT_SOURCES.every((source) => sources.has(source));
}

/**
 * Reads `key=value` pairs from a fragment's content.
 *
 * The first occurrence of a key wins. Fragments put their structured fields
 * ahead of model-written text, so text that looks like a field cannot replace one.
 */
export function parseFragmentFields(content: string): Map<string, string> {
  const fields = new Map<string, string>();
  for (const part of content.split(', ')) {
    const separator = part.indexOf('=');
    const key = part.slice(0, separator);
    if (separator > 0 && !fields.has(key)) {
      fields.set(key, part.slice(separator + 1));
    }
  }
  return fields;
}

/**
 * Checks whether the Observer fragment reports a flag as set.
 */
export function thoughtsReportFlag(text: string, flag: string): boolean {
  return parseInternalThoughts(text).some(
    (fragment) =>
      fragment.source === 'Observer' && parseFragmentFields(fragment.content).get(flag) === 'true'
  );
}

/**
 * Builds the Observer fragment.
 */
export function observerFragment(
  report: ObserverReport,
  decision: ObserverDecision
): ThoughtFragment {
  const fields = [
    `next_action=${report.recommended_next_action}`,
    `quality=${String(report.answer_quality)}`,
    ...OBSERVER_FLAG_NAMES.map((flag) => `${flag}=${String(report.flags[flag])}`),
    `experts=${decision.expert_roles.length > 0 ? decision.expert_roles.join('+') : 'none'}`,
    // Model-written text from here on.
    `topic=${report.detected_topic}`,
  ];
  if (report.fact_check_notes !== undefined && report.fact_check_notes !== '') {
    fields.push(`fact_check=${report.fact_check_notes}`);
  }
  if (decision.reasoning_notes !== undefined && decision.reasoning_notes !== '') {
    fields.push(`notes=${decision.reasoning_notes}`);
  }
  return { source: 'Observer', content: fields.join(', ') };
}

/**
 * Builds an expert fragment, appending the follow-up question when present.
 */
export function expertFragment(evaluation: ExpertEvaluation): ThoughtFragment {
  const question = evaluation.question?.trim() ?? '';
  const content =
    question === '' ? evaluation.comment : `${evaluation.comment} ${EXPERT_QUESTION_LABEL} ${question}`;
  return { source: `Expert:${evaluation.role}`, content };
}

/**
 * Builds the Interviewer fragment.
 */
export function interviewerFragment(
  strategy: InterviewStrategy,
  difficultyBefore: DifficultyLevel,
  difficultyAfter: DifficultyLevel,
  topic: string
): ThoughtFragment {
  return {
    source: 'Interviewer',
    content: `strategy=${strategy}, difficulty=${String(difficultyBefore)}->${String(difficultyAfter)}, topic=${topic}`,
  };
}
