/**
 * Candidate-facing rendering of the conversation and the final report.
 *
 * Only visible messages and the final feedback pass through here; hidden
 * reflection never does.
 */

import type { FinalFeedback, FeedbackItem } from '../interview/types.js';
import { getAnsiStyles, type DisplayOptions } from './utils/displayUtils.js';

/** Prompt shown before each candidate answer. */
export const CANDIDATE_PROMPT = 'Кандидат: ';

/**
 * Formats a visible interviewer message.
 */
export function formatInterviewerLine(message: string, options: DisplayOptions): string {
  const { bold, cyan, reset } = getAnsiStyles(options);
  return `${bold}${cyan}Интервьюер:${reset} ${message}`;
}

function turnsLabel(item: Pick<FeedbackItem, 'turn_ids'>): string {
  return `(ходы: ${item.turn_ids.join(', ')})`;
}

/**
 * Renders the final feedback as plain lines.
 */
export function formatFinalFeedback(feedback: FinalFeedback, options: DisplayOptions): string {
  const { bold, dim, green, yellow, reset } = getAnsiStyles(options);
  const { decision, hard_skills: hard, soft_skills: soft, roadmap } = feedback;

  const lines: string[] = [
    `${bold}Финальный отчёт${reset}`,
    `Грейд: ${decision.grade} | Рекомендация: ${decision.recommendation} | ` +
      `Уверенность: ${decision.confidence_score.toFixed(2)}`,
    '',
    `${bold}Подтверждённые навыки${reset}`,
  ];

  for (const item of hard.confirmed) {
    lines.push(`  ${green}+${reset} ${item.statement} ${dim}${turnsLabel(item)}${reset}`);
  }

  lines.push('', `${bold}Зоны роста${reset}`);
  for (const gap of hard.gaps) {
    lines.push(`  ${yellow}-${reset} ${gap.statement} ${dim}${turnsLabel(gap)}${reset}`);
    lines.push(`    ${gap.correct_answer}`);
  }

  lines.push(
    '',
    `${bold}Soft skills${reset}`,
    `  Ясность: ${soft.clarity}`,
    `  Честность: ${soft.honesty}`,
    `  Вовлечённость: ${soft.engagement}`
  );

  lines.push('', `${bold}План развития${reset}`);
  roadmap.next_steps.forEach((step, index) => {
    lines.push(`  ${String(index + 1)}. ${step}`);
  });
  if (roadmap.links !== undefined && roadmap.links.length > 0) {
    lines.push('', `${bold}Материалы${reset}`);
    for (const link of roadmap.links) {
      lines.push(`  - ${link}`);
    }
  }

  return lines.join('\n');
}
