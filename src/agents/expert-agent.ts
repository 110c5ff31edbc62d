/**
 * Model-backed expert reviewers.
 *
 * @packageDocumentation
 */

import type { Expert, ExpertContext } from '../interview/collaborators.js';
import { activeFlags, type ExpertEvaluation, type ExpertRole } from '../interview/types.js';
import { ModelAgent, renderPrompt, summarizeTurns, type ModelAgentOptions } from './model-agent.js';

/**
 * Builds an expert's user prompt.
 */
export function buildExpertPrompt(role: ExpertRole, context: ExpertContext): string {
  return renderPrompt(`Review the candidate answer as the ${role}.`, {
    position: context.intake.position,
    grade_target: context.intake.grade_target,
    current_topic: context.current_topic,
    difficulty: context.difficulty,
    last_question: context.last_question,
    last_answer: context.last_answer,
    observer: {
      answer_quality: context.report.answer_quality,
      flags: activeFlags(context.report.flags),
      fact_check_notes: context.report.fact_check_notes ?? '',
    },
    recent_turns: summarizeTurns(context.recent_turns),
  });
}

/**
 * One expert agent serving every role; the role picks the prompt file.
 */
export class ModelExpert extends ModelAgent implements Expert {
  constructor(options: ModelAgentOptions) {
    super('expert', options);
  }

  async evaluate(role: ExpertRole, context: ExpertContext): Promise<ExpertEvaluation> {
    const reply = await this.ask(buildExpertPrompt(role, context), this.registry.getExpert(role));
    const { comment, question } = this.parseReply(reply, 'expert-evaluation');
    return { role, comment, question };
  }
}
