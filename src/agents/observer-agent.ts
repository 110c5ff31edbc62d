/**
 * Model-backed observer.
 *
 * @packageDocumentation
 */

import type { Observer, ObserverContext } from '../interview/collaborators.js';
import {
  EXPERT_ROLES,
  OBSERVER_FLAG_NAMES,
  RECOMMENDED_ACTIONS,
  type ObserverOutput,
} from '../interview/types.js';
import { normalizeObserverOutput } from '../interview/validation.js';
import { extractJson } from './json-reply.js';
import { ModelAgent, renderPrompt, summarizeTurns, type ModelAgentOptions } from './model-agent.js';
import { AgentError } from './types.js';

/**
 * Builds the observer's user prompt.
 */
export function buildObserverPrompt(context: ObserverContext): string {
  const task = context.kickoff
    ? 'The interview is starting. There is no answer yet; describe the opening topic.'
    : 'Assess the candidate answer to the last question.';
  return renderPrompt(task, {
    kickoff: context.kickoff,
    position: context.intake.position,
    grade_target: context.intake.grade_target,
    experience_summary: context.intake.experience_summary,
    current_topic: context.current_topic,
    planned_topics: context.planned_topics,
    difficulty: context.difficulty,
    last_question: context.last_question,
    last_answer: context.last_answer,
    recent_turns: summarizeTurns(context.recent_turns),
    skill_scores: context.skill_scores,
    skill_vocabulary: context.skill_vocabulary,
    allowed_flags: OBSERVER_FLAG_NAMES,
    allowed_actions: RECOMMENDED_ACTIONS,
    allowed_expert_roles: EXPERT_ROLES,
  });
}

/**
 * Asks the observer model for a decision and a report.
 *
 * Parts of the reply that fail their schema are replaced with safe defaults
 * here, so the engine receives a well-formed output.
 */
export class ModelObserver extends ModelAgent implements Observer {
  constructor(options: ModelAgentOptions) {
    super('observer', options);
  }

  async observe(context: ObserverContext): Promise<ObserverOutput> {
    const reply = await this.ask(buildObserverPrompt(context));
    const data = extractJson(reply);
    if (data === undefined) {
      throw new AgentError('observer', 'PARSE_FAILURE', 'observer reply is not JSON');
    }

    const { output, issues } = normalizeObserverOutput(data, context.current_topic);
    if (issues.length > 0) {
      this.logger.warn('observer_output_repaired', { kickoff: context.kickoff, issues });
    }
    return output;
  }
}
