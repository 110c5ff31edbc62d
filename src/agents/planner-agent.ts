/**
 * Model-backed topic planner.
 *
 * @packageDocumentation
 */

import type { Planner } from '../interview/collaborators.js';
import { PLANNED_TOPIC_COUNT, type InterviewIntake } from '../interview/types.js';
import { ModelAgent, renderPrompt, type ModelAgentOptions } from './model-agent.js';

/**
 * Asks the planner model for the topic plan. The engine checks the count.
 */
export class ModelPlanner extends ModelAgent implements Planner {
  constructor(options: ModelAgentOptions) {
    super('planner', options);
  }

  async plan(intake: InterviewIntake): Promise<readonly string[]> {
    const reply = await this.ask(
      renderPrompt(`Plan exactly ${String(PLANNED_TOPIC_COUNT)} interview topics for this candidate.`, {
        position: intake.position,
        grade_target: intake.grade_target,
        experience_summary: intake.experience_summary,
        topic_count: PLANNED_TOPIC_COUNT,
      })
    );
    const { topics } = this.parseReply(reply, 'topic-plan');
    return topics.map((topic) => topic.trim());
  }
}
