/**
 * Model-backed question generator.
 *
 * @packageDocumentation
 */

import type { QuestionContext, QuestionGenerator } from '../interview/collaborators.js';
import { activeFlags } from '../interview/types.js';
import { extractPlainText } from './json-reply.js';
import { ModelAgent, renderPrompt, summarizeTurns, type ModelAgentOptions } from './model-agent.js';
import { AgentError } from './types.js';

/**
 * Builds the interviewer's user prompt.
 */
export function buildQuestionPrompt(context: QuestionContext): string {
  return renderPrompt(
    `Write the next question using the "${context.strategy}" strategy. Reply with the question only.`,
    {
      position: context.intake.position,
      grade_target: context.intake.grade_target,
      participant_name: context.intake.participant_name,
      strategy: context.strategy,
      current_topic: context.current_topic,
      difficulty: context.difficulty,
      question_style: context.report.recommended_question_style,
      flags: activeFlags(context.report.flags),
      fact_check_notes: context.report.fact_check_notes ?? '',
      last_question: context.last_question,
      last_answer: context.last_answer,
      expert_notes: context.expert_evaluations.map((evaluation) => ({
        role: evaluation.role,
        comment: evaluation.comment,
        question: evaluation.question ?? '',
      })),
      asked_questions: context.asked_questions,
      recent_turns: summarizeTurns(context.recent_turns),
      max_chars: context.max_chars,
    }
  );
}

/**
 * Asks the interviewer model for the next visible question. The engine
 * checks the length and the single question mark.
 */
export class ModelQuestionGenerator extends ModelAgent implements QuestionGenerator {
  constructor(options: ModelAgentOptions) {
    super('interviewer', options);
  }

  async generate(context: QuestionContext): Promise<string> {
    const question = extractPlainText(await this.ask(buildQuestionPrompt(context)));
    if (question === '') {
      throw new AgentError('interviewer', 'PARSE_FAILURE', 'interviewer reply is empty');
    }
    return question;
  }
}
