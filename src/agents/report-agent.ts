/**
 * Model-backed report writer.
 *
 * The hard-skill sections and the hiring decision always come from the
 * deterministic synthesizer. The model only rewrites the soft-skill
 * narrative and the roadmap; any failure keeps the synthesized text.
 *
 * @packageDocumentation
 */

import type { ReportContext, ReportWriter } from '../interview/collaborators.js';
import { synthesize } from '../interview/report.js';
import type { FinalFeedback, SkillLedger, TurnRecord } from '../interview/types.js';
import { ModelAgent, renderPrompt, summarizeTurns, type ModelAgentOptions } from './model-agent.js';

/**
 * Builds the report writer's user prompt.
 */
export function buildReportPrompt(
  draft: FinalFeedback,
  turnLog: readonly TurnRecord[],
  context: ReportContext
): string {
  return renderPrompt('Rewrite the soft-skill narrative and the roadmap for this interview.', {
    position: context.intake.position,
    grade_target: context.intake.grade_target,
    decision: draft.decision,
    strengths: draft.hard_skills.confirmed.map((item) => item.statement),
    gaps: draft.hard_skills.gaps.map((item) => ({
      statement: item.statement,
      correct_answer: item.correct_answer,
    })),
    soft_skills: {
      clarity: draft.soft_skills.clarity,
      honesty: draft.soft_skills.honesty,
      engagement: draft.soft_skills.engagement,
    },
    next_steps: draft.roadmap.next_steps,
    turns: summarizeTurns(turnLog),
  });
}

/**
 * Synthesizes the report, then lets the model polish its narrative parts.
 */
export class ModelReportWriter extends ModelAgent implements ReportWriter {
  constructor(options: ModelAgentOptions) {
    super('report_writer', options);
  }

  async write(
    snapshot: SkillLedger,
    turnLog: readonly TurnRecord[],
    context: ReportContext
  ): Promise<FinalFeedback> {
    const draft = synthesize(turnLog, snapshot, context);

    try {
      const reply = await this.ask(buildReportPrompt(draft, turnLog, context));
      const narrative = this.parseReply(reply, 'report-narrative');
      return {
        ...draft,
        soft_skills: {
          ...draft.soft_skills,
          clarity: narrative.clarity,
          honesty: narrative.honesty,
          engagement: narrative.engagement,
        },
        roadmap:
          narrative.links !== undefined && narrative.links.length > 0
            ? { next_steps: narrative.next_steps, links: narrative.links }
            : { next_steps: narrative.next_steps },
      };
    } catch (error) {
      this.logger.warn('narrative_fallback', {
        error: error instanceof Error ? error.message : String(error),
      });
      return draft;
    }
  }
}
