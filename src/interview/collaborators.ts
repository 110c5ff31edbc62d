/**
 * Collaborator contracts.
 *
 * Each collaborator is a single-method interface. The engine hands it a
 * read-only context built from the session state and applies whatever it
 * returns; collaborators never see or mutate the state itself.
 *
 * @packageDocumentation
 */

import type {
  DifficultyLevel,
  ExpertEvaluation,
  ExpertRole,
  FinalFeedback,
  InterviewIntake,
  InterviewStrategy,
  ObserverOutput,
  ObserverReport,
  SkillLedger,
  TurnRecord,
} from './types.js';

/**
 * Context shared by every per-turn collaborator.
 */
export interface TurnContext {
  readonly intake: InterviewIntake;
  readonly planned_topics: readonly string[];
  readonly current_topic: string;
  readonly current_topic_index: number;
  readonly difficulty: DifficultyLevel;
  /** Question the candidate is answering. Empty on kickoff. */
  readonly last_question: string;
  /** Candidate's latest message. Empty on kickoff. */
  readonly last_answer: string;
  /** Most recent sealed turns, oldest first. */
  readonly recent_turns: readonly TurnRecord[];
  readonly skill_scores: Readonly<Record<string, number>>;
  readonly skill_vocabulary: readonly string[];
  readonly asked_questions: readonly string[];
}

/**
 * Observer input.
 */
export interface ObserverContext extends TurnContext {
  /** True for the opening cycle, which has no answer to assess. */
  readonly kickoff: boolean;
}

/**
 * Expert input.
 */
export interface ExpertContext extends TurnContext {
  readonly report: ObserverReport;
}

/**
 * Question generator input.
 */
export interface QuestionContext extends TurnContext {
  readonly strategy: InterviewStrategy;
  readonly report: ObserverReport;
  readonly expert_evaluations: readonly ExpertEvaluation[];
  /** Character budget for the question. */
  readonly max_chars: number;
}

/**
 * Report writer input besides the ledger and log.
 */
export interface ReportContext {
  readonly intake: InterviewIntake;
  readonly planned_topics: readonly string[];
  readonly current_topic_index: number;
  readonly topics_covered: readonly string[];
  readonly confirmed_threshold: number;
  readonly gap_threshold: number;
}

/**
 * Drafts the topic plan.
 */
export interface Planner {
  plan(intake: InterviewIntake): Promise<readonly string[]>;
}

/**
 * Assesses the latest answer.
 */
export interface Observer {
  observe(context: ObserverContext): Promise<ObserverOutput>;
}

/**
 * Reviews the latest answer from one role's point of view.
 */
export interface Expert {
  evaluate(role: ExpertRole, context: ExpertContext): Promise<ExpertEvaluation>;
}

/**
 * Phrases the next visible question.
 */
export interface QuestionGenerator {
  generate(context: QuestionContext): Promise<string>;
}

/**
 * Produces the final evaluation.
 */
export interface ReportWriter {
  write(
    snapshot: SkillLedger,
    turnLog: readonly TurnRecord[],
    context: ReportContext
  ): Promise<FinalFeedback>;
}

/**
 * Full collaborator set the engine needs.
 */
export interface InterviewCollaborators {
  readonly planner: Planner;
  readonly observer: Observer;
  readonly expert: Expert;
  readonly questionGenerator: QuestionGenerator;
  readonly reportWriter: ReportWriter;
}
