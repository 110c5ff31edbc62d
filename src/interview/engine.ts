/**
 * Interview engine.
 *
 * Owns the session state and drives the turn cycle: observe the answer,
 * route, drain experts, adjust difficulty, move along the topic plan, ask
 * the next question and seal the turn. Each call to {@link InterviewEngine.start}
 * or {@link InterviewEngine.submit} runs exactly one cycle and resolves once
 * the engine is waiting for input again or the session is finalized.
 *
 * @packageDocumentation
 */

import type { Config } from '../config/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type {
  ExpertContext,
  InterviewCollaborators,
  ObserverContext,
  QuestionContext,
  ReportContext,
  TurnContext,
} from './collaborators.js';
import { adjustDifficulty, clampDifficulty } from './difficulty.js';
import { drainExperts, enqueueRoles } from './expert-queue.js';
import { synthesize } from './report.js';
import { applySkillDelta, skillScores } from './skill-ledger.js';
import { isStopCommand, isTurnBudgetExhausted } from './termination.js';
import {
  expertFragment,
  formatInternalThoughts,
  interviewerFragment,
  observerFragment,
  type ThoughtFragment,
} from './thoughts.js';
import { route, selectStrategy, shouldAdvanceTopic, type FinalizeReason } from './turn-router.js';
import {
  createInitialInterviewState,
  currentTopic,
  type ExpertEvaluation,
  type FinalFeedback,
  type InterviewIntake,
  type InterviewState,
  type InterviewStrategy,
  type ObserverOutput,
  type TurnRecord,
} from './types.js';
import {
  fallbackQuestion,
  normalizeKickoffOutput,
  normalizeObserverOutput,
  validateQuestion,
  validateTopicPlan,
} from './validation.js';

/**
 * Error codes for interview engine errors.
 */
export type InterviewEngineErrorCode =
  | 'INVALID_TOPIC_PLAN'
  | 'ENGINE_NOT_STARTED'
  | 'ALREADY_STARTED'
  | 'INTERVIEW_COMPLETE'
  | 'CYCLE_IN_PROGRESS';

/**
 * Error class for interview engine operations.
 */
export class InterviewEngineError extends Error {
  /** The error code for programmatic handling. */
  public readonly code: InterviewEngineErrorCode;
  /** Individual problems, when the error comes from validation. */
  public readonly details: readonly string[];
  /** The underlying cause if available. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new InterviewEngineError.
   *
   * @param message - Human-readable error message.
   * @param code - The error code.
   * @param options - Additional error options.
   */
  constructor(
    message: string,
    code: InterviewEngineErrorCode,
    options?: { details?: readonly string[] | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'InterviewEngineError';
    this.code = code;
    this.details = options?.details ?? [];
    this.cause = options?.cause;
  }
}

/**
 * Result of one cycle.
 */
export type CycleOutcome =
  | { readonly kind: 'question'; readonly turn: TurnRecord }
  | {
      readonly kind: 'finalized';
      readonly feedback: FinalFeedback;
      readonly reason: FinalizeReason;
    };

/**
 * Engine settings taken from configuration.
 */
export type EngineSettings = Pick<Config, 'interview' | 'thresholds'>;

/**
 * Options for creating an engine.
 */
export interface InterviewEngineOptions {
  readonly collaborators: InterviewCollaborators;
  readonly config: EngineSettings;
  readonly logger?: Logger | undefined;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Drives one interview session.
 *
 * @example
 * ```typescript
 * const engine = new InterviewEngine({ collaborators, config });
 * const first = await engine.start(intake);
 * const next = await engine.submit('I would use a partial index.');
 * ```
 */
export class InterviewEngine {
  private readonly collaborators: InterviewCollaborators;
  private readonly config: EngineSettings;
  private readonly logger: Logger;
  private state: InterviewState | null = null;
  private cycleRunning = false;

  constructor(options: InterviewEngineOptions) {
    this.collaborators = options.collaborators;
    this.config = options.config;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Current session state, or null before {@link start}.
   */
  getState(): InterviewState | null {
    return this.state;
  }

  /**
   * Whether the final feedback has been produced.
   */
  isFinalized(): boolean {
    return this.state !== null && this.state.final_feedback !== null;
  }

  /**
   * Plans the topics and runs the kickoff cycle.
   *
   * @throws InterviewEngineError with `INVALID_TOPIC_PLAN` if the planner does
   * not return exactly ten non-empty topics, or `ALREADY_STARTED`.
   */
  async start(intake: InterviewIntake): Promise<CycleOutcome> {
    if (this.state !== null || this.cycleRunning) {
      throw new InterviewEngineError('Interview has already been started', 'ALREADY_STARTED');
    }

    this.cycleRunning = true;
    try {
      const planned = await this.collaborators.planner.plan(intake);
      const plan = validateTopicPlan(planned);
      if (plan.issues.length > 0) {
        throw new InterviewEngineError(
          `Invalid topic plan: ${plan.issues.join('; ')}`,
          'INVALID_TOPIC_PLAN',
          { details: plan.issues }
        );
      }

      this.state = createInitialInterviewState(
        intake,
        plan.topics,
        clampDifficulty(this.config.interview.initial_difficulty)
      );
      this.logger.info('session_started', {
        participant: intake.participant_name,
        position: intake.position,
        gradeTarget: intake.grade_target,
        topics: plan.topics,
      });

      return await this.runCycle(this.state, '', true);
    } finally {
      this.cycleRunning = false;
    }
  }

  /**
   * Runs one cycle for a candidate message.
   *
   * A stop command, or a message arriving once the turn budget is used up,
   * requests the stop and finalizes in the same cycle.
   *
   * @throws InterviewEngineError with `ENGINE_NOT_STARTED`, `CYCLE_IN_PROGRESS`
   * or `INTERVIEW_COMPLETE`.
   */
  async submit(message: string): Promise<CycleOutcome> {
    if (this.cycleRunning) {
      throw new InterviewEngineError('A turn is already being processed', 'CYCLE_IN_PROGRESS');
    }
    const state = this.requireActiveState();

    this.cycleRunning = true;
    try {
      if (isStopCommand(message, this.config.interview.stop_commands)) {
        this.requestStop();
      } else if (isTurnBudgetExhausted(state.turn_log.length, this.config.interview.max_turns)) {
        this.logger.info('turn_budget_exhausted', { maxTurns: this.config.interview.max_turns });
        this.requestStop();
      }
      return await this.runCycle(this.state ?? state, message, false);
    } finally {
      this.cycleRunning = false;
    }
  }

  /**
   * Asks the engine to finalize at the top of the next cycle.
   *
   * Only sets the flag; a stop requested while a cycle is running takes
   * effect on the following cycle.
   */
  requestStop(): void {
    const state = this.requireActiveState();
    if (!state.stop_requested) {
      this.state = { ...state, stop_requested: true };
      this.logger.info('stop_requested', { turns: state.turn_log.length });
    }
  }

  /**
   * Requests the stop and runs the finalizing cycle without a candidate
   * message. Used when input ends.
   *
   * @throws InterviewEngineError as {@link submit} does.
   */
  async finish(): Promise<CycleOutcome> {
    if (this.cycleRunning) {
      throw new InterviewEngineError('A turn is already being processed', 'CYCLE_IN_PROGRESS');
    }
    this.requestStop();

    this.cycleRunning = true;
    try {
      return await this.runCycle(this.currentState(), '', false);
    } finally {
      this.cycleRunning = false;
    }
  }

  private requireActiveState(): InterviewState {
    if (this.state === null) {
      throw new InterviewEngineError('Interview has not been started', 'ENGINE_NOT_STARTED');
    }
    if (this.state.final_feedback !== null) {
      throw new InterviewEngineError('Interview is already complete', 'INTERVIEW_COMPLETE');
    }
    return this.state;
  }

  private buildTurnContext(state: InterviewState, answer: string): TurnContext {
    const window = Math.max(0, this.config.interview.recent_turns_window);
    return {
      intake: state.intake,
      planned_topics: state.planned_topics,
      current_topic: currentTopic(state),
      current_topic_index: state.current_topic_index,
      difficulty: state.difficulty,
      last_question: state.last_question,
      last_answer: answer,
      recent_turns: window === 0 ? [] : state.turn_log.slice(-window),
      skill_scores: skillScores(state.skill_ledger),
      skill_vocabulary: this.config.interview.skill_vocabulary,
      asked_questions: state.asked_questions,
    };
  }

  private async observe(context: ObserverContext): Promise<ObserverOutput> {
    let raw: unknown;
    try {
      raw = await this.collaborators.observer.observe(context);
    } catch (error) {
      this.logger.warn('observer_fallback', {
        kickoff: context.kickoff,
        error: describeError(error),
      });
      raw = undefined;
    }

    const normalized = normalizeObserverOutput(raw, context.current_topic);
    if (raw !== undefined && normalized.issues.length > 0) {
      this.logger.warn('observer_fallback', {
        kickoff: context.kickoff,
        issues: normalized.issues,
      });
    }
    return context.kickoff
      ? normalizeKickoffOutput(normalized.output, context.current_topic)
      : normalized.output;
  }

  private async runCycle(
    initial: InterviewState,
    answer: string,
    kickoff: boolean
  ): Promise<CycleOutcome> {
    // Captured once; a stop requested from here on waits for the next cycle.
    const stopRequested = initial.stop_requested;
    if (stopRequested) {
      return this.finalize('stop_requested');
    }

    const turnContext = this.buildTurnContext(initial, answer);
    const { decision, report } = await this.observe({ ...turnContext, kickoff });

    if (report.detected_topic !== '' && !initial.topics_covered.includes(report.detected_topic)) {
      this.updateState({ topics_covered: [...initial.topics_covered, report.detected_topic] });
    }
    this.updateState({
      pending_expert_roles: enqueueRoles(initial.pending_expert_roles, decision.expert_roles),
    });

    const evaluations: ExpertEvaluation[] = [];
    for (;;) {
      const next = route({ ...this.currentState(), stop_requested: stopRequested }, report, decision);

      if (next.kind === 'FINALIZE') {
        if (Object.keys(report.skills_delta).length > 0) {
          this.logger.info('final_delta_discarded', { skills_delta: report.skills_delta });
        }
        this.updateState({ pending_expert_roles: [] });
        return this.finalize(next.reason);
      }

      if (next.kind === 'DISPATCH_EXPERTS') {
        const expertContext: ExpertContext = { ...turnContext, report };
        const drained = await drainExperts(next.roles, this.collaborators.expert, expertContext, {
          mode: this.config.interview.expert_dispatch,
          logger: this.logger,
        });
        evaluations.push(...drained);
        this.updateState({ pending_expert_roles: [] });
        continue;
      }

      break;
    }

    const before = this.currentState();
    const difficultyBefore = before.difficulty;
    const difficultyAfter = kickoff
      ? difficultyBefore
      : adjustDifficulty(difficultyBefore, report.answer_quality, report.flags, {
          raise: this.config.thresholds.raise_difficulty_quality,
          lower: this.config.thresholds.lower_difficulty_quality,
        });
    if (difficultyAfter !== difficultyBefore) {
      this.logger.info('difficulty_adjusted', { from: difficultyBefore, to: difficultyAfter });
    }

    let topicIndex = before.current_topic_index;
    if (!kickoff && shouldAdvanceTopic(report, decision)) {
      topicIndex = Math.min(before.planned_topics.length, topicIndex + 1);
      if (topicIndex !== before.current_topic_index) {
        this.logger.info('topic_advanced', { from: before.current_topic_index, to: topicIndex });
      }
    }
    this.updateState({ difficulty: difficultyAfter, current_topic_index: topicIndex });

    const strategy: InterviewStrategy = kickoff ? 'kickoff' : selectStrategy(report);
    const afterMove = this.currentState();
    const questionContext: QuestionContext = {
      ...turnContext,
      current_topic: currentTopic(afterMove),
      current_topic_index: afterMove.current_topic_index,
      difficulty: difficultyAfter,
      strategy,
      report,
      expert_evaluations: evaluations,
      max_chars: this.config.interview.max_question_chars,
    };
    const question = await this.generateQuestion(questionContext);

    const fragments: ThoughtFragment[] = [
      observerFragment(report, decision),
      ...evaluations.map(expertFragment),
      interviewerFragment(strategy, difficultyBefore, difficultyAfter, questionContext.current_topic),
    ];

    const turn = this.sealTurn(answer, question, fragments, {
      topic: questionContext.current_topic,
      difficulty_before: difficultyBefore,
      difficulty_after: difficultyAfter,
      report,
      kickoff,
      strategy,
      expert_roles: evaluations.map((evaluation) => evaluation.role),
    });
    return { kind: 'question', turn };
  }

  private async generateQuestion(context: QuestionContext): Promise<string> {
    let question = '';
    try {
      question = (await this.collaborators.questionGenerator.generate(context)).trim();
    } catch (error) {
      this.logger.warn('question_fallback', { error: describeError(error) });
      return fallbackQuestion(context.current_topic, context.max_chars);
    }

    const issues = validateQuestion(question, context.max_chars);
    if (issues.length > 0) {
      this.logger.warn('question_fallback', { issues });
      return fallbackQuestion(context.current_topic, context.max_chars);
    }
    return question;
  }

  private sealTurn(
    answer: string,
    question: string,
    fragments: readonly ThoughtFragment[],
    details: {
      readonly topic: string;
      readonly difficulty_before: TurnRecord['difficulty_before'];
      readonly difficulty_after: TurnRecord['difficulty_after'];
      readonly report: ObserverOutput['report'];
      readonly kickoff: boolean;
      readonly strategy: InterviewStrategy;
      readonly expert_roles: TurnRecord['expert_roles'];
    }
  ): TurnRecord {
    const state = this.currentState();
    const turnId = state.turn_log.length + 1;
    const { report } = details;

    const record: TurnRecord = {
      turn_id: turnId,
      agent_visible_message: question,
      user_message: answer,
      internal_thoughts: formatInternalThoughts(fragments),
      topic: details.topic,
      difficulty_before: details.difficulty_before,
      difficulty_after: details.difficulty_after,
      flags: { ...report.flags },
      skills_delta: { ...report.skills_delta },
      answer_quality: details.kickoff ? null : report.answer_quality,
      strategy: details.strategy,
      expert_roles: details.expert_roles,
    };

    const note =
      report.fact_check_notes !== undefined && report.fact_check_notes !== ''
        ? report.fact_check_notes
        : `${report.detected_topic}: quality ${String(report.answer_quality)}`;

    this.updateState({
      turn_log: [...state.turn_log, record],
      skill_ledger: applySkillDelta(state.skill_ledger, report.skills_delta, turnId, note, {
        initialScore: this.config.thresholds.initial_skill_score,
      }),
      last_question: question,
      asked_questions: [...state.asked_questions, question],
      pending_expert_roles: [],
    });

    this.logger.info('turn_sealed', {
      turnId,
      topic: record.topic,
      strategy: record.strategy,
      difficulty: record.difficulty_after,
      flags: Object.entries(record.flags)
        .filter(([, set]) => set)
        .map(([name]) => name),
    });
    return record;
  }

  private async finalize(reason: FinalizeReason): Promise<CycleOutcome> {
    const state = this.currentState();
    const context: ReportContext = {
      intake: state.intake,
      planned_topics: state.planned_topics,
      current_topic_index: state.current_topic_index,
      topics_covered: state.topics_covered,
      confirmed_threshold: this.config.thresholds.confirmed_skill,
      gap_threshold: this.config.thresholds.gap_skill,
    };

    let feedback: FinalFeedback;
    try {
      feedback = await this.collaborators.reportWriter.write(
        state.skill_ledger,
        state.turn_log,
        context
      );
    } catch (error) {
      this.logger.warn('report_fallback', { error: describeError(error) });
      feedback = synthesize(state.turn_log, state.skill_ledger, context);
    }

    this.updateState({ final_feedback: feedback, stop_requested: true });
    this.logger.info('session_finalized', {
      reason,
      turns: state.turn_log.length,
      recommendation: feedback.decision.recommendation,
    });
    return { kind: 'finalized', feedback, reason };
  }

  private currentState(): InterviewState {
    if (this.state === null) {
      throw new InterviewEngineError('Interview has not been started', 'ENGINE_NOT_STARTED');
    }
    return this.state;
  }

  private updateState(patch: Partial<InterviewState>): void {
    this.state = { ...this.currentState(), ...patch };
  }
}
