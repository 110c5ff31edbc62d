/**
 * Interview session types.
 *
 * Defines the shared session state owned by the turn engine together with the
 * per-turn signals produced by the observer, the experts and the report writer.
 * Field names are snake_case because they double as the wire and log format.
 *
 * @packageDocumentation
 */

/**
 * Number of topics a planner must produce for a session.
 */
export const PLANNED_TOPIC_COUNT = 10;

/**
 * Target seniority the candidate is interviewed for.
 */
export type GradeTarget = 'intern' | 'junior' | 'middle' | 'senior' | 'staff' | 'principal';

/**
 * Grades in ascending order of seniority.
 */
export const GRADE_TARGETS: readonly GradeTarget[] = [
  'intern',
  'junior',
  'middle',
  'senior',
  'staff',
  'principal',
] as const;

/**
 * Checks if a string is a valid GradeTarget.
 *
 * @param value - The string to check.
 * @returns True if the value is a valid GradeTarget.
 */
export function isValidGradeTarget(value: string): value is GradeTarget {
  return GRADE_TARGETS.some((grade) => grade === value);
}

/**
 * Candidate and vacancy context collected before the session starts.
 */
export interface InterviewIntake {
  readonly participant_name: string;
  readonly position: string;
  readonly grade_target: GradeTarget;
  readonly experience_summary: string;
}

/**
 * Expert reviewers the observer may ask for.
 */
export type ExpertRole = 'tech_lead' | 'team_lead' | 'qa' | 'designer' | 'analyst';

/**
 * Array of all expert roles.
 */
export const EXPERT_ROLES: readonly ExpertRole[] = [
  'tech_lead',
  'team_lead',
  'qa',
  'designer',
  'analyst',
] as const;

/**
 * Checks if a string is a valid ExpertRole.
 *
 * @param value - The string to check.
 * @returns True if the value is a valid ExpertRole.
 */
export function isValidExpertRole(value: string): value is ExpertRole {
  return EXPERT_ROLES.some((role) => role === value);
}

/**
 * Action the observer recommends for the next question.
 */
export type RecommendedAction =
  | 'ASK_DEEPER'
  | 'ASK_EASIER'
  | 'CHANGE_TOPIC'
  | 'HANDLE_OFFTOPIC'
  | 'HANDLE_HALLUCINATION'
  | 'HANDLE_ROLE_REVERSAL'
  | 'WRAP_UP';

/**
 * Array of all recommended actions.
 */
export const RECOMMENDED_ACTIONS: readonly RecommendedAction[] = [
  'ASK_DEEPER',
  'ASK_EASIER',
  'CHANGE_TOPIC',
  'HANDLE_OFFTOPIC',
  'HANDLE_HALLUCINATION',
  'HANDLE_ROLE_REVERSAL',
  'WRAP_UP',
] as const;

/**
 * Anomalies the observer can detect in the latest answer.
 */
export type ObserverFlagName = 'off_topic' | 'hallucination' | 'role_reversal' | 'contradiction';

/**
 * Array of all flag names.
 */
export const OBSERVER_FLAG_NAMES: readonly ObserverFlagName[] = [
  'off_topic',
  'hallucination',
  'role_reversal',
  'contradiction',
] as const;

/**
 * Per-turn anomaly flags.
 *
 * Always derived from the latest answer only; never carried to the next turn.
 */
export type ObserverFlags = Readonly<Record<ObserverFlagName, boolean>>;

/**
 * Creates a fresh flag set with every flag cleared.
 *
 * A new object is returned on every call so that no two turns share a flag container.
 */
export function createEmptyFlags(): ObserverFlags {
  return {
    off_topic: false,
    hallucination: false,
    role_reversal: false,
    contradiction: false,
  };
}

/**
 * Lists the names of the flags that are set.
 */
export function activeFlags(flags: ObserverFlags): ObserverFlagName[] {
  return OBSERVER_FLAG_NAMES.filter((name) => flags[name]);
}

/**
 * Routing part of the observer output.
 */
export interface ObserverDecision {
  readonly ask_deeper: boolean;
  readonly advance_topic: boolean;
  /** Zero, one or two distinct roles. */
  readonly expert_roles: readonly ExpertRole[];
  /** Hidden from the candidate. */
  readonly reasoning_notes?: string | undefined;
}

/**
 * Assessment part of the observer output.
 */
export interface ObserverReport {
  readonly detected_topic: string;
  /** 0..5, where 1..5 is the recommended range. */
  readonly answer_quality: number;
  /** 0..1. */
  readonly confidence: number;
  readonly flags: ObserverFlags;
  readonly recommended_next_action: RecommendedAction;
  readonly recommended_question_style: string;
  readonly fact_check_notes?: string | undefined;
  /** Skill id to signed delta in [-0.4, 0.4]. */
  readonly skills_delta: Readonly<Record<string, number>>;
}

/**
 * Observer output for one turn.
 */
export interface ObserverOutput {
  readonly decision: ObserverDecision;
  readonly report: ObserverReport;
}

/**
 * Note produced by one expert for one turn.
 */
export interface ExpertEvaluation {
  readonly role: ExpertRole;
  readonly comment: string;
  readonly question?: string | undefined;
}

/**
 * Discrete difficulty rank, 1 (easiest) to 5 (hardest).
 */
export type DifficultyLevel = 1 | 2 | 3 | 4 | 5;

/**
 * Lowest difficulty rank.
 */
export const MIN_DIFFICULTY: DifficultyLevel = 1;

/**
 * Highest difficulty rank.
 */
export const MAX_DIFFICULTY: DifficultyLevel = 5;

/**
 * Checks if a number is a valid DifficultyLevel.
 *
 * @param value - The number to check.
 * @returns True if the value is an integer rank between 1 and 5.
 */
export function isDifficultyLevel(value: number): value is DifficultyLevel {
  return Number.isInteger(value) && value >= MIN_DIFFICULTY && value <= MAX_DIFFICULTY;
}

/**
 * One piece of evidence behind a skill score.
 */
export interface SkillEvidence {
  readonly turn_id: number;
  /** Raw delta as reported, before clamping. */
  readonly delta: number;
  readonly note: string;
}

/**
 * Running score for one skill.
 */
export interface SkillLedgerEntry {
  /** Always within [0, 1]. */
  readonly score: number;
  readonly evidence: readonly SkillEvidence[];
}

/**
 * Skill id to ledger entry.
 */
export type SkillLedger = Readonly<Record<string, SkillLedgerEntry>>;

/**
 * Interviewer tactic chosen for the next question.
 */
export type InterviewStrategy =
  | 'kickoff'
  | 'ask_standard'
  | 'deepen'
  | 'simplify'
  | 'change_topic'
  | 'return_to_topic'
  | 'handle_hallucination'
  | 'answer_candidate_question'
  | 'wrap_up';

/**
 * One sealed turn of the interview.
 */
export interface TurnRecord {
  /** 1-based and sequential. */
  readonly turn_id: number;
  readonly agent_visible_message: string;
  /** Empty on the kickoff turn. */
  readonly user_message: string;
  readonly internal_thoughts: string;
  readonly topic: string;
  readonly difficulty_before: DifficultyLevel;
  readonly difficulty_after: DifficultyLevel;
  readonly flags: ObserverFlags;
  readonly skills_delta: Readonly<Record<string, number>>;
  /** Null on the kickoff turn. */
  readonly answer_quality: number | null;
  readonly strategy: InterviewStrategy;
  readonly expert_roles: readonly ExpertRole[];
}

/**
 * Hiring recommendation categories.
 */
export type HiringRecommendation = 'hire' | 'lean_hire' | 'lean_no_hire' | 'no_hire';

/**
 * Where a strength or growth statement came from.
 */
export type FeedbackBasis =
  | 'confirmed_skill'
  | 'positive_evidence'
  | 'clean_answer'
  | 'skill_gap'
  | 'negative_evidence'
  | 'flagged_answer'
  | 'unreached_topic'
  | 'insufficient_evidence';

/**
 * A strength statement tied to the turns that support it.
 */
export interface FeedbackItem {
  readonly subject: string;
  readonly statement: string;
  readonly basis: FeedbackBasis;
  /** Never empty; every id exists in the turn log. */
  readonly turn_ids: readonly number[];
}

/**
 * A growth area with the note that corrects it.
 */
export interface GapItem extends FeedbackItem {
  readonly correct_answer: string;
}

/**
 * A soft-skill observation tied to turns.
 */
export interface SoftSkillExample {
  readonly statement: string;
  readonly turn_ids: readonly number[];
}

/**
 * Final evaluation, produced once when the session ends.
 */
export interface FinalFeedback {
  readonly decision: {
    readonly grade: GradeTarget;
    readonly recommendation: HiringRecommendation;
    readonly confidence_score: number;
  };
  readonly hard_skills: {
    /** 3..5 strengths. */
    readonly confirmed: readonly FeedbackItem[];
    /** 3..5 growth areas. */
    readonly gaps: readonly GapItem[];
  };
  readonly soft_skills: {
    readonly clarity: string;
    readonly honesty: string;
    readonly engagement: string;
    readonly examples: readonly SoftSkillExample[];
  };
  readonly roadmap: {
    readonly next_steps: readonly string[];
    /** Reading material for the next steps. */
    readonly links?: readonly string[];
  };
}

/**
 * Shared session state.
 *
 * @remarks
 * Owned by a single InterviewEngine for the whole session. Collaborators only
 * ever receive read-only views and return values the engine applies.
 */
export interface InterviewState {
  readonly intake: InterviewIntake;
  readonly planned_topics: readonly string[];
  /** Non-decreasing, within [0, planned_topics.length]. */
  readonly current_topic_index: number;
  readonly difficulty: DifficultyLevel;
  readonly skill_ledger: SkillLedger;
  /** Append-only; turn_log[i].turn_id === i + 1. */
  readonly turn_log: readonly TurnRecord[];
  /** Transient expert queue; empty between turns. */
  readonly pending_expert_roles: readonly ExpertRole[];
  /** Set once, never cleared. */
  readonly stop_requested: boolean;
  readonly last_question: string;
  readonly asked_questions: readonly string[];
  readonly topics_covered: readonly string[];
  readonly final_feedback: FinalFeedback | null;
}

/**
 * Creates the state for a new session once the topic plan is known.
 *
 * @param intake - Candidate and vacancy context.
 * @param plannedTopics - Validated topic plan.
 * @param difficulty - Starting difficulty rank.
 * @returns A fresh session state.
 */
export function createInitialInterviewState(
  intake: InterviewIntake,
  plannedTopics: readonly string[],
  difficulty: DifficultyLevel
): InterviewState {
  return {
    intake,
    planned_topics: [...plannedTopics],
    current_topic_index: 0,
    difficulty,
    skill_ledger: {},
    turn_log: [],
    pending_expert_roles: [],
    stop_requested: false,
    last_question: '',
    asked_questions: [],
    topics_covered: [],
    final_feedback: null,
  };
}

/**
 * Gets the topic at the current plan position.
 *
 * @param state - Session state.
 * @returns The current topic, or the last planned topic once the plan is exhausted.
 */
export function currentTopic(state: Pick<InterviewState, 'planned_topics' | 'current_topic_index'>): string {
  const { planned_topics: topics, current_topic_index: index } = state;
  const topic = topics[Math.min(index, topics.length - 1)];
  return topic ?? '';
}
