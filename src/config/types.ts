/**
 * Configuration types for interview.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Model identifiers per agent alias.
 */
export interface ModelAssignments {
  /** Model that drafts the topic plan. */
  planner_model: string;
  /** Model that assesses each answer. */
  observer_model: string;
  /** Model that phrases the visible question. */
  interviewer_model: string;
  /** Model shared by all expert reviewers. */
  expert_model: string;
  /** Model that rewrites the final narrative. */
  report_model: string;
}

/**
 * Filesystem locations.
 */
export interface PathConfig {
  /** Directory for session logs and reports. */
  runs: string;
  /** Directory holding agent prompt files. Empty means the bundled prompts. */
  prompts: string;
}

/**
 * How the expert queue invokes its experts.
 */
export type ExpertDispatchMode = 'sequential' | 'concurrent';

/**
 * Session behaviour.
 */
export interface InterviewSettings {
  /** Starting difficulty rank (1-5). */
  initial_difficulty: number;
  /** Character budget for one visible question. */
  max_question_chars: number;
  /** Number of recent turns given to collaborators as context. */
  recent_turns_window: number;
  /** Turn count after which the session is stopped. */
  max_turns: number;
  /** Expert invocation mode. */
  expert_dispatch: ExpertDispatchMode;
  /** Phrases that end the interview, matched case-insensitively. */
  stop_commands: string[];
  /** Skill ids the observer may score. */
  skill_vocabulary: string[];
}

/**
 * Scoring thresholds.
 *
 * Difficulty thresholds are on the 0-5 answer quality scale; skill thresholds
 * are on the 0-1 ledger scale. The two are independent.
 */
export interface ThresholdConfig {
  /** Ledger score at or above which a skill counts as confirmed. */
  confirmed_skill: number;
  /** Ledger score at or below which a skill counts as a gap. */
  gap_skill: number;
  /** Neutral prior for a skill's first evidence. */
  initial_skill_score: number;
  /** Answer quality at or above which difficulty goes up. */
  raise_difficulty_quality: number;
  /** Answer quality at or below which difficulty goes down. */
  lower_difficulty_quality: number;
}

/**
 * Settings for the model subprocess client.
 */
export interface ModelClientConfig {
  /** Executable invoked for completions. */
  executable: string;
  /** Per-request timeout in milliseconds. */
  timeout_ms: number;
  /** Retries after the first failed attempt. */
  max_retry_attempts: number;
  /** Base delay in milliseconds for exponential backoff. */
  retry_base_delay_ms: number;
}

/**
 * Complete configuration object parsed from interview.toml.
 */
export interface Config {
  models: ModelAssignments;
  paths: PathConfig;
  interview: InterviewSettings;
  thresholds: ThresholdConfig;
  model_client: ModelClientConfig;
}

/**
 * Partial configuration for merging with defaults.
 */
export interface PartialConfig {
  models?: Partial<ModelAssignments>;
  paths?: Partial<PathConfig>;
  interview?: Partial<InterviewSettings>;
  thresholds?: Partial<ThresholdConfig>;
  model_client?: Partial<ModelClientConfig>;
}
