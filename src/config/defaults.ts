/**
 * Default configuration values for interview.toml.
 *
 * @packageDocumentation
 */

import type {
  Config,
  InterviewSettings,
  ModelAssignments,
  ModelClientConfig,
  PathConfig,
  ThresholdConfig,
} from './types.js';

/**
 * Default model assignments. The observer and report writer get the stronger model.
 */
export const DEFAULT_MODEL_ASSIGNMENTS: ModelAssignments = {
  planner_model: 'sonnet',
  observer_model: 'opus',
  interviewer_model: 'sonnet',
  expert_model: 'sonnet',
  report_model: 'opus',
};

/**
 * Default paths relative to the working directory.
 */
export const DEFAULT_PATHS: PathConfig = {
  runs: 'runs',
  prompts: '',
};

/**
 * Default stop phrases.
 */
export const DEFAULT_STOP_COMMANDS: readonly string[] = ['stop', 'стоп', 'стоп интервью'];

/**
 * Default skill ids for a backend engineering interview.
 */
export const DEFAULT_SKILL_VOCABULARY: readonly string[] = [
  'python_basics',
  'async',
  'db_modeling',
  'queues',
  'observability',
  'architecture',
  'testing',
  'rag_langchain',
];

/**
 * Default session behaviour.
 */
export const DEFAULT_INTERVIEW_SETTINGS: InterviewSettings = {
  initial_difficulty: 3,
  max_question_chars: 300,
  recent_turns_window: 5,
  max_turns: 40,
  expert_dispatch: 'sequential',
  stop_commands: [...DEFAULT_STOP_COMMANDS],
  skill_vocabulary: [...DEFAULT_SKILL_VOCABULARY],
};

/**
 * Default thresholds.
 */
export const DEFAULT_THRESHOLDS: ThresholdConfig = {
  confirmed_skill: 0.6,
  gap_skill: 0.2,
  initial_skill_score: 0.5,
  raise_difficulty_quality: 4,
  lower_difficulty_quality: 2,
};

/**
 * Default model client settings.
 */
export const DEFAULT_MODEL_CLIENT: ModelClientConfig = {
  executable: 'claude',
  timeout_ms: 120000,
  max_retry_attempts: 2,
  retry_base_delay_ms: 1000,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  models: DEFAULT_MODEL_ASSIGNMENTS,
  paths: DEFAULT_PATHS,
  interview: DEFAULT_INTERVIEW_SETTINGS,
  thresholds: DEFAULT_THRESHOLDS,
  model_client: DEFAULT_MODEL_CLIENT,
};
