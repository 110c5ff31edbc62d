/**
 * TOML configuration parser for interview.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import {
  DEFAULT_CONFIG,
  DEFAULT_INTERVIEW_SETTINGS,
  DEFAULT_MODEL_ASSIGNMENTS,
  DEFAULT_MODEL_CLIENT,
  DEFAULT_PATHS,
  DEFAULT_THRESHOLDS,
} from './defaults.js';
import type {
  Config,
  InterviewSettings,
  ModelAssignments,
  ModelClientConfig,
  PathConfig,
  ThresholdConfig,
} from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

type RawSection = Readonly<Record<string, unknown>>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a table from the parsed document.
 *
 * @throws ConfigParseError if the key holds something other than a table.
 */
function readSection(parsed: RawSection, name: string): RawSection | undefined {
  const value = parsed[name];
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigParseError(`Invalid type for '${name}': expected table, got ${typeof value}`);
  }
  return value;
}

function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

function validateStringArray(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected array of strings, got ${typeof value}`
    );
  }
  return value.map((item: unknown, index) => validateString(item, `${fieldPath}[${String(index)}]`));
}

function parseModelAssignments(raw: RawSection | undefined): ModelAssignments {
  const result: ModelAssignments = { ...DEFAULT_MODEL_ASSIGNMENTS };
  if (raw === undefined) {
    return result;
  }

  if ('planner_model' in raw) {
    result.planner_model = validateString(raw.planner_model, 'models.planner_model');
  }
  if ('observer_model' in raw) {
    result.observer_model = validateString(raw.observer_model, 'models.observer_model');
  }
  if ('interviewer_model' in raw) {
    result.interviewer_model = validateString(raw.interviewer_model, 'models.interviewer_model');
  }
  if ('expert_model' in raw) {
    result.expert_model = validateString(raw.expert_model, 'models.expert_model');
  }
  if ('report_model' in raw) {
    result.report_model = validateString(raw.report_model, 'models.report_model');
  }

  return result;
}

function parsePaths(raw: RawSection | undefined): PathConfig {
  const result: PathConfig = { ...DEFAULT_PATHS };
  if (raw === undefined) {
    return result;
  }

  if ('runs' in raw) {
    result.runs = validateString(raw.runs, 'paths.runs');
  }
  if ('prompts' in raw) {
    result.prompts = validateString(raw.prompts, 'paths.prompts');
  }

  return result;
}

function parseInterviewSettings(raw: RawSection | undefined): InterviewSettings {
  const result: InterviewSettings = {
    ...DEFAULT_INTERVIEW_SETTINGS,
    stop_commands: [...DEFAULT_INTERVIEW_SETTINGS.stop_commands],
    skill_vocabulary: [...DEFAULT_INTERVIEW_SETTINGS.skill_vocabulary],
  };
  if (raw === undefined) {
    return result;
  }

  if ('initial_difficulty' in raw) {
    result.initial_difficulty = validateNumber(
      raw.initial_difficulty,
      'interview.initial_difficulty'
    );
  }
  if ('max_question_chars' in raw) {
    result.max_question_chars = validateNumber(
      raw.max_question_chars,
      'interview.max_question_chars'
    );
  }
  if ('recent_turns_window' in raw) {
    result.recent_turns_window = validateNumber(
      raw.recent_turns_window,
      'interview.recent_turns_window'
    );
  }
  if ('max_turns' in raw) {
    result.max_turns = validateNumber(raw.max_turns, 'interview.max_turns');
  }
  if ('expert_dispatch' in raw) {
    const mode = validateString(raw.expert_dispatch, 'interview.expert_dispatch');
    if (mode !== 'sequential' && mode !== 'concurrent') {
      throw new ConfigParseError(
        `Invalid value for 'interview.expert_dispatch': expected 'sequential' or 'concurrent', got '${mode}'`
      );
    }
    result.expert_dispatch = mode;
  }
  if ('stop_commands' in raw) {
    result.stop_commands = validateStringArray(raw.stop_commands, 'interview.stop_commands');
  }
  if ('skill_vocabulary' in raw) {
    result.skill_vocabulary = validateStringArray(
      raw.skill_vocabulary,
      'interview.skill_vocabulary'
    );
  }

  return result;
}

function parseThresholds(raw: RawSection | undefined): ThresholdConfig {
  const result: ThresholdConfig = { ...DEFAULT_THRESHOLDS };
  if (raw === undefined) {
    return result;
  }

  if ('confirmed_skill' in raw) {
    result.confirmed_skill = validateNumber(raw.confirmed_skill, 'thresholds.confirmed_skill');
  }
  if ('gap_skill' in raw) {
    result.gap_skill = validateNumber(raw.gap_skill, 'thresholds.gap_skill');
  }
  if ('initial_skill_score' in raw) {
    result.initial_skill_score = validateNumber(
      raw.initial_skill_score,
      'thresholds.initial_skill_score'
    );
  }
  if ('raise_difficulty_quality' in raw) {
    result.raise_difficulty_quality = validateNumber(
      raw.raise_difficulty_quality,
      'thresholds.raise_difficulty_quality'
    );
  }
  if ('lower_difficulty_quality' in raw) {
    result.lower_difficulty_quality = validateNumber(
      raw.lower_difficulty_quality,
      'thresholds.lower_difficulty_quality'
    );
  }

  return result;
}

function parseModelClient(raw: RawSection | undefined): ModelClientConfig {
  const result: ModelClientConfig = { ...DEFAULT_MODEL_CLIENT };
  if (raw === undefined) {
    return result;
  }

  if ('executable' in raw) {
    result.executable = validateString(raw.executable, 'model_client.executable');
  }
  if ('timeout_ms' in raw) {
    result.timeout_ms = validateNumber(raw.timeout_ms, 'model_client.timeout_ms');
  }
  if ('max_retry_attempts' in raw) {
    result.max_retry_attempts = validateNumber(
      raw.max_retry_attempts,
      'model_client.max_retry_attempts'
    );
  }
  if ('retry_base_delay_ms' in raw) {
    result.retry_base_delay_ms = validateNumber(
      raw.retry_base_delay_ms,
      'model_client.retry_base_delay_ms'
    );
  }

  return result;
}

/**
 * Parses a TOML string into a Config object.
 *
 * Missing sections and fields take their default values. Semantic checks
 * (ranges, threshold ordering) are left to the validator.
 *
 * @param tomlContent - Raw TOML content.
 * @returns Configuration with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or mistyped fields.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [interview]
 * expert_dispatch = "concurrent"
 *
 * [thresholds]
 * confirmed_skill = 0.7
 * `);
 * config.interview.expert_dispatch; // "concurrent"
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: RawSection;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    models: parseModelAssignments(readSection(parsed, 'models')),
    paths: parsePaths(readSection(parsed, 'paths')),
    interview: parseInterviewSettings(readSection(parsed, 'interview')),
    thresholds: parseThresholds(readSection(parsed, 'thresholds')),
    model_client: parseModelClient(readSection(parsed, 'model_client')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return {
    models: { ...DEFAULT_CONFIG.models },
    paths: { ...DEFAULT_CONFIG.paths },
    interview: {
      ...DEFAULT_CONFIG.interview,
      stop_commands: [...DEFAULT_CONFIG.interview.stop_commands],
      skill_vocabulary: [...DEFAULT_CONFIG.interview.skill_vocabulary],
    },
    thresholds: { ...DEFAULT_CONFIG.thresholds },
    model_client: { ...DEFAULT_CONFIG.model_client },
  };
}
