/**
 * Environment variable overrides for configuration.
 *
 * INTERVIEW_* variables override configuration values at runtime.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import type { Config, ExpertDispatchMode, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Name of the variable that turns on debug logging.
 */
export const DEBUG_ENV_VAR = 'INTERVIEW_DEBUG';

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

type EnvMapping =
  | {
      readonly type: 'string';
      readonly description: string;
      readonly set: (overrides: PartialConfig, value: string) => void;
    }
  | {
      readonly type: 'number';
      readonly description: string;
      readonly set: (overrides: PartialConfig, value: number) => void;
    }
  | {
      readonly type: 'list';
      readonly description: string;
      readonly set: (overrides: PartialConfig, value: string[]) => void;
    }
  | {
      readonly type: 'dispatch';
      readonly description: string;
      readonly set: (overrides: PartialConfig, value: ExpertDispatchMode) => void;
    };

/**
 * Mapping from environment variable names to config fields.
 *
 * Format: INTERVIEW_<SECTION>_<FIELD> maps to config.<section>.<field>.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvMapping>> = {
  INTERVIEW_MODELS_PLANNER_MODEL: {
    type: 'string',
    description: 'Override the planner model',
    set: (o, v) => {
      o.models = { ...o.models, planner_model: v };
    },
  },
  INTERVIEW_MODELS_OBSERVER_MODEL: {
    type: 'string',
    description: 'Override the observer model',
    set: (o, v) => {
      o.models = { ...o.models, observer_model: v };
    },
  },
  INTERVIEW_MODELS_INTERVIEWER_MODEL: {
    type: 'string',
    description: 'Override the interviewer model',
    set: (o, v) => {
      o.models = { ...o.models, interviewer_model: v };
    },
  },
  INTERVIEW_MODELS_EXPERT_MODEL: {
    type: 'string',
    description: 'Override the expert model',
    set: (o, v) => {
      o.models = { ...o.models, expert_model: v };
    },
  },
  INTERVIEW_MODELS_REPORT_MODEL: {
    type: 'string',
    description: 'Override the report writer model',
    set: (o, v) => {
      o.models = { ...o.models, report_model: v };
    },
  },

  INTERVIEW_PATHS_RUNS: {
    type: 'string',
    description: 'Override the session log directory',
    set: (o, v) => {
      o.paths = { ...o.paths, runs: v };
    },
  },
  INTERVIEW_PATHS_PROMPTS: {
    type: 'string',
    description: 'Override the prompt directory',
    set: (o, v) => {
      o.paths = { ...o.paths, prompts: v };
    },
  },

  INTERVIEW_INITIAL_DIFFICULTY: {
    type: 'number',
    description: 'Override the starting difficulty (1-5)',
    set: (o, v) => {
      o.interview = { ...o.interview, initial_difficulty: v };
    },
  },
  INTERVIEW_MAX_QUESTION_CHARS: {
    type: 'number',
    description: 'Override the question character budget',
    set: (o, v) => {
      o.interview = { ...o.interview, max_question_chars: v };
    },
  },
  INTERVIEW_MAX_TURNS: {
    type: 'number',
    description: 'Override the turn limit',
    set: (o, v) => {
      o.interview = { ...o.interview, max_turns: v };
    },
  },
  INTERVIEW_EXPERT_DISPATCH: {
    type: 'dispatch',
    description: 'Override the expert dispatch mode (sequential, concurrent)',
    set: (o, v) => {
      o.interview = { ...o.interview, expert_dispatch: v };
    },
  },
  INTERVIEW_STOP_COMMANDS: {
    type: 'list',
    description: 'Override the stop phrases (comma-separated)',
    set: (o, v) => {
      o.interview = { ...o.interview, stop_commands: v };
    },
  },

  INTERVIEW_THRESHOLDS_CONFIRMED_SKILL: {
    type: 'number',
    description: 'Override the confirmed skill threshold',
    set: (o, v) => {
      o.thresholds = { ...o.thresholds, confirmed_skill: v };
    },
  },
  INTERVIEW_THRESHOLDS_GAP_SKILL: {
    type: 'number',
    description: 'Override the skill gap threshold',
    set: (o, v) => {
      o.thresholds = { ...o.thresholds, gap_skill: v };
    },
  },

  INTERVIEW_MODEL_CLIENT_EXECUTABLE: {
    type: 'string',
    description: 'Override the model client executable',
    set: (o, v) => {
      o.model_client = { ...o.model_client, executable: v };
    },
  },
  INTERVIEW_MODEL_CLIENT_TIMEOUT_MS: {
    type: 'number',
    description: 'Override the model request timeout in milliseconds',
    set: (o, v) => {
      o.model_client = { ...o.model_client, timeout_ms: v };
    },
  },
  INTERVIEW_MAX_RETRIES: {
    type: 'number',
    description: 'Override the model client retry count',
    set: (o, v) => {
      o.model_client = { ...o.model_client, max_retry_attempts: v };
    },
  },
};

/**
 * Coerces a string value to a number.
 *
 * @throws EnvCoercionError if the value is empty or not numeric.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts true/1/yes/on and false/0/no/off, case-insensitively.
 *
 * @throws EnvCoercionError if the value is not recognized.
 */
export function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

function coerceToList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function coerceToDispatch(value: string, envVar: string): ExpertDispatchMode {
  const trimmed = value.trim().toLowerCase();
  if (trimmed === 'sequential' || trimmed === 'concurrent') {
    return trimmed;
  }
  throw new EnvCoercionError(envVar, value, "'sequential' or 'concurrent'");
}

function applyMapping(
  overrides: PartialConfig,
  mapping: EnvMapping,
  value: string,
  envVar: string
): void {
  switch (mapping.type) {
    case 'string':
      mapping.set(overrides, value);
      return;
    case 'number':
      mapping.set(overrides, coerceToNumber(value, envVar));
      return;
    case 'list':
      mapping.set(overrides, coerceToList(value));
      return;
    case 'dispatch':
      mapping.set(overrides, coerceToDispatch(value, envVar));
      return;
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads INTERVIEW_* variables and returns configuration overrides.
 *
 * @param env - The environment to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ INTERVIEW_MAX_TURNS: '12' });
 * result.overrides.interview?.max_turns; // 12
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      applyMapping(overrides, mapping, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 *
 * @param base - The base configuration.
 * @param partial - The partial configuration to merge.
 * @returns A new configuration with partial values merged in.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    models: { ...base.models, ...partial.models },
    paths: { ...base.paths, ...partial.paths },
    interview: { ...base.interview, ...partial.interview },
    thresholds: { ...base.thresholds, ...partial.thresholds },
    model_client: { ...base.model_client, ...partial.model_client },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);
  return mergeConfig(config, overrides);
}

/**
 * Reads the debug logging switch.
 *
 * @returns False when the variable is unset or empty.
 * @throws EnvCoercionError if the value is not a recognized boolean.
 */
export function readDebugFlag(env: EnvRecord = process.env): boolean {
  const value = env[DEBUG_ENV_VAR];
  if (value === undefined || value === '') {
    return false;
  }
  return coerceToBoolean(value, DEBUG_ENV_VAR);
}

/**
 * Gets documentation for all supported environment variables.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  docs[DEBUG_ENV_VAR] = { description: 'Enable debug logging (true/false)', type: 'boolean' };
  return docs;
}
