/**
 * Error suggestion system for the interview-coach CLI.
 *
 * Provides contextual suggestions based on error types to help users
 * resolve issues quickly.
 *
 * @packageDocumentation
 */

import { AgentError, PromptLoadError } from '../agents/index.js';
import { ConfigParseError, ConfigValidationError, EnvCoercionError } from '../config/index.js';
import { ScenarioError } from '../interview/scenario.js';
import { SessionLogError } from '../interview/session-log.js';
import { ReportStorageError } from '../report/storage.js';
import { PathValidationError } from '../utils/safe-fs.js';
import type { DisplayOptions } from './utils/displayUtils.js';

/**
 * Error types that can occur while running an interview.
 */
export type ErrorType =
  | 'model_failure'
  | 'config_error'
  | 'scenario_error'
  | 'storage_error'
  | 'unknown';

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  /** Suggestion text. */
  text: string;
  /** Command or action to take (optional). */
  action?: string;
}

/**
 * Error context with details needed for generating suggestions.
 */
export interface ErrorContext {
  /** Type of error that occurred. */
  errorType: ErrorType;
  /** Command that failed (optional). */
  command?: string;
  /** Additional error details (optional). */
  details?: {
    /** File involved in the failure. */
    filePath?: string;
    /** Individual problems, such as schema violations. */
    problems?: readonly string[];
  };
}

/**
 * Error suggestion mappings.
 */
const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  model_failure: [
    {
      text: 'Check that the claude CLI is installed and on PATH',
      action: 'claude --version',
    },
    {
      text: 'Make sure the CLI is signed in by running it once interactively',
    },
    {
      text: 'Point the client at another executable',
      action: 'INTERVIEW_MODEL_CLIENT_EXECUTABLE=/path/to/claude',
    },
    {
      text: 'Allow slow models more time',
      action: 'INTERVIEW_MODEL_CLIENT_TIMEOUT_MS=300000',
    },
  ],

  config_error: [
    {
      text: 'Check interview.toml for TOML syntax errors',
    },
    {
      text: 'Keep thresholds within [0, 1] with gap_skill below confirmed_skill',
    },
    {
      text: 'Rule out environment overrides',
      action: 'env | grep INTERVIEW_',
    },
  ],

  scenario_error: [
    {
      text: 'A scenario needs "intake" and "scripted_user_messages"',
    },
    {
      text: 'Compare the file with the scenario schema',
      action: 'schemas/scenario.schema.json',
    },
    {
      text: 'Expected flags must be off_topic, hallucination, role_reversal or contradiction',
    },
  ],

  storage_error: [
    {
      text: 'Check that the runs directory is writable',
      action: 'INTERVIEW_PATHS_RUNS=./runs',
    },
    {
      text: 'Write the session log somewhere else',
      action: 'interview-coach run --log <path>',
    },
  ],

  unknown: [
    {
      text: 'Re-run with debug logging for model replies',
      action: 'INTERVIEW_DEBUG=true interview-coach run',
    },
    {
      text: 'Inspect the structured log lines written to stderr',
    },
  ],
};

/**
 * Extracts error type from an error message.
 *
 * @param errorMessage - The error message to analyze.
 * @returns The identified error type.
 */
export function inferErrorType(errorMessage: string): ErrorType {
  const lowerMessage = errorMessage.toLowerCase();

  if (
    lowerMessage.includes('model') ||
    lowerMessage.includes('claude') ||
    lowerMessage.includes('authentication') ||
    lowerMessage.includes('rate limit') ||
    lowerMessage.includes('timeout') ||
    lowerMessage.includes('timed out')
  ) {
    return 'model_failure';
  }

  if (
    lowerMessage.includes('config') ||
    lowerMessage.includes('toml') ||
    lowerMessage.includes('interview_')
  ) {
    return 'config_error';
  }

  if (lowerMessage.includes('scenario') || lowerMessage.includes('expected flags')) {
    return 'scenario_error';
  }

  if (
    lowerMessage.includes('session log') ||
    lowerMessage.includes('report') ||
    lowerMessage.includes('permission denied') ||
    lowerMessage.includes('eacces') ||
    lowerMessage.includes('enoent')
  ) {
    return 'storage_error';
  }

  return 'unknown';
}

/**
 * Classifies a thrown value, by class where it is known and by message
 * otherwise.
 */
export function classifyError(error: unknown): ErrorType {
  if (error instanceof AgentError || error instanceof PromptLoadError) {
    return 'model_failure';
  }
  if (
    error instanceof ConfigParseError ||
    error instanceof ConfigValidationError ||
    error instanceof EnvCoercionError
  ) {
    return 'config_error';
  }
  if (error instanceof ScenarioError) {
    return 'scenario_error';
  }
  if (
    error instanceof SessionLogError ||
    error instanceof ReportStorageError ||
    error instanceof PathValidationError
  ) {
    return 'storage_error';
  }
  return inferErrorType(error instanceof Error ? error.message : String(error));
}

/**
 * Gets suggestions for a given error type.
 *
 * @param errorType - The type of error.
 * @returns Array of suggestions.
 */
function getSuggestions(errorType: ErrorType): readonly Suggestion[] {
  return ERROR_SUGGESTIONS[errorType];
}

/**
 * Formats a suggestion for display.
 *
 * @param suggestion - The suggestion to format.
 * @param index - The suggestion index (1-based).
 * @param options - Display options.
 * @returns Formatted suggestion string.
 */
function formatSuggestion(suggestion: Suggestion, index: number, options: DisplayOptions): string {
  const yellowCode = options.colors ? '\x1b[33m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const dimCode = options.colors ? '\x1b[2m' : '';

  const prefix = `${yellowCode}${String(index)}.${resetCode}`;
  const actionText = suggestion.action ? `\n    ${dimCode}${suggestion.action}${resetCode}` : '';

  return `  ${prefix} ${suggestion.text}${actionText}`;
}

/**
 * Formats error message with contextual suggestions.
 *
 * @param errorMessage - The error message.
 * @param context - Additional error context.
 * @param options - Display options.
 * @returns Formatted error with suggestions.
 */
export function formatErrorWithSuggestions(
  errorMessage: string,
  context: Partial<ErrorContext> = {},
  options: DisplayOptions = { colors: true, unicode: true }
): string {
  const errorType = context.errorType ?? inferErrorType(errorMessage);
  const suggestions = getSuggestions(errorType);

  const boldCode = options.colors ? '\x1b[1m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const redCode = options.colors ? '\x1b[31m' : '';
  const yellowCode = options.colors ? '\x1b[33m' : '';

  let result = `${redCode}Error:${resetCode} ${errorMessage}`;

  if (context.details?.filePath !== undefined) {
    result += `\n  ${yellowCode}File:${resetCode} ${context.details.filePath}`;
  }

  for (const problem of context.details?.problems ?? []) {
    result += `\n  ${yellowCode}-${resetCode} ${problem}`;
  }

  if (context.command !== undefined) {
    result += `\n  ${yellowCode}Command:${resetCode} ${context.command}`;
  }

  result += `\n\n${boldCode}Suggestions:${resetCode}`;
  for (let i = 0; i < suggestions.length; i++) {
    const suggestion = suggestions[i];
    if (suggestion !== undefined) {
      result += '\n' + formatSuggestion(suggestion, i + 1, options);
    }
  }

  return result;
}

/**
 * Builds the suggestion context for a thrown value.
 */
export function errorContextFor(error: unknown, command?: string): Partial<ErrorContext> {
  const problems =
    error instanceof ScenarioError ||
    error instanceof SessionLogError ||
    error instanceof AgentError
      ? error.details
      : [];
  return {
    errorType: classifyError(error),
    ...(command !== undefined ? { command } : {}),
    ...(problems.length > 0 ? { details: { problems } } : {}),
  };
}

/**
 * Displays error message with suggestions to console.
 *
 * @param errorMessage - The error message.
 * @param context - Additional error context.
 * @param options - Display options.
 */
export function displayErrorWithSuggestions(
  errorMessage: string,
  context: Partial<ErrorContext> = {},
  options: DisplayOptions = { colors: true, unicode: true }
): void {
  console.error(formatErrorWithSuggestions(errorMessage, context, options));
}

/**
 * Gets recoverable status for error type.
 *
 * @param errorType - The type of error.
 * @returns Whether the error is typically recoverable.
 */
export function isErrorRecoverable(errorType: ErrorType): boolean {
  switch (errorType) {
    case 'model_failure':
      return true;
    case 'config_error':
      return true;
    case 'scenario_error':
      return true;
    case 'storage_error':
      return false;
    case 'unknown':
      return false;
    default: {
      // Exhaustive check - if new ErrorType is added, this will error
      const exhaustiveCheck: never = errorType;
      return exhaustiveCheck;
    }
  }
}
