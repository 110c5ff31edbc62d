/**
 * Session log persistence.
 *
 * A session log records the visible conversation together with the hidden
 * reflection of every turn and, once the interview is over, the final
 * feedback. Logs are validated before every save and written atomically.
 *
 * @packageDocumentation
 */

import path from 'node:path';
import { safeReadTextFile, safeWriteFileAtomic } from '../utils/safe-fs.js';
import { checkSchema } from './schemas.js';
import { hasRequiredThoughts } from './thoughts.js';
import type { FinalFeedback, InterviewState } from './types.js';

/**
 * One turn as stored in the log.
 */
export interface SessionLogTurn {
  turn_id: number;
  agent_visible_message: string;
  user_message: string;
  internal_thoughts: string;
}

/**
 * Session log file layout.
 */
export interface SessionLogFile {
  participant_name: string;
  turns: SessionLogTurn[];
  /** Structured feedback once finalized, a text summary otherwise. */
  final_feedback: string | FinalFeedback;
}

/**
 * Error type for session log operations.
 */
export type SessionLogErrorType = 'schema_error' | 'thoughts_error' | 'parse_error' | 'file_error';

/**
 * Error class for session log failures.
 */
export class SessionLogError extends Error {
  /** The type of session log error. */
  public readonly errorType: SessionLogErrorType;
  /** Individual problems found. */
  public readonly details: readonly string[];
  /** The underlying cause of the error if available. */
  public override readonly cause: Error | undefined;

  constructor(
    message: string,
    errorType: SessionLogErrorType,
    options?: { details?: readonly string[] | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'SessionLogError';
    this.errorType = errorType;
    this.details = options?.details ?? [];
    this.cause = options?.cause;
  }
}

/**
 * Builds the log for the current state of a session.
 *
 * @param state - Session state.
 * @param summary - Text used for `final_feedback` while the session is running.
 */
export function buildSessionLog(state: InterviewState, summary = ''): SessionLogFile {
  return {
    participant_name: state.intake.participant_name,
    turns: state.turn_log.map((turn) => ({
      turn_id: turn.turn_id,
      agent_visible_message: turn.agent_visible_message,
      user_message: turn.user_message,
      internal_thoughts: turn.internal_thoughts,
    })),
    final_feedback: state.final_feedback ?? summary,
  };
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local-time `YYYYMMDD_HHMMSS` stamp used in run file names.
 */
export function formatRunStamp(now: Date): string {
  return (
    `${String(now.getFullYear())}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  );
}

/**
 * Default log location: `<runs>/interview_log_<YYYYMMDD_HHMMSS>.json`.
 */
export function defaultSessionLogPath(runsDir: string, now: Date = new Date()): string {
  return path.join(runsDir, `interview_log_${formatRunStamp(now)}.json`);
}

/**
 * Checks a log against the schema and the hidden reflection format.
 *
 * @throws SessionLogError describing every problem found.
 */
export function assertValidSessionLog(log: unknown): asserts log is SessionLogFile {
  const check = checkSchema('session-log', log);
  if (!check.valid) {
    throw new SessionLogError(
      `Invalid session log: ${check.errors.join('; ')}`,
      'schema_error',
      { details: check.errors }
    );
  }

  const problems: string[] = [];
  check.value.turns.forEach((turn, index) => {
    if (turn.turn_id !== index + 1) {
      problems.push(`turn ${String(index + 1)} has turn_id ${String(turn.turn_id)}`);
    }
    if (!hasRequiredThoughts(turn.internal_thoughts)) {
      problems.push(`turn ${String(turn.turn_id)} is missing Observer or Interviewer thoughts`);
    }
  });
  if (problems.length > 0) {
    throw new SessionLogError(`Invalid session log: ${problems.join('; ')}`, 'thoughts_error', {
      details: problems,
    });
  }
}

/**
 * Validates and writes a session log.
 *
 * @param filePath - Target file; parent directories are created.
 * @param log - Log to write.
 * @throws SessionLogError if the log is invalid or cannot be written.
 */
export async function saveSessionLog(filePath: string, log: SessionLogFile): Promise<void> {
  assertValidSessionLog(log);
  try {
    await safeWriteFileAtomic(filePath, `${JSON.stringify(log, null, 2)}\n`, 'session-log');
  } catch (error) {
    throw new SessionLogError(
      `Failed to write session log to ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      'file_error',
      { cause: error instanceof Error ? error : undefined }
    );
  }
}

/**
 * Reads and validates a session log.
 *
 * @throws SessionLogError if the file cannot be read, parsed or validated.
 */
export async function loadSessionLog(filePath: string): Promise<SessionLogFile> {
  let content: string;
  try {
    content = await safeReadTextFile(filePath);
  } catch (error) {
    throw new SessionLogError(
      `Failed to read session log ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      'file_error',
      { cause: error instanceof Error ? error : undefined }
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new SessionLogError(`Session log ${filePath} is not valid JSON`, 'parse_error', {
      cause: error instanceof Error ? error : undefined,
    });
  }

  assertValidSessionLog(parsed);
  return parsed;
}
