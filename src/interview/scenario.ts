/**
 * Scripted interview scenarios.
 *
 * A scenario file holds an intake and the candidate messages to replay. The
 * runner feeds them to the engine one per cycle and finishes the session
 * when they run out.
 *
 * @packageDocumentation
 */

import { safeReadTextFile } from '../utils/safe-fs.js';
import type { CycleOutcome, InterviewEngine } from './engine.js';
import { checkSchema } from './schemas.js';
import { thoughtsReportFlag } from './thoughts.js';
import type { FinalFeedback, InterviewIntake, ObserverFlagName, TurnRecord } from './types.js';

/**
 * Scenario file layout.
 */
export interface ScenarioFile {
  intake: InterviewIntake;
  scripted_user_messages: string[];
  /** Flags that must appear in some turn's hidden reflection. */
  expected_flags?: ObserverFlagName[];
}

/**
 * Error type for scenario operations.
 */
export type ScenarioErrorType = 'file_error' | 'parse_error' | 'validation_error' | 'expectation_failed';

/**
 * Error class for scenario failures.
 */
export class ScenarioError extends Error {
  /** The type of scenario error. */
  public readonly errorType: ScenarioErrorType;
  /** Individual problems found. */
  public readonly details: readonly string[];
  /** The underlying cause of the error if available. */
  public override readonly cause: Error | undefined;

  constructor(
    message: string,
    errorType: ScenarioErrorType,
    options?: { details?: readonly string[] | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'ScenarioError';
    this.errorType = errorType;
    this.details = options?.details ?? [];
    this.cause = options?.cause;
  }
}

/**
 * Outcome of a scenario run.
 */
export interface ScenarioResult {
  readonly feedback: FinalFeedback;
  readonly turns: readonly TurnRecord[];
  /** Scripted messages the engine consumed before finalizing. */
  readonly messagesUsed: number;
  /** Expected flags no turn reported. */
  readonly missingFlags: readonly ObserverFlagName[];
}

/**
 * Hooks for observing a run.
 */
export interface ScenarioRunOptions {
  /** Called for every sealed turn, kickoff included. */
  readonly onTurn?: ((turn: TurnRecord) => void) | undefined;
}

/**
 * Parses and validates scenario JSON.
 *
 * @throws ScenarioError with `parse_error` or `validation_error`.
 */
export function parseScenario(content: string, source = 'scenario'): ScenarioFile {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ScenarioError(`Scenario ${source} is not valid JSON`, 'parse_error', {
      cause: error instanceof Error ? error : undefined,
    });
  }

  const check = checkSchema('scenario', data);
  if (!check.valid) {
    throw new ScenarioError(
      `Invalid scenario ${source}: ${check.errors.join('; ')}`,
      'validation_error',
      { details: check.errors }
    );
  }
  return check.value;
}

/**
 * Reads a scenario file.
 *
 * @throws ScenarioError if the file cannot be read or is invalid.
 */
export async function loadScenario(filePath: string): Promise<ScenarioFile> {
  let content: string;
  try {
    content = await safeReadTextFile(filePath);
  } catch (error) {
    throw new ScenarioError(
      `Failed to read scenario ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      'file_error',
      { cause: error instanceof Error ? error : undefined }
    );
  }
  return parseScenario(content, filePath);
}

/**
 * Lists the expected flags that no turn's Observer fragment reports.
 */
export function findMissingFlags(
  turns: readonly TurnRecord[],
  expected: readonly ObserverFlagName[]
): ObserverFlagName[] {
  return expected.filter(
    (flag) => !turns.some((turn) => thoughtsReportFlag(turn.internal_thoughts, flag))
  );
}

/**
 * Replays a scenario on a fresh engine.
 *
 * Each scripted message runs one cycle. A stop command or the turn budget
 * may finalize early; otherwise the session is finished once the messages
 * run out.
 */
export async function runScenario(
  engine: InterviewEngine,
  scenario: ScenarioFile,
  options: ScenarioRunOptions = {}
): Promise<ScenarioResult> {
  const report = (outcome: CycleOutcome): void => {
    if (outcome.kind === 'question') {
      options.onTurn?.(outcome.turn);
    }
  };

  let outcome = await engine.start(scenario.intake);
  report(outcome);

  let messagesUsed = 0;
  for (const message of scenario.scripted_user_messages) {
    if (outcome.kind === 'finalized') {
      break;
    }
    outcome = await engine.submit(message);
    messagesUsed++;
    report(outcome);
  }

  if (outcome.kind !== 'finalized') {
    outcome = await engine.finish();
  }
  if (outcome.kind !== 'finalized') {
    throw new ScenarioError('Interview did not finalize', 'expectation_failed');
  }

  const turns = engine.getState()?.turn_log ?? [];
  return {
    feedback: outcome.feedback,
    turns,
    messagesUsed,
    missingFlags: findMissingFlags(turns, scenario.expected_flags ?? []),
  };
}

/**
 * Throws when a run is missing expected flags.
 *
 * @throws ScenarioError with `expectation_failed`.
 */
export function assertExpectedFlags(result: ScenarioResult): void {
  if (result.missingFlags.length > 0) {
    throw new ScenarioError(
      `Expected flags not reported: ${result.missingFlags.join(', ')}`,
      'expectation_failed',
      { details: [...result.missingFlags] }
    );
  }
}
