/**
 * Final report storage.
 *
 * Saves the final feedback next to the session logs as JSON or YAML and
 * reads it back in either format.
 *
 * @packageDocumentation
 */

import path from 'node:path';
import * as yaml from 'js-yaml';
import { checkSchema } from '../interview/schemas.js';
import { formatRunStamp } from '../interview/session-log.js';
import type { FinalFeedback } from '../interview/types.js';
import { safeReadTextFile, safeWriteFileAtomic } from '../utils/safe-fs.js';

/**
 * On-disk report format.
 */
export type ReportFormat = 'json' | 'yaml';

/**
 * Error type for report storage operations.
 */
export type ReportStorageErrorType = 'file_error' | 'parse_error' | 'validation_error' | 'not_found';

/**
 * Error class for report storage operations.
 */
export class ReportStorageError extends Error {
  /** The type of storage error. */
  public readonly errorType: ReportStorageErrorType;
  /** Additional details about the error. */
  public readonly details: string | undefined;
  /** The underlying cause of the error if available. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ReportStorageError.
   *
   * @param message - Human-readable error message.
   * @param errorType - The type of storage error.
   * @param options - Additional error options.
   */
  constructor(
    message: string,
    errorType: ReportStorageErrorType,
    options?: { details?: string | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'ReportStorageError';
    this.errorType = errorType;
    this.details = options?.details;
    this.cause = options?.cause;
  }
}

/**
 * Options for saving a report.
 */
export interface ReportStorageOptions {
  /** Defaults to the format implied by the file extension, else JSON. */
  readonly format?: ReportFormat | undefined;
  /** Pretty-print JSON. Default: true. */
  readonly pretty?: boolean | undefined;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Infers the format from a file extension.
 */
export function formatFromPath(filePath: string): ReportFormat {
  const extension = path.extname(filePath).toLowerCase();
  return extension === '.yaml' || extension === '.yml' ? 'yaml' : 'json';
}

/**
 * Default report location: `<runs>/interview_report_<YYYYMMDD_HHMMSS>.<ext>`.
 */
export function defaultReportPath(
  runsDir: string,
  now: Date = new Date(),
  format: ReportFormat = 'json'
): string {
  return path.join(runsDir, `interview_report_${formatRunStamp(now)}.${format}`);
}

/**
 * Report path that sits beside a session log: `x.json` becomes `x.report.<ext>`.
 */
export function reportPathForLog(logPath: string, format: ReportFormat = 'json'): string {
  const parsed = path.parse(logPath);
  return path.join(parsed.dir, `${parsed.name}.report.${format}`);
}

/**
 * Serializes feedback to JSON.
 */
export function serializeFeedbackToJson(feedback: FinalFeedback, pretty = true): string {
  return pretty ? `${JSON.stringify(feedback, null, 2)}\n` : JSON.stringify(feedback);
}

/**
 * Serializes feedback to YAML, keeping key order and inlining shared values.
 */
export function serializeFeedbackToYaml(feedback: FinalFeedback): string {
  return yaml.dump(feedback, {
    indent: 2,
    lineWidth: -1,
    noRefs: true,
    sortKeys: false,
  });
}

/**
 * Writes the final feedback atomically.
 *
 * @returns The path written.
 * @throws ReportStorageError if the file cannot be written.
 */
export async function saveFinalFeedback(
  filePath: string,
  feedback: FinalFeedback,
  options: ReportStorageOptions = {}
): Promise<string> {
  const format = options.format ?? formatFromPath(filePath);
  const content =
    format === 'yaml'
      ? serializeFeedbackToYaml(feedback)
      : serializeFeedbackToJson(feedback, options.pretty ?? true);

  try {
    await safeWriteFileAtomic(filePath, content, 'report');
  } catch (error) {
    const fileError = toError(error);
    throw new ReportStorageError(
      `Failed to save report to "${filePath}": ${fileError.message}`,
      'file_error',
      { cause: fileError, details: 'Check that the directory is writable' }
    );
  }
  return filePath;
}

/**
 * Parses report content, trying JSON first and YAML second.
 *
 * @throws ReportStorageError if neither parses or the result is not a report.
 */
export function parseFeedbackContent(content: string, filePath: string): FinalFeedback {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (jsonError) {
    try {
      data = yaml.load(content);
    } catch (yamlError) {
      throw new ReportStorageError(
        `Failed to parse report at "${filePath}": Neither JSON nor YAML format valid`,
        'parse_error',
        {
          cause: new Error(`JSON: ${toError(jsonError).message}; YAML: ${toError(yamlError).message}`),
        }
      );
    }
  }

  const check = checkSchema('final-feedback', data);
  if (!check.valid) {
    throw new ReportStorageError(`Invalid report at "${filePath}"`, 'validation_error', {
      details: check.errors.join('; '),
    });
  }
  return check.value;
}

/**
 * Reads a saved report.
 *
 * @throws ReportStorageError with `not_found`, `parse_error` or `validation_error`.
 */
export async function loadFinalFeedback(filePath: string): Promise<FinalFeedback> {
  let content: string;
  try {
    content = await safeReadTextFile(filePath);
  } catch (error) {
    throw new ReportStorageError(`Report "${filePath}" not found`, 'not_found', {
      cause: toError(error),
    });
  }
  return parseFeedbackContent(content, filePath);
}
