/**
 * JSON schemas for collaborator output, the session log and the final report.
 *
 * Schemas live in the `schemas/` directory at the package root and are
 * compiled by ajv on first use.
 *
 * @packageDocumentation
 */

import { readFileSync } from 'node:fs';
import AjvModule, { type ErrorObject, type ValidateFunction } from 'ajv';
import type { ScenarioFile } from './scenario.js';
import type { SessionLogFile } from './session-log.js';
import type { ExpertRole, FinalFeedback, ObserverFlags, RecommendedAction } from './types.js';

const Ajv = AjvModule.default;

/**
 * Directory holding the schema files.
 */
export const SCHEMA_DIR = new URL('../../schemas/', import.meta.url);

/**
 * Observer decision as it arrives on the wire.
 */
export interface ObserverDecisionWire {
  ask_deeper: boolean;
  advance_topic: boolean;
  expert_roles: ExpertRole[];
  reasoning_notes?: string;
}

/**
 * Observer report as it arrives on the wire. Deltas are not yet clamped.
 */
export interface ObserverReportWire {
  detected_topic: string;
  answer_quality: number;
  confidence: number;
  flags: ObserverFlags;
  recommended_next_action: RecommendedAction;
  recommended_question_style: string;
  fact_check_notes?: string;
  skills_delta: Record<string, number>;
}

/**
 * Expert reply before the role is attached.
 */
export interface ExpertEvaluationWire {
  comment: string;
  question?: string;
}

/**
 * Planner reply.
 */
export interface TopicPlanWire {
  topics: string[];
}

/**
 * Report writer reply.
 */
export interface ReportNarrativeWire {
  clarity: string;
  honesty: string;
  engagement: string;
  next_steps: string[];
  links?: string[];
}

/**
 * Schema name to the type it guarantees.
 */
export interface SchemaTypes {
  'observer-decision': ObserverDecisionWire;
  'observer-report': ObserverReportWire;
  'expert-evaluation': ExpertEvaluationWire;
  'topic-plan': TopicPlanWire;
  'report-narrative': ReportNarrativeWire;
  'session-log': SessionLogFile;
  'final-feedback': FinalFeedback;
  scenario: ScenarioFile;
}

/**
 * Known schema names.
 */
export type SchemaName = keyof SchemaTypes;

/**
 * Error thrown when a schema file cannot be read.
 */
export class SchemaLoadError extends Error {
  public readonly schemaName: string;
  public override readonly cause: Error | undefined;

  constructor(schemaName: string, message: string, cause?: Error) {
    super(message);
    this.name = 'SchemaLoadError';
    this.schemaName = schemaName;
    this.cause = cause;
  }
}

/**
 * Outcome of validating a value against a schema.
 */
export type SchemaCheck<T> =
  | { readonly valid: true; readonly value: T }
  | { readonly valid: false; readonly errors: readonly string[] };

const ajv = new Ajv({ allErrors: true });


function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads and parses a schema file.
 *
 * @throws SchemaLoadError if the file is missing or not a JSON object.
 */
export function loadSchema(name: SchemaName): Record<string, unknown> {
  const url = new URL(`${name}.schema.json`, SCHEMA_DIR);
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(url, 'utf-8'));
  } catch (error) {
    throw new SchemaLoadError(
      name,
      `Failed to load schema '${name}': ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined
    );
  }
  if (!isRecord(parsed)) {
    throw new SchemaLoadError(name, `Schema '${name}' is not a JSON object`);
  }
  return parsed;
}

function lazyValidator<K extends SchemaName>(name: K): () => ValidateFunction<SchemaTypes[K]> {
  let compiled: ValidateFunction<SchemaTypes[K]> | undefined;
  return () => {
    if (compiled === undefined) {
      compiled = ajv.compile<SchemaTypes[K]>(loadSchema(name));
    }
    return compiled;
  };
}

// Compiled on first use.
const validators: { readonly [K in SchemaName]: () => ValidateFunction<SchemaTypes[K]> } = {
  'observer-decision': lazyValidator('observer-decision'),
  'observer-report': lazyValidator('observer-report'),
  'expert-evaluation': lazyValidator('expert-evaluation'),
  'topic-plan': lazyValidator('topic-plan'),
  'report-narrative': lazyValidator('report-narrative'),
  'session-log': lazyValidator('session-log'),
  'final-feedback': lazyValidator('final-feedback'),
  scenario: lazyValidator('scenario'),
};

function getValidator<K extends SchemaName>(name: K): ValidateFunction<SchemaTypes[K]> {
  return validators[name]();
}

/**
 * Formats ajv errors as `path: message` lines.
 */
export function formatSchemaErrors(errors: readonly ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map(
    (error) => `${error.instancePath === '' ? '/' : error.instancePath}: ${error.message ?? 'Unknown error'}`
  );
}

/**
 * Validates a value against a named schema.
 *
 * @example
 * ```typescript
 * const check = checkSchema('topic-plan', JSON.parse(reply));
 * if (check.valid) {
 *   use(check.value.topics);
 * }
 * ```
 */
export function checkSchema<K extends SchemaName>(name: K, data: unknown): SchemaCheck<SchemaTypes[K]> {
  const validate = getValidator(name);
  if (validate(data)) {
    return { valid: true, value: data };
  }
  return { valid: false, errors: formatSchemaErrors(validate.errors) };
}
