/**
 * Agent types.
 *
 * Each collaborator of the interview engine has a model-backed agent. An
 * agent is described by the prompt file that carries its instructions and
 * the model alias its requests are routed to.
 *
 * @packageDocumentation
 */

import type { ModelAlias, ModelRouterError } from '../model/types.js';
import type { ExpertRole } from '../interview/types.js';

/**
 * Model-backed agents.
 *
 * @remarks
 * - `planner`: builds the ten-topic plan from the intake
 * - `observer`: assesses each answer and picks experts
 * - `interviewer`: writes the next visible question
 * - `expert`: comments on an answer from one role's point of view
 * - `report_writer`: rewrites the soft-skill narrative of the final report
 */
export type AgentName = 'planner' | 'observer' | 'interviewer' | 'expert' | 'report_writer';

/**
 * All agent names.
 */
export const AGENT_NAMES: readonly AgentName[] = [
  'planner',
  'observer',
  'interviewer',
  'expert',
  'report_writer',
] as const;

/**
 * Definition of an agent in the registry.
 *
 * @example
 * ```typescript
 * const observer: AgentDefinition = {
 *   name: 'observer',
 *   description: 'Assesses the answer and selects experts',
 *   promptFile: 'observer.md',
 *   modelAlias: 'observer',
 * };
 * ```
 */
export interface AgentDefinition {
  readonly name: AgentName;
  readonly description: string;
  /** File under the prompts directory holding the system prompt. */
  readonly promptFile: string;
  readonly modelAlias: ModelAlias;
}

/**
 * Error thrown when an unknown agent is requested.
 */
export class AgentNotFoundError extends Error {
  /** The agent that was requested. */
  public readonly agent: string;

  constructor(agent: string) {
    super(`Agent '${agent}' not found in registry`);
    this.name = 'AgentNotFoundError';
    this.agent = agent;
  }
}

/**
 * Error codes for failed agent calls.
 */
export type AgentErrorCode = 'MODEL_FAILURE' | 'PARSE_FAILURE' | 'SCHEMA_FAILURE';

/**
 * Error thrown by an agent when the model call or its reply is unusable.
 *
 * The interview engine catches these at the collaborator boundary and falls
 * back to safe defaults.
 */
export class AgentError extends Error {
  /** The agent that failed. */
  public readonly agent: AgentName;
  /** The error code for programmatic handling. */
  public readonly code: AgentErrorCode;
  /** Schema violations or parse problems. */
  public readonly details: readonly string[];
  /** The model router failure, for `MODEL_FAILURE`. */
  public readonly modelError: ModelRouterError | undefined;
  /** The underlying cause if available. */
  public override readonly cause: Error | undefined;

  constructor(
    agent: AgentName,
    code: AgentErrorCode,
    message: string,
    options?: {
      details?: readonly string[] | undefined;
      modelError?: ModelRouterError | undefined;
      cause?: Error | undefined;
    }
  ) {
    super(message);
    this.name = 'AgentError';
    this.agent = agent;
    this.code = code;
    this.details = options?.details ?? [];
    this.modelError = options?.modelError;
    this.cause = options?.cause;
  }
}

/**
 * Prompt file for each expert role.
 */
export const EXPERT_PROMPT_FILES: Readonly<Record<ExpertRole, string>> = {
  tech_lead: 'expert_tech_lead.md',
  team_lead: 'expert_team_lead.md',
  qa: 'expert_qa.md',
  designer: 'expert_designer.md',
  analyst: 'expert_analyst.md',
};
