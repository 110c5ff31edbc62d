/**
 * Shared plumbing for model-backed agents.
 *
 * @packageDocumentation
 */

import type { ModelRouter } from '../model/types.js';
import { checkSchema, type SchemaName, type SchemaTypes } from '../interview/schemas.js';
import { activeFlags, type TurnRecord } from '../interview/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { extractJson } from './json-reply.js';
import type { PromptLoader } from './prompts.js';
import { agentRegistry, type AgentRegistry } from './registry.js';
import { AgentError, type AgentDefinition, type AgentName } from './types.js';

/**
 * Dependencies every agent needs.
 */
export interface ModelAgentOptions {
  readonly router: ModelRouter;
  readonly prompts: PromptLoader;
  readonly registry?: AgentRegistry | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Compact view of a turn for prompts.
 */
export interface TurnSummary {
  readonly turn_id: number;
  readonly topic: string;
  readonly candidate: string;
  readonly interviewer: string;
  readonly flags: readonly string[];
}

/**
 * Summarizes turns without the hidden reflection.
 */
export function summarizeTurns(turns: readonly TurnRecord[]): TurnSummary[] {
  return turns.map((turn) => ({
    turn_id: turn.turn_id,
    topic: turn.topic,
    candidate: turn.user_message,
    interviewer: turn.agent_visible_message,
    flags: activeFlags(turn.flags),
  }));
}

/**
 * Renders a user prompt: a task line followed by the context as JSON.
 */
export function renderPrompt(task: string, payload: Record<string, unknown>): string {
  return `${task}\n\n\`\`\`json\n${JSON.stringify(payload, null, 2)}\n\`\`\``;
}

/**
 * Base class for agents: loads the system prompt, calls the model and
 * turns failures into {@link AgentError}.
 */
export abstract class ModelAgent {
  protected readonly router: ModelRouter;
  protected readonly prompts: PromptLoader;
  protected readonly registry: AgentRegistry;
  protected readonly logger: Logger;

  protected constructor(
    protected readonly agentName: AgentName,
    options: ModelAgentOptions
  ) {
    this.router = options.router;
    this.prompts = options.prompts;
    this.registry = options.registry ?? agentRegistry;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Sends a prompt and returns the reply text.
   *
   * @throws AgentError with `MODEL_FAILURE` when the router reports a failure.
   * @throws PromptLoadError when the system prompt cannot be read.
   */
  protected async ask(
    prompt: string,
    definition: AgentDefinition = this.registry.getAgent(this.agentName)
  ): Promise<string> {
    const systemPrompt = await this.prompts.load(definition.promptFile);
    const result = await this.router.complete({
      modelAlias: definition.modelAlias,
      prompt,
      systemPrompt,
    });
    if (!result.success) {
      throw new AgentError(
        this.agentName,
        'MODEL_FAILURE',
        `${this.agentName} model call failed: ${result.error.message}`,
        { modelError: result.error }
      );
    }
    this.logger.debug('agent_reply', {
      agent: this.agentName,
      latencyMs: result.response.metadata.latencyMs,
      totalTokens: result.response.usage.totalTokens,
    });
    return result.response.content;
  }

  /**
   * Extracts JSON from a reply and checks it against a schema.
   *
   * @throws AgentError with `PARSE_FAILURE` or `SCHEMA_FAILURE`.
   */
  protected parseReply<K extends SchemaName>(reply: string, schema: K): SchemaTypes[K] {
    const data = extractJson(reply);
    if (data === undefined) {
      throw new AgentError(this.agentName, 'PARSE_FAILURE', `${this.agentName} reply is not JSON`);
    }
    const check = checkSchema(schema, data);
    if (!check.valid) {
      throw new AgentError(
        this.agentName,
        'SCHEMA_FAILURE',
        `${this.agentName} reply does not match ${schema}: ${check.errors.join('; ')}`,
        { details: check.errors }
      );
    }
    return check.value;
  }
}
