/**
 * Model router backed by the `claude` CLI.
 *
 * Each request spawns the CLI in print mode with JSON output and parses the
 * reply. Failures come back as typed error values.
 *
 * @packageDocumentation
 */

import { execa } from 'execa';
import type { Config, ModelAssignments } from '../config/types.js';
import type {
  ModelAlias,
  ModelRouter,
  ModelRouterRequest,
  ModelRouterResponse,
  ModelRouterResult,
  ModelUsage,
} from './types.js';
import {
  createAuthenticationError,
  createFailureResult,
  createModelError,
  createProcessError,
  createRateLimitError,
  createSuccessResult,
  createTimeoutError,
} from './types.js';

/**
 * Provider name reported in response metadata.
 */
export const CLAUDE_CODE_PROVIDER = 'claude-code';

/**
 * Options for creating a ClaudeCodeClient.
 */
export interface ClaudeCodeClientOptions {
  /** Model assignments and client settings. */
  readonly config: Pick<Config, 'models' | 'model_client'>;
  /** Extra CLI flags passed to every invocation. */
  readonly additionalFlags?: readonly string[] | undefined;
  /** Working directory for the subprocess. */
  readonly cwd?: string | undefined;
}

const MODEL_ALIAS_FIELDS: Readonly<Record<ModelAlias, keyof ModelAssignments>> = {
  planner: 'planner_model',
  observer: 'observer_model',
  interviewer: 'interviewer_model',
  expert: 'expert_model',
  reporter: 'report_model',
};

/**
 * Resolves a model alias to the configured model identifier.
 */
export function resolveModelAlias(alias: ModelAlias, models: ModelAssignments): string {
  return models[MODEL_ALIAS_FIELDS[alias]];
}

type JsonObject = Readonly<Record<string, unknown>>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(source: JsonObject, key: string): number {
  const value = source[key];
  return typeof value === 'number' ? value : 0;
}

function parseUsage(raw: unknown): ModelUsage | undefined {
  if (!isJsonObject(raw)) {
    return undefined;
  }
  const promptTokens =
    readNumber(raw, 'input_tokens') +
    readNumber(raw, 'cache_read_input_tokens') +
    readNumber(raw, 'cache_creation_input_tokens');
  const completionTokens = readNumber(raw, 'output_tokens');
  return { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens };
}

/**
 * Parsed form of the CLI's JSON output.
 */
export interface ParsedClaudeOutput {
  readonly content: string;
  readonly usage: ModelUsage;
  readonly modelId: string;
  readonly latencyMs: number | undefined;
  readonly isError: boolean;
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function collectMessages(stdout: string): JsonObject[] {
  const trimmed = stdout.trim();
  if (trimmed === '') {
    return [];
  }

  // A single JSON document (object or array of messages) is tried first.
  const whole = tryParseJson(trimmed);
  if (Array.isArray(whole)) {
    return whole.filter(isJsonObject);
  }
  if (isJsonObject(whole)) {
    return [whole];
  }

  return trimmed
    .split('\n')
    .map((line) => tryParseJson(line.trim()))
    .filter(isJsonObject);
}

/**
 * Parses CLI output in any of its JSON shapes.
 *
 * Assistant text blocks are concatenated; the `result` message supplies the
 * content when no assistant text was seen, plus the latency and final usage.
 *
 * @param stdout - Raw standard output.
 */
export function parseClaudeOutput(stdout: string): ParsedClaudeOutput {
  let content = '';
  let usage: ModelUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
  let modelId = 'unknown';
  let latencyMs: number | undefined;
  let isError = false;

  for (const message of collectMessages(stdout)) {
    const type = message.type;

    if (type === 'assistant' && isJsonObject(message.message)) {
      const inner = message.message;
      if (Array.isArray(inner.content)) {
        for (const block of inner.content) {
          if (isJsonObject(block) && block.type === 'text' && typeof block.text === 'string') {
            content += block.text;
          }
        }
      }
      if (typeof inner.model === 'string' && inner.model !== '') {
        modelId = inner.model;
      }
      usage = parseUsage(inner.usage) ?? usage;
    }

    if (type === 'result') {
      if (typeof message.result === 'string' && content === '') {
        content = message.result;
      }
      if (typeof message.duration_ms === 'number') {
        latencyMs = message.duration_ms;
      }
      if (message.is_error === true) {
        isError = true;
      }
      usage = parseUsage(message.usage) ?? usage;
    }
  }

  return { content, usage, modelId, latencyMs, isError };
}

const RATE_LIMIT_PATTERN = /rate.?limit|usage limit|overloaded|429/i;
const AUTH_PATTERN = /auth|api key|log ?in|401|403/i;

/**
 * Model router that shells out to the `claude` CLI.
 *
 * @example
 * ```typescript
 * const client = new ClaudeCodeClient({ config });
 * const result = await client.complete({ modelAlias: 'observer', prompt: '...' });
 * if (result.success) {
 *   console.log(result.response.content);
 * }
 * ```
 */
export class ClaudeCodeClient implements ModelRouter {
  private readonly models: ModelAssignments;
  private readonly executable: string;
  private readonly timeoutMs: number;
  private readonly additionalFlags: readonly string[];
  private readonly cwd: string | undefined;

  /**
   * Creates a new ClaudeCodeClient.
   */
  constructor(options: ClaudeCodeClientOptions) {
    this.models = options.config.models;
    this.executable = options.config.model_client.executable;
    this.timeoutMs = options.config.model_client.timeout_ms;
    this.additionalFlags = options.additionalFlags ?? [];
    this.cwd = options.cwd;
  }

  /**
   * Builds CLI arguments for a request.
   */
  buildArgs(request: ModelRouterRequest): string[] {
    const args: string[] = [
      '-p',
      '--output-format',
      'json',
      '--model',
      resolveModelAlias(request.modelAlias, this.models),
      '--no-session-persistence',
      ...this.additionalFlags,
    ];

    if (request.systemPrompt !== undefined && request.systemPrompt !== '') {
      args.push('--system-prompt', request.systemPrompt);
    }

    args.push(request.prompt);
    return args;
  }

  /**
   * Sends a request to the CLI.
   */
  async complete(request: ModelRouterRequest): Promise<ModelRouterResult> {
    const timeoutMs = request.timeoutMs ?? this.timeoutMs;
    const startTime = Date.now();

    const outcome = await execa(this.executable, this.buildArgs(request), {
      timeout: timeoutMs,
      reject: false,
      stdin: 'ignore',
      ...(this.cwd !== undefined ? { cwd: this.cwd } : {}),
    }).then(
      (value) => ({ started: true as const, value }),
      (error: unknown) => ({ started: false as const, error })
    );

    if (!outcome.started) {
      const cause = outcome.error instanceof Error ? outcome.error : new Error(String(outcome.error));
      return createFailureResult(
        createProcessError(
          `Failed to start '${this.executable}': ${cause.message}`,
          this.executable,
          { cause, request }
        )
      );
    }

    const result = outcome.value;

    if (result.timedOut) {
      return createFailureResult(
        createTimeoutError(`Request timed out after ${String(timeoutMs)}ms`, timeoutMs, {
          request,
        })
      );
    }

    if (result.exitCode === undefined) {
      return createFailureResult(
        createProcessError(
          `'${this.executable}' could not be started. Is it installed and on PATH?`,
          this.executable,
          { request }
        )
      );
    }

    const parsed = parseClaudeOutput(result.stdout);

    if (result.exitCode !== 0 || parsed.isError) {
      const detail = [parsed.content, result.stderr].filter((part) => part !== '').join(' ');
      if (RATE_LIMIT_PATTERN.test(detail)) {
        return createFailureResult(createRateLimitError(`Rate limited: ${detail}`, { request }));
      }
      if (AUTH_PATTERN.test(detail)) {
        return createFailureResult(
          createAuthenticationError(`Authentication failed: ${detail}`, CLAUDE_CODE_PROVIDER, {
            request,
          })
        );
      }
      return createFailureResult(
        createModelError(
          `'${this.executable}' failed with exit code ${String(result.exitCode)}${detail === '' ? '' : `: ${detail}`}`,
          true,
          { errorCode: `EXIT_${String(result.exitCode)}`, request }
        )
      );
    }

    if (parsed.content.trim() === '') {
      return createFailureResult(
        createModelError('Model returned an empty reply', true, {
          errorCode: 'EMPTY_REPLY',
          request,
        })
      );
    }

    const response: ModelRouterResponse = {
      content: parsed.content,
      usage: parsed.usage,
      metadata: {
        modelId: parsed.modelId,
        provider: CLAUDE_CODE_PROVIDER,
        latencyMs: parsed.latencyMs ?? Date.now() - startTime,
      },
      ...(request.requestId !== undefined ? { requestId: request.requestId } : {}),
    };

    return createSuccessResult(response);
  }
}
