/**
 * Application wiring for the interview-coach CLI.
 */

import { loadConfig, readDebugFlag, type Config, type EnvRecord } from '../config/index.js';
import { createModelCollaborators, PromptLoader } from '../agents/index.js';
import { InterviewEngine } from '../interview/engine.js';
import { ClaudeCodeClient, createRetryingRouter, type ModelRouter } from '../model/index.js';
import { Logger, type LogSink } from '../utils/logger.js';
import type { CliConfig, CliContext } from './types.js';

/**
 * Creates and initializes CLI application context.
 *
 * Colors are on for a terminal unless `NO_COLOR` is set.
 *
 * @param config - CLI configuration options (override the detected values).
 * @param env - Environment to read `NO_COLOR` from.
 */
export function createCliApp(
  config: Partial<CliConfig> = {},
  env: EnvRecord = process.env
): CliContext {
  const noColor = env.NO_COLOR !== undefined && env.NO_COLOR !== '';
  return {
    args: process.argv.slice(2),
    config: {
      colors: config.colors ?? (!noColor && process.stdout.isTTY === true),
      unicode: config.unicode ?? true,
    },
  };
}

/**
 * Options for building a session runtime.
 */
export interface RuntimeOptions {
  /** Explicit config file. */
  readonly configPath?: string | undefined;
  /** Overrides `interview.max_turns`. */
  readonly maxTurns?: number | undefined;
  /** Environment for config overrides and the debug flag. */
  readonly env?: EnvRecord | undefined;
  /** Router used instead of the `claude` CLI backend. */
  readonly router?: ModelRouter | undefined;
  /** Destination for log lines. */
  readonly sink?: LogSink | undefined;
}

/**
 * Everything a command needs to run one interview.
 */
export interface CliRuntime {
  readonly config: Config;
  readonly logger: Logger;
  readonly engine: InterviewEngine;
}

/**
 * Loads configuration and assembles the engine on model-backed collaborators.
 *
 * @throws ConfigParseError, EnvCoercionError or ConfigValidationError when
 * configuration cannot be loaded.
 */
export async function createRuntime(options: RuntimeOptions = {}): Promise<CliRuntime> {
  const env = options.env ?? process.env;
  const loaded = await loadConfig({ path: options.configPath, env });
  const config: Config =
    options.maxTurns === undefined
      ? loaded
      : { ...loaded, interview: { ...loaded.interview, max_turns: options.maxTurns } };

  const logger = new Logger({ component: 'cli', debugMode: readDebugFlag(env), sink: options.sink });
  const router =
    options.router ??
    createRetryingRouter(new ClaudeCodeClient({ config }), {
      config: {
        maxRetries: config.model_client.max_retry_attempts,
        baseDelayMs: config.model_client.retry_base_delay_ms,
      },
      logger: logger.child('model'),
    });

  const collaborators = createModelCollaborators({
    router,
    prompts: new PromptLoader(config.paths.prompts),
    logger: logger.child('agents'),
  });

  return {
    config,
    logger,
    engine: new InterviewEngine({ collaborators, config, logger: logger.child('engine') }),
  };
}
