/**
 * In-process model router for agent tests.
 */

import { vi, type Mock } from 'vitest';
import {
  createFailureResult,
  createModelError,
  createSuccessResult,
  type ModelAlias,
  type ModelRouter,
  type ModelRouterError,
  type ModelRouterResult,
} from '../../src/model/types.js';

export type ScriptedReply = string | ModelRouterError;

/**
 * Router that answers with the scripted replies in order and repeats the
 * last one when they run out. A string is a successful completion; an error
 * object is returned as a failure.
 */
export function scriptedRouter(
  replies: readonly ScriptedReply[]
): ModelRouter & { complete: Mock<ModelRouter['complete']> } {
  let index = 0;
  return {
    complete: vi.fn<ModelRouter['complete']>((request) => {
      const reply = replies[Math.min(index, replies.length - 1)] ?? '';
      index++;
      return Promise.resolve(toResult(reply, request.modelAlias));
    }),
  };
}

/**
 * Router with a separate script per model alias. Each alias replays its
 * replies in order and repeats the last; an alias without a script fails
 * with a model error.
 */
export function aliasRouter(
  scripts: Partial<Record<ModelAlias, readonly ScriptedReply[]>>
): ModelRouter & { complete: Mock<ModelRouter['complete']> } {
  const calls = new Map<ModelAlias, number>();
  return {
    complete: vi.fn<ModelRouter['complete']>((request) => {
      const replies = scripts[request.modelAlias] ?? [];
      const index = calls.get(request.modelAlias) ?? 0;
      calls.set(request.modelAlias, index + 1);
      const reply =
        replies[Math.min(index, replies.length - 1)] ??
        createModelError(`no script for ${request.modelAlias}`, false);
      return Promise.resolve(toResult(reply, request.modelAlias));
    }),
  };
}

function toResult(reply: ScriptedReply, alias: ModelAlias): ModelRouterResult {
  if (typeof reply !== 'string') {
    return createFailureResult(reply);
  }
  return createSuccessResult({
    content: reply,
    usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    metadata: { modelId: `fake-${alias}`, provider: 'fake', latencyMs: 1 },
  });
}
