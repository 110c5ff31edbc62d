/**
 * Expert dispatch queue.
 *
 * Drains the roles the observer selected and collects their evaluations in
 * selection order. A failing expert is logged and left out; the turn goes on.
 *
 * @packageDocumentation
 */

import type { ExpertDispatchMode } from '../config/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { Expert, ExpertContext } from './collaborators.js';
import type { ExpertEvaluation, ExpertRole } from './types.js';

/**
 * Options for draining the queue.
 */
export interface DrainOptions {
  /** Sequential (default) or concurrent fan-out. */
  readonly mode?: ExpertDispatchMode | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Removes repeated roles, keeping the first occurrence.
 */
export function dedupeRoles(roles: readonly ExpertRole[]): ExpertRole[] {
  return [...new Set(roles)];
}

/**
 * Adds roles to a pending queue without duplicates.
 */
export function enqueueRoles(
  pending: readonly ExpertRole[],
  roles: readonly ExpertRole[]
): ExpertRole[] {
  return dedupeRoles([...pending, ...roles]);
}

async function evaluateOne(
  expert: Expert,
  role: ExpertRole,
  context: ExpertContext,
  logger: Logger
): Promise<ExpertEvaluation | undefined> {
  try {
    const evaluation = await expert.evaluate(role, context);
    const comment = evaluation.comment.trim();
    if (comment === '') {
      logger.warn('expert_failed', { role, error: 'Empty comment' });
      return undefined;
    }
    const question = evaluation.question?.trim();
    return question !== undefined && question !== ''
      ? { role, comment, question }
      : { role, comment };
  } catch (error) {
    logger.warn('expert_failed', {
      role,
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
}

function isEvaluation(value: ExpertEvaluation | undefined): value is ExpertEvaluation {
  return value !== undefined;
}

/**
 * Invokes each selected expert and returns their evaluations.
 *
 * Nothing is dispatched when the candidate has not answered yet.
 *
 * @param roles - Selected roles, possibly with repeats.
 * @param expert - Expert collaborator.
 * @param context - Shared turn context.
 * @param options - Dispatch mode and logger.
 * @returns Evaluations in selection order, failures omitted.
 */
export async function drainExperts(
  roles: readonly ExpertRole[],
  expert: Expert,
  context: ExpertContext,
  options: DrainOptions = {}
): Promise<ExpertEvaluation[]> {
  const logger = options.logger ?? silentLogger;
  const queue = dedupeRoles(roles);
  if (queue.length === 0 || context.last_answer.trim() === '') {
    return [];
  }

  if (options.mode === 'concurrent') {
    const results = await Promise.all(
      queue.map((role) => evaluateOne(expert, role, context, logger))
    );
    return results.filter(isEvaluation);
  }

  const evaluations: ExpertEvaluation[] = [];
  for (const role of queue) {
    const evaluation = await evaluateOne(expert, role, context, logger);
    if (evaluation !== undefined) {
      evaluations.push(evaluation);
    }
  }
  return evaluations;
}
