/**
 * Adaptive interview core.
 *
 * The engine drives the turn cycle; the router, expert queue, difficulty
 * controller, skill ledger, termination policy and report synthesizer are
 * pure modules it composes. Collaborators that need a model are injected
 * through the interfaces in `collaborators.ts`.
 *
 * @packageDocumentation
 */

export * from './types.js';
export * from './collaborators.js';
export * from './thoughts.js';
export * from './turn-router.js';
export * from './expert-queue.js';
export * from './difficulty.js';
export * from './skill-ledger.js';
export * from './termination.js';
export * from './report.js';
export * from './schemas.js';
export * from './validation.js';
export * from './session-log.js';
export * from './scenario.js';
export * from './engine.js';
