/**
 * Turn router: decides what happens after the observer has spoken.
 *
 * The router is pure. It reads the session state and the observer output and
 * names the next step of the cycle; the engine performs it.
 *
 * @packageDocumentation
 */

import type {
  ExpertRole,
  InterviewState,
  InterviewStrategy,
  ObserverDecision,
  ObserverReport,
  RecommendedAction,
} from './types.js';

/**
 * Why a session is being finalized.
 */
export type FinalizeReason = 'stop_requested' | 'plan_exhausted';

/**
 * Next step of the turn cycle.
 *
 * `ADJUST_DIFFICULTY` is always followed by question generation.
 */
export type NextAction =
  | { readonly kind: 'FINALIZE'; readonly reason: FinalizeReason }
  | { readonly kind: 'DISPATCH_EXPERTS'; readonly roles: readonly ExpertRole[] }
  | { readonly kind: 'ADJUST_DIFFICULTY' };

/**
 * Actions that end the session once every planned topic has been covered.
 */
export const FINALIZING_ACTIONS: readonly RecommendedAction[] = ['WRAP_UP', 'CHANGE_TOPIC'];

/**
 * State fields the router reads.
 */
export type RoutingState = Pick<
  InterviewState,
  'stop_requested' | 'current_topic_index' | 'planned_topics' | 'pending_expert_roles'
>;

/**
 * Checks whether the topic plan has run out.
 */
export function isPlanExhausted(state: Pick<InterviewState, 'current_topic_index' | 'planned_topics'>): boolean {
  return state.current_topic_index >= state.planned_topics.length;
}

/**
 * Picks the next step.
 *
 * Rules, first match wins:
 * 1. A stop request, or an exhausted plan with a wrap-up or topic change
 *    recommendation, finalizes.
 * 2. Selected experts still waiting in the queue are dispatched.
 * 3. Otherwise difficulty is adjusted and a question generated.
 *
 * @param state - Current session state.
 * @param report - Observer assessment for this cycle.
 * @param decision - Observer routing decision for this cycle.
 */
export function route(
  state: RoutingState,
  report: ObserverReport,
  decision: ObserverDecision
): NextAction {
  if (state.stop_requested) {
    return { kind: 'FINALIZE', reason: 'stop_requested' };
  }
  if (isPlanExhausted(state) && FINALIZING_ACTIONS.includes(report.recommended_next_action)) {
    return { kind: 'FINALIZE', reason: 'plan_exhausted' };
  }
  if (decision.expert_roles.length > 0 && state.pending_expert_roles.length > 0) {
    return { kind: 'DISPATCH_EXPERTS', roles: [...state.pending_expert_roles] };
  }
  return { kind: 'ADJUST_DIFFICULTY' };
}

const ACTION_STRATEGIES: Readonly<Record<RecommendedAction, InterviewStrategy>> = {
  ASK_DEEPER: 'deepen',
  ASK_EASIER: 'simplify',
  CHANGE_TOPIC: 'change_topic',
  HANDLE_OFFTOPIC: 'return_to_topic',
  HANDLE_HALLUCINATION: 'handle_hallucination',
  HANDLE_ROLE_REVERSAL: 'answer_candidate_question',
  WRAP_UP: 'wrap_up',
};

/**
 * Chooses the interviewer tactic for the next question.
 *
 * Flags outrank the recommended action. A contradiction is recorded by the
 * observer but does not change the tactic.
 */
export function selectStrategy(report: ObserverReport): InterviewStrategy {
  if (report.flags.role_reversal) {
    return 'answer_candidate_question';
  }
  if (report.flags.off_topic) {
    return 'return_to_topic';
  }
  if (report.flags.hallucination) {
    return 'handle_hallucination';
  }
  return ACTION_STRATEGIES[report.recommended_next_action];
}

/**
 * Checks whether the topic pointer should move after this turn.
 */
export function shouldAdvanceTopic(report: ObserverReport, decision: ObserverDecision): boolean {
  if (!decision.advance_topic || decision.ask_deeper) {
    return false;
  }
  return !report.flags.off_topic && !report.flags.hallucination && !report.flags.role_reversal;
}
