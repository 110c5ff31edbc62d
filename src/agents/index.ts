/**
 * Model-backed collaborators for the interview engine.
 *
 * @packageDocumentation
 */

import type { InterviewCollaborators } from '../interview/collaborators.js';
import { ModelExpert } from './expert-agent.js';
import { ModelQuestionGenerator } from './interviewer-agent.js';
import type { ModelAgentOptions } from './model-agent.js';
import { ModelObserver } from './observer-agent.js';
import { ModelPlanner } from './planner-agent.js';
import { ModelReportWriter } from './report-agent.js';

// Types
export type { AgentName, AgentDefinition, AgentErrorCode } from './types.js';

export { AGENT_NAMES, EXPERT_PROMPT_FILES, AgentError, AgentNotFoundError } from './types.js';

// Registry
export { AGENT_DEFINITIONS, AgentRegistry, agentRegistry } from './registry.js';

// Prompts and replies
export { DEFAULT_PROMPTS_DIR, PromptLoader, PromptLoadError } from './prompts.js';
export { extractJson, extractPlainText } from './json-reply.js';

// Agents
export type { ModelAgentOptions, TurnSummary } from './model-agent.js';
export { ModelAgent, renderPrompt, summarizeTurns } from './model-agent.js';
export { ModelPlanner } from './planner-agent.js';
export { ModelObserver, buildObserverPrompt } from './observer-agent.js';
export { ModelExpert, buildExpertPrompt } from './expert-agent.js';
export { ModelQuestionGenerator, buildQuestionPrompt } from './interviewer-agent.js';
export { ModelReportWriter, buildReportPrompt } from './report-agent.js';

/**
 * Creates the full collaborator set on one model router.
 *
 * @example
 * ```typescript
 * const collaborators = createModelCollaborators({
 *   router,
 *   prompts: new PromptLoader(config.paths.prompts),
 *   logger,
 * });
 * ```
 */
export function createModelCollaborators(options: ModelAgentOptions): InterviewCollaborators {
  return {
    planner: new ModelPlanner(options),
    observer: new ModelObserver(options),
    expert: new ModelExpert(options),
    questionGenerator: new ModelQuestionGenerator(options),
    reportWriter: new ModelReportWriter(options),
  };
}
