/**
 * Agent registry.
 *
 * Maps every agent, and every expert role, to its prompt file and model
 * alias.
 *
 * @packageDocumentation
 */

import type { ExpertRole } from '../interview/types.js';
import {
  AGENT_NAMES,
  AgentNotFoundError,
  EXPERT_PROMPT_FILES,
  type AgentDefinition,
  type AgentName,
} from './types.js';

/**
 * All agent definitions.
 */
export const AGENT_DEFINITIONS: readonly AgentDefinition[] = [
  {
    name: 'planner',
    description: 'Plans ten interview topics from the intake',
    promptFile: 'planner.md',
    modelAlias: 'planner',
  },
  {
    name: 'observer',
    description: 'Assesses the answer, sets flags and selects experts',
    promptFile: 'observer.md',
    modelAlias: 'observer',
  },
  {
    name: 'interviewer',
    description: 'Writes the next visible question',
    promptFile: 'interviewer.md',
    modelAlias: 'interviewer',
  },
  {
    name: 'expert',
    description: 'Comments on the answer from one role',
    promptFile: EXPERT_PROMPT_FILES.tech_lead,
    modelAlias: 'expert',
  },
  {
    name: 'report_writer',
    description: 'Rewrites the soft-skill narrative and roadmap',
    promptFile: 'report_writer.md',
    modelAlias: 'reporter',
  },
] as const;

/**
 * Agent registry providing lookup operations.
 */
export class AgentRegistry {
  private readonly agents: ReadonlyMap<AgentName, AgentDefinition>;

  /**
   * Creates a registry with the given definitions.
   *
   * @param definitions - Agent definitions; defaults to {@link AGENT_DEFINITIONS}.
   */
  constructor(definitions: readonly AgentDefinition[] = AGENT_DEFINITIONS) {
    const agentMap = new Map<AgentName, AgentDefinition>();
    for (const agent of definitions) {
      agentMap.set(agent.name, agent);
    }
    this.agents = agentMap;
  }

  /**
   * Gets an agent definition by name.
   *
   * @throws {AgentNotFoundError} If the agent is not registered.
   */
  getAgent(name: AgentName): AgentDefinition {
    const agent = this.agents.get(name);
    if (agent === undefined) {
      throw new AgentNotFoundError(name);
    }
    return agent;
  }

  /**
   * Gets an agent definition by name, returning undefined if not found.
   */
  tryGetAgent(name: string): AgentDefinition | undefined {
    if (!this.isValidAgentName(name)) {
      return undefined;
    }
    return this.agents.get(name);
  }

  /**
   * Checks if a string is a valid agent name.
   */
  isValidAgentName(name: string): name is AgentName {
    return AGENT_NAMES.some((agent) => agent === name);
  }

  getAllAgents(): readonly AgentDefinition[] {
    return [...this.agents.values()];
  }

  /**
   * Gets the definition used for one expert role. Experts share the
   * `expert` model alias but each role has its own prompt.
   *
   * @throws {AgentNotFoundError} If no expert agent is registered.
   */
  getExpert(role: ExpertRole): AgentDefinition {
    return { ...this.getAgent('expert'), promptFile: EXPERT_PROMPT_FILES[role] };
  }
}

/**
 * Default registry instance.
 */
export const agentRegistry = new AgentRegistry();
