import { AgentRecord, PersistedTurn, Turn } from '../types/Agent.js';

export type NewAgentRecord = Omit<AgentRecord, 'id' | 'createdAt'>;

/**
 * Durable, append-only record of agents and their turns. Each turn is keyed
 * by (agentId, index); writing the same key twice is an error.
 */
export interface ConversationLog {
  /** Persist the static part of a new agent and return it with its id */
  createAgent(record: NewAgentRecord): Promise<AgentRecord>;

  getAgent(agentId: string): Promise<AgentRecord | null>;

  appendTurn(agentId: string, turn: Turn): Promise<void>;

  /** All turns for the agent ordered by index */
  listTurns(agentId: string): Promise<PersistedTurn[]>;

  /**
   * Atomically swap the agent's stored turns for `turns`. Used when a
   * reconstructed history was compacted or re-indexed.
   */
  replaceTurns(agentId: string, turns: readonly Turn[]): Promise<void>;

  /** Agents with a turn written at or after `sinceIso`, most recent first */
  listRecentlyActiveAgentIds(sinceIso: string, limit: number): Promise<string[]>;
}
