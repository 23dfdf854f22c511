import { ConversationLog } from '../interfaces/ConversationLog.js';
import { Agent } from '../types/Agent.js';
import { HistoryReconstructor } from '../agents/HistoryReconstructor.js';
import { errorMessage } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';

const log = createLogger(NAMESPACES.stores.agents);

/**
 * In-memory registry of live agents. Misses fall through to reconstruction
 * from the durable log; concurrent misses for the same id share one load.
 */
export class AgentStore {
  private readonly agents = new Map<string, Agent>();
  private readonly loading = new Map<string, Promise<Agent>>();

  constructor(
    private readonly reconstructor: HistoryReconstructor,
    private readonly conversationLog: ConversationLog
  ) {}

  register(agent: Agent): void {
    this.agents.set(agent.id, agent);
  }

  get(agentId: string): Agent | undefined {
    return this.agents.get(agentId);
  }

  delete(agentId: string): boolean {
    return this.agents.delete(agentId);
  }

  get size(): number {
    return this.agents.size;
  }

  async getOrLoad(agentId: string): Promise<Agent> {
    const live = this.agents.get(agentId);
    if (live) return live;

    const inFlight = this.loading.get(agentId);
    if (inFlight) return inFlight;

    const load = this.reconstructor
      .reconstruct(agentId)
      .then(agent => {
        const registered = this.agents.get(agentId);
        if (registered) return registered;
        this.agents.set(agentId, agent);
        log('[LOAD] agent %s reconstructed with %d turns', agentId, agent.history.length);
        return agent;
      })
      .finally(() => {
        this.loading.delete(agentId);
      });
    this.loading.set(agentId, load);
    return load;
  }

  /**
   * Load agents that took a turn within the last `hours`, newest first.
   * Returns how many were loaded; individual failures are logged and skipped.
   */
  async preloadActive(hours: number, limit: number): Promise<number> {
    const since = new Date(Date.now() - hours * 60 * 60 * 1000).toISOString();
    const ids = await this.conversationLog.listRecentlyActiveAgentIds(since, limit);
    let loaded = 0;
    for (const id of ids) {
      if (this.agents.has(id)) continue;
      try {
        await this.getOrLoad(id);
        loaded++;
      } catch (error) {
        log('[PRELOAD] skipping agent %s: %s', id, errorMessage(error));
      }
    }
    log('[PRELOAD] loaded %d of %d recently active agents', loaded, ids.length);
    return loaded;
  }
}
