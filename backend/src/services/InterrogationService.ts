import { ConversationLog } from '../interfaces/ConversationLog.js';
import { InstructionBuilder } from '../interfaces/Generator.js';
import { Agent, AgentRecord, HistoryMessage, HistoryPage, SendMessageInput, Turn, TurnResult } from '../types/Agent.js';
import { Story, StorySummary } from '../types/Story.js';
import { badInput, notFound, unavailable } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { CapabilityModel } from '../agents/CapabilityModel.js';
import { TurnPipeline } from '../agents/TurnPipeline.js';
import { AgentStore } from '../stores/AgentStore.js';
import { PersistenceQueue } from '../stores/PersistenceQueue.js';
import { KeyedSerializer } from '../utils/KeyedSerializer.js';
import { StoryService } from './StoryService.js';

export const DEFAULT_HISTORY_LIMIT = 50;
export const MAX_HISTORY_LIMIT = 100;

export interface HistoryOptions {
  limit?: number;
  offset?: number;
  /** Include instruction turns and the generator-facing text */
  includeFull?: boolean;
}

export interface InterrogationServiceDeps {
  stories: StoryService;
  conversationLog: ConversationLog;
  agents: AgentStore;
  pipeline: TurnPipeline;
  instructions: InstructionBuilder;
  persistence: PersistenceQueue;
}

/**
 * Caller-facing facade: spawning agents, sending messages and reading
 * history. Messages to one agent are processed strictly one after another.
 */
export class InterrogationService {
  private readonly log = createLogger(NAMESPACES.services.interrogation);
  private readonly serializer = new KeyedSerializer();

  constructor(private readonly deps: InterrogationServiceDeps) {}

  async spawn(storyId: string, characterId: string): Promise<string> {
    if (!storyId || !characterId) {
      throw badInput('storyId and characterId are required');
    }
    const story = await this.deps.stories.getStory(storyId);
    if (!story) {
      throw notFound(`Story ${storyId} not found`, { storyId });
    }
    const character = story.characters.find(candidate => candidate.id === characterId);
    if (!character) {
      throw notFound(`Character ${characterId} not found in story ${storyId}`, { storyId, characterId });
    }

    const capability = CapabilityModel.fromCharacter(character);
    const instruction = this.deps.instructions.buildInstruction(story, character);
    let record: AgentRecord;
    try {
      record = await this.deps.conversationLog.createAgent({
        storyRef: story.id,
        characterRef: character.id,
        characterName: character.name,
        personality: character.personality,
        heldEvidenceIds: Array.from(capability.heldEvidenceIds),
        knownLocationIds: Array.from(capability.knownLocationIds)
      });
    } catch (error) {
      throw unavailable('Could not create the agent record', error);
    }

    const opening: Turn = {
      role: 'instruction',
      index: 0,
      fullText: instruction,
      clientText: '',
      timestamp: record.createdAt,
      revealedEvidenceIds: [],
      revealedLocationIds: []
    };
    const agent: Agent = {
      id: record.id,
      storyRef: record.storyRef,
      characterRef: record.characterRef,
      characterName: record.characterName,
      personality: record.personality,
      heldEvidenceIds: capability.heldEvidenceIds,
      knownLocationIds: capability.knownLocationIds,
      revealedEvidenceIds: new Set(),
      revealedLocationIds: new Set(),
      history: [opening],
      reconstructedFromStore: false
    };
    this.deps.agents.register(agent);
    this.deps.persistence.enqueue(`turn ${agent.id}#0`, () => this.deps.conversationLog.appendTurn(agent.id, opening));

    this.log('[SPAWN] agent=%s story=%s character=%s evidence=%d locations=%d',
      agent.id, story.id, character.id, capability.heldEvidenceIds.size, capability.knownLocationIds.size);
    return agent.id;
  }

  sendMessage(agentId: string, input: SendMessageInput): Promise<TurnResult> {
    return this.serializer.run(agentId, async () => {
      const agent = await this.deps.agents.getOrLoad(agentId);
      return this.deps.pipeline.run(agent, input);
    });
  }

  async getHistory(agentId: string, options: HistoryOptions = {}): Promise<HistoryPage> {
    const limit = clampLimit(options.limit);
    const offset = Math.max(0, Math.floor(options.offset ?? 0));
    const agent = await this.deps.agents.getOrLoad(agentId);

    const visible = options.includeFull ? agent.history : agent.history.filter(turn => turn.role !== 'instruction');
    const messages = visible.slice(offset, offset + limit).map((turn): HistoryMessage => ({
      index: turn.index,
      role: turn.role,
      content: options.includeFull ? turn.fullText : turn.clientText,
      timestamp: turn.timestamp,
      revealedEvidenceIds: [...turn.revealedEvidenceIds],
      revealedLocationIds: [...turn.revealedLocationIds]
    }));

    return {
      agentId: agent.id,
      characterName: agent.characterName,
      messages,
      total: visible.length,
      hasMore: offset + messages.length < visible.length
    };
  }

  listStories(): Promise<StorySummary[]> {
    return this.deps.stories.listStories();
  }

  async getStory(storyId: string): Promise<Story> {
    const story = await this.deps.stories.getStory(storyId);
    if (!story) {
      throw notFound(`Story ${storyId} not found`, { storyId });
    }
    return story;
  }

  importStory(input: unknown): Story {
    return this.deps.stories.importStory(input);
  }

  preloadActive(hours: number, limit: number): Promise<number> {
    return this.deps.agents.preloadActive(hours, limit);
  }

  /** Wait for every queued durable write to settle. */
  drain(): Promise<void> {
    return this.deps.persistence.drain();
  }
}

function clampLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit) || limit <= 0) return DEFAULT_HISTORY_LIMIT;
  return Math.min(Math.floor(limit), MAX_HISTORY_LIMIT);
}
