import type { Environment } from 'nunjucks';
import { ConfigManager } from '../configManager.js';
import { SqliteDatabase } from '../database.js';
import { Generator, InstructionBuilder } from '../interfaces/Generator.js';
import { CharacterAgent } from '../agents/CharacterAgent.js';
import { HistoryReconstructor } from '../agents/HistoryReconstructor.js';
import { TurnPipeline, TurnPipelineDeps } from '../agents/TurnPipeline.js';
import { createLocationDetector } from '../agents/detectors/createLocationDetector.js';
import { LocationRevealDetector } from '../agents/detectors/LocationRevealDetector.js';
import { AgentStore } from '../stores/AgentStore.js';
import { PersistenceQueue } from '../stores/PersistenceQueue.js';
import { SqliteConversationLog } from '../stores/SqliteConversationLog.js';
import { InterrogationService } from './InterrogationService.js';
import { StoryService } from './StoryService.js';

export interface ServiceOverrides {
  generator?: Generator;
  instructions?: InstructionBuilder;
  detector?: LocationRevealDetector;
  env?: Environment;
  onTransition?: TurnPipelineDeps['onTransition'];
}

export interface InterrogationComponents {
  service: InterrogationService;
  stories: StoryService;
  conversationLog: SqliteConversationLog;
  agents: AgentStore;
  persistence: PersistenceQueue;
}

/**
 * Wire the engine over one database. Tests swap the generator, instruction
 * builder or detector through `overrides`.
 */
export function createInterrogationService(
  configManager: ConfigManager,
  db: SqliteDatabase,
  overrides: ServiceOverrides = {}
): InterrogationComponents {
  const features = configManager.getFeatures();
  const characterAgent = new CharacterAgent(configManager, overrides.env);
  const generator = overrides.generator ?? characterAgent;
  const instructions = overrides.instructions ?? characterAgent;

  const stories = new StoryService(db);
  const conversationLog = new SqliteConversationLog(db);
  const persistence = new PersistenceQueue({
    timeoutMs: features.persistenceTimeoutMs,
    retries: features.persistenceRetries,
    backoffMs: features.persistenceBackoffMs
  });
  const reconstructor = new HistoryReconstructor({ conversationLog, stories, instructions });
  const agents = new AgentStore(reconstructor, conversationLog);
  const pipeline = new TurnPipeline({
    generator,
    stories,
    detector: overrides.detector ?? createLocationDetector(configManager, overrides.env),
    conversationLog,
    persistence,
    generationTimeoutMs: features.generationTimeoutMs,
    onTransition: overrides.onTransition
  });

  const service = new InterrogationService({ stories, conversationLog, agents, pipeline, instructions, persistence });
  return { service, stories, conversationLog, agents, persistence };
}
