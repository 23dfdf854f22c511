import { ConversationLog } from '../interfaces/ConversationLog.js';
import { Generator, GeneratorTurn } from '../interfaces/Generator.js';
import { StoryProvider } from '../interfaces/StoryProvider.js';
import { Agent, SendMessageInput, Turn, TurnResult } from '../types/Agent.js';
import { Evidence, StoryLocation } from '../types/Story.js';
import { AgentErrorCodes, emptyInput, errorMessage, invalidAgentState, isAgentError, unavailable } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { PersistenceQueue } from '../stores/PersistenceQueue.js';
import { withTimeout } from '../utils/async.js';
import { augmentUserText, extractClientText } from '../utils/turnContent.js';
import { LocationRevealDetector } from './detectors/LocationRevealDetector.js';
import { EMPTY_REPLY_LINE, fallbackLine } from './personality.js';
import { ParsedReply, parseCharacterReply } from './replyParser.js';
import { validateReveals } from './revealValidator.js';

export type PipelineState = 'augmenting' | 'generating' | 'parsing' | 'retrying' | 'validating' | 'persisting' | 'done';

export const CLARIFICATION_TEXT = `Please respond in valid JSON format:
{
  "reply": "your spoken dialogue with [actions] in brackets",
  "revealed_evidences": ["evidence IDs you're giving"]
}`;

export const FORMAT_REMINDER_TEXT =
  'Reminder: answer with a single JSON object {"reply": "...", "revealed_evidences": [...], "revealed_locations": [...]} and nothing else.';

export interface TurnPipelineDeps {
  generator: Generator;
  stories: StoryProvider;
  detector: LocationRevealDetector;
  conversationLog: ConversationLog;
  persistence: PersistenceQueue;
  generationTimeoutMs: number;
  /** Observes every state entered; used for tracing and tests */
  onTransition?: (agentId: string, state: PipelineState) => void;
}

interface TurnContext {
  agent: Agent;
  input: SendMessageInput;
  raw: string;
  parsed: ParsedReply | null;
  retried: boolean;
  usedFallback: boolean;
  result: TurnResult | null;
}

export function nextTurnIndex(agent: Agent): number {
  const last = agent.history[agent.history.length - 1];
  return last ? last.index + 1 : 0;
}

/**
 * One player message through augment → generate → parse (→ retry) →
 * validate → persist. The caller guarantees that no other run for the same
 * agent is in flight.
 */
export class TurnPipeline {
  private readonly log = createLogger(NAMESPACES.agents.pipeline);

  constructor(private readonly deps: TurnPipelineDeps) {}

  async run(agent: Agent, input: SendMessageInput): Promise<TurnResult> {
    if (!agent.storyRef) {
      throw invalidAgentState(`Agent ${agent.id} has no story reference`, { agentId: agent.id });
    }

    const ctx: TurnContext = { agent, input, raw: '', parsed: null, retried: false, usedFallback: false, result: null };
    let state: PipelineState = 'augmenting';

    while (state !== 'done') {
      this.deps.onTransition?.(agent.id, state);
      switch (state) {
        case 'augmenting':
          await this.augment(ctx);
          state = 'generating';
          break;
        case 'generating':
          try {
            ctx.raw = await this.generate(agent, agent.reconstructedFromStore ? [{ role: 'instruction', fullText: FORMAT_REMINDER_TEXT }] : []);
          } catch (error) {
            this.log('[TURN] generation failed agent=%s: %s', agent.id, errorMessage(error));
            throw unavailable('The character is unavailable right now', error);
          }
          state = 'parsing';
          break;
        case 'parsing':
          state = this.parse(ctx);
          break;
        case 'retrying':
          ctx.retried = true;
          try {
            ctx.raw = await this.generate(agent, [{ role: 'user', fullText: CLARIFICATION_TEXT }]);
            state = 'parsing';
          } catch (error) {
            this.log('[TURN] clarification request failed agent=%s: %s', agent.id, errorMessage(error));
            this.useFallback(ctx);
            state = 'validating';
          }
          break;
        case 'validating':
          await this.validate(ctx);
          state = 'persisting';
          break;
        case 'persisting':
          this.persistCharacterTurn(ctx);
          state = 'done';
          break;
      }
    }
    this.deps.onTransition?.(agent.id, 'done');

    if (!ctx.result) {
      throw invalidAgentState(`Turn for agent ${agent.id} finished without a result`);
    }
    return ctx.result;
  }

  private async augment(ctx: TurnContext): Promise<void> {
    const { agent, input } = ctx;
    const text = (input.text ?? '').trim();
    const location = input.locationId ? await this.lookupLocation(agent, input.locationId) : null;
    const evidence = input.presentedEvidenceIds?.length ? await this.lookupEvidence(agent, input.presentedEvidenceIds) : [];

    if (!text && evidence.length === 0) {
      throw emptyInput();
    }

    const fullText = augmentUserText(text, location, evidence);
    const turn: Turn = {
      role: 'user',
      index: nextTurnIndex(agent),
      fullText,
      clientText: extractClientText('user', fullText),
      timestamp: new Date().toISOString(),
      revealedEvidenceIds: [],
      revealedLocationIds: []
    };
    agent.history.push(turn);
    this.persist(agent.id, turn);
    this.log('[TURN] user turn agent=%s index=%d location=%s evidence=%o', agent.id, turn.index, location?.id ?? '-', evidence.map(item => item.id));
  }

  private async generate(agent: Agent, extra: GeneratorTurn[]): Promise<string> {
    const turns: GeneratorTurn[] = [...agent.history.filter(turn => turn.fullText.trim()), ...extra];
    const options = extra.length > 0 ? { structured: true, transientTurns: extra.length } : { structured: true };
    return withTimeout(this.deps.generator.generate(turns, options), this.deps.generationTimeoutMs, 'generation');
  }

  private parse(ctx: TurnContext): PipelineState {
    try {
      ctx.parsed = parseCharacterReply(ctx.raw);
      return 'validating';
    } catch (error) {
      if (!isAgentError(error) || error.code !== AgentErrorCodes.GENERATOR_OUTPUT_MALFORMED) throw error;
      this.log('[TURN] malformed output agent=%s retried=%s details=%o', ctx.agent.id, ctx.retried, error.details);
      if (!ctx.retried) return 'retrying';
      this.useFallback(ctx);
      return 'validating';
    }
  }

  private useFallback(ctx: TurnContext): void {
    ctx.usedFallback = true;
    ctx.parsed = { reply: fallbackLine(ctx.agent.personality), revealedEvidences: [], revealedLocations: [], repaired: false };
  }

  private async validate(ctx: TurnContext): Promise<void> {
    const { agent } = ctx;
    const parsed = ctx.parsed ?? { reply: '', revealedEvidences: [], revealedLocations: [], repaired: false };
    const reply = parsed.reply.trim() || EMPTY_REPLY_LINE;
    const evidenceIds = ctx.usedFallback ? [] : validateReveals(parsed.revealedEvidences, agent.heldEvidenceIds);
    const locationIds = ctx.usedFallback ? [] : await this.detectLocations(agent, reply);

    const dropped = parsed.revealedEvidences.length - evidenceIds.length;
    if (dropped > 0) {
      this.log('[TURN] dropped %d evidence claim(s) agent=%s claimed=%o', dropped, agent.id, parsed.revealedEvidences);
    }
    if (parsed.revealedLocations.length > 0) {
      this.log('[TURN] generator location hint agent=%s hint=%o detected=%o', agent.id, parsed.revealedLocations, locationIds);
    }

    ctx.result = { reply, revealedEvidenceIds: evidenceIds, revealedLocationIds: locationIds };
  }

  private async detectLocations(agent: Agent, reply: string): Promise<string[]> {
    if (agent.knownLocationIds.size === 0) return [];
    try {
      const candidates = await this.deps.stories.getLocations(agent.storyRef, Array.from(agent.knownLocationIds));
      const detected = await withTimeout(this.deps.detector.detect(reply, candidates), this.deps.generationTimeoutMs, 'location detection');
      return validateReveals(detected, agent.knownLocationIds);
    } catch (error) {
      this.log('[TURN] location detection failed agent=%s: %s', agent.id, errorMessage(error));
      return [];
    }
  }

  private persistCharacterTurn(ctx: TurnContext): void {
    const { agent, result } = ctx;
    if (!result) return;
    const fullText = JSON.stringify({
      reply: result.reply,
      revealed_evidences: result.revealedEvidenceIds,
      revealed_locations: result.revealedLocationIds
    });
    const turn: Turn = {
      role: 'character',
      index: nextTurnIndex(agent),
      fullText,
      clientText: result.reply,
      timestamp: new Date().toISOString(),
      revealedEvidenceIds: [...result.revealedEvidenceIds],
      revealedLocationIds: [...result.revealedLocationIds]
    };
    agent.history.push(turn);
    for (const id of result.revealedEvidenceIds) agent.revealedEvidenceIds.add(id);
    for (const id of result.revealedLocationIds) agent.revealedLocationIds.add(id);
    this.persist(agent.id, turn);
    this.log('[TURN] character turn agent=%s index=%d evidence=%o locations=%o', agent.id, turn.index, result.revealedEvidenceIds, result.revealedLocationIds);
  }

  private persist(agentId: string, turn: Turn): void {
    this.deps.persistence.enqueue(`turn ${agentId}#${turn.index}`, () => this.deps.conversationLog.appendTurn(agentId, turn));
  }

  private async lookupLocation(agent: Agent, locationId: string): Promise<StoryLocation | null> {
    try {
      return await this.deps.stories.getLocation(agent.storyRef, locationId);
    } catch (error) {
      this.log('[TURN] location lookup failed agent=%s location=%s: %s', agent.id, locationId, errorMessage(error));
      return null;
    }
  }

  private async lookupEvidence(agent: Agent, evidenceIds: readonly string[]): Promise<Evidence[]> {
    try {
      return await this.deps.stories.getEvidence(agent.storyRef, evidenceIds);
    } catch (error) {
      this.log('[TURN] evidence lookup failed agent=%s: %s', agent.id, errorMessage(error));
      return [];
    }
  }
}
