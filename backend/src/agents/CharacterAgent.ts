import type { Environment } from 'nunjucks';
import { BaseAgent } from './BaseAgent.js';
import { ConfigManager } from '../configManager.js';
import { Generator, GeneratorTurn, GenerateOptions, InstructionBuilder } from '../interfaces/Generator.js';
import { buildOpenAIMessages } from '../llm/messageBuilder.js';
import { Story, StoryCharacter } from '../types/Story.js';
import { countMessageTokens, countTokens } from '../utils/tokenCounter.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { cooperationLevel, personalityBehaviors } from './personality.js';

/** Used when an agent's story data is gone and its original instruction was lost. */
export const CONTINUATION_INSTRUCTION = [
  'You are a character in an ongoing investigation conversation.',
  '[Note: This agent was loaded from database and its original character sheet is unavailable.]',
  'Continue the conversation naturally based on your character as established in the messages so far.',
  'Stay in character and respond as your character would.',
  'Respond with a JSON object: {"reply": "your spoken dialogue with [actions] in brackets", "revealed_evidences": [], "revealed_locations": []}'
].join('\n');

/**
 * Voices story characters. One instance serves every agent: all per-agent
 * state travels in the turns handed to `generate`.
 */
export class CharacterAgent extends BaseAgent implements Generator, InstructionBuilder {
  private readonly log = createLogger(NAMESPACES.agents.character);

  constructor(configManager: ConfigManager, env?: Environment) {
    super('character', configManager, env);
  }

  async generate(turns: readonly GeneratorTurn[], options: GenerateOptions): Promise<string> {
    const messages = this.applyTokenBudget(buildOpenAIMessages(turns), options.transientTurns ?? 0);
    const raw = await this.callLLM(messages, { json: options.structured });
    this.log('[GENERATE] messages=%d promptTokens=%d structured=%s chars=%d',
      messages.length, countMessageTokens(messages), options.structured, raw.length);
    return raw;
  }

  /** The system instruction that opens every conversation with this character. */
  buildInstruction(story: Story, character: StoryCharacter): string {
    const known = new Set(character.knownLocationIds);
    return this.renderTemplate('character', {
      story,
      character,
      evidence: character.heldEvidence,
      locations: story.locations.filter(location => known.has(location.id)),
      cooperation: cooperationLevel(character.personality),
      behaviors: personalityBehaviors(character.personality)
    }).trim();
  }

  /**
   * Drop the oldest exchanges when the conversation no longer fits the
   * profile's context window. The instruction, the latest conversation turn
   * and any transient tail always stay.
   */
  private applyTokenBudget<T extends { content: string }>(messages: T[], transientTurns: number): T[] {
    const profile = this.getProfile();
    const maxContextTokens = profile.sampler?.maxContextTokens;
    const tailStart = Math.max(1, messages.length - transientTurns - 1);
    if (!maxContextTokens || tailStart <= 1) return messages;

    const maxCompletionTokens = profile.sampler?.max_completion_tokens || 512;
    const availableTokens = Math.floor((maxContextTokens - maxCompletionTokens) * 0.9);
    const first = messages[0];
    const tail = messages.slice(tailStart);
    let used = countTokens(first.content) + tail.reduce((sum, message) => sum + countTokens(message.content), 0);
    const middle: T[] = [];
    for (let i = tailStart - 1; i >= 1; i--) {
      const cost = countTokens(messages[i].content);
      if (used + cost > availableTokens) {
        this.log('[CHARACTER_BUDGET] dropping %d oldest messages (available=%d)', i, availableTokens);
        break;
      }
      used += cost;
      middle.unshift(messages[i]);
    }
    return [first, ...middle, ...tail];
  }
}
