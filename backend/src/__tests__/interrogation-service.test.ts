import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AgentErrorCodes } from '../errors.js';
import { MAX_HISTORY_LIMIT } from '../services/InterrogationService.js';
import { createTestEngine, reply, TestEngine } from './fixtures/engine.js';
import { buildStory } from './fixtures/story.js';

const NORA_INSTRUCTION = 'You are Nora Vale in "The Missing Ledger".\nStay in character and respond as your character would.';

describe('InterrogationService', () => {
  let engine: TestEngine;

  beforeEach(() => {
    engine = createTestEngine();
  });

  describe('spawn', () => {
    it('registers an agent that opens with its instruction and persists it', async () => {
      const agentId = await engine.service.spawn('story_1', 'char_nora');

      const agent = engine.agents.get(agentId);
      expect(agent?.history).toHaveLength(1);
      expect(agent?.history[0]).toMatchObject({ role: 'instruction', index: 0, fullText: NORA_INSTRUCTION, clientText: '' });
      expect(Array.from(agent?.heldEvidenceIds ?? [])).toEqual(['ev_1']);
      expect(Array.from(agent?.knownLocationIds ?? [])).toEqual(['loc_lab', 'loc_engine']);
      expect(agent?.revealedEvidenceIds.size).toBe(0);

      await engine.service.drain();
      expect(await engine.conversationLog.getAgent(agentId)).toMatchObject({
        storyRef: 'story_1',
        characterRef: 'char_nora',
        heldEvidenceIds: ['ev_1'],
        knownLocationIds: ['loc_lab', 'loc_engine']
      });
      expect((await engine.conversationLog.listTurns(agentId)).map(turn => turn.role)).toEqual(['instruction']);
    });

    it('gives every agent its own id', async () => {
      const first = await engine.service.spawn('story_1', 'char_nora');
      const second = await engine.service.spawn('story_1', 'char_nora');

      expect(first).not.toBe(second);
      expect(engine.agents.size).toBe(2);
    });

    it('rejects missing and unknown references', async () => {
      await expect(engine.service.spawn('', 'char_nora')).rejects.toMatchObject({ code: AgentErrorCodes.BAD_INPUT });
      await expect(engine.service.spawn('story_missing', 'char_nora')).rejects.toMatchObject({ code: AgentErrorCodes.NOT_FOUND });
      await expect(engine.service.spawn('story_1', 'char_missing')).rejects.toMatchObject({ code: AgentErrorCodes.NOT_FOUND });
      expect(engine.agents.size).toBe(0);
    });

    it('reports a failed agent record as unavailable', async () => {
      vi.spyOn(engine.conversationLog, 'createAgent').mockRejectedValue(new Error('disk I/O error'));

      await expect(engine.service.spawn('story_1', 'char_nora')).rejects.toMatchObject({ code: AgentErrorCodes.UNAVAILABLE });
      expect(engine.agents.size).toBe(0);
    });
  });

  describe('sendMessage', () => {
    it('reports an unknown agent as not found', async () => {
      await expect(engine.service.sendMessage('agent_missing', { text: 'Hello?' })).rejects.toMatchObject({
        code: AgentErrorCodes.NOT_FOUND
      });
    });

    it('does not let the caller rewrite history through the returned lists', async () => {
      const agentId = await engine.service.spawn('story_1', 'char_nora');
      engine.generator.push(reply('Take it.', ['ev_1']));

      const result = await engine.service.sendMessage(agentId, { text: 'The receipt, please.' });
      result.revealedEvidenceIds.push('ev_99');

      const page = await engine.service.getHistory(agentId);
      expect(page.messages[page.messages.length - 1]).toMatchObject({ content: 'Take it.', revealedEvidenceIds: ['ev_1'] });
    });

    it('keeps talking to an agent after a restart', async () => {
      const agentId = await engine.service.spawn('story_1', 'char_nora');
      engine.generator.push(reply('Take it.', ['ev_1']));
      await engine.service.sendMessage(agentId, { text: 'The receipt, please.' });
      await engine.service.drain();

      const restarted = createTestEngine({ db: engine.db, script: [reply('I gave you everything.', ['ev_1'])] });
      const result = await restarted.service.sendMessage(agentId, { text: 'Anything else?' });

      expect(result.revealedEvidenceIds).toEqual(['ev_1']);
      expect(restarted.agents.get(agentId)?.history.map(turn => turn.index)).toEqual([0, 1, 2, 3, 4]);
      expect(Array.from(restarted.agents.get(agentId)?.revealedEvidenceIds ?? [])).toEqual(['ev_1']);
    });
  });

  describe('getHistory', () => {
    let agentId: string;

    beforeEach(async () => {
      agentId = await engine.service.spawn('story_1', 'char_nora');
      for (const n of [1, 2, 3]) {
        engine.generator.push(reply(`Answer ${n}`));
        await engine.service.sendMessage(agentId, { text: `Question ${n}`, locationId: n === 1 ? 'loc_dock' : undefined });
      }
    });

    it('returns the player-visible conversation without the instruction', async () => {
      const page = await engine.service.getHistory(agentId);

      expect(page).toMatchObject({ agentId, characterName: 'Nora Vale', total: 6, hasMore: false });
      expect(page.messages.map(message => `${message.index}:${message.role}:${message.content}`)).toEqual([
        '1:user:Question 1',
        '2:character:Answer 1',
        '3:user:Question 2',
        '4:character:Answer 2',
        '5:user:Question 3',
        '6:character:Answer 3'
      ]);
    });

    it('pages with limit and offset', async () => {
      const middle = await engine.service.getHistory(agentId, { limit: 2, offset: 1 });
      expect(middle.messages.map(message => message.index)).toEqual([2, 3]);
      expect(middle.hasMore).toBe(true);

      const tail = await engine.service.getHistory(agentId, { limit: 2, offset: 5 });
      expect(tail.messages.map(message => message.index)).toEqual([6]);
      expect(tail.hasMore).toBe(false);

      const past = await engine.service.getHistory(agentId, { offset: 40 });
      expect(past).toMatchObject({ messages: [], total: 6, hasMore: false });
    });

    it('falls back to the default limit and caps large ones', async () => {
      expect((await engine.service.getHistory(agentId, { limit: 0 })).messages).toHaveLength(6);
      expect((await engine.service.getHistory(agentId, { limit: MAX_HISTORY_LIMIT * 10 })).messages).toHaveLength(6);
    });

    it('shows the generator-facing text on request', async () => {
      const page = await engine.service.getHistory(agentId, { includeFull: true, limit: 3 });

      expect(page.total).toBe(7);
      expect(page.hasMore).toBe(true);
      expect(page.messages.map(message => message.content)).toEqual([
        NORA_INSTRUCTION,
        '[CURRENT LOCATION: Dock - Wet planks and rope.]\n\nQuestion 1',
        JSON.stringify({ reply: 'Answer 1', revealed_evidences: [], revealed_locations: [] })
      ]);
    });

    it('reports an unknown agent as not found', async () => {
      await expect(engine.service.getHistory('agent_missing')).rejects.toMatchObject({ code: AgentErrorCodes.NOT_FOUND });
    });
  });

  describe('stories', () => {
    it('lists, fetches and imports stories', async () => {
      expect((await engine.service.listStories()).map(story => story.id)).toEqual(['story_1']);
      expect((await engine.service.getStory('story_1')).title).toBe('The Missing Ledger');
      await expect(engine.service.getStory('story_missing')).rejects.toMatchObject({ code: AgentErrorCodes.NOT_FOUND });

      engine.service.importStory(buildStory({ id: 'story_2', title: 'The Second Ledger' }));
      expect((await engine.service.listStories()).map(story => story.id).sort()).toEqual(['story_1', 'story_2']);
    });
  });
});
