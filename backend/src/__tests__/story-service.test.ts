import { describe, it, expect, beforeEach } from 'vitest';
import { openDatabase, SqliteDatabase } from '../database.js';
import { AgentErrorCodes } from '../errors.js';
import { StoryService } from '../services/StoryService.js';
import { BRASS_KEY, buildStory, RECEIPT } from './fixtures/story.js';

describe('StoryService', () => {
  let db: SqliteDatabase;
  let stories: StoryService;

  function importError(input: unknown): unknown {
    try {
      stories.importStory(input);
    } catch (error) {
      return error;
    }
    return undefined;
  }

  beforeEach(() => {
    db = openDatabase(':memory:');
    stories = new StoryService(db);
    stories.importStory(buildStory());
  });

  it('returns the imported story and its parts', async () => {
    expect(await stories.getStory('story_1')).toEqual(buildStory());
    expect((await stories.getCharacter('story_1', 'char_otto'))?.name).toBe('Otto Brand');
    expect((await stories.getLocation('story_1', 'loc_lab'))?.name).toBe('Secret Lab');
  });

  it('resolves unknown ids to null or leaves them out', async () => {
    expect(await stories.getStory('story_missing')).toBeNull();
    expect(await stories.getCharacter('story_1', 'char_missing')).toBeNull();
    expect(await stories.getLocation('story_missing', 'loc_lab')).toBeNull();
    expect(await stories.getLocations('story_missing', ['loc_lab'])).toEqual([]);
  });

  it('returns locations and evidence in the requested order', async () => {
    const locations = await stories.getLocations('story_1', ['loc_engine', 'loc_void', 'loc_dock']);
    expect(locations.map(location => location.id)).toEqual(['loc_engine', 'loc_dock']);

    expect(await stories.getEvidence('story_1', ['ev_2', 'ev_404', 'ev_1'])).toEqual([BRASS_KEY, RECEIPT]);
  });

  it('lists story summaries', async () => {
    expect(await stories.listStories()).toEqual([
      { id: 'story_1', title: 'The Missing Ledger', summary: 'A harbour ledger has vanished.' }
    ]);
  });

  it('replaces a story imported again under the same id', async () => {
    stories.importStory(buildStory({ title: 'The Missing Ledger, Revised' }));

    expect((await stories.listStories()).map(story => story.title)).toEqual(['The Missing Ledger, Revised']);
  });

  it('rejects documents that do not match the story shape', () => {
    const { title: _title, ...untitled } = buildStory();

    expect(importError(untitled)).toMatchObject({ code: AgentErrorCodes.BAD_INPUT, message: 'Invalid story document' });
    expect(importError('not a story')).toMatchObject({ code: AgentErrorCodes.BAD_INPUT });
  });

  it('rejects stories whose references do not line up', () => {
    const story = buildStory({ id: 'story_2', startingLocationIds: ['loc_void'] });
    story.characters[1].heldEvidence = [RECEIPT];

    expect(importError(story)).toMatchObject({
      code: AgentErrorCodes.BAD_INPUT,
      message: 'Inconsistent story document',
      details: { errors: ['evidence ev_1 is held twice', 'unknown starting location loc_void'] }
    });
  });

  it('skips stored documents that no longer validate', async () => {
    db.prepare('INSERT INTO Stories (id, title, data, createdAt, updatedAt) VALUES (?, ?, ?, ?, ?)').run(
      'story_broken',
      'Broken',
      '{"id": "story_broken"',
      '2026-01-01T00:00:00.000Z',
      '2026-01-01T00:00:00.000Z'
    );

    expect(await stories.getStory('story_broken')).toBeNull();
    expect((await stories.listStories()).map(story => story.id)).toEqual(['story_1']);
  });
});
