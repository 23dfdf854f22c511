import { SqliteDatabase } from '../database.js';
import { badInput, errorMessage } from '../errors.js';
import { StoryProvider } from '../interfaces/StoryProvider.js';
import { compileValidator, describeErrors } from '../agents/context/jsonValidation.js';
import { Evidence, Story, StoryCharacter, StoryLocation, StorySummary } from '../types/Story.js';
import { createLogger, NAMESPACES } from '../logging.js';

const ID = { type: 'string', minLength: 1 } as const;
const TEXT = { type: 'string' } as const;

const EVIDENCE_SCHEMA = {
  type: 'object',
  required: ['id', 'title', 'description', 'visualDescription'],
  properties: { id: ID, title: TEXT, description: TEXT, visualDescription: TEXT, imageUrl: TEXT }
} as const;

const STORY_SCHEMA = {
  type: 'object',
  required: ['id', 'title', 'summary', 'fullStory', 'characters', 'locations'],
  properties: {
    id: ID,
    title: TEXT,
    summary: TEXT,
    fullStory: TEXT,
    coverImageUrl: TEXT,
    startingLocationIds: { type: 'array', items: ID },
    characters: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id', 'name', 'appearance', 'personality', 'knowledge', 'heldEvidence', 'knownLocationIds'],
        properties: {
          id: ID,
          name: TEXT,
          appearance: TEXT,
          personality: TEXT,
          knowledge: TEXT,
          heldEvidence: { type: 'array', items: EVIDENCE_SCHEMA },
          knownLocationIds: { type: 'array', items: ID },
          imageUrl: TEXT
        }
      }
    },
    locations: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id', 'name', 'description'],
        properties: { id: ID, name: TEXT, description: TEXT, imageUrl: TEXT }
      }
    }
  }
} as const;

const validateStory = compileValidator<Story>(STORY_SCHEMA);

function findDuplicate(ids: readonly string[]): string | undefined {
  const seen = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) return id;
    seen.add(id);
  }
  return undefined;
}

/** Cross-reference checks the schema cannot express. */
function integrityErrors(story: Story): string[] {
  const errors: string[] = [];
  const locationIds = new Set(story.locations.map(location => location.id));
  const duplicateCharacter = findDuplicate(story.characters.map(character => character.id));
  if (duplicateCharacter) errors.push(`duplicate character id ${duplicateCharacter}`);
  const duplicateLocation = findDuplicate(story.locations.map(location => location.id));
  if (duplicateLocation) errors.push(`duplicate location id ${duplicateLocation}`);
  const duplicateEvidence = findDuplicate(story.characters.flatMap(character => character.heldEvidence.map(item => item.id)));
  if (duplicateEvidence) errors.push(`evidence ${duplicateEvidence} is held twice`);
  for (const character of story.characters) {
    for (const locationId of character.knownLocationIds) {
      if (!locationIds.has(locationId)) errors.push(`character ${character.id} knows unknown location ${locationId}`);
    }
  }
  for (const locationId of story.startingLocationIds ?? []) {
    if (!locationIds.has(locationId)) errors.push(`unknown starting location ${locationId}`);
  }
  return errors;
}

/**
 * Story data kept as validated JSON documents in the Stories table.
 */
export class StoryService implements StoryProvider {
  private readonly log = createLogger(NAMESPACES.services.story);

  constructor(private readonly db: SqliteDatabase) {}

  async getStory(storyId: string): Promise<Story | null> {
    const row = this.db.prepare<[string], { data: string }>('SELECT data FROM Stories WHERE id = ?').get(storyId);
    return row ? this.decode(storyId, row.data) : null;
  }

  async getCharacter(storyId: string, characterId: string): Promise<StoryCharacter | null> {
    const story = await this.getStory(storyId);
    return story?.characters.find(character => character.id === characterId) ?? null;
  }

  async getLocation(storyId: string, locationId: string): Promise<StoryLocation | null> {
    const story = await this.getStory(storyId);
    return story?.locations.find(location => location.id === locationId) ?? null;
  }

  async getLocations(storyId: string, locationIds: readonly string[]): Promise<StoryLocation[]> {
    const story = await this.getStory(storyId);
    if (!story) return [];
    const byId = new Map(story.locations.map(location => [location.id, location]));
    return locationIds.flatMap(id => byId.get(id) ?? []);
  }

  async getEvidence(storyId: string, evidenceIds: readonly string[]): Promise<Evidence[]> {
    const story = await this.getStory(storyId);
    if (!story) return [];
    const byId = new Map(story.characters.flatMap(character => character.heldEvidence).map(item => [item.id, item]));
    return evidenceIds.flatMap(id => byId.get(id) ?? []);
  }

  async listStories(): Promise<StorySummary[]> {
    const rows = this.db.prepare<[], { id: string; data: string }>('SELECT id, data FROM Stories ORDER BY createdAt ASC').all();
    const summaries: StorySummary[] = [];
    for (const row of rows) {
      const story = this.decode(row.id, row.data);
      if (!story) continue;
      summaries.push({ id: story.id, title: story.title, summary: story.summary, coverImageUrl: story.coverImageUrl });
    }
    return summaries;
  }

  /**
   * Validate and insert (or replace) a story document.
   * @throws AgentError BAD_INPUT when the document is malformed
   */
  importStory(input: unknown): Story {
    if (!validateStory(input)) {
      throw badInput('Invalid story document', { errors: describeErrors(validateStory) });
    }
    const problems = integrityErrors(input);
    if (problems.length > 0) {
      throw badInput('Inconsistent story document', { errors: problems });
    }
    const now = new Date().toISOString();
    this.db.prepare(
      `INSERT INTO Stories (id, title, data, createdAt, updatedAt) VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET title = excluded.title, data = excluded.data, updatedAt = excluded.updatedAt`
    ).run(input.id, input.title, JSON.stringify(input), now, now);
    this.log('[STORY_IMPORT] id=%s characters=%d locations=%d', input.id, input.characters.length, input.locations.length);
    return input;
  }

  private decode(storyId: string, data: string): Story | null {
    try {
      const parsed: unknown = JSON.parse(data);
      if (validateStory(parsed)) return parsed;
      this.log('[STORY] stored story %s failed validation: %o', storyId, describeErrors(validateStory));
    } catch (e) {
      this.log('[STORY] stored story %s is not valid JSON: %s', storyId, errorMessage(e));
    }
    return null;
  }
}
