import { Evidence, Story, StoryCharacter, StoryLocation, StorySummary } from '../types/Story.js';

/**
 * Read access to story data. Lookups of unknown ids resolve to null (or are
 * left out of list results); only storage failures reject.
 */
export interface StoryProvider {
  getStory(storyId: string): Promise<Story | null>;
  getCharacter(storyId: string, characterId: string): Promise<StoryCharacter | null>;
  getLocation(storyId: string, locationId: string): Promise<StoryLocation | null>;
  /** Locations in the order of `locationIds`; unknown ids are skipped */
  getLocations(storyId: string, locationIds: readonly string[]): Promise<StoryLocation[]>;
  /** Evidence in the order of `evidenceIds`; unknown ids are skipped */
  getEvidence(storyId: string, evidenceIds: readonly string[]): Promise<Evidence[]>;
  listStories(): Promise<StorySummary[]>;
}
