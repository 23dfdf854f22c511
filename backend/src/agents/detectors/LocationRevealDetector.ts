import { StoryLocation } from '../../types/Story.js';

export type CandidateLocation = Pick<StoryLocation, 'id' | 'name'>;

/**
 * Decides which of the candidate locations a line of dialogue actively grants
 * the player (directions, keys, invitations), as opposed to merely mentioning.
 */
export interface LocationRevealDetector {
  /**
   * @param dialogue - the character's spoken reply, bracketed actions included
   * @param candidates - only the locations the speaker knows
   * @returns candidate ids in candidate order, without duplicates; never throws
   */
  detect(dialogue: string, candidates: readonly CandidateLocation[]): Promise<string[]>;
}
