import { StoryCharacter } from '../types/Story.js';

/**
 * What a character may ever reveal. Built once at spawn (or reconstruction)
 * and never mutated afterwards.
 */
export class CapabilityModel {
  readonly heldEvidenceIds: ReadonlySet<string>;
  readonly knownLocationIds: ReadonlySet<string>;

  constructor(heldEvidenceIds: Iterable<string>, knownLocationIds: Iterable<string>) {
    this.heldEvidenceIds = new Set(heldEvidenceIds);
    this.knownLocationIds = new Set(knownLocationIds);
  }

  static fromCharacter(character: StoryCharacter): CapabilityModel {
    return new CapabilityModel(
      character.heldEvidence.map(evidence => evidence.id),
      character.knownLocationIds
    );
  }

  holds(evidenceId: string): boolean {
    return this.heldEvidenceIds.has(evidenceId);
  }

  knows(locationId: string): boolean {
    return this.knownLocationIds.has(locationId);
  }
}
