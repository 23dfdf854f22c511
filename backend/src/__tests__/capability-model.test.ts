import { describe, it, expect } from 'vitest';
import { CapabilityModel } from '../agents/CapabilityModel.js';
import { buildStory } from './fixtures/story.js';

describe('CapabilityModel', () => {
  it('is built from the character sheet', () => {
    const [nora] = buildStory().characters;
    const capability = CapabilityModel.fromCharacter(nora);

    expect(Array.from(capability.heldEvidenceIds)).toEqual(['ev_1']);
    expect(Array.from(capability.knownLocationIds)).toEqual(['loc_lab', 'loc_engine']);
  });

  it('answers membership questions', () => {
    const capability = new CapabilityModel(['ev_1'], ['loc_lab']);

    expect(capability.holds('ev_1')).toBe(true);
    expect(capability.holds('ev_2')).toBe(false);
    expect(capability.knows('loc_lab')).toBe(true);
    expect(capability.knows('loc_dock')).toBe(false);
  });

  it('does not follow later changes to the source lists', () => {
    const held = ['ev_1'];
    const capability = new CapabilityModel(held, []);
    held.push('ev_2');

    expect(capability.holds('ev_2')).toBe(false);
  });
});
