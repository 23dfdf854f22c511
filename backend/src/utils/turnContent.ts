import { Evidence, StoryLocation } from '../types/Story.js';
import { TurnRole } from '../types/Agent.js';

const SEPARATOR = '='.repeat(40);
const ITEM_SEPARATOR = '-'.repeat(40);
export const EVIDENCE_HEADER = '[USER IS PRESENTING THE FOLLOWING EVIDENCE TO YOU]:';

const LOCATION_MARKER_PATTERN = /\[CURRENT LOCATION:[^\]]*\]\s*/g;
const EVIDENCE_SECTION_PATTERN = /\s*(?:=+\s*)?\[USER IS PRESENTING THE FOLLOWING EVIDENCE TO YOU\]:[\s\S]*$/;

// Phrases that only ever appear in instruction text; two or more mark a turn as one
const INSTRUCTION_INDICATORS = [
  'You are',
  'Your personality is',
  'IMPORTANT: Only provide spoken dialogue',
  'Continue the conversation naturally based on your character',
  '[Note: This agent was loaded from database',
  'Stay in character and respond as your character would'
];

export function formatLocationMarker(location: Pick<StoryLocation, 'name' | 'description'>): string {
  return `[CURRENT LOCATION: ${location.name} - ${location.description}]\n\n`;
}

export function formatEvidenceBlock(evidence: readonly Evidence[]): string {
  if (evidence.length === 0) return '';
  const parts = [`\n\n${SEPARATOR}\n${EVIDENCE_HEADER}\n${SEPARATOR}\n`];
  for (const item of evidence) {
    let entry = `EVIDENCE: ${item.title}\nDescription: ${item.description}\n`;
    if (item.visualDescription) entry += `Visual: ${item.visualDescription}\n`;
    if (item.imageUrl) entry += `(Image: ${item.imageUrl})\n`;
    parts.push(`${entry}${ITEM_SEPARATOR}\n`);
  }
  return parts.join('');
}

/**
 * What the generator sees for a player message: optional location marker,
 * the message itself, then the presented evidence.
 */
export function augmentUserText(
  text: string,
  location: Pick<StoryLocation, 'name' | 'description'> | null,
  evidence: readonly Evidence[]
): string {
  const prefix = location ? formatLocationMarker(location) : '';
  return `${prefix}${text}${formatEvidenceBlock(evidence)}`;
}

export function isInstructionText(text: string): boolean {
  let hits = 0;
  for (const indicator of INSTRUCTION_INDICATORS) {
    if (text.includes(indicator)) hits++;
    if (hits >= 2) return true;
  }
  return false;
}

export function stripContextMarkers(text: string): string {
  return text.replace(LOCATION_MARKER_PATTERN, '').replace(EVIDENCE_SECTION_PATTERN, '').trim();
}

/** The player-visible form of a turn's full text. */
export function extractClientText(role: TurnRole, fullText: string): string {
  if (role === 'instruction') return '';
  if (role === 'character' && isInstructionText(fullText)) return '';
  if (role === 'user') return stripContextMarkers(fullText);
  return fullText.trim();
}
