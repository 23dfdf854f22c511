import { readDataFile, section, sectionList, stringList } from '../utils/dataFiles.js';

export type CooperationLevel = 'HIGH' | 'MEDIUM' | 'LOW';

const table = readDataFile('personality.json');
const cooperation = section(table, 'cooperation');
const HIGH_COOPERATION = stringList(cooperation, 'HIGH');
const MEDIUM_COOPERATION = stringList(cooperation, 'MEDIUM');
const BEHAVIOR_GROUPS = sectionList(table, 'behaviors').map(group => ({
  keywords: stringList(group, 'keywords'),
  lines: stringList(group, 'lines')
}));
const DEFAULT_BEHAVIORS = stringList(table, 'defaultBehaviors');

// Spoken when the generator output could not be decoded even after a retry
const FALLBACK_LINES = {
  nervous: "I-I'm sorry, I'm having trouble understanding... Could you repeat that?",
  arrogant: "Speak clearly. I don't have time for your mumbling.",
  professional: 'I apologize, could you please rephrase your question?',
  default: "I'm having trouble understanding. Could you rephrase that?"
} as const;

export const EMPTY_REPLY_LINE =
  "I apologize, but I couldn't formulate a proper response. Could you please rephrase your question?";

function mentionsAny(personality: string, keywords: readonly string[]): boolean {
  const lower = personality.toLowerCase();
  return keywords.some(keyword => lower.includes(keyword));
}

export function fallbackLine(personality: string): string {
  const lower = personality.toLowerCase();
  if (lower.includes('nervous')) return FALLBACK_LINES.nervous;
  if (lower.includes('arrogant')) return FALLBACK_LINES.arrogant;
  if (lower.includes('professional')) return FALLBACK_LINES.professional;
  return FALLBACK_LINES.default;
}

export function cooperationLevel(personality: string): CooperationLevel {
  if (mentionsAny(personality, HIGH_COOPERATION)) return 'HIGH';
  if (mentionsAny(personality, MEDIUM_COOPERATION)) return 'MEDIUM';
  return 'LOW';
}

export function personalityBehaviors(personality: string): string[] {
  const lines = BEHAVIOR_GROUPS
    .filter(group => mentionsAny(personality, group.keywords))
    .flatMap(group => group.lines);
  return lines.length > 0 ? lines : [...DEFAULT_BEHAVIORS];
}
