import { createLogger, NAMESPACES } from '../../logging.js';
import { readDataFile, stringList } from '../../utils/dataFiles.js';
import { CandidateLocation, LocationRevealDetector } from './LocationRevealDetector.js';

const phrases = readDataFile('revealPhrases.json');
const GRANTING_PHRASES = stringList(phrases, 'grantingPhrases');
const DENIAL_PHRASES = stringList(phrases, 'denialPhrases');
const NEGATION_WORDS = stringList(phrases, 'negationWords');
const ACTION_VERBS = stringList(phrases, 'actionVerbs');
const ACCESS_OBJECTS = stringList(phrases, 'accessObjects');
const MEETING_WORDS = stringList(phrases, 'meetingWords');
const TIME_WORDS = stringList(phrases, 'timeWords');

export const DEFAULT_PROXIMITY_WINDOW = 40;
/** How far back from a granting phrase a negation still applies to it. */
export const NEGATION_WINDOW = 20;

interface Span {
  start: number;
  end: number;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function normalize(text: string): string {
  return text.toLowerCase().replace(/[‘’]/g, "'");
}

/** Whole-word occurrences of `needle` in already-normalized `text`. */
function occurrences(text: string, needle: string): Span[] {
  if (!needle) return [];
  const pattern = new RegExp(`(?<![a-z0-9])${escapeRegExp(needle)}(?![a-z0-9])`, 'g');
  const spans: Span[] = [];
  for (const match of text.matchAll(pattern)) {
    const start = match.index ?? 0;
    spans.push({ start, end: start + match[0].length });
  }
  return spans;
}

function containsAny(text: string, needles: readonly string[]): boolean {
  return needles.some(needle => occurrences(text, needle).length > 0);
}

function gap(a: Span, b: Span): number {
  if (a.end <= b.start) return b.start - a.end;
  if (b.end <= a.start) return a.start - b.end;
  return 0;
}

/**
 * True when some occurrence of `a` and some occurrence of `b` are separated by
 * at most `maxDistance` characters, in either order. Case-insensitive.
 */
export function withinProximity(text: string, a: string, b: string, maxDistance: number): boolean {
  const normalized = normalize(text);
  const first = occurrences(normalized, normalize(a));
  const second = occurrences(normalized, normalize(b));
  for (const x of first) {
    for (const y of second) {
      if (gap(x, y) <= maxDistance) return true;
    }
  }
  return false;
}

function nameVariants(name: string): string[] {
  const full = normalize(name).trim();
  const variants = [full];
  if (full.startsWith('the ') && full.length > 4) variants.push(full.slice(4));
  return variants;
}

/** Sentences and clauses; a contrastive "but" starts a new clause. */
function segments(text: string): string[] {
  return text
    .split(/[.!?;\n]+|,\s*(?:but|though|although)\b/)
    .map(segment => segment.trim())
    .filter(segment => segment.length > 0);
}

/** "I don't have the key to", "never take you to", "nobody gets access to". */
function negated(text: string, span: Span): boolean {
  return containsAny(text.slice(Math.max(0, span.start - NEGATION_WINDOW), span.start), NEGATION_WORDS);
}

function affirmed(text: string, needles: readonly string[]): Span[] {
  return needles.flatMap(needle => occurrences(text, needle)).filter(span => !negated(text, span));
}

function hasAccessAction(segment: string): boolean {
  for (const match of segment.matchAll(/\[([^\]]*)\]/g)) {
    const action = match[1];
    if (containsAny(action, ACTION_VERBS) && containsAny(action, ACCESS_OBJECTS)) return true;
  }
  return false;
}

export class HeuristicLocationDetector implements LocationRevealDetector {
  private readonly log = createLogger(NAMESPACES.agents.detector);

  constructor(private readonly proximityWindow: number = DEFAULT_PROXIMITY_WINDOW) {}

  async detect(dialogue: string, candidates: readonly CandidateLocation[]): Promise<string[]> {
    return this.detectSync(dialogue, candidates);
  }

  detectSync(dialogue: string, candidates: readonly CandidateLocation[]): string[] {
    if (!dialogue.trim() || candidates.length === 0) return [];
    const clauses = segments(normalize(dialogue));
    const revealed: string[] = [];
    for (const candidate of candidates) {
      if (revealed.includes(candidate.id)) continue;
      const variants = nameVariants(candidate.name);
      if (clauses.some(clause => this.clauseReveals(clause, variants))) {
        revealed.push(candidate.id);
      }
    }
    if (revealed.length > 0) {
      this.log('[DETECT] heuristic revealed=%o', revealed);
    }
    return revealed;
  }

  private clauseReveals(clause: string, variants: string[]): boolean {
    const nameSpans = variants.flatMap(variant => occurrences(clause, variant));
    if (nameSpans.length === 0) return false;
    if (containsAny(clause, DENIAL_PHRASES)) return false;

    const grantedNearby = affirmed(clause, GRANTING_PHRASES).some(phraseSpan =>
      nameSpans.some(nameSpan => gap(phraseSpan, nameSpan) <= this.proximityWindow)
    );
    if (grantedNearby) return true;
    if (hasAccessAction(clause)) return true;
    return affirmed(clause, MEETING_WORDS).length > 0 && containsAny(clause, TIME_WORDS);
  }
}
