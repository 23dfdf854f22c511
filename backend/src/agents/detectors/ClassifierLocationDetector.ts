import type { Environment } from 'nunjucks';
import { BaseAgent } from '../BaseAgent.js';
import { ConfigManager } from '../../configManager.js';
import { errorMessage } from '../../errors.js';
import { createLogger, NAMESPACES } from '../../logging.js';
import { validateJson } from '../context/jsonValidation.js';
import { uniqueStrings, validateReveals } from '../revealValidator.js';
import { CandidateLocation, LocationRevealDetector } from './LocationRevealDetector.js';

const CLASSIFIER_SCHEMA = {
  anyOf: [
    { type: 'array' },
    { type: 'object', required: ['revealed'], properties: { revealed: { type: 'array' } } }
  ]
} as const;

function revealedList(parsed: unknown): unknown[] {
  if (Array.isArray(parsed)) return parsed;
  if (typeof parsed === 'object' && parsed !== null) {
    const revealed: unknown = Reflect.get(parsed, 'revealed');
    if (Array.isArray(revealed)) return revealed;
  }
  return [];
}

/**
 * Asks a narrowly scoped model call which candidate locations a line of
 * dialogue grants. Whatever comes back is checked against the candidates,
 * and any failure counts as "nothing revealed".
 */
export class ClassifierLocationDetector extends BaseAgent implements LocationRevealDetector {
  private readonly log = createLogger(NAMESPACES.agents.classifier);

  constructor(configManager: ConfigManager, env?: Environment) {
    super('locationDetector', configManager, env);
  }

  async detect(dialogue: string, candidates: readonly CandidateLocation[]): Promise<string[]> {
    if (!dialogue.trim() || candidates.length === 0) return [];
    try {
      const prompt = this.renderTemplate('location_detector', { dialogue, locations: candidates });
      const raw = await this.callLLM([{ role: 'user', content: prompt }], { json: true });
      const result = validateJson(raw, CLASSIFIER_SCHEMA);
      if (!result.valid) {
        this.log('[DETECT] unparseable classifier output errors=%o', result.errors);
        return [];
      }
      const allowed = new Set(candidates.map(candidate => candidate.id));
      const picked = new Set(validateReveals(revealedList(result.parsed), allowed));
      // Report in candidate order
      return uniqueStrings(candidates.map(candidate => candidate.id)).filter(id => picked.has(id));
    } catch (error) {
      this.log('[DETECT] classifier call failed: %s', errorMessage(error));
      return [];
    }
  }
}
