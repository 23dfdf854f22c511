import { generatorOutputMalformed } from '../errors.js';
import { validateJson } from './context/jsonValidation.js';

export const CHARACTER_REPLY_SCHEMA = {
  type: 'object',
  required: ['reply'],
  properties: {
    reply: { type: 'string' },
    revealed_evidences: { type: ['array', 'null'] },
    revealed_locations: { type: ['array', 'null'] }
  }
} as const;

export interface ParsedReply {
  reply: string;
  /** Unvalidated; may hold ids the character does not own, or non-strings */
  revealedEvidences: unknown[];
  /** Generator's own claim; a hint only */
  revealedLocations: unknown[];
  repaired: boolean;
}

function listField(value: object, key: string): unknown[] {
  const field: unknown = Reflect.get(value, key);
  return Array.isArray(field) ? field : [];
}

/**
 * Decode a structured character reply.
 * @throws AgentError GENERATOR_OUTPUT_MALFORMED when the text does not decode
 */
export function parseCharacterReply(raw: string): ParsedReply {
  const result = validateJson(raw, CHARACTER_REPLY_SCHEMA);
  const parsed = result.parsed;
  if (!result.valid || typeof parsed !== 'object' || parsed === null) {
    throw generatorOutputMalformed('Generator output is not a character reply', { errors: result.errors ?? [] });
  }
  const reply: unknown = Reflect.get(parsed, 'reply');
  return {
    reply: typeof reply === 'string' ? reply : '',
    revealedEvidences: listField(parsed, 'revealed_evidences'),
    revealedLocations: listField(parsed, 'revealed_locations'),
    repaired: result.repaired ?? false
  };
}
