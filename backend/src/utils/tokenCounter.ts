import { encode } from 'gpt-tokenizer';
import { errorMessage } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';

const log = createLogger(NAMESPACES.utils.tokens);

/**
 * Count tokens with the GPT tokenizer, falling back to ~4 characters per
 * token if tokenization fails.
 */
export function countTokens(text: string): number {
  if (!text) return 0;

  try {
    return encode(text).length;
  } catch (error) {
    log('[TOKENS] tokenization failed, estimating from length: %s', errorMessage(error));
    return Math.max(1, Math.round(text.length / 4));
  }
}

/** Total tokens over a set of message bodies. */
export function countMessageTokens(messages: readonly { content: string }[]): number {
  return messages.reduce((total, message) => total + countTokens(message.content), 0);
}
