import OpenAI from 'openai';
import { LLMProfile } from '../configManager.js';
import { sleep } from '../utils/async.js';
import { errorMessage } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { ChatMessage, CompletionOptions } from './types.js';

export type { ChatMessage } from './types.js';

const log = createLogger(NAMESPACES.llm.client);

// Retry configuration
const MAX_RETRIES = 3;
const INITIAL_BACKOFF_MS = 1000; // 1 second
const BACKOFF_MULTIPLIER = 2; // Double each retry

// Retryable error codes (network, rate limit, temporary server errors)
const RETRYABLE_STATUS_CODES = [408, 429, 500, 502, 503, 504];
const RETRYABLE_NETWORK_CODES = ['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT'];

export interface ChatCompletionOptions extends CompletionOptions {
  fallbackProfiles?: LLMProfile[];
  /** Base delay between retries; doubled each time */
  backoffMs?: number;
}

export function isRetryableError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;

  // Network errors
  if ('code' in error && typeof error.code === 'string' && RETRYABLE_NETWORK_CODES.includes(error.code)) {
    return true;
  }

  // HTTP status codes
  if ('status' in error && typeof error.status === 'number' && RETRYABLE_STATUS_CODES.includes(error.status)) {
    return true;
  }

  return error instanceof OpenAI.APIConnectionError;
}

function calculateBackoff(retryCount: number, baseMs: number): number {
  return baseMs * Math.pow(BACKOFF_MULTIPLIER, retryCount);
}

export function resolveApiKey(profile: LLMProfile): string {
  if (profile.apiKey) return profile.apiKey;
  if (profile.apiKeyEnv) return process.env[profile.apiKeyEnv] || 'dummy';
  return 'dummy';
}

export async function chatCompletion(
  profile: LLMProfile,
  messages: ChatMessage[],
  options: ChatCompletionOptions = {}
): Promise<string> {
  let lastError: unknown = null;
  const backoffMs = options.backoffMs ?? INITIAL_BACKOFF_MS;

  // Try main profile with retries, then fallback profiles
  const profilesToTry: LLMProfile[] = [profile, ...(options.fallbackProfiles ?? [])];

  for (let profileIndex = 0; profileIndex < profilesToTry.length; profileIndex++) {
    const currentProfile = profilesToTry[profileIndex];

    for (let retryCount = 0; retryCount < MAX_RETRIES; retryCount++) {
      try {
        log('[LLM] Attempt %d/%d on profile %s', retryCount + 1, MAX_RETRIES, currentProfile.baseURL);
        const result = await attemptChatCompletion(currentProfile, messages, options);
        if (retryCount > 0) {
          log('[LLM] Retry succeeded on attempt %d', retryCount + 1);
        }
        return result;
      } catch (error) {
        lastError = error;

        if (!isRetryableError(error)) {
          log('[LLM] Non-retryable error: %s', errorMessage(error));
          break; // Don't retry on non-retryable errors
        }

        if (retryCount < MAX_RETRIES - 1) {
          const waitMs = calculateBackoff(retryCount, backoffMs);
          log('[LLM] Retryable error, waiting %dms before retry: %s', waitMs, errorMessage(error));
          await sleep(waitMs);
        } else {
          log('[LLM] Max retries (%d) reached on this profile', MAX_RETRIES);
        }
      }
    }

    if (profileIndex < profilesToTry.length - 1) {
      log('[LLM] Profile %s failed, trying fallback profile', currentProfile.baseURL);
    }
  }

  // All profiles exhausted
  throw new Error(`All LLM profiles failed. Last error: ${lastError ? errorMessage(lastError) : 'Unknown error'}`, {
    cause: lastError
  });
}

async function attemptChatCompletion(
  profile: LLMProfile,
  messages: ChatMessage[],
  options: CompletionOptions
): Promise<string> {
  // OpenAI compatible; retries are handled above
  const client = new OpenAI({
    apiKey: resolveApiKey(profile),
    baseURL: profile.baseURL,
    maxRetries: 0,
    ...(options.timeoutMs ? { timeout: options.timeoutMs } : {})
  });

  const model = profile.model || 'gpt-4o-mini';
  const wantsJson = options.json ?? (profile.format === 'json' || profile.sampler?.forceJson === true);

  log('[LLM] Making call to %s at %s (messages=%d json=%s)', model, profile.baseURL, messages.length, wantsJson);
  const response = await client.chat.completions.create({
    model,
    messages,
    temperature: profile.sampler?.temperature,
    top_p: profile.sampler?.topP,
    max_completion_tokens: profile.sampler?.max_completion_tokens,
    frequency_penalty: profile.sampler?.frequencyPenalty,
    presence_penalty: profile.sampler?.presencePenalty,
    stop: profile.sampler?.stop,
    ...(wantsJson ? { response_format: { type: 'json_object' as const } } : {})
  });
  return response.choices[0]?.message?.content ?? '';
}
