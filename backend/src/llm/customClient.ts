import axios from 'axios';
import { LLMProfile } from '../configManager.js';
import { errorMessage } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { resolveApiKey } from './client.js';

const log = createLogger(NAMESPACES.llm.custom);

export interface CustomClientOptions {
  timeout?: number;
}

function field(value: unknown, key: string): unknown {
  return typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;
}

/** Pull the generated text out of the response formats seen in the wild. */
export function extractCompletionText(data: unknown): string {
  const choices = field(data, 'choices');
  if (Array.isArray(choices) && choices.length > 0) {
    const choice: unknown = choices[0];
    // Support both 'text' (completions API) and 'message.content' (chat format)
    const text = field(choice, 'text');
    if (typeof text === 'string' && text) return text;
    const content = field(field(choice, 'message'), 'content');
    return typeof content === 'string' ? content : '';
  }

  const result = field(data, 'result');
  if (typeof result === 'string') return result;

  log('[Custom LLM] Unexpected response format: %o', data);
  return '';
}

/**
 * Custom LLM client using axios for non-OpenAI compatible endpoints.
 * Sends raw rendered prompts directly to the LLM backend.
 */
export async function customLLMRequest(
  profile: LLMProfile,
  renderedPrompt: string,
  options: CustomClientOptions = {}
): Promise<string> {
  const { timeout = 120000 } = options;

  try {
    log('[Custom LLM] Posting to %s with model %s', profile.baseURL, profile.model);

    const requestBody = {
      prompt: renderedPrompt,
      model: profile.model,
      max_tokens: profile.sampler?.max_completion_tokens || 512,
      temperature: profile.sampler?.temperature ?? 0.7,
      top_p: profile.sampler?.topP ?? 0.9,
      ...(profile.sampler?.frequencyPenalty !== undefined && { frequency_penalty: profile.sampler.frequencyPenalty }),
      ...(profile.sampler?.presencePenalty !== undefined && { presence_penalty: profile.sampler.presencePenalty }),
      ...(profile.sampler?.stop && profile.sampler.stop.length > 0 && { stop: profile.sampler.stop }),
    };

    const apiKey = resolveApiKey(profile);
    const response = await axios.post<unknown>(`${profile.baseURL}/completions`, requestBody, {
      timeout,
      headers: {
        'Content-Type': 'application/json',
        ...(apiKey !== 'dummy' && { Authorization: `Bearer ${apiKey}` }),
      },
    });

    return extractCompletionText(response.data);
  } catch (error) {
    const apiMessage = axios.isAxiosError(error) ? field(field(error.response?.data, 'error'), 'message') : undefined;
    log('[Custom LLM] Request failed: %s', typeof apiMessage === 'string' ? apiMessage : errorMessage(error));
    throw error;
  }
}
