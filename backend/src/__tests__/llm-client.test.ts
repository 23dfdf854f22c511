import { describe, it, expect, beforeEach, vi } from 'vitest';
import OpenAI from 'openai';
import { chatCompletion, isRetryableError, resolveApiKey } from '../llm/client.js';
import { customLLMRequest, extractCompletionText } from '../llm/customClient.js';
import { LLMProfile } from '../configManager.js';
import { ChatMessage } from '../llm/types.js';

const { createMock, constructorMock, postMock } = vi.hoisted(() => ({
  createMock: vi.fn(),
  constructorMock: vi.fn(),
  postMock: vi.fn()
}));

vi.mock('openai', () => {
  class APIConnectionError extends Error {}
  class MockOpenAI {
    static APIConnectionError = APIConnectionError;
    chat = { completions: { create: createMock } };
    constructor(options: unknown) {
      constructorMock(options);
    }
  }
  return { default: MockOpenAI };
});

vi.mock('axios', () => ({
  default: {
    post: postMock,
    isAxiosError: vi.fn(() => false)
  }
}));

const profile: LLMProfile = {
  type: 'openai',
  apiKey: 'test-key',
  baseURL: 'http://localhost:1/v1',
  model: 'test-model',
  sampler: { temperature: 0.5 }
};

const messages: ChatMessage[] = [
  { role: 'system', content: 'You are Nora.' },
  { role: 'user', content: 'Hello' }
];

function completion(content: string) {
  return { choices: [{ message: { content } }] };
}

function httpError(status: number, message: string): Error {
  return Object.assign(new Error(message), { status });
}

describe('chatCompletion', () => {
  beforeEach(() => {
    createMock.mockReset();
    constructorMock.mockReset();
  });

  it('returns the first choice and requests a JSON object when asked', async () => {
    createMock.mockResolvedValue(completion('{"reply": "Hi"}'));

    const result = await chatCompletion(profile, messages, { json: true, timeoutMs: 2500 });

    expect(result).toBe('{"reply": "Hi"}');
    expect(constructorMock).toHaveBeenCalledWith({
      apiKey: 'test-key',
      baseURL: 'http://localhost:1/v1',
      maxRetries: 0,
      timeout: 2500
    });
    expect(createMock.mock.calls[0][0]).toMatchObject({
      model: 'test-model',
      messages,
      temperature: 0.5,
      response_format: { type: 'json_object' }
    });
  });

  it('retries retryable failures', async () => {
    createMock.mockRejectedValueOnce(httpError(503, 'busy')).mockResolvedValueOnce(completion('ok'));

    expect(await chatCompletion(profile, messages, { backoffMs: 1 })).toBe('ok');
    expect(createMock).toHaveBeenCalledTimes(2);
  });

  it('gives up on a profile after three retryable failures', async () => {
    createMock.mockRejectedValue(httpError(503, 'busy'));

    await expect(chatCompletion(profile, messages, { backoffMs: 1 })).rejects.toThrow('All LLM profiles failed. Last error: busy');
    expect(createMock).toHaveBeenCalledTimes(3);
  });

  it('moves straight to the fallback profile on a non-retryable failure', async () => {
    const backup: LLMProfile = { type: 'openai', baseURL: 'http://localhost:2/v1', model: 'backup-model' };
    createMock.mockRejectedValueOnce(httpError(401, 'unauthorized')).mockResolvedValueOnce(completion('from backup'));

    const result = await chatCompletion(profile, messages, { fallbackProfiles: [backup], backoffMs: 1 });

    expect(result).toBe('from backup');
    expect(createMock).toHaveBeenCalledTimes(2);
    expect(constructorMock.mock.calls[1][0]).toMatchObject({ baseURL: 'http://localhost:2/v1', apiKey: 'dummy' });
  });

  it('keeps the cause of the final failure', async () => {
    const failure = httpError(400, 'bad request');
    createMock.mockRejectedValue(failure);

    const error = await chatCompletion(profile, messages).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(Error);
    expect(error instanceof Error ? error.cause : undefined).toBe(failure);
    expect(createMock).toHaveBeenCalledTimes(1);
  });
});

describe('isRetryableError', () => {
  it('recognises network codes, retryable statuses and connection errors', () => {
    expect(isRetryableError({ code: 'ECONNRESET' })).toBe(true);
    expect(isRetryableError({ status: 429 })).toBe(true);
    expect(isRetryableError({ status: 404 })).toBe(false);
    expect(isRetryableError(null)).toBe(false);
    expect(isRetryableError(new OpenAI.APIConnectionError({ message: 'down' }))).toBe(true);
  });
});

describe('resolveApiKey', () => {
  it('prefers the inline key, then the named environment variable', () => {
    vi.stubEnv('INTERROGATION_TEST_KEY', 'test-secret');
    expect(resolveApiKey({ ...profile, apiKey: undefined, apiKeyEnv: 'INTERROGATION_TEST_KEY' })).toBe('test-secret');
    expect(resolveApiKey({ ...profile, apiKey: undefined, apiKeyEnv: 'INTERROGATION_UNSET_KEY' })).toBe('dummy');
    expect(resolveApiKey(profile)).toBe('test-key');
    vi.unstubAllEnvs();
  });
});

describe('customLLMRequest', () => {
  beforeEach(() => {
    postMock.mockReset();
  });

  it('posts the rendered prompt to the completions endpoint', async () => {
    postMock.mockResolvedValue({ data: { choices: [{ text: 'Hello from the backend' }] } });
    const custom: LLMProfile = { type: 'custom', apiKey: 'test-key', baseURL: 'http://localhost:3/v1', model: 'local-model' };

    const text = await customLLMRequest(custom, '<|im_start|>user\nHi<|im_end|>', { timeout: 1000 });

    expect(text).toBe('Hello from the backend');
    expect(postMock).toHaveBeenCalledWith(
      'http://localhost:3/v1/completions',
      { prompt: '<|im_start|>user\nHi<|im_end|>', model: 'local-model', max_tokens: 512, temperature: 0.7, top_p: 0.9 },
      { timeout: 1000, headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-key' } }
    );
  });

  it('propagates request failures', async () => {
    postMock.mockRejectedValue(new Error('socket hang up'));
    const custom: LLMProfile = { type: 'custom', baseURL: 'http://localhost:3/v1' };

    await expect(customLLMRequest(custom, 'prompt')).rejects.toThrow('socket hang up');
  });
});

describe('extractCompletionText', () => {
  it('reads the known response shapes', () => {
    expect(extractCompletionText({ choices: [{ message: { content: 'chat' } }] })).toBe('chat');
    expect(extractCompletionText({ result: 'plain' })).toBe('plain');
    expect(extractCompletionText({ unexpected: true })).toBe('');
  });
});
