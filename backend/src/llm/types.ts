/**
 * Chat message format for LLM APIs
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  /** Ask the backend for a JSON object response */
  json?: boolean;
  /** Per-request timeout handed to the HTTP client */
  timeoutMs?: number;
}
