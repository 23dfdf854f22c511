import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import type { Environment } from 'nunjucks';
import { GeneratorTurn } from '../interfaces/Generator.js';
import { ChatMessage } from './types.js';

const TEMPLATES_DIR = path.join(dirname(fileURLToPath(import.meta.url)), '..', 'llm_templates');
const DEFAULT_TEMPLATE = 'chatml';

const ROLE_MAP: Record<GeneratorTurn['role'], ChatMessage['role']> = {
  instruction: 'system',
  user: 'user',
  character: 'assistant'
};

/**
 * Builds an OpenAI-compatible messages array from conversation turns.
 * Turns with no text are left out; the generator never sees empty messages.
 */
export function buildOpenAIMessages(turns: readonly GeneratorTurn[]): ChatMessage[] {
  const messages: ChatMessage[] = [];
  for (const turn of turns) {
    if (!turn.fullText.trim()) continue;
    messages.push({ role: ROLE_MAP[turn.role], content: turn.fullText });
  }
  return messages;
}

export function resolveTemplatePath(templateName: string | undefined): string {
  const requested = path.join(TEMPLATES_DIR, `${templateName || DEFAULT_TEMPLATE}.njk`);
  if (fs.existsSync(requested)) return requested;
  const fallback = path.join(TEMPLATES_DIR, `${DEFAULT_TEMPLATE}.njk`);
  if (!fs.existsSync(fallback)) {
    throw new Error(`Critical: Default template ${DEFAULT_TEMPLATE}.njk not found at ${fallback}`);
  }
  return fallback;
}

/**
 * Renders a raw prompt for custom (completion-style) backends, e.g. ChatML.
 */
export function buildCustomTemplate(messages: readonly ChatMessage[], templateName: string | undefined, env: Environment): string {
  const template = fs.readFileSync(resolveTemplatePath(templateName), 'utf-8');
  return env.renderString(template, { messages });
}
