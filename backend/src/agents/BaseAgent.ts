import nunjucks from 'nunjucks';
import type { Environment } from 'nunjucks';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import { chatCompletion } from '../llm/client.js';
import { customLLMRequest } from '../llm/customClient.js';
import { buildCustomTemplate } from '../llm/messageBuilder.js';
import { ChatMessage, CompletionOptions } from '../llm/types.js';
import { ConfigManager, LLMProfile } from '../configManager.js';
import { errorMessage } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';

const PROMPTS_DIR = path.join(dirname(fileURLToPath(import.meta.url)), '..', 'prompts');

/** Prompts are plain text, so nothing gets HTML-escaped. */
export function createTemplateEnvironment(): Environment {
  const env = new nunjucks.Environment(null, { autoescape: false });
  env.addFilter('json', (obj: unknown) => JSON.stringify(obj, null, 2));
  return env;
}

export abstract class BaseAgent {
  protected configManager: ConfigManager;
  protected env: Environment;
  protected agentName: string;
  private readonly baseAgentLog = createLogger(NAMESPACES.agents.base);

  constructor(agentName: string, configManager: ConfigManager, env: Environment = createTemplateEnvironment()) {
    this.agentName = agentName;
    this.configManager = configManager;
    this.env = env;
  }

  /**
   * The agent's LLM profile: the named (or default) profile with the agent's
   * overrides from config applied on top.
   */
  protected getProfile(): LLMProfile {
    // Reload config to ensure latest changes are applied
    this.configManager.reload();

    const agentConfig = this.configManager.getAgentConfig(this.agentName);
    let profileName = agentConfig?.llmProfile || this.configManager.getConfig().defaultProfile;
    if (profileName === 'default') {
      profileName = this.configManager.getConfig().defaultProfile;
    }

    const baseProfile = this.configManager.getProfile(profileName);
    const mergedProfile: LLMProfile = {
      ...baseProfile,
      type: agentConfig?.type ?? baseProfile.type,
      sampler: {
        ...(baseProfile.sampler || {}),
        ...(agentConfig?.sampler || {})
      }
    };

    // Determine format: explicit agent override -> sampler.forceJson -> base profile
    if (agentConfig?.format) {
      mergedProfile.format = agentConfig.format;
    } else if (mergedProfile.sampler?.forceJson) {
      mergedProfile.format = 'json';
    }

    // Apply other optional overrides only when provided
    if (agentConfig?.apiKey !== undefined) mergedProfile.apiKey = agentConfig.apiKey;
    if (agentConfig?.baseURL !== undefined) mergedProfile.baseURL = agentConfig.baseURL;
    if (agentConfig?.model !== undefined) mergedProfile.model = agentConfig.model;
    if (agentConfig?.template !== undefined) mergedProfile.template = agentConfig.template;

    return mergedProfile;
  }

  private getFallbackProfiles(profile: LLMProfile): LLMProfile[] {
    const fallbacks: LLMProfile[] = [];
    for (const name of profile.fallbackProfiles ?? []) {
      try {
        fallbacks.push(this.configManager.getProfile(name));
      } catch (error) {
        this.baseAgentLog('[LLM] Skipping fallback profile %s for agent %s: %s', name, this.agentName, errorMessage(error));
      }
    }
    return fallbacks;
  }

  /**
   * Send a conversation to the configured backend. Failures propagate; callers
   * decide what a failed call means for them.
   */
  protected async callLLM(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    const profile = this.getProfile();
    if (profile.type === 'custom') {
      const rendered = buildCustomTemplate(messages, profile.template, this.env);
      this.baseAgentLog('[Agent %s] Calling custom LLM with template %s', this.agentName, profile.template || 'chatml');
      return customLLMRequest(profile, rendered, { timeout: options.timeoutMs });
    }
    return chatCompletion(profile, messages, {
      ...options,
      fallbackProfiles: this.getFallbackProfiles(profile)
    });
  }

  protected renderTemplate(templateName: string, context: object): string {
    const templatePath = path.join(PROMPTS_DIR, `${templateName}.njk`);
    const template = fs.readFileSync(templatePath, 'utf-8');
    const result = this.env.renderString(template, context);
    const preview = result.substring(0, 500) + (result.length > 500 ? '...' : '');
    this.baseAgentLog('Rendered template for %s: %s', templateName, preview);
    return result;
  }
}
