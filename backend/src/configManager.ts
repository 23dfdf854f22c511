import * as fs from 'fs';
import * as path from 'path';

export interface SamplerSettings {
  temperature?: number;
  topP?: number;
  max_completion_tokens?: number;
  frequencyPenalty?: number;
  presencePenalty?: number;
  stop?: string[];
  maxContextTokens?: number; // Maximum total context length in tokens
  forceJson?: boolean;
}

export interface DebugSettings {
  enabledNamespaces?: string;
}

export interface LLMProfile {
  type: 'openai' | 'custom'; // 'openai' uses OpenAI SDK, 'custom' uses axios with templates
  apiKey?: string;
  apiKeyEnv?: string; // Name of an environment variable holding the key
  baseURL: string;
  model?: string;
  template?: string; // LLM template name for 'custom' profiles, e.g. 'chatml'
  sampler?: SamplerSettings;
  format?: 'json' | 'text';
  fallbackProfiles?: string[]; // Profile names to try if this one fails
}

export interface AgentConfig {
  llmProfile?: string;
  type?: 'openai' | 'custom';
  sampler?: SamplerSettings;
  format?: 'json' | 'text';
  apiKey?: string;
  baseURL?: string;
  model?: string;
  template?: string;
}

export type LocationDetectorMode = 'heuristic' | 'classifier';

export interface FeatureSettings {
  locationDetector?: LocationDetectorMode;
  revealProximityWindow?: number;
  generationTimeoutMs?: number;
  persistenceTimeoutMs?: number;
  persistenceRetries?: number;
  persistenceBackoffMs?: number;
  preloadActiveHours?: number;
  preloadLimit?: number;
}

export interface Config {
  profiles: Record<string, LLMProfile>;
  defaultProfile: string;
  agents?: Record<string, AgentConfig>;
  features?: FeatureSettings;
  database?: { path?: string };
  server?: { port?: number };
  debug?: DebugSettings;
}

export const DEFAULT_FEATURES: Required<FeatureSettings> = {
  locationDetector: 'heuristic',
  revealProximityWindow: 40,
  generationTimeoutMs: 30000,
  persistenceTimeoutMs: 5000,
  persistenceRetries: 3,
  persistenceBackoffMs: 100,
  preloadActiveHours: 24,
  preloadLimit: 50,
};

export const DEFAULT_PORT = 8080;

export function defaultConfigPath(): string {
  return process.env.INTERROGATION_CONFIG || path.join(process.cwd(), 'localConfig', 'config.json');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isConfig(value: unknown): value is Config {
  return isRecord(value) && typeof value.defaultProfile === 'string' && isRecord(value.profiles);
}

export class ConfigManager {
  private config: Config;
  private readonly configPath: string;

  constructor(configPath: string = defaultConfigPath()) {
    this.configPath = configPath;
    this.config = this.loadConfig(configPath);
  }

  private loadConfig(configPath: string): Config {
    if (!fs.existsSync(configPath)) {
      // Create dummy config
      const dummyConfig: Config = {
        defaultProfile: 'openai',
        profiles: {
          openai: {
            type: 'openai',
            apiKeyEnv: 'OPENAI_API_KEY',
            baseURL: 'https://api.openai.com/v1',
            model: 'gpt-4o-mini',
            sampler: { temperature: 0.8, max_completion_tokens: 400 }
          }
        },
        agents: {
          character: { format: 'json' },
          locationDetector: { format: 'json', sampler: { temperature: 0 } }
        },
        features: { ...DEFAULT_FEATURES },
        debug: {
          enabledNamespaces: 'interrogation:server*,interrogation:services:*'
        }
      };
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, JSON.stringify(dummyConfig, null, 2));
      return dummyConfig;
    }
    const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    if (!isConfig(parsed)) {
      throw new Error(`Config at ${configPath} must define "defaultProfile" and "profiles"`);
    }
    if (!parsed.profiles[parsed.defaultProfile]) {
      throw new Error(`Default profile ${parsed.defaultProfile} is not defined in ${configPath}`);
    }
    return parsed;
  }

  getProfile(name?: string): LLMProfile {
    const profileName = name || this.config.defaultProfile;
    const profile = this.config.profiles[profileName];
    if (!profile) {
      throw new Error(`Profile ${profileName} not found`);
    }
    return profile;
  }

  getConfig(): Config {
    return { ...this.config };
  }

  getAgentConfig(agentName: string): AgentConfig | undefined {
    return this.config.agents?.[agentName];
  }

  getFeatures(): Required<FeatureSettings> {
    return { ...DEFAULT_FEATURES, ...this.config.features };
  }

  getDatabasePath(): string {
    const configured = this.config.database?.path;
    if (!configured) return path.join(process.cwd(), 'data', 'interrogation.db');
    return configured === ':memory:' ? configured : path.resolve(configured);
  }

  getPort(): number {
    const fromEnv = Number(process.env.PORT);
    if (Number.isInteger(fromEnv) && fromEnv > 0) return fromEnv;
    return this.config.server?.port ?? DEFAULT_PORT;
  }

  reload(): void {
    this.config = this.loadConfig(this.configPath);
  }
}
