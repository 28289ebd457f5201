import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import { createLogger, NAMESPACES } from './logging.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const configLog = createLogger(NAMESPACES.config);

export interface SamplerSettings {
  temperature?: number;
  topP?: number;
  max_completion_tokens?: number;
  frequencyPenalty?: number;
  presencePenalty?: number;
  stop?: string[];
}

export interface DebugSettings {
  enabledNamespaces?: string;
}

export interface LLMProfile {
  type: 'openai' | 'custom'; // 'openai' uses OpenAI SDK, 'custom' uses axios with templates
  apiKey?: string;
  baseURL: string;
  model?: string;
  template?: string; // chat template name under llm_templates/, used by 'custom' profiles
  sampler?: SamplerSettings;
}

export type SpeechVoice = 'alloy' | 'echo' | 'fable' | 'onyx' | 'nova' | 'shimmer';
export type SpeechFormat = 'mp3' | 'opus' | 'aac' | 'flac' | 'wav';
export type ImageSize = '256x256' | '512x512' | '1024x1024' | '1792x1024' | '1024x1792';

export interface SpeechSettings {
  profile: string;
  model: string;
  voice: SpeechVoice;
  format: SpeechFormat;
}

export interface ImageSettings {
  profile: string;
  model: string;
  size: ImageSize;
  stylePrefix?: string;
}

export interface AgentConfig {
  llmProfile?: string;
  sampler?: SamplerSettings;
  model?: string;
}

export interface FeatureSettings {
  maxPlayers: number;
  scenarioOptionCount: number;
  characterOptionCount: number;
  contextTokenBudget: number;
  requestTimeoutMs: number;
  narrationEnabled: boolean;
  imageryEnabled: boolean;
  showDmNotes: boolean;
  jsonValidationMaxRetries: number;
}

export interface Config {
  profiles: Record<string, LLMProfile>;
  defaultProfile: string;
  speech?: SpeechSettings;
  image?: ImageSettings;
  agents?: Record<string, AgentConfig>;
  features: FeatureSettings;
  debug?: DebugSettings;
}

export const DEFAULT_FEATURES: FeatureSettings = {
  maxPlayers: 4,
  scenarioOptionCount: 3,
  characterOptionCount: 6,
  contextTokenBudget: 6000,
  requestTimeoutMs: 120000,
  narrationEnabled: true,
  imageryEnabled: true,
  showDmNotes: false,
  jsonValidationMaxRetries: 1
};

function defaultConfig(): Config {
  return {
    defaultProfile: 'openai',
    profiles: {
      openai: {
        type: 'openai',
        baseURL: 'https://api.openai.com/v1',
        model: 'gpt-4o-mini'
      }
    },
    speech: { profile: 'openai', model: 'tts-1', voice: 'fable', format: 'mp3' },
    image: { profile: 'openai', model: 'dall-e-3', size: '1024x1024' },
    features: { ...DEFAULT_FEATURES },
    debug: { enabledNamespaces: 'adventure:engine:*,adventure:gateway' }
  };
}

export class ConfigManager {
  private config: Config;
  private readonly configPath: string;

  constructor(configPath: string = path.join(__dirname, '..', 'localConfig', 'config.json')) {
    this.configPath = configPath;
    this.config = this.loadConfig(configPath);
  }

  private loadConfig(configPath: string): Config {
    const defaults = defaultConfig();
    if (!fs.existsSync(configPath)) {
      configLog('No config at %s, using built-in defaults', configPath);
      return this.applyEnvironment(defaults);
    }
    const parsed: Partial<Config> = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    const merged: Config = {
      ...defaults,
      ...parsed,
      profiles: parsed.profiles ?? defaults.profiles,
      features: { ...DEFAULT_FEATURES, ...(parsed.features ?? {}) }
    };
    this.validate(merged);
    return this.applyEnvironment(merged);
  }

  private validate(config: Config): void {
    if (!config.profiles[config.defaultProfile]) {
      throw new Error(`Default profile ${config.defaultProfile} not found`);
    }
    const { maxPlayers, scenarioOptionCount, characterOptionCount } = config.features;
    if (!Number.isInteger(maxPlayers) || maxPlayers < 1) {
      throw new Error(`features.maxPlayers must be a positive integer, got ${maxPlayers}`);
    }
    if (scenarioOptionCount < 1 || characterOptionCount < 1) {
      throw new Error('features.scenarioOptionCount and features.characterOptionCount must be positive');
    }
    for (const [name, agent] of Object.entries(config.agents ?? {})) {
      if (agent.llmProfile && agent.llmProfile !== 'default' && !config.profiles[agent.llmProfile]) {
        configLog('WARN: agent %s references unknown profile %s', name, agent.llmProfile);
      }
    }
  }

  private applyEnvironment(config: Config): Config {
    const apiKey = process.env.OPENAI_API_KEY;
    const profiles: Record<string, LLMProfile> = {};
    for (const [name, profile] of Object.entries(config.profiles)) {
      profiles[name] = profile.apiKey || !apiKey || profile.type !== 'openai' ? profile : { ...profile, apiKey };
    }
    const showDmNotes = process.env.SHOW_DM_NOTES;
    return {
      ...config,
      profiles,
      features: {
        ...config.features,
        showDmNotes: showDmNotes === undefined ? config.features.showDmNotes : showDmNotes === '1'
      }
    };
  }

  getProfile(name?: string): LLMProfile {
    const profileName = name || this.config.defaultProfile;
    const profile = this.config.profiles[profileName];
    if (!profile) {
      throw new Error(`Profile ${profileName} not found`);
    }
    return profile;
  }

  /**
   * Profile for an agent: the agent's named profile (or the default), with
   * the agent's sampler and model overrides layered on top.
   */
  resolveAgentProfile(agentName: string): LLMProfile {
    const agentConfig = this.config.agents?.[agentName];
    const profileName = !agentConfig?.llmProfile || agentConfig.llmProfile === 'default'
      ? this.config.defaultProfile
      : agentConfig.llmProfile;
    const base = this.getProfile(profileName);
    return {
      ...base,
      model: agentConfig?.model ?? base.model,
      sampler: { ...(base.sampler ?? {}), ...(agentConfig?.sampler ?? {}) }
    };
  }

  getConfig(): Config {
    return { ...this.config };
  }

  getFeatures(): FeatureSettings {
    return { ...this.config.features };
  }

  getSpeechSettings(): SpeechSettings | undefined {
    return this.config.speech;
  }

  getImageSettings(): ImageSettings | undefined {
    return this.config.image;
  }

  isDmNotesEnabled(): boolean {
    return this.config.features.showDmNotes;
  }

  reload(): void {
    this.config = this.loadConfig(this.configPath);
  }
}
