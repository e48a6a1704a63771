/**
 * Configuration loader: builds the runtime config from environment variables.
 *
 * Handles:
 * - Provider selection (LLM_PROVIDER) with per-provider model ids and keys
 * - Fallback to ollama for unknown providers
 * - HTTP bind address, transport, logging folder and debug switches
 *
 * A `.env` file is loaded by the entry point before this runs.
 */

import {
  DEFAULT_PROVIDER,
  PROVIDERS,
  isProviderId,
  type ProviderId,
} from '@seqthink/shared';
import { ConfigError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('config');

// ---------------------------------------------------------------------------
// Configuration Types
// ---------------------------------------------------------------------------

export type TransportMode = 'stdio' | 'http';
export type WebSearchTool = 'exa' | 'none';

export interface LLMConfig {
  provider: ProviderId;
  /** Model used by the coordinator. */
  teamModel: string;
  /** Model used by the specialist agents. */
  agentModel: string;
  /** API key for the selected provider (empty for ollama). */
  apiKey: string;
  /** Overrides the provider's default endpoint. */
  baseURL?: string;
  maxTokens: number;
}

export interface ThinkingConfig {
  llm: LLMConfig;
  search: {
    tool: WebSearchTool;
    exaApiKey: string;
  };
  server: {
    host: string;
    port: number;
    transport: TransportMode;
  };
  logging: {
    folder: string;
    debug: boolean;
    debugAgents: boolean;
  };
}

export type Env = Record<string, string | undefined>;

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

const DEFAULT_PORT = 8090;
const DEFAULT_HOST = '0.0.0.0';
const DEFAULT_MAX_TOKENS = 4096;
const DEFAULT_LOG_FOLDER = './logs';
const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434/v1';

/** Model used for both roles when LLM_PROVIDER names nothing we know. */
export const FALLBACK_MODEL = 'deepseek-r1:7b';

const MODEL_ENV: Record<ProviderId, { team: string; agent: string }> = {
  deepseek: { team: 'DEEPSEEK_TEAM_MODEL_ID', agent: 'DEEPSEEK_AGENT_MODEL_ID' },
  groq: { team: 'GROQ_TEAM_MODEL_ID', agent: 'GROQ_AGENT_MODEL_ID' },
  openrouter: { team: 'OPENROUTER_TEAM_MODEL_ID', agent: 'OPENROUTER_AGENT_MODEL_ID' },
  ollama: { team: 'OLLAMA_TEAM_MODEL_ID', agent: 'OLLAMA_AGENT_MODEL_ID' },
};

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

/**
 * Build the runtime configuration from `env`.
 *
 * Missing credentials are not an error here: they only matter once the team
 * is built (see assertProviderCredentials), so the HTTP health endpoints and
 * the hosting helpers work without keys.
 */
export function loadConfig(env: Env = process.env): ThinkingConfig {
  const llm = resolveLLMConfig(env);

  const searchTool = (env['WEB_SEARCH_TOOL'] || 'exa').toLowerCase();
  if (searchTool !== 'exa' && searchTool !== 'none') {
    throw new ConfigError(`Unsupported WEB_SEARCH_TOOL: "${searchTool}". Supported: exa, none`);
  }

  const transport = (env['MCP_TRANSPORT'] || 'stdio').toLowerCase();
  if (transport !== 'stdio' && transport !== 'http') {
    throw new ConfigError(`Unsupported MCP_TRANSPORT: "${transport}". Supported: stdio, http`);
  }

  return {
    llm,
    search: {
      tool: searchTool,
      exaApiKey: env['EXA_API_KEY'] ?? '',
    },
    server: {
      host: env['HOST'] || DEFAULT_HOST,
      port: parseInteger(env, 'PORT', DEFAULT_PORT),
      transport,
    },
    logging: {
      folder: env['LOG_FOLDER'] || DEFAULT_LOG_FOLDER,
      debug: env['DEBUG'] === 'True',
      debugAgents: env['DEBUG_AGENTS'] === 'True',
    },
  };
}

function resolveLLMConfig(env: Env): LLMConfig {
  const requested = (env['LLM_PROVIDER'] || DEFAULT_PROVIDER).toLowerCase();
  const maxTokens = parseInteger(env, 'LLM_MAX_TOKENS', DEFAULT_MAX_TOKENS);

  if (!isProviderId(requested)) {
    log.warn(`Unsupported LLM_PROVIDER: ${requested}. Defaulting to ollama.`);
    return {
      provider: 'ollama',
      teamModel: FALLBACK_MODEL,
      agentModel: FALLBACK_MODEL,
      apiKey: '',
      baseURL: env['OLLAMA_BASE_URL'] || DEFAULT_OLLAMA_BASE_URL,
      maxTokens,
    };
  }

  const info = PROVIDERS[requested];
  const modelEnv = MODEL_ENV[requested];

  return {
    provider: requested,
    teamModel: env[modelEnv.team] || info.defaultTeamModel,
    agentModel: env[modelEnv.agent] || info.defaultAgentModel,
    apiKey: info.apiKeyEnv ? env[info.apiKeyEnv] ?? '' : '',
    baseURL: requested === 'ollama'
      ? env['OLLAMA_BASE_URL'] || DEFAULT_OLLAMA_BASE_URL
      : undefined,
    maxTokens,
  };
}

function parseInteger(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Fail when the selected provider needs an API key and none is set.
 */
export function assertProviderCredentials(config: ThinkingConfig): void {
  const info = PROVIDERS[config.llm.provider];
  if (info.apiKeyEnv && !config.llm.apiKey) {
    throw new ConfigError(
      `Missing API key for provider ${config.llm.provider}: set ${info.apiKeyEnv}`,
    );
  }
}

/** One-line summary for startup logs (no secrets). */
export function describeConfig(config: ThinkingConfig): string {
  const search = config.search.tool === 'exa' && config.search.exaApiKey
    ? 'exa'
    : 'disabled';
  return (
    `provider=${config.llm.provider} team=${config.llm.teamModel} ` +
    `agent=${config.llm.agentModel} search=${search} transport=${config.server.transport}`
  );
}
