/**
 * Provider catalogue: identifiers, credential variables and default models.
 */

import type { HostingConfig, ProviderId } from './types.js';

export const PROVIDER_IDS: readonly ProviderId[] = ['deepseek', 'groq', 'openrouter', 'ollama'];

/** Provider selected when nothing else is configured. */
export const DEFAULT_PROVIDER: ProviderId = 'deepseek';

export interface ProviderInfo {
  id: ProviderId;
  /** OpenAI-compatible API base URL. `null` means "configured separately" (ollama). */
  baseURL: string | null;
  /** Environment variable holding the API key; `null` when the provider needs none. */
  apiKeyEnv: 'DEEPSEEK_API_KEY' | 'GROQ_API_KEY' | 'OPENROUTER_API_KEY' | null;
  /** Hosting config field carrying the same key. */
  hostingKeyField: Exclude<keyof HostingConfig, 'llmProvider' | 'exaApiKey'> | null;
  defaultTeamModel: string;
  defaultAgentModel: string;
}

export const PROVIDERS: Record<ProviderId, ProviderInfo> = {
  deepseek: {
    id: 'deepseek',
    baseURL: 'https://api.deepseek.com',
    apiKeyEnv: 'DEEPSEEK_API_KEY',
    hostingKeyField: 'deepseekApiKey',
    defaultTeamModel: 'deepseek-chat',
    defaultAgentModel: 'deepseek-chat',
  },
  groq: {
    id: 'groq',
    baseURL: 'https://api.groq.com/openai/v1',
    apiKeyEnv: 'GROQ_API_KEY',
    hostingKeyField: 'groqApiKey',
    defaultTeamModel: 'deepseek-r1-distill-llama-70b',
    defaultAgentModel: 'qwen-2.5-32b',
  },
  openrouter: {
    id: 'openrouter',
    baseURL: 'https://openrouter.ai/api/v1',
    apiKeyEnv: 'OPENROUTER_API_KEY',
    hostingKeyField: 'openrouterApiKey',
    defaultTeamModel: 'deepseek/deepseek-chat-v3-0324',
    defaultAgentModel: 'deepseek/deepseek-r1',
  },
  ollama: {
    id: 'ollama',
    baseURL: null,
    apiKeyEnv: null,
    hostingKeyField: null,
    defaultTeamModel: 'qwen3:14b',
    defaultAgentModel: 'qwen3:14b',
  },
};

export function isProviderId(value: string): value is ProviderId {
  return PROVIDER_IDS.some((id) => id === value);
}
