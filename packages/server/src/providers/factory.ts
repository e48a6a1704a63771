/**
 * LLM provider factory: creates the provider selected by LLM_PROVIDER.
 */

import { PROVIDERS } from '@seqthink/shared';
import type { LLMProvider } from '../llm-provider.js';
import type { ThinkingConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { OpenAIProvider } from './openai.js';

const log = createLogger('provider');

export interface ModelConfig {
  teamModelId: string;
  agentModelId: string;
}

/** Model ids for the coordinator and the specialists. */
export function getModelConfig(config: ThinkingConfig): ModelConfig {
  const { provider, teamModel, agentModel } = config.llm;
  log.info(`Using ${provider}: Team Model='${teamModel}', Agent Model='${agentModel}'`);
  return { teamModelId: teamModel, agentModelId: agentModel };
}

export function createLLMProvider(config: ThinkingConfig): LLMProvider {
  const { provider, apiKey, baseURL } = config.llm;
  const info = PROVIDERS[provider];

  switch (provider) {
    case 'deepseek':
    case 'groq':
      return new OpenAIProvider({ apiKey, baseURL: baseURL ?? info.baseURL ?? undefined }, provider);

    case 'openrouter':
      return new OpenAIProvider(
        {
          apiKey,
          baseURL: baseURL ?? info.baseURL ?? undefined,
          defaultHeaders: { 'X-Title': 'mcp-server-mas-sequential-thinking' },
        },
        provider,
      );

    case 'ollama':
      // Ollama ignores the key but the client refuses an empty one
      return new OpenAIProvider({ apiKey: 'ollama', baseURL }, provider);
  }
}
