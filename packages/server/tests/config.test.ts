import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  FALLBACK_MODEL,
  assertProviderCredentials,
  describeConfig,
  loadConfig,
} from '../src/config.js';
import { ConfigError } from '../src/errors.js';

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

describe('loadConfig', () => {
  it('uses deepseek and the documented defaults with an empty environment', () => {
    expect(loadConfig({})).toEqual({
      llm: {
        provider: 'deepseek',
        teamModel: 'deepseek-chat',
        agentModel: 'deepseek-chat',
        apiKey: '',
        baseURL: undefined,
        maxTokens: 4096,
      },
      search: { tool: 'exa', exaApiKey: '' },
      server: { host: '0.0.0.0', port: 8090, transport: 'stdio' },
      logging: { folder: './logs', debug: false, debugAgents: false },
    });
  });

  it('reads the selected provider key and model overrides', () => {
    const config = loadConfig({
      LLM_PROVIDER: 'Groq',
      GROQ_API_KEY: 'test-groq-key',
      DEEPSEEK_API_KEY: 'test-other-key',
      GROQ_TEAM_MODEL_ID: 'llama-3.3-70b-versatile',
    });

    expect(config.llm).toMatchObject({
      provider: 'groq',
      apiKey: 'test-groq-key',
      teamModel: 'llama-3.3-70b-versatile',
      agentModel: 'qwen-2.5-32b',
    });
  });

  it('points ollama at the local endpoint unless overridden', () => {
    expect(loadConfig({ LLM_PROVIDER: 'ollama' }).llm.baseURL).toBe('http://localhost:11434/v1');
    expect(
      loadConfig({ LLM_PROVIDER: 'ollama', OLLAMA_BASE_URL: 'http://gpu-box:11434/v1' }).llm.baseURL,
    ).toBe('http://gpu-box:11434/v1');
  });

  it('falls back to ollama for an unknown provider', () => {
    const { llm } = loadConfig({ LLM_PROVIDER: 'mistral' });

    expect(llm.provider).toBe('ollama');
    expect(llm.teamModel).toBe(FALLBACK_MODEL);
    expect(llm.agentModel).toBe(FALLBACK_MODEL);
    expect(console.error).toHaveBeenCalledWith(
      '[config] WARNING: Unsupported LLM_PROVIDER: mistral. Defaulting to ollama.',
    );
  });

  it('parses server, search and logging settings', () => {
    const config = loadConfig({
      MCP_TRANSPORT: 'HTTP',
      HOST: '127.0.0.1',
      PORT: '9000',
      WEB_SEARCH_TOOL: 'none',
      EXA_API_KEY: 'test-exa-key',
      LLM_MAX_TOKENS: '2048',
      LOG_FOLDER: '/tmp/thinking-logs',
      DEBUG: 'True',
      DEBUG_AGENTS: 'true',
    });

    expect(config.server).toEqual({ host: '127.0.0.1', port: 9000, transport: 'http' });
    expect(config.search).toEqual({ tool: 'none', exaApiKey: 'test-exa-key' });
    expect(config.llm.maxTokens).toBe(2048);
    expect(config.logging).toEqual({ folder: '/tmp/thinking-logs', debug: true, debugAgents: false });
  });

  it('treats blank transport and search tool as unset', () => {
    const config = loadConfig({ MCP_TRANSPORT: '', WEB_SEARCH_TOOL: '' });

    expect(config.server.transport).toBe('stdio');
    expect(config.search.tool).toBe('exa');
  });

  it('rejects unsupported search tools and transports', () => {
    expect(() => loadConfig({ WEB_SEARCH_TOOL: 'duckduckgo' })).toThrow(
      'Unsupported WEB_SEARCH_TOOL: "duckduckgo". Supported: exa, none',
    );
    expect(() => loadConfig({ MCP_TRANSPORT: 'sse' })).toThrow(ConfigError);
  });

  it('rejects non-positive or non-numeric integers', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow('PORT must be a positive integer, got "abc"');
    expect(() => loadConfig({ LLM_MAX_TOKENS: '0' })).toThrow(
      'LLM_MAX_TOKENS must be a positive integer, got "0"',
    );
  });
});

describe('assertProviderCredentials', () => {
  it('requires the key of the selected provider only', () => {
    expect(() => assertProviderCredentials(loadConfig({ GROQ_API_KEY: 'test-key' }))).toThrow(
      'Missing API key for provider deepseek: set DEEPSEEK_API_KEY',
    );
    expect(() =>
      assertProviderCredentials(loadConfig({ LLM_PROVIDER: 'openrouter', OPENROUTER_API_KEY: 'test-key' })),
    ).not.toThrow();
  });

  it('needs nothing for ollama', () => {
    expect(() => assertProviderCredentials(loadConfig({ LLM_PROVIDER: 'ollama' }))).not.toThrow();
  });
});

describe('describeConfig', () => {
  it('summarises the config without secrets', () => {
    const config = loadConfig({ DEEPSEEK_API_KEY: 'test-secret', EXA_API_KEY: 'test-exa-key' });

    expect(describeConfig(config)).toBe(
      'provider=deepseek team=deepseek-chat agent=deepseek-chat search=exa transport=stdio',
    );
  });
});
