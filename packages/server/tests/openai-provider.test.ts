import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { ChatCompletion } from 'openai/resources/chat/completions';

const createMock = vi.fn();
const openAIConstructorMock = vi.fn();

vi.mock('openai', () => {
  class MockOpenAI {
    chat = {
      completions: {
        create: createMock,
      },
    };

    constructor(options: unknown) {
      openAIConstructorMock(options);
    }
  }

  return { default: MockOpenAI };
});

import { loadConfig } from '../src/config.js';
import { createLLMProvider } from '../src/providers/factory.js';
import { OpenAIProvider, fromOpenAIResponse, toOpenAIMessages } from '../src/providers/openai.js';

function completion(
  message: Partial<ChatCompletion.Choice['message']>,
  finishReason: ChatCompletion.Choice['finish_reason'],
): ChatCompletion {
  return {
    id: 'cmpl-1',
    object: 'chat.completion',
    created: 0,
    model: 'test-model',
    choices: [
      {
        index: 0,
        logprobs: null,
        finish_reason: finishReason,
        message: { role: 'assistant', content: null, refusal: null, ...message },
      },
    ],
    usage: { prompt_tokens: 11, completion_tokens: 7, total_tokens: 18 },
  };
}

beforeEach(() => {
  createMock.mockReset();
  openAIConstructorMock.mockReset();
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

describe('toOpenAIMessages', () => {
  it('expands tool results into one tool message each', () => {
    expect(
      toOpenAIMessages({
        role: 'tool_results',
        content: [
          { type: 'tool_result', toolCallId: 'a', content: 'first' },
          { type: 'tool_result', toolCallId: 'b', content: 'second' },
        ],
      }),
    ).toEqual([
      { role: 'tool', tool_call_id: 'a', content: 'first' },
      { role: 'tool', tool_call_id: 'b', content: 'second' },
    ]);
  });

  it('maps assistant tool calls with JSON arguments', () => {
    expect(
      toOpenAIMessages({
        role: 'assistant',
        content: [
          { type: 'text', text: 'Delegating.' },
          { type: 'tool_call', id: 'call-1', name: 'delegate_task_to_member', input: { member: 'Critic' } },
        ],
      }),
    ).toEqual([
      {
        role: 'assistant',
        content: 'Delegating.',
        tool_calls: [
          {
            id: 'call-1',
            type: 'function',
            function: { name: 'delegate_task_to_member', arguments: '{"member":"Critic"}' },
          },
        ],
      },
    ]);
  });

  it('sends null content for an assistant turn with only tool calls', () => {
    const [message] = toOpenAIMessages({
      role: 'assistant',
      content: [{ type: 'tool_call', id: 'x', name: 'think', input: {} }],
    });
    expect(message).toMatchObject({ role: 'assistant', content: null });
  });
});

describe('fromOpenAIResponse', () => {
  it('maps text and usage', () => {
    expect(fromOpenAIResponse(completion({ content: 'Hello' }, 'stop'))).toEqual({
      content: [{ type: 'text', text: 'Hello' }],
      stopReason: 'end_turn',
      usage: { inputTokens: 11, outputTokens: 7 },
    });
  });

  it('treats tool calls as tool_use even when the backend says stop', () => {
    const response = fromOpenAIResponse(
      completion(
        {
          tool_calls: [
            { id: 't1', type: 'function', function: { name: 'think', arguments: '{"thought":"x"}' } },
            { id: 't2', type: 'function', function: { name: 'think', arguments: 'not json' } },
          ],
        },
        'stop',
      ),
    );

    expect(response.stopReason).toBe('tool_use');
    expect(response.content).toEqual([
      { type: 'tool_call', id: 't1', name: 'think', input: { thought: 'x' } },
      { type: 'tool_call', id: 't2', name: 'think', input: { _raw: 'not json' } },
    ]);
  });

  it('maps length to max_tokens', () => {
    expect(fromOpenAIResponse(completion({ content: 'cut' }, 'length')).stopReason).toBe('max_tokens');
  });
});

describe('OpenAIProvider', () => {
  it('prepends the system prompt and omits an empty tool list', async () => {
    createMock.mockResolvedValue(completion({ content: 'ok' }, 'stop'));
    const provider = new OpenAIProvider({ apiKey: 'test-key', baseURL: 'https://llm.test/v1' }, 'deepseek');

    const response = await provider.chat({
      model: 'deepseek-chat',
      maxTokens: 128,
      system: 'Be brief.',
      messages: [{ role: 'user', content: 'Hi' }],
      tools: [],
    });

    expect(response.content).toEqual([{ type: 'text', text: 'ok' }]);
    expect(createMock).toHaveBeenCalledWith({
      model: 'deepseek-chat',
      max_tokens: 128,
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'Hi' },
      ],
    });
    expect(openAIConstructorMock).toHaveBeenCalledWith({
      apiKey: 'test-key',
      baseURL: 'https://llm.test/v1',
      defaultHeaders: undefined,
    });
  });

  it('sends tool definitions as functions', async () => {
    createMock.mockResolvedValue(completion({ content: 'ok' }, 'stop'));
    const provider = new OpenAIProvider({ apiKey: 'test-key' }, 'groq');
    const parameters = {
      type: 'object' as const,
      properties: { thought: { type: 'string' } },
      required: ['thought'],
    };

    await provider.chat({
      model: 'm',
      maxTokens: 10,
      system: 's',
      messages: [],
      tools: [{ name: 'think', description: 'Scratchpad', parameters }],
    });

    expect(createMock.mock.calls[0]?.[0]?.tools).toEqual([
      { type: 'function', function: { name: 'think', description: 'Scratchpad', parameters } },
    ]);
  });
});

describe('createLLMProvider', () => {
  it('targets the provider endpoint with its key', () => {
    const provider = createLLMProvider(loadConfig({ LLM_PROVIDER: 'groq', GROQ_API_KEY: 'test-key' }));

    expect(provider.name).toBe('groq');
    expect(openAIConstructorMock).toHaveBeenCalledWith({
      apiKey: 'test-key',
      baseURL: 'https://api.groq.com/openai/v1',
      defaultHeaders: undefined,
    });
  });

  it('adds an attribution header for openrouter', () => {
    createLLMProvider(loadConfig({ LLM_PROVIDER: 'openrouter', OPENROUTER_API_KEY: 'test-key' }));

    expect(openAIConstructorMock).toHaveBeenCalledWith({
      apiKey: 'test-key',
      baseURL: 'https://openrouter.ai/api/v1',
      defaultHeaders: { 'X-Title': 'mcp-server-mas-sequential-thinking' },
    });
  });

  it('uses a placeholder key for ollama', () => {
    const provider = createLLMProvider(loadConfig({ LLM_PROVIDER: 'ollama' }));

    expect(provider.name).toBe('ollama');
    expect(openAIConstructorMock).toHaveBeenCalledWith({
      apiKey: 'ollama',
      baseURL: 'http://localhost:11434/v1',
      defaultHeaders: undefined,
    });
  });
});
