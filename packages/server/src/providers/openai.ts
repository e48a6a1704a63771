/**
 * OpenAI-compatible LLM provider.
 *
 * Works with every backend the team supports:
 * - DeepSeek (api.deepseek.com)
 * - Groq (api.groq.com/openai/v1)
 * - OpenRouter (openrouter.ai/api/v1)
 * - Ollama (local OpenAI-compatible endpoint)
 *
 * Translates between provider-agnostic types and the Chat Completions format.
 */

import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
import type {
  AssistantBlock,
  ChatMessage,
  ChatParams,
  LLMProvider,
  LLMResponse,
  StopReason,
  ToolDefinition,
} from '../llm-provider.js';

// ---------------------------------------------------------------------------
// Translation: Provider-Agnostic → OpenAI
// ---------------------------------------------------------------------------

function toOpenAITool(tool: ToolDefinition): ChatCompletionTool {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: { ...tool.parameters },
    },
  };
}

/**
 * Convert a single ChatMessage into one or more OpenAI messages.
 *
 * A `tool_results` message expands into one `tool` role message per result.
 */
export function toOpenAIMessages(msg: ChatMessage): ChatCompletionMessageParam[] {
  switch (msg.role) {
    case 'user':
      return [{ role: 'user', content: msg.content }];

    case 'tool_results':
      return msg.content.map((block) => ({
        role: 'tool' as const,
        tool_call_id: block.toolCallId,
        content: block.content,
      }));

    case 'assistant': {
      if (typeof msg.content === 'string') {
        return [{ role: 'assistant', content: msg.content }];
      }

      const textParts: string[] = [];
      const toolCalls: ChatCompletionMessageToolCall[] = [];
      for (const block of msg.content) {
        if (block.type === 'text') {
          textParts.push(block.text);
        } else {
          toolCalls.push({
            id: block.id,
            type: 'function',
            function: { name: block.name, arguments: JSON.stringify(block.input) },
          });
        }
      }

      const content = textParts.join('') || null;
      return toolCalls.length > 0
        ? [{ role: 'assistant', content, tool_calls: toolCalls }]
        : [{ role: 'assistant', content }];
    }
  }
}

// ---------------------------------------------------------------------------
// Translation: OpenAI → Provider-Agnostic
// ---------------------------------------------------------------------------

const STOP_REASONS: Record<string, StopReason> = {
  tool_calls: 'tool_use',
  stop: 'end_turn',
  length: 'max_tokens',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseArguments(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (isRecord(parsed)) {
      return parsed;
    }
  } catch {
    // fall through: hand the raw text to the tool handler
  }
  return { _raw: raw };
}

export function fromOpenAIResponse(response: ChatCompletion): LLMResponse {
  const choice = response.choices[0];
  if (!choice) {
    return { content: [], stopReason: 'unknown' };
  }

  const message = choice.message;
  const content: AssistantBlock[] = [];

  if (message.content) {
    content.push({ type: 'text', text: message.content });
  }

  for (const tc of message.tool_calls ?? []) {
    content.push({
      type: 'tool_call',
      id: tc.id,
      name: tc.function.name,
      input: parseArguments(tc.function.arguments),
    });
  }

  // Some backends report "stop" even when they emitted tool calls
  const hasToolCalls = content.some((block) => block.type === 'tool_call');
  const stopReason = hasToolCalls
    ? 'tool_use'
    : STOP_REASONS[choice.finish_reason ?? ''] ?? 'unknown';

  return {
    content,
    stopReason,
    usage: response.usage
      ? {
          inputTokens: response.usage.prompt_tokens,
          outputTokens: response.usage.completion_tokens,
        }
      : undefined,
  };
}

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

export interface OpenAIProviderOptions {
  apiKey: string;
  baseURL?: string;
  /** Extra headers sent with every request (OpenRouter attribution). */
  defaultHeaders?: Record<string, string>;
}

export class OpenAIProvider implements LLMProvider {
  private client: OpenAI;
  readonly name: string;

  constructor(options: OpenAIProviderOptions, providerName: string) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      defaultHeaders: options.defaultHeaders,
    });
    this.name = providerName;
  }

  async chat(params: ChatParams): Promise<LLMResponse> {
    const messages: ChatCompletionMessageParam[] = [
      { role: 'system', content: params.system },
      ...params.messages.flatMap(toOpenAIMessages),
    ];

    const request: ChatCompletionCreateParamsNonStreaming = {
      model: params.model,
      max_tokens: params.maxTokens,
      messages,
    };

    // Only include tools if there are any (some models choke on empty arrays)
    if (params.tools.length > 0) {
      request.tools = params.tools.map(toOpenAITool);
    }

    const response = await this.client.chat.completions.create(request);
    return fromOpenAIResponse(response);
  }
}
