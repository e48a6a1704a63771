/**
 * Tool-use loop shared by the coordinator and the specialists.
 *
 * Flow:
 * 1. Send the conversation + tool definitions to the LLM
 * 2. If the LLM responds with tool_call blocks, run each handler and send
 *    the results back
 * 3. Repeat until the LLM answers with text only, or the iteration cap hits
 *
 * Handler failures are reported to the LLM as tool result text; provider
 * failures propagate to the caller.
 */

import {
  addUsage,
  textOf,
  toolCallsOf,
  type ChatMessage,
  type LLMProvider,
  type TokenUsage,
  type ToolCallContent,
  type ToolDefinition,
  type ToolResultContent,
} from '../llm-provider.js';
import { toError } from '../errors.js';

export interface LoopTool {
  definition: ToolDefinition;
  execute(input: Record<string, unknown>): Promise<string>;
}

export interface ToolLoopParams {
  provider: LLMProvider;
  model: string;
  maxTokens: number;
  system: string;
  input: string;
  tools: LoopTool[];
  maxIterations: number;
  /** Called after every tool call with its outcome. */
  onToolCall?: (call: ToolCallContent, result: string, failed: boolean) => void;
}

export interface ToolLoopResult {
  content: string;
  iterations: number;
  usage: TokenUsage;
  /** True when the cap was reached before a text-only answer. */
  truncated: boolean;
}

export async function runToolLoop(params: ToolLoopParams): Promise<ToolLoopResult> {
  const toolsByName = new Map(params.tools.map((tool) => [tool.definition.name, tool]));
  const definitions = params.tools.map((tool) => tool.definition);
  const messages: ChatMessage[] = [{ role: 'user', content: params.input }];

  let usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };
  let lastText = '';
  let iterations = 0;

  while (iterations < params.maxIterations) {
    iterations++;

    const response = await params.provider.chat({
      model: params.model,
      maxTokens: params.maxTokens,
      system: params.system,
      messages,
      tools: definitions,
    });
    usage = addUsage(usage, response.usage);

    const text = textOf(response.content);
    if (text) lastText = text;

    const toolCalls = toolCallsOf(response.content);
    if (response.stopReason !== 'tool_use' || toolCalls.length === 0) {
      return { content: text, iterations, usage, truncated: false };
    }

    messages.push({ role: 'assistant', content: response.content });

    const results: ToolResultContent[] = [];
    for (const call of toolCalls) {
      const { content, failed } = await executeToolCall(toolsByName.get(call.name), call);
      params.onToolCall?.(call, content, failed);
      results.push({ type: 'tool_result', toolCallId: call.id, content });
    }
    messages.push({ role: 'tool_results', content: results });
  }

  return { content: lastText, iterations, usage, truncated: true };
}

async function executeToolCall(
  tool: LoopTool | undefined,
  call: ToolCallContent,
): Promise<{ content: string; failed: boolean }> {
  if (!tool) {
    return { content: `Error: unknown tool "${call.name}"`, failed: true };
  }
  try {
    return { content: await tool.execute(call.input), failed: false };
  } catch (err) {
    return { content: `Error: ${toError(err).message}`, failed: true };
  }
}
