/**
 * Provider-agnostic LLM types and interface.
 *
 * The coordinator and the specialists only talk to this interface.
 * Every supported backend speaks the OpenAI-compatible Chat Completions
 * API, so one implementation (providers/openai.ts) covers them all.
 */

// ---------------------------------------------------------------------------
// Tool Definitions
// ---------------------------------------------------------------------------

export interface ToolParameter {
  type: string;
  description?: string;
  enum?: string[];
  items?: ToolParameter;
  properties?: Record<string, ToolParameter>;
  required?: string[];
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, ToolParameter>;
    required: string[];
  };
}

// ---------------------------------------------------------------------------
// Content Blocks
// ---------------------------------------------------------------------------

export interface TextContent {
  type: 'text';
  text: string;
}

export interface ToolCallContent {
  type: 'tool_call';
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultContent {
  type: 'tool_result';
  toolCallId: string;
  content: string;
}

export type AssistantBlock = TextContent | ToolCallContent;

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

export type ChatMessage =
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string | AssistantBlock[] }
  | { role: 'tool_results'; content: ToolResultContent[] };

// ---------------------------------------------------------------------------
// Response
// ---------------------------------------------------------------------------

export type StopReason = 'tool_use' | 'end_turn' | 'max_tokens' | 'unknown';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface LLMResponse {
  content: AssistantBlock[];
  stopReason: StopReason;
  usage?: TokenUsage;
}

export interface ChatParams {
  model: string;
  maxTokens: number;
  system: string;
  messages: ChatMessage[];
  tools: ToolDefinition[];
}

// ---------------------------------------------------------------------------
// Provider Interface
// ---------------------------------------------------------------------------

export interface LLMProvider {
  /** Send a chat completion request with tool definitions. */
  chat(params: ChatParams): Promise<LLMResponse>;

  /** Provider name for logging. */
  readonly name: string;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function textOf(blocks: AssistantBlock[]): string {
  return blocks
    .filter((block): block is TextContent => block.type === 'text')
    .map((block) => block.text)
    .join('')
    .trim();
}

export function toolCallsOf(blocks: AssistantBlock[]): ToolCallContent[] {
  return blocks.filter((block): block is ToolCallContent => block.type === 'tool_call');
}

export function addUsage(total: TokenUsage, usage: TokenUsage | undefined): TokenUsage {
  if (!usage) return total;
  return {
    inputTokens: total.inputTokens + usage.inputTokens,
    outputTokens: total.outputTokens + usage.outputTokens,
  };
}
