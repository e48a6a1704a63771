/**
 * Specialist agent: answers one delegated sub-task with its own tool loop.
 */

import type { LLMProvider, TokenUsage } from '../llm-provider.js';
import { createLogger, type Logger } from '../logger.js';
import { runToolLoop } from './loop.js';
import type { ToolFactory } from './tools.js';

const MAX_AGENT_ITERATIONS = 6;

export interface AgentOptions {
  name: string;
  role: string;
  description: string;
  instructions: string[];
  tools: ToolFactory[];
  provider: LLMProvider;
  model: string;
  maxTokens: number;
  addDatetimeToInstructions?: boolean;
  markdown?: boolean;
  debugMode?: boolean;
  /** Clock used for the datetime line (tests pin it). */
  now?: () => Date;
}

export interface AgentRunResult {
  content: string;
  iterations: number;
  usage: TokenUsage;
}

export class Agent {
  readonly name: string;
  readonly role: string;
  readonly description: string;
  readonly instructions: string[];
  readonly model: string;
  private readonly tools: ToolFactory[];
  private readonly provider: LLMProvider;
  private readonly maxTokens: number;
  private readonly addDatetime: boolean;
  private readonly markdown: boolean;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(options: AgentOptions) {
    this.name = options.name;
    this.role = options.role;
    this.description = options.description;
    this.instructions = options.instructions;
    this.model = options.model;
    this.tools = options.tools;
    this.provider = options.provider;
    this.maxTokens = options.maxTokens;
    this.addDatetime = options.addDatetimeToInstructions ?? true;
    this.markdown = options.markdown ?? true;
    this.now = options.now ?? (() => new Date());
    this.log = createLogger(`agent:${options.name.toLowerCase()}`, { debug: options.debugMode });
  }

  /** Names of the tools this agent gets on every run. */
  get toolNames(): string[] {
    return this.tools.map((factory) => factory().definition.name);
  }

  buildSystemPrompt(): string {
    const sections = [
      `You are ${this.name}, the team's ${this.role}.`,
      this.description,
      ['Instructions:', ...this.instructions.map((line) => `- ${line.trim()}`)].join('\n'),
    ];
    if (this.markdown) {
      sections.push('Use markdown to format your answers.');
    }
    if (this.addDatetime) {
      sections.push(`The current time is ${this.now().toISOString()}.`);
    }
    return sections.join('\n\n');
  }

  async run(task: string): Promise<AgentRunResult> {
    this.log.debug(`Task received:\n${task}`);

    const result = await runToolLoop({
      provider: this.provider,
      model: this.model,
      maxTokens: this.maxTokens,
      system: this.buildSystemPrompt(),
      input: task,
      tools: this.tools.map((factory) => factory()),
      maxIterations: MAX_AGENT_ITERATIONS,
      onToolCall: (call, output, failed) => {
        this.log.debug(`${call.name}(${JSON.stringify(call.input).slice(0, 200)}) → ${failed ? 'error' : 'ok'}`);
        if (failed) this.log.warn(`Tool ${call.name} failed: ${output}`);
      },
    });

    if (result.truncated) {
      this.log.warn(`Stopped after ${result.iterations} iterations without a final answer`);
    }
    this.log.debug(`Answer:\n${result.content}`);

    return {
      content: result.content || `${this.name} produced no answer.`,
      iterations: result.iterations,
      usage: result.usage,
    };
  }
}
