/**
 * Team: the coordinator of the specialist agents ("coordinate" mode).
 *
 * The coordinator receives a thought, delegates sub-tasks to the minimum
 * set of specialists through the `delegate_task_to_member` tool, and
 * synthesizes their answers into one response.
 */

import type { LLMProvider, TokenUsage } from '../llm-provider.js';
import { addUsage } from '../llm-provider.js';
import { createLogger, type Logger } from '../logger.js';
import type { Agent } from './agent.js';
import { runToolLoop, type LoopTool } from './loop.js';

const MAX_COORDINATOR_ITERATIONS = 8;

export const DELEGATE_TOOL_NAME = 'delegate_task_to_member';

export interface Delegation {
  member: string;
  task: string;
  response: string;
  failed: boolean;
}

export interface TeamRunResult {
  content: string;
  delegations: Delegation[];
  iterations: number;
  usage: TokenUsage;
}

export interface TeamOptions {
  name: string;
  mode: 'coordinate';
  members: Agent[];
  provider: LLMProvider;
  model: string;
  maxTokens: number;
  description: string;
  instructions: string[];
  successCriteria?: string[];
  markdown?: boolean;
  addDatetimeToInstructions?: boolean;
  debugMode?: boolean;
  now?: () => Date;
}

export interface TeamRunHooks {
  onDelegation?: (delegation: Delegation) => void;
}

export class Team {
  readonly name: string;
  readonly mode: 'coordinate';
  readonly members: Agent[];
  readonly model: string;
  private readonly provider: LLMProvider;
  private readonly maxTokens: number;
  private readonly description: string;
  private readonly instructions: string[];
  private readonly successCriteria: string[];
  private readonly markdown: boolean;
  private readonly addDatetime: boolean;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(options: TeamOptions) {
    if (options.members.length === 0) {
      throw new Error(`Team ${options.name} needs at least one member`);
    }
    this.name = options.name;
    this.mode = options.mode;
    this.members = options.members;
    this.model = options.model;
    this.provider = options.provider;
    this.maxTokens = options.maxTokens;
    this.description = options.description;
    this.instructions = options.instructions;
    this.successCriteria = options.successCriteria ?? [];
    this.markdown = options.markdown ?? true;
    this.addDatetime = options.addDatetimeToInstructions ?? true;
    this.now = options.now ?? (() => new Date());
    this.log = createLogger('team', { debug: options.debugMode });
  }

  get providerName(): string {
    return this.provider.name;
  }

  buildSystemPrompt(): string {
    const roster = this.members
      .map((m) => `- ${m.name} (${m.role}): ${m.description}`)
      .join('\n');

    const sections = [
      this.description,
      ['Instructions:', ...this.instructions.map((line) => `- ${line.trim()}`)].join('\n'),
      `Team members (delegate with the ${DELEGATE_TOOL_NAME} tool):\n${roster}`,
    ];
    if (this.successCriteria.length > 0) {
      sections.push(
        ['Success criteria:', ...this.successCriteria.map((c) => `- ${c}`)].join('\n'),
      );
    }
    if (this.markdown) {
      sections.push('Use markdown to format your answers.');
    }
    if (this.addDatetime) {
      sections.push(`The current time is ${this.now().toISOString()}.`);
    }
    return sections.join('\n\n');
  }

  /** Run one coordinator turn for `input`. */
  async run(input: string, hooks: TeamRunHooks = {}): Promise<TeamRunResult> {
    const delegations: Delegation[] = [];
    let memberUsage: TokenUsage = { inputTokens: 0, outputTokens: 0 };

    const delegate: LoopTool = {
      definition: {
        name: DELEGATE_TOOL_NAME,
        description:
          'Delegate a sub-task to one team member and receive their answer. ' +
          'Give the member everything they need: they do not see the conversation.',
        parameters: {
          type: 'object',
          properties: {
            member: {
              type: 'string',
              enum: this.members.map((m) => m.name),
              description: 'Name of the member to delegate to',
            },
            task: { type: 'string', description: 'Clear description of the sub-task' },
            expected_output: { type: 'string', description: 'What the answer should contain' },
          },
          required: ['member', 'task'],
        },
      },
      execute: async (toolInput) => {
        const memberName = toolInput['member'];
        const task = toolInput['task'];
        if (typeof memberName !== 'string' || typeof task !== 'string' || !task.trim()) {
          throw new Error('"member" and "task" must be strings');
        }
        const member = this.findMember(memberName);
        if (!member) {
          throw new Error(
            `No team member named "${memberName}". Members: ${this.members.map((m) => m.name).join(', ')}`,
          );
        }

        const expected = toolInput['expected_output'];
        const prompt = typeof expected === 'string' && expected.trim()
          ? `${task.trim()}\n\nExpected output: ${expected.trim()}`
          : task.trim();

        this.log.info(`Delegating to ${member.name}`);
        const result = await member.run(prompt);
        memberUsage = addUsage(memberUsage, result.usage);
        return result.content;
      },
    };

    const loopResult = await runToolLoop({
      provider: this.provider,
      model: this.model,
      maxTokens: this.maxTokens,
      system: this.buildSystemPrompt(),
      input,
      tools: [delegate],
      maxIterations: MAX_COORDINATOR_ITERATIONS,
      onToolCall: (call, response, failed) => {
        const member = call.input['member'];
        const task = call.input['task'];
        const delegation: Delegation = {
          member: typeof member === 'string' ? member : String(member),
          task: typeof task === 'string' ? task : '',
          response,
          failed,
        };
        delegations.push(delegation);
        hooks.onDelegation?.(delegation);
        if (failed) this.log.warn(`Delegation to ${delegation.member} failed: ${response}`);
      },
    });

    if (loopResult.truncated) {
      this.log.warn(`Coordinator stopped after ${loopResult.iterations} iterations`);
    }

    return {
      content: loopResult.content,
      delegations,
      iterations: loopResult.iterations,
      usage: addUsage(loopResult.usage, memberUsage),
    };
  }

  private findMember(name: string): Agent | undefined {
    const wanted = name.trim().toLowerCase();
    return this.members.find((m) => m.name.toLowerCase() === wanted);
  }
}
