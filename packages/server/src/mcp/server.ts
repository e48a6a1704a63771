/**
 * MCP surface: the `sequentialthinking` tool and the `sequential-thinking`
 * starter prompt, bound to one SequentialThinkingService.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { ActivityLog } from '../activity-log.js';
import { MIN_TOTAL_THOUGHTS } from '../thinking/thought.js';
import type { SequentialThinkingService } from '../thinking/service.js';

export const SERVER_NAME = 'sequential-thinking';
export const SERVER_VERSION = '0.3.0';
export const TOOL_NAME = 'sequentialthinking';
export const PROMPT_NAME = 'sequential-thinking';

const TOOL_DESCRIPTION = `A tool for dynamic, reflective problem-solving through a sequence of thoughts.

Each thought is processed by a multi-agent team in coordinate mode: a Coordinator delegates sub-tasks to specialists (Planner, Researcher, Analyzer, Critic, Synthesizer) and synthesizes their answers.

When to use it:
- Breaking a complex problem into manageable steps.
- Planning and design that needs iterative refinement and revision.
- Analysis where the approach may need course correction along the way.
- Problems whose full scope or best path is unclear at the start.
- Multi-step work where context has to be kept across steps.

How to use it:
- The caller drives the process, calling the tool once per step.
- Start with an estimate for totalThoughts (at least ${MIN_TOTAL_THOUGHTS}) and adjust it on later calls.
- Use isRevision=true with revisesThought to correct an earlier step.
- Use branchFromThought with branchId to explore an alternative path.
- If the estimate is reached but more steps are needed, set needsMoreThoughts=true on the last thought of the current estimate.
- Set nextThoughtNeeded=false only when the process is complete.

Returns the Coordinator's synthesized response followed by guidance for the next step.`;

const thoughtInputShape = {
  thought: z.string().describe('Content of the current thinking step'),
  thoughtNumber: z.number().describe('Sequence number of this thought (>= 1); may exceed totalThoughts'),
  totalThoughts: z.number().describe(`Current estimate of the thoughts needed (minimum ${MIN_TOTAL_THOUGHTS})`),
  nextThoughtNeeded: z.boolean().describe('Whether another thought step is needed after this one'),
  isRevision: z.boolean().optional().describe('Whether this thought revises an earlier one'),
  revisesThought: z.number().nullish().describe('Thought number being revised (requires isRevision)'),
  branchFromThought: z.number().nullish().describe('Thought number this branch starts from'),
  branchId: z.string().nullish().describe('Identifier of the branch (requires branchFromThought)'),
  needsMoreThoughts: z.boolean().optional().describe('Signals that the estimate must be extended'),
};

export interface McpServerOptions {
  activityLog?: ActivityLog | null;
}

export function createMcpServer(
  service: SequentialThinkingService,
  options: McpServerOptions = {},
): McpServer {
  const activityLog = options.activityLog ?? null;
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  server.registerTool(
    TOOL_NAME,
    {
      title: 'Sequential thinking',
      description: TOOL_DESCRIPTION,
      inputSchema: thoughtInputShape,
    },
    async (args) => {
      const startedAt = Date.now();
      const outcome = await service.processThought(args);
      activityLog?.logToolCall(service.sessionId, {
        tool: TOOL_NAME,
        thoughtNumber: args.thoughtNumber,
        status: outcome.status,
        durationMs: Date.now() - startedAt,
      });

      if (outcome.status === 'error') {
        return {
          content: [{ type: 'text', text: outcome.message }],
          isError: true,
        };
      }
      return {
        content: [{ type: 'text', text: outcome.result.coordinatorResponse }],
      };
    },
  );

  server.registerPrompt(
    PROMPT_NAME,
    {
      title: 'Sequential thinking starter',
      description: 'Starter prompt for non-linear sequential thinking with the coordinate-mode team.',
      argsSchema: {
        problem: z.string().describe('The problem to think through'),
        context: z.string().optional().describe('Extra context for the problem'),
      },
    },
    ({ problem, context }) => ({
      description: 'Starter prompt for non-linear sequential thinking (coordinate mode).',
      messages: [
        { role: 'user', content: { type: 'text', text: buildProblemStatement(problem, context) } },
        { role: 'assistant', content: { type: 'text', text: buildGuidelines(problem) } },
      ],
    }),
  );

  return server;
}

export function buildProblemStatement(problem: string, context?: string): string {
  const lines = [
    'Start a comprehensive sequential thinking process for the following problem:',
    '',
    `Problem: ${problem}`,
  ];
  if (context) {
    lines.push(`Context: ${context}`);
  }
  return lines.join('\n');
}

export function buildGuidelines(problem: string): string {
  return `Let's start the sequential thinking process. These are the guidelines for the coordinate-mode team:

**Goals and guidelines**

1. **Estimate steps:** Judge the problem's complexity. The initial \`totalThoughts\` estimate must be at least ${MIN_TOTAL_THOUGHTS}.
2. **First thought:** Call the '${TOOL_NAME}' tool with \`thoughtNumber: 1\`, your \`totalThoughts\` estimate (at least ${MIN_TOTAL_THOUGHTS}) and \`nextThoughtNeeded: true\`. Phrase the first thought as: "Plan a comprehensive analysis approach for: ${problem}"
3. **Revision:** Revise earlier thoughts when later analysis shows flaws or oversights. Use \`isRevision: true\` with \`revisesThought: <thought_number>\`, and watch for 'RECOMMENDATION: Revise thought #X...' in the Coordinator's response.
4. **Branching:** Explore alternative paths where they help. Use \`branchFromThought: <thought_number>\` with \`branchId: <unique_branch_name>\`, and consider the Coordinator's 'SUGGESTION: Consider branching...' hints.
5. **Extension:** If more steps are needed than estimated, set \`needsMoreThoughts: true\` on the thought before the extension.
6. **Thought content:** Each thought must be specific to its stage (planning, analysis, critique, synthesis, revision, branching), explain its reasoning, and end with what the next thought needs to address.

**Process**

- The tool tracks progress. The Coordinator receives each thought, delegates sub-tasks to the specialists and synthesizes their answers, including any revision or branching recommendations.
- Favour insightful analysis, constructive critique and creative exploration over a single linear pass.

Proceed with the first thought.`;
}
