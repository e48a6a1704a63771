import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { PROMPT_NAME, TOOL_NAME, buildProblemStatement, createMcpServer } from '../src/mcp/server.js';
import type { TeamRunResult } from '../src/team/team.js';
import { LazyTeam, NEXT_STEP_GUIDANCE, SequentialThinkingService } from '../src/thinking/service.js';

let server: McpServer;
let client: Client;
let service: SequentialThinkingService;

beforeEach(async () => {
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
  const team = {
    providerName: 'fake',
    run: async (): Promise<TeamRunResult> => ({
      content: 'Coordinator synthesis',
      delegations: [],
      iterations: 1,
      usage: { inputTokens: 1, outputTokens: 1 },
    }),
  };
  service = new SequentialThinkingService({ team: new LazyTeam(() => team), sessionId: 'mcp-test' });
  server = createMcpServer(service);
  client = new Client({ name: 'test-client', version: '1.0.0' });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  await client.connect(clientTransport);
});

afterEach(async () => {
  await client.close();
  await server.close();
});

describe('sequentialthinking tool', () => {
  it('is listed with the thought fields', async () => {
    const { tools } = await client.listTools();

    expect(tools.map((t) => t.name)).toEqual([TOOL_NAME]);
    expect(tools[0]?.inputSchema.required).toEqual([
      'thought',
      'thoughtNumber',
      'totalThoughts',
      'nextThoughtNeeded',
    ]);
    expect(Object.keys(tools[0]?.inputSchema.properties ?? {})).toEqual([
      'thought',
      'thoughtNumber',
      'totalThoughts',
      'nextThoughtNeeded',
      'isRevision',
      'revisesThought',
      'branchFromThought',
      'branchId',
      'needsMoreThoughts',
    ]);
  });

  it('returns the coordinator response with guidance', async () => {
    const result = await client.callTool({
      name: TOOL_NAME,
      arguments: { thought: 'Frame the problem', thoughtNumber: 1, totalThoughts: 5, nextThoughtNeeded: true },
    });

    expect(result.isError).toBeFalsy();
    expect(result.content).toEqual([{ type: 'text', text: 'Coordinator synthesis' + NEXT_STEP_GUIDANCE }]);
    expect(service.history.length).toBe(1);
  });

  it('returns validation failures as tool errors', async () => {
    const result = await client.callTool({
      name: TOOL_NAME,
      arguments: {
        thought: 'Revise',
        thoughtNumber: 2,
        totalThoughts: 5,
        nextThoughtNeeded: true,
        isRevision: true,
        revisesThought: 3,
      },
    });

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([
      {
        type: 'text',
        text: 'Input validation failed: revisesThought: revisesThought must be less than thoughtNumber',
      },
    ]);
    expect(service.history.length).toBe(0);
  });
});

describe('sequential-thinking prompt', () => {
  it('returns the problem and the guidelines as two messages', async () => {
    const prompt = await client.getPrompt({
      name: PROMPT_NAME,
      arguments: { problem: 'Pick a message broker', context: 'Three services, one team' },
    });

    expect(prompt.messages).toHaveLength(2);
    expect(prompt.messages[0]).toEqual({
      role: 'user',
      content: {
        type: 'text',
        text:
          'Start a comprehensive sequential thinking process for the following problem:\n\n' +
          'Problem: Pick a message broker\nContext: Three services, one team',
      },
    });
    expect(prompt.messages[1]?.role).toBe('assistant');
    const guidelines = prompt.messages[1]?.content;
    expect(guidelines?.type === 'text' && guidelines.text).toContain(
      '"Plan a comprehensive analysis approach for: Pick a message broker"',
    );
  });

  it('omits the context line when no context is given', () => {
    expect(buildProblemStatement('Pick a broker')).toBe(
      'Start a comprehensive sequential thinking process for the following problem:\n\nProblem: Pick a broker',
    );
  });
});
