import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ActivityLog } from '../src/activity-log.js';
import { ConfigError } from '../src/errors.js';
import type { TeamRunHooks, TeamRunResult } from '../src/team/team.js';
import {
  FINAL_GUIDANCE,
  LazyTeam,
  NEXT_STEP_GUIDANCE,
  SequentialThinkingService,
  type ThinkingTeam,
} from '../src/thinking/service.js';

class FakeTeam implements ThinkingTeam {
  readonly providerName = 'fake';
  readonly prompts: string[] = [];
  reply = 'Coordinator synthesis';
  failWith: Error | null = null;

  async run(input: string, hooks: TeamRunHooks = {}): Promise<TeamRunResult> {
    this.prompts.push(input);
    if (this.failWith) throw this.failWith;
    const delegation = { member: 'Critic', task: 'Review', response: 'Looks fine', failed: false };
    hooks.onDelegation?.(delegation);
    return {
      content: this.reply,
      delegations: [delegation],
      iterations: 2,
      usage: { inputTokens: 10, outputTokens: 5 },
    };
  }
}

function thought(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    thought: 'Plan the approach',
    thoughtNumber: 1,
    totalThoughts: 5,
    nextThoughtNeeded: true,
    ...overrides,
  };
}

let fakeTeam: FakeTeam;
let service: SequentialThinkingService;

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
  fakeTeam = new FakeTeam();
  service = new SequentialThinkingService({ team: new LazyTeam(() => fakeTeam), sessionId: 'session-1' });
});

describe('SequentialThinkingService.processThought', () => {
  it('processes a first thought and raises a low estimate to the minimum', async () => {
    const outcome = await service.processThought(thought({ totalThoughts: 3 }));

    expect(outcome).toEqual({
      status: 'success',
      result: {
        processedThoughtNumber: 1,
        estimatedTotalThoughts: 5,
        nextThoughtNeeded: true,
        coordinatorResponse: 'Coordinator synthesis' + NEXT_STEP_GUIDANCE,
        branches: [],
        thoughtHistoryLength: 1,
        branchDetails: { currentBranchId: 'main', branchOriginThought: null, allBranches: {} },
        isRevision: false,
        revisesThought: null,
        isBranch: false,
        status: 'success',
      },
    });
    expect(fakeTeam.prompts).toEqual(['Process Thought #1:\n\nThought Content: "Plan the approach"']);
  });

  it('marks the last thought of the estimate as final', async () => {
    const outcome = await service.processThought(thought({ thoughtNumber: 5, totalThoughts: 5 }));

    expect(outcome.status).toBe('success');
    if (outcome.status !== 'success') return;
    expect(outcome.result.nextThoughtNeeded).toBe(false);
    expect(outcome.result.coordinatorResponse).toBe('Coordinator synthesis' + FINAL_GUIDANCE);
  });

  it('keeps going past the estimate when more thoughts are needed', async () => {
    const outcome = await service.processThought(
      thought({ thoughtNumber: 5, totalThoughts: 5, needsMoreThoughts: true }),
    );

    expect(outcome.status === 'success' && outcome.result.nextThoughtNeeded).toBe(true);
  });

  it('honours nextThoughtNeeded=false before the estimate is reached', async () => {
    const outcome = await service.processThought(thought({ thoughtNumber: 2, nextThoughtNeeded: false }));

    expect(outcome.status === 'success' && outcome.result.coordinatorResponse).toBe(
      'Coordinator synthesis' + FINAL_GUIDANCE,
    );
  });

  it('quotes the original thought in a revision prompt', async () => {
    await service.processThought(thought({ thought: 'Use a queue' }));
    const outcome = await service.processThought(
      thought({ thought: 'Use a log instead', thoughtNumber: 2, isRevision: true, revisesThought: 1 }),
    );

    expect(fakeTeam.prompts[1]).toBe(
      'Process Thought #2:\n' +
      '**This is a REVISION of Thought #1** (Original: "Use a queue").\n' +
      '\nThought Content: "Use a log instead"',
    );
    expect(outcome.status === 'success' && outcome.result).toMatchObject({
      isRevision: true,
      revisesThought: 1,
      isBranch: false,
      thoughtHistoryLength: 2,
    });
  });

  it('uses a placeholder when the revised thought is not in the history', async () => {
    await service.processThought(thought({ thoughtNumber: 3, isRevision: true, revisesThought: 2 }));

    expect(fakeTeam.prompts[0]).toBe(
      'Process Thought #3:\n' +
      '**This is a REVISION of Thought #2** (Original: "Unknown Original Thought").\n' +
      '\nThought Content: "Plan the approach"',
    );
  });

  it('tracks branches and reports them in the result', async () => {
    await service.processThought(thought({ thought: 'Main line' }));
    const outcome = await service.processThought(
      thought({ thought: 'Try caching', thoughtNumber: 2, branchFromThought: 1, branchId: 'cache' }),
    );

    expect(fakeTeam.prompts[1]).toBe(
      'Process Thought #2:\n' +
      '**This is a BRANCH (ID: cache) from Thought #1** (Origin: "Main line").\n' +
      '\nThought Content: "Try caching"',
    );
    expect(outcome.status === 'success' && outcome.result).toMatchObject({
      branches: ['cache'],
      isBranch: true,
      branchDetails: { currentBranchId: 'cache', branchOriginThought: 1, allBranches: { cache: 1 } },
    });
  });

  it('reports a branch without an id as a null branch', async () => {
    const outcome = await service.processThought(thought({ thoughtNumber: 3, branchFromThought: 1 }));

    expect(outcome.status === 'success' && outcome.result.branchDetails).toEqual({
      currentBranchId: null,
      branchOriginThought: 1,
      allBranches: {},
    });
    expect(fakeTeam.prompts[0]).toBe('Process Thought #3:\n\nThought Content: "Plan the approach"');
  });

  it('rejects invalid thoughts without calling the team', async () => {
    const outcome = await service.processThought(thought({ thoughtNumber: 0 }));

    expect(outcome).toEqual({
      status: 'error',
      message: 'Input validation failed: thoughtNumber: Number must be greater than or equal to 1',
    });
    expect(fakeTeam.prompts).toEqual([]);
    expect(service.history.length).toBe(0);
  });

  it('rejects a revision target without isRevision', async () => {
    const outcome = await service.processThought(thought({ thoughtNumber: 2, revisesThought: 1 }));

    expect(outcome).toEqual({
      status: 'error',
      message: 'Input validation failed: revisesThought: revisesThought can only be set when isRevision is true',
    });
  });

  it('reports team failures after recording the thought', async () => {
    fakeTeam.failWith = new Error('LLM unavailable');

    const outcome = await service.processThought(thought());

    expect(outcome).toEqual({ status: 'error', message: 'An unexpected error occurred: LLM unavailable' });
    expect(service.history.length).toBe(1);
  });

  it('reports a team that cannot be built', async () => {
    const broken = new SequentialThinkingService({
      team: new LazyTeam(() => {
        throw new ConfigError('Missing API key for provider groq: set GROQ_API_KEY');
      }),
      sessionId: 'session-2',
    });

    const outcome = await broken.processThought(thought());

    expect(outcome).toEqual({
      status: 'error',
      message:
        'Critical Error: Application context not available and re-initialization failed: ' +
        'Missing API key for provider groq: set GROQ_API_KEY',
    });
  });

  it('builds the team once across calls', async () => {
    const factory = vi.fn(() => fakeTeam);
    const lazy = new LazyTeam(factory);
    const a = new SequentialThinkingService({ team: lazy, sessionId: 'a' });
    const b = new SequentialThinkingService({ team: lazy, sessionId: 'b' });

    await a.processThought(thought());
    await b.processThought(thought());

    expect(factory).toHaveBeenCalledTimes(1);
    expect(a.history.length).toBe(1);
    expect(b.history.length).toBe(1);
  });
});

describe('activity logging', () => {
  let logDir: string;
  let activityLog: ActivityLog;

  beforeEach(() => {
    logDir = fs.mkdtempSync(path.join(os.tmpdir(), 'thinking-activity-'));
    activityLog = new ActivityLog(logDir);
    activityLog.init();
  });

  afterEach(async () => {
    await activityLog.close();
    fs.rmSync(logDir, { recursive: true, force: true });
  });

  it('records each stage of a processed thought', async () => {
    const entries: Record<string, unknown>[] = [];
    activityLog.setOnLog((entry) => entries.push(entry));
    const logged = new SequentialThinkingService({
      team: new LazyTeam(() => fakeTeam),
      sessionId: 'session-3',
      activityLog,
    });

    await logged.processThought(thought());

    expect(entries.map((e) => e['type'])).toEqual([
      'thought_received',
      'team_request',
      'delegation',
      'team_response',
    ]);
    expect(entries.every((e) => e['sessionId'] === 'session-3')).toBe(true);
    expect(entries[2]?.['data']).toEqual({ thoughtNumber: 1, member: 'Critic', taskLength: 6, failed: false });
  });

  it('records validation failures as errors', async () => {
    const entries: Record<string, unknown>[] = [];
    activityLog.setOnLog((entry) => entries.push(entry));
    const logged = new SequentialThinkingService({
      team: new LazyTeam(() => fakeTeam),
      sessionId: 'session-4',
      activityLog,
    });

    await logged.processThought(thought({ thought: '' }));

    expect(entries).toHaveLength(1);
    expect(entries[0]?.['type']).toBe('error');
    expect(entries[0]?.['data']).toEqual({ stage: 'validation', error: 'thought: thought must not be empty' });
  });
});
