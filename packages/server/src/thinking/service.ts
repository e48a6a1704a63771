/**
 * Sequential thinking service: validates each thought, records it in the
 * history and passes it to the coordinator team.
 *
 * One service (and history) exists per MCP session. The team is shared
 * and built on first use, or up front when the caller invokes LazyTeam.get().
 */

import type { ThoughtData, ThoughtResult } from '@seqthink/shared';
import type { ActivityLog } from '../activity-log.js';
import { ThoughtValidationError, toError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { TeamRunHooks, TeamRunResult } from '../team/team.js';
import { ThoughtHistory } from './history.js';
import { formatThoughtForLog, parseThought, thoughtKind } from './thought.js';

const log = createLogger('thinking');

/** The part of Team the service depends on. */
export interface ThinkingTeam {
  readonly providerName: string;
  run(input: string, hooks?: TeamRunHooks): Promise<TeamRunResult>;
}

/** Builds the team once and hands out the same instance afterwards. */
export class LazyTeam {
  private team: ThinkingTeam | null = null;
  private readonly factory: () => ThinkingTeam;

  constructor(factory: () => ThinkingTeam) {
    this.factory = factory;
  }

  get ready(): boolean {
    return this.team !== null;
  }

  /** Build (if needed) and return the team. Throws whatever the factory throws. */
  get(): ThinkingTeam {
    if (!this.team) {
      this.team = this.factory();
    }
    return this.team;
  }
}

export type ThoughtOutcome =
  | { status: 'success'; result: ThoughtResult }
  | { status: 'error'; message: string };

export const FINAL_GUIDANCE =
  "\n\nThis is the final thought. Review the Coordinator's final synthesis.";

export const NEXT_STEP_GUIDANCE =
  '\n\nGuidance for next step:' +
  "\n- **Revision/Branching:** Look for 'RECOMMENDATION: Revise thought #X...' or " +
  "'SUGGESTION: Consider branching...' in the response. Use `isRevision: true` with " +
  "`revisesThought: X` for revisions, or `branchFromThought: Y` with `branchId: '...'` for branching." +
  "\n- **Next Thought:** Based on the Coordinator's response, formulate the next logical " +
  'thought, addressing any points raised.';

export interface ThinkingServiceOptions {
  team: LazyTeam;
  sessionId: string;
  activityLog?: ActivityLog | null;
}

export class SequentialThinkingService {
  readonly history = new ThoughtHistory();
  readonly sessionId: string;
  private readonly team: LazyTeam;
  private readonly activityLog: ActivityLog | null;

  constructor(options: ThinkingServiceOptions) {
    this.team = options.team;
    this.sessionId = options.sessionId;
    this.activityLog = options.activityLog ?? null;
  }

  async processThought(input: unknown): Promise<ThoughtOutcome> {
    let team: ThinkingTeam;
    try {
      const wasReady = this.team.ready;
      team = this.team.get();
      if (!wasReady) {
        log.info(`Team initialized directly in coordinate mode using provider: ${team.providerName}.`);
      }
    } catch (err) {
      const error = toError(err);
      log.error(`Failed to initialize team during tool call: ${error.message}`);
      this.activityLog?.logError(this.sessionId, { stage: 'team_init', error: error.message });
      return {
        status: 'error',
        message: `Critical Error: Application context not available and re-initialization failed: ${error.message}`,
      };
    }

    let thought: ThoughtData;
    try {
      thought = parseThought(input);
    } catch (err) {
      const error = toError(err);
      log.error(`Validation Error processing tool call: ${error.message}`);
      this.activityLog?.logError(this.sessionId, { stage: 'validation', error: error.message });
      if (err instanceof ThoughtValidationError) {
        return { status: 'error', message: `Input validation failed: ${error.message}` };
      }
      return { status: 'error', message: `An unexpected error occurred: ${error.message}` };
    }

    try {
      return { status: 'success', result: await this.runThought(team, thought) };
    } catch (err) {
      const error = toError(err);
      log.error('Error processing tool call:', error);
      this.activityLog?.logError(this.sessionId, {
        stage: 'team_run',
        thoughtNumber: thought.thoughtNumber,
        error: error.message,
      });
      return { status: 'error', message: `An unexpected error occurred: ${error.message}` };
    }
  }

  private async runThought(team: ThinkingTeam, thought: ThoughtData): Promise<ThoughtResult> {
    const nextThoughtNeeded =
      thought.thoughtNumber >= thought.totalThoughts && !thought.needsMoreThoughts
        ? false
        : thought.nextThoughtNeeded;

    const formatted = formatThoughtForLog(thought);
    log.info(`\n${receivedHeader(thought)}\n${formatted}\n`);
    this.activityLog?.logThoughtReceived(this.sessionId, {
      kind: thoughtKind(thought),
      thoughtNumber: thought.thoughtNumber,
      totalThoughts: thought.totalThoughts,
      summary: formatted,
    });

    this.history.add(thought);

    const prompt = this.buildCoordinatorPrompt(thought);
    log.info(`Passing thought #${thought.thoughtNumber} to the Coordinator...`);
    this.activityLog?.logTeamRequest(this.sessionId, {
      thoughtNumber: thought.thoughtNumber,
      promptLength: prompt.length,
    });

    const response = await team.run(prompt, {
      onDelegation: (delegation) => {
        this.activityLog?.logDelegation(this.sessionId, {
          thoughtNumber: thought.thoughtNumber,
          member: delegation.member,
          taskLength: delegation.task.length,
          failed: delegation.failed,
        });
      },
    });

    log.info(`Coordinator finished processing thought #${thought.thoughtNumber}.`);
    log.debug(`Coordinator Raw Response:\n${response.content}`);
    this.activityLog?.logTeamResponse(this.sessionId, {
      thoughtNumber: thought.thoughtNumber,
      iterations: response.iterations,
      delegations: response.delegations.map((d) => d.member),
      usage: response.usage,
      responseLength: response.content.length,
    });

    const isBranch = thought.branchFromThought !== undefined;
    return {
      processedThoughtNumber: thought.thoughtNumber,
      estimatedTotalThoughts: thought.totalThoughts,
      nextThoughtNeeded,
      coordinatorResponse: response.content + (nextThoughtNeeded ? NEXT_STEP_GUIDANCE : FINAL_GUIDANCE),
      branches: this.history.branchIds,
      thoughtHistoryLength: this.history.length,
      branchDetails: {
        currentBranchId: isBranch ? thought.branchId ?? null : 'main',
        branchOriginThought: thought.branchFromThought ?? null,
        allBranches: this.history.getAllBranches(),
      },
      isRevision: thought.isRevision,
      revisesThought: thought.isRevision ? thought.revisesThought ?? null : null,
      isBranch,
      status: 'success',
    };
  }

  /** Prompt handed to the coordinator for one thought. */
  buildCoordinatorPrompt(thought: ThoughtData): string {
    let prompt = `Process Thought #${thought.thoughtNumber}:\n`;

    if (thought.isRevision && thought.revisesThought !== undefined) {
      const original = this.history.findBefore(thought.revisesThought)?.thought ?? 'Unknown Original Thought';
      prompt += `**This is a REVISION of Thought #${thought.revisesThought}** (Original: "${original}").\n`;
    } else if (thought.branchFromThought !== undefined && thought.branchId !== undefined) {
      const origin = this.history.findBefore(thought.branchFromThought)?.thought ?? 'Unknown Branch Point';
      prompt += `**This is a BRANCH (ID: ${thought.branchId}) from Thought #${thought.branchFromThought}** (Origin: "${origin}").\n`;
    }

    prompt += `\nThought Content: "${thought.thought}"`;
    return prompt;
  }
}

function receivedHeader(thought: ThoughtData): string {
  if (thought.isRevision) {
    return `--- Received REVISION Thought (revising #${thought.revisesThought ?? '?'}) ---`;
  }
  if (thought.branchFromThought !== undefined) {
    return `--- Received BRANCH Thought (from #${thought.branchFromThought}, ID: ${thought.branchId ?? '?'}) ---`;
  }
  return '--- Received Thought ---';
}
