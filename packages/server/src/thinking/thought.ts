/**
 * Thought validation and log formatting.
 *
 * `totalThoughts` below MIN_TOTAL_THOUGHTS is raised rather than rejected,
 * so callers may under-estimate. `thoughtNumber` may exceed
 * `totalThoughts`: the estimate is allowed to grow.
 */

import { z } from 'zod';
import type { ThoughtData } from '@seqthink/shared';
import { ThoughtValidationError } from '../errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('thought');

export const MIN_TOTAL_THOUGHTS = 5;

const positiveInt = z.number().int().min(1);

export const thoughtSchema = z
  .object({
    thought: z.string().min(1, 'thought must not be empty'),
    thoughtNumber: positiveInt,
    totalThoughts: positiveInt,
    nextThoughtNeeded: z.boolean(),
    isRevision: z.boolean().default(false),
    revisesThought: positiveInt.nullish(),
    branchFromThought: positiveInt.nullish(),
    branchId: z.string().nullish(),
    needsMoreThoughts: z.boolean().default(false),
  })
  .strict()
  .superRefine((data, ctx) => {
    if (data.revisesThought != null) {
      if (!data.isRevision) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['revisesThought'],
          message: 'revisesThought can only be set when isRevision is true',
        });
      } else if (data.revisesThought >= data.thoughtNumber) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['revisesThought'],
          message: 'revisesThought must be less than thoughtNumber',
        });
      }
    }
    if (data.branchId != null && data.branchFromThought == null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['branchId'],
        message: 'branchId can only be set when branchFromThought is set',
      });
    }
    if (data.branchFromThought != null && data.branchFromThought >= data.thoughtNumber) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['branchFromThought'],
        message: 'branchFromThought must be less than thoughtNumber',
      });
    }
  });

export type ThoughtInput = z.input<typeof thoughtSchema>;

function describeIssue(issue: z.ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join('.') : 'input';
  return `${where}: ${issue.message}`;
}

/**
 * Validate raw tool arguments into a frozen ThoughtData.
 * Throws ThoughtValidationError listing every problem found.
 */
export function parseThought(input: unknown): ThoughtData {
  const parsed = thoughtSchema.safeParse(input);
  if (!parsed.success) {
    throw new ThoughtValidationError(parsed.error.issues.map(describeIssue));
  }

  const data = parsed.data;
  let totalThoughts = data.totalThoughts;
  if (totalThoughts < MIN_TOTAL_THOUGHTS) {
    log.info(
      `Input totalThoughts (${totalThoughts}) is below suggested minimum ${MIN_TOTAL_THOUGHTS}. ` +
      `Adjusting to ${MIN_TOTAL_THOUGHTS}.`,
    );
    totalThoughts = MIN_TOTAL_THOUGHTS;
  }

  const thought: ThoughtData = {
    thought: data.thought,
    thoughtNumber: data.thoughtNumber,
    totalThoughts,
    nextThoughtNeeded: data.nextThoughtNeeded,
    isRevision: data.isRevision,
    needsMoreThoughts: data.needsMoreThoughts,
  };
  if (data.revisesThought != null) thought.revisesThought = data.revisesThought;
  if (data.branchFromThought != null) thought.branchFromThought = data.branchFromThought;
  if (data.branchId != null) thought.branchId = data.branchId;

  return Object.freeze(thought);
}

export type ThoughtKind = 'thought' | 'revision' | 'branch';

export function thoughtKind(thought: ThoughtData): ThoughtKind {
  if (thought.isRevision && thought.revisesThought !== undefined) return 'revision';
  if (thought.branchFromThought !== undefined && thought.branchId !== undefined) return 'branch';
  return 'thought';
}

/**
 * Multi-line summary of a thought:
 *
 *   Branch 6/10 (from thought 4, ID: alt-approach)
 *     Thought: Exploring an alternative approach.
 *     Branch Details: ID='alt-approach', originates from Thought #4
 *     Next Needed: true, Needs More: false
 */
export function formatThoughtForLog(thought: ThoughtData): string {
  const position = `${thought.thoughtNumber}/${thought.totalThoughts}`;
  const lines: string[] = [];

  switch (thoughtKind(thought)) {
    case 'revision':
      lines.push(`Revision ${position} (revising thought ${thought.revisesThought})`);
      lines.push(`  Thought: ${thought.thought}`);
      break;
    case 'branch':
      lines.push(`Branch ${position} (from thought ${thought.branchFromThought}, ID: ${thought.branchId})`);
      lines.push(`  Thought: ${thought.thought}`);
      lines.push(
        `  Branch Details: ID='${thought.branchId}', originates from Thought #${thought.branchFromThought}`,
      );
      break;
    case 'thought':
      lines.push(`Thought ${position}`);
      lines.push(`  Thought: ${thought.thought}`);
      break;
  }

  lines.push(`  Next Needed: ${thought.nextThoughtNeeded}, Needs More: ${thought.needsMoreThoughts}`);
  return lines.join('\n');
}
