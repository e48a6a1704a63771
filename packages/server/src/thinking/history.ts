/**
 * In-memory thought history with per-branch views.
 */

import type { ThoughtData } from '@seqthink/shared';

export class ThoughtHistory {
  private thoughts: ThoughtData[] = [];
  private branches: Map<string, ThoughtData[]> = new Map();

  /** Append a thought; branch thoughts are also filed under their branch id. */
  add(thought: ThoughtData): void {
    this.thoughts.push(thought);

    if (thought.branchFromThought !== undefined && thought.branchId !== undefined) {
      let branch = this.branches.get(thought.branchId);
      if (!branch) {
        branch = [];
        this.branches.set(thought.branchId, branch);
      }
      branch.push(thought);
    }
  }

  get length(): number {
    return this.thoughts.length;
  }

  get branchIds(): string[] {
    return [...this.branches.keys()];
  }

  all(): readonly ThoughtData[] {
    return this.thoughts;
  }

  getBranchThoughts(branchId: string): readonly ThoughtData[] {
    return this.branches.get(branchId) ?? [];
  }

  /** Branch id → number of thoughts filed under it. */
  getAllBranches(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const [id, thoughts] of this.branches) {
      counts[id] = thoughts.length;
    }
    return counts;
  }

  /**
   * First thought numbered `thoughtNumber`, ignoring the most recently added
   * one (the thought currently being processed).
   */
  findBefore(thoughtNumber: number): ThoughtData | undefined {
    return this.thoughts
      .slice(0, -1)
      .find((t) => t.thoughtNumber === thoughtNumber);
  }

  clear(): void {
    this.thoughts = [];
    this.branches.clear();
  }
}
