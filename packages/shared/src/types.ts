/**
 * Core types shared by the sequential thinking server and its tooling.
 */

/** LLM backends the team can run on. */
export type ProviderId = 'deepseek' | 'groq' | 'openrouter' | 'ollama';

/**
 * Operator-supplied configuration collected by the hosting platform
 * (see smithery.yaml). Every field is a string once defaults are applied.
 */
export interface HostingConfig {
  llmProvider: ProviderId;
  deepseekApiKey: string;
  groqApiKey: string;
  openrouterApiKey: string;
  exaApiKey: string;
}

/** Environment variables the launched process reads at startup. */
export type ProjectedEnvVar =
  | 'LLM_PROVIDER'
  | 'DEEPSEEK_API_KEY'
  | 'GROQ_API_KEY'
  | 'OPENROUTER_API_KEY'
  | 'EXA_API_KEY';

export type ProjectedEnvironment = Record<ProjectedEnvVar, string>;

/** What the hosting platform runs to start the server over stdio. */
export interface StartCommand {
  command: string;
  args: string[];
  env: ProjectedEnvironment;
}

/** A single validated thought, as accepted by the `sequentialthinking` tool. */
export interface ThoughtData {
  thought: string;
  thoughtNumber: number;
  totalThoughts: number;
  nextThoughtNeeded: boolean;
  isRevision: boolean;
  revisesThought?: number;
  branchFromThought?: number;
  branchId?: string;
  needsMoreThoughts: boolean;
}

/** Result of processing one thought through the coordinator team. */
export interface ThoughtResult {
  processedThoughtNumber: number;
  estimatedTotalThoughts: number;
  nextThoughtNeeded: boolean;
  /** Coordinator synthesis followed by guidance for the caller's next step. */
  coordinatorResponse: string;
  branches: string[];
  thoughtHistoryLength: number;
  branchDetails: {
    /** `'main'` unless the thought branches; `null` for a branch without an id. */
    currentBranchId: string | null;
    branchOriginThought: number | null;
    allBranches: Record<string, number>;
  };
  isRevision: boolean;
  revisesThought: number | null;
  isBranch: boolean;
  status: 'success';
}

/** Activity log entry (one JSONL line). */
export interface ActivityEntry {
  timestamp: Date;
  type:
    | 'thought_received'
    | 'team_request'
    | 'team_response'
    | 'delegation'
    | 'tool_call'
    | 'http_request'
    | 'error';
  /** MCP session id, HTTP request id, or `'stdio'`. */
  sessionId: string;
  data: Record<string, unknown>;
}
