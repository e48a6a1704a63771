/**
 * Builds the sequential thinking team: five specialists and a coordinator.
 */

import { assertProviderCredentials, type ThinkingConfig } from '../config.js';
import type { LLMProvider } from '../llm-provider.js';
import { createLLMProvider, getModelConfig } from '../providers/factory.js';
import { ExaSearchClient, type SearchClient } from '../search/exa.js';
import { createLogger } from '../logger.js';
import { Agent } from './agent.js';
import { Team } from './team.js';
import { createThinkTool, createWebSearchTool, type ToolFactory } from './tools.js';

const log = createLogger('team');

export interface TeamDependencies {
  /** Overrides the provider built from config (tests). */
  provider?: LLMProvider;
  /** Overrides the Exa client built from config (tests). */
  search?: SearchClient | null;
  now?: () => Date;
}

interface SpecialistSpec {
  name: string;
  role: string;
  description: string;
  instructions: string[];
  research?: boolean;
}

const SUBTASK_FLOW = '**When you receive a sub-task:**';

const SPECIALISTS: SpecialistSpec[] = [
  {
    name: 'Planner',
    role: 'Strategic Planner',
    description: 'Develops strategic plans and roadmaps based on delegated sub-tasks.',
    instructions: [
      'You are the Strategic Planner specialist.',
      'The Team Coordinator sends you sub-tasks about planning, strategy or process design.',
      SUBTASK_FLOW,
      ' 1. Pin down the planning requirement you were given.',
      ' 2. Use the `think` tool as a scratchpad to outline steps and possible non-linear points in your sub-task.',
      ' 3. Produce the requested plan, roadmap or sequence of steps.',
      ' 4. Flag points in your plan where a revision or a branch may be needed.',
      ' 5. Note constraints and likely roadblocks.',
      ' 6. Reply to the Coordinator with a clear, concise planning output.',
      'Stay on the delegated planning sub-task.',
    ],
  },
  {
    name: 'Researcher',
    role: 'Information Gatherer',
    description: 'Gathers and validates information based on delegated research sub-tasks.',
    research: true,
    instructions: [
      'You are the Information Gatherer specialist.',
      'The Team Coordinator sends you sub-tasks that need information gathered or verified.',
      SUBTASK_FLOW,
      ' 1. Identify exactly what information is requested.',
      ' 2. Use `web_search` when available to find facts, data or context; use `think` to plan queries and organize findings.',
      ' 3. Cross-check information where you can.',
      ' 4. Structure the findings clearly, with sources.',
      ' 5. Name any significant gaps you could not fill.',
      ' 6. Reply to the Coordinator with the findings relevant to the sub-task.',
      'Favour accuracy and relevance over volume.',
    ],
  },
  {
    name: 'Analyzer',
    role: 'Core Analyst',
    description: 'Performs analysis based on delegated analytical sub-tasks.',
    instructions: [
      'You are the Core Analyst specialist.',
      'The Team Coordinator sends you sub-tasks needing analysis, pattern identification or logical evaluation.',
      SUBTASK_FLOW,
      ' 1. Understand the analytical question you were given.',
      ' 2. Use the `think` tool to outline your framework or draft insights.',
      ' 3. Break down components, look for patterns and evaluate the logic.',
      ' 4. Condense the result into concise insights.',
      ' 5. Call out logical inconsistencies or invalidated premises within your sub-task.',
      ' 6. Reply to the Coordinator with your findings.',
      'Aim for depth and clarity on the delegated question.',
    ],
  },
  {
    name: 'Critic',
    role: 'Quality Controller',
    description: 'Critically evaluates ideas or assumptions based on delegated critique sub-tasks.',
    instructions: [
      'You are the Quality Controller specialist.',
      'The Team Coordinator sends you sub-tasks needing critique, assumption checks or flaw finding.',
      SUBTASK_FLOW,
      ' 1. Identify what exactly must be critiqued.',
      ' 2. Use the `think` tool to list assumptions and potential weaknesses.',
      ' 3. Evaluate the premise or information critically.',
      ' 4. Point out biases, flaws and logical fallacies.',
      ' 5. Suggest concrete improvements.',
      ' 6. If the critique shows a significant flaw or outdated assumption, say so plainly.',
      ' 7. Reply to the Coordinator with your evaluation and recommendations.',
      'Be rigorous and constructive.',
    ],
  },
  {
    name: 'Synthesizer',
    role: 'Integration Specialist',
    description: 'Integrates information or forms conclusions based on delegated synthesis sub-tasks.',
    instructions: [
      'You are the Integration Specialist.',
      'The Team Coordinator sends you sub-tasks needing integration of information, synthesis of ideas or conclusions.',
      SUBTASK_FLOW,
      ' 1. Identify the elements to integrate.',
      ' 2. Use the `think` tool to outline connections or draft conclusions.',
      ' 3. Connect the elements, find overarching themes and draw conclusions.',
      ' 4. Distill complex input into clear, structured insights.',
      ' 5. Reply to the Coordinator with the synthesis.',
      'For a final synthesis, stay concise and high-level: key takeaways, not a replay of every step.',
    ],
  },
];

const COORDINATOR_DESCRIPTION =
  'You are the Coordinator of a specialist team processing sequential thoughts. ' +
  'You manage the flow, delegate tasks and synthesize the results.';

const COORDINATOR_INSTRUCTIONS = [
  "You coordinate the specialists (Planner, Researcher, Analyzer, Critic, Synthesizer) in 'coordinate' mode.",
  'For each input thought:',
  ' 1. Work out what kind of thought it is (initial planning, analysis, revision, branch).',
  ' 2. Split it into specific, actionable sub-tasks for the specialists.',
  ' 3. Pick the MINIMUM set of specialists the thought really needs.',
  ' 4. Delegate only to them, with clear instructions and the context they need (e.g. the original text of a revised thought).',
  ' 5. Wait for their answers.',
  ' 6. Synthesize the answers into one cohesive response to the original thought.',
  ' 7. From the synthesis, decide whether earlier thoughts should be revised or alternatives explored.',
  " 8. Say so explicitly, using 'RECOMMENDATION: Revise thought #X...' or 'SUGGESTION: Consider branching from thought #Y...'.",
  ' 9. End with guidance for the next step in the sequence.',
  'Delegation: choose specialists by the actions the thought implies, keep delegations to the strictly necessary, and always pass context along.',
  'Synthesis: integrate answers logically, resolve or highlight conflicts, and give one combined answer.',
];

const COORDINATOR_SUCCESS_CRITERIA = [
  'Input thoughts are broken down into appropriate sub-tasks',
  'Sub-tasks go only to the most relevant specialists',
  'Specialist answers are synthesized into one output addressing the original thought',
  'Needed revisions or branches are identified and recommended',
];

export function createSequentialThinkingTeam(
  config: ThinkingConfig,
  deps: TeamDependencies = {},
): Team {
  assertProviderCredentials(config);

  const { teamModelId, agentModelId } = getModelConfig(config);
  const provider = deps.provider ?? createLLMProvider(config);
  const search = deps.search === undefined ? createSearchClient(config) : deps.search;
  const debugMode = config.logging.debugAgents;

  const members = SPECIALISTS.map((specialist) => {
    const tools: ToolFactory[] = [createThinkTool];
    if (specialist.research && search) {
      tools.push(() => createWebSearchTool(search));
    }
    return new Agent({
      name: specialist.name,
      role: specialist.role,
      description: specialist.description,
      instructions: specialist.instructions,
      tools,
      provider,
      model: agentModelId,
      maxTokens: config.llm.maxTokens,
      debugMode,
      now: deps.now,
    });
  });

  const team = new Team({
    name: 'SequentialThinkingTeam',
    mode: 'coordinate',
    members,
    provider,
    model: teamModelId,
    maxTokens: config.llm.maxTokens,
    description: COORDINATOR_DESCRIPTION,
    instructions: COORDINATOR_INSTRUCTIONS,
    successCriteria: COORDINATOR_SUCCESS_CRITERIA,
    debugMode,
    now: deps.now,
  });

  log.info(
    `Team initialized in coordinate mode using provider: ${provider.name} ` +
    `(web search ${search ? 'enabled' : 'disabled'})`,
  );
  return team;
}

/** Exa client for the Researcher, or null when search is off or has no key. */
export function createSearchClient(config: ThinkingConfig): SearchClient | null {
  if (config.search.tool === 'none') {
    return null;
  }
  if (!config.search.exaApiKey) {
    log.warn('EXA_API_KEY is not set: the Researcher runs without web search');
    return null;
  }
  return new ExaSearchClient({ apiKey: config.search.exaApiKey });
}
