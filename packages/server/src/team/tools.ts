/**
 * Tools available to the specialist agents.
 *
 * - think: a per-run scratchpad; every call returns the notes so far
 * - web_search: Exa search, given to the Researcher when search is enabled
 */

import type { SearchClient } from '../search/exa.js';
import type { LoopTool } from './loop.js';

/** Builds a fresh tool instance for every agent run. */
export type ToolFactory = () => LoopTool;

export function createThinkTool(): LoopTool {
  const notes: string[] = [];
  return {
    definition: {
      name: 'think',
      description:
        'Use as a scratchpad to reason about the task, list assumptions or plan ' +
        'next steps. The note is not shown to anyone; it returns all notes so far.',
      parameters: {
        type: 'object',
        properties: {
          thought: { type: 'string', description: 'The note to record' },
        },
        required: ['thought'],
      },
    },
    async execute(input) {
      const thought = input['thought'];
      if (typeof thought !== 'string' || !thought.trim()) {
        throw new Error('"thought" must be a non-empty string');
      }
      notes.push(thought.trim());
      return `Notes so far:\n${notes.map((note, i) => `${i + 1}. ${note}`).join('\n')}`;
    },
  };
}

export function createWebSearchTool(search: SearchClient): LoopTool {
  return {
    definition: {
      name: 'web_search',
      description: 'Search the web and return the top results with a short excerpt each.',
      parameters: {
        type: 'object',
        properties: {
          query: { type: 'string', description: 'Search query' },
          num_results: { type: 'number', description: 'Number of results (1-10, default 5)' },
        },
        required: ['query'],
      },
    },
    async execute(input) {
      const query = input['query'];
      if (typeof query !== 'string' || !query.trim()) {
        throw new Error('"query" must be a non-empty string');
      }
      const requested = input['num_results'];
      const numResults = typeof requested === 'number' && Number.isInteger(requested)
        ? Math.min(Math.max(requested, 1), 10)
        : 5;

      const results = await search.search(query.trim(), numResults);
      if (results.length === 0) {
        return `No results found for "${query.trim()}".`;
      }
      return results
        .map((r, i) => `${i + 1}. ${r.title}\n   ${r.url}${r.snippet ? `\n   ${r.snippet}` : ''}`)
        .join('\n');
    },
  };
}
