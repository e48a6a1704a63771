/**
 * Exa web search over Exa's hosted MCP endpoint.
 *
 * Uses the official MCP client with the Streamable HTTP transport:
 * - Connects lazily on the first search and reuses the session
 * - Calls the `web_search_exa` tool with a per-call timeout
 * - Normalizes the text payload into SearchResult records
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { createLogger } from '../logger.js';

const log = createLogger('search');

export interface SearchResult {
  title: string;
  url: string;
  snippet: string;
}

export interface SearchClient {
  search(query: string, numResults?: number): Promise<SearchResult[]>;
  close?(): Promise<void>;
}

const EXA_MCP_URL = 'https://mcp.exa.ai/mcp';
const DEFAULT_TIMEOUT_MS = 30_000;
const MAX_SNIPPET = 500;

export interface ExaSearchOptions {
  apiKey: string;
  endpoint?: string;
  timeoutMs?: number;
}

export class ExaSearchClient implements SearchClient {
  private readonly endpoint: URL;
  private readonly timeoutMs: number;
  private client: Client | null = null;
  private connecting: Promise<Client> | null = null;

  constructor(options: ExaSearchOptions) {
    this.endpoint = new URL(options.endpoint ?? EXA_MCP_URL);
    this.endpoint.searchParams.set('exaApiKey', options.apiKey);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async search(query: string, numResults = 5): Promise<SearchResult[]> {
    log.debug(`Query: ${query}`);
    const client = await this.connect();

    const result = await client.callTool(
      { name: 'web_search_exa', arguments: { query, numResults } },
      CallToolResultSchema,
      { timeout: this.timeoutMs },
    );

    const text = extractText(result.content);
    if (result.isError) {
      throw new Error(`Exa search failed: ${text || 'unknown error'}`);
    }
    return parseExaResults(text).slice(0, numResults);
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.connecting = null;
    if (client) {
      await client.close();
    }
  }

  private connect(): Promise<Client> {
    if (this.client) {
      return Promise.resolve(this.client);
    }
    if (!this.connecting) {
      this.connecting = this.openSession().catch((err: unknown) => {
        this.connecting = null;
        throw err;
      });
    }
    return this.connecting;
  }

  private async openSession(): Promise<Client> {
    const client = new Client({ name: 'mcp-server-mas-sequential-thinking', version: '0.3.0' });
    await client.connect(new StreamableHTTPClientTransport(this.endpoint));
    log.info('Connected to Exa MCP endpoint');
    this.client = client;
    return client;
  }
}

// ---------------------------------------------------------------------------
// Result parsing
// ---------------------------------------------------------------------------

function extractText(content: unknown): string {
  if (!Array.isArray(content)) return '';
  const items: unknown[] = content;
  const texts: string[] = [];
  for (const item of items) {
    if (typeof item === 'object' && item !== null && 'text' in item && typeof item.text === 'string') {
      texts.push(item.text);
    }
  }
  return texts.join('\n');
}

function truncate(text: string): string {
  return text.trim().slice(0, MAX_SNIPPET);
}

/**
 * Parse Exa's tool output. Accepts either a JSON payload with a `results`
 * array or the plain-text `Title:/URL:/Text:` block format.
 */
export function parseExaResults(text: string): SearchResult[] {
  const trimmed = text.trim();
  if (!trimmed) return [];

  if (trimmed.startsWith('{')) {
    const fromJson = parseJsonResults(trimmed);
    if (fromJson) return fromJson;
  }

  const results: SearchResult[] = [];
  for (const block of trimmed.split(/\n\s*\n(?=Title:)/)) {
    const title = block.match(/Title:\s*(.+)/)?.[1];
    const url = block.match(/URL:\s*(.+)/)?.[1];
    const body = block.match(/Text:\s*([\s\S]+)/)?.[1] ?? '';
    if (title && url) {
      results.push({ title: title.trim(), url: url.trim(), snippet: truncate(body) });
    }
  }
  return results;
}

function parseJsonResults(text: string): SearchResult[] | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || !('results' in parsed)) {
    return null;
  }
  if (!Array.isArray(parsed.results)) return null;

  const entries: unknown[] = parsed.results;
  const results: SearchResult[] = [];
  for (const entry of entries) {
    if (typeof entry !== 'object' || entry === null) continue;
    const title = 'title' in entry && typeof entry.title === 'string' ? entry.title : '';
    const url = 'url' in entry && typeof entry.url === 'string' ? entry.url : '';
    const body = 'text' in entry && typeof entry.text === 'string' ? entry.text : '';
    if (url) {
      results.push({ title: title.trim() || url, url, snippet: truncate(body) });
    }
  }
  return results;
}
