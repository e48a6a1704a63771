/**
 * Wires config, team, services and transports together for both run modes.
 *
 * stdio: a single MCP server and thought history; the team is built on the
 * first tool call, so the server starts (and answers listTools) without keys.
 * http: the team is built before listening and startup fails if it cannot
 * be; every MCP session gets its own service and history.
 */

import { randomUUID } from 'node:crypto';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ActivityLog } from './activity-log.js';
import type { ThinkingConfig } from './config.js';
import { ThinkingHttpServer } from './http/server.js';
import { createLogger } from './logger.js';
import { createMcpServer } from './mcp/server.js';
import type { SearchClient } from './search/exa.js';
import { createSearchClient, createSequentialThinkingTeam } from './team/specialists.js';
import { LazyTeam, SequentialThinkingService } from './thinking/service.js';

const log = createLogger('app');

export interface RunningServer {
  close(): Promise<void>;
}

export interface AppContext {
  team: LazyTeam;
  search: SearchClient | null;
  activityLog: ActivityLog | null;
}

export function createAppContext(config: ThinkingConfig, activityLog: ActivityLog | null): AppContext {
  const search = createSearchClient(config);
  const team = new LazyTeam(() => createSequentialThinkingTeam(config, { search }));
  return { team, search, activityLog };
}

/** New MCP server with its own thought history. */
export function createSessionServer(context: AppContext, sessionId: string): McpServer {
  const service = new SequentialThinkingService({
    team: context.team,
    sessionId,
    activityLog: context.activityLog,
  });
  return createMcpServer(service, { activityLog: context.activityLog });
}

export async function startStdio(context: AppContext): Promise<RunningServer> {
  const server = createSessionServer(context, randomUUID());
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info('MCP server running over stdio');

  return {
    close: async () => {
      await server.close();
      await context.search?.close?.();
    },
  };
}

export async function startHttp(context: AppContext, config: ThinkingConfig): Promise<RunningServer> {
  const team = context.team.get();
  log.info(`Team ready (provider: ${team.providerName})`);

  const httpServer = new ThinkingHttpServer({
    activityLog: context.activityLog,
    createSession: (sessionId) => createSessionServer(context, sessionId),
  });
  await httpServer.listen(config.server.port, config.server.host);

  return {
    close: async () => {
      await httpServer.close();
      await context.search?.close?.();
    },
  };
}
