/**
 * HTTP front end: service info, health check, OpenAPI document and the MCP
 * Streamable HTTP endpoint.
 *
 * Routes:
 * - GET  /                         → service information
 * - GET  /health-check             → liveness probe
 * - GET  /mcp-server/openapi.json  → OpenAPI document for these routes
 * - *    /mcp-server/mcp           → MCP Streamable HTTP (stateful sessions)
 *
 * Each MCP session gets its own McpServer (and thought history) from
 * `createSession`; sessions end when the client sends DELETE or the server
 * closes.
 */

import * as http from 'node:http';
import type { AddressInfo } from 'node:net';
import { randomUUID } from 'node:crypto';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import type { ActivityLog } from '../activity-log.js';
import { toError } from '../errors.js';
import { createLogger } from '../logger.js';
import { SERVER_VERSION } from '../mcp/server.js';

const log = createLogger('http');

export const SERVICE_NAME = 'Multi-Agent Sequential Thinking MCP Service';
export const MCP_PATH = '/mcp-server/mcp';
export const OPENAPI_PATH = '/mcp-server/openapi.json';

const MAX_BODY_BYTES = 4 * 1024 * 1024;

const CORS_HEADERS: Record<string, string> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, DELETE, OPTIONS',
  'Access-Control-Allow-Headers': 'mcp-protocol-version, mcp-session-id, Authorization, Content-Type',
  'Access-Control-Expose-Headers': 'Mcp-Session-Id',
};

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface HttpServerOptions {
  /** Build the MCP server for a new session. */
  createSession: (sessionId: string) => McpServer;
  activityLog?: ActivityLog | null;
}

interface Session {
  transport: StreamableHTTPServerTransport;
  server: McpServer;
}

class HttpError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = 'HttpError';
  }
}

// ---------------------------------------------------------------------------
// Server
// ---------------------------------------------------------------------------

export class ThinkingHttpServer {
  readonly server: http.Server;
  private readonly sessions: Map<string, Session> = new Map();
  private readonly createSession: (sessionId: string) => McpServer;
  private readonly activityLog: ActivityLog | null;

  constructor(options: HttpServerOptions) {
    this.createSession = options.createSession;
    this.activityLog = options.activityLog ?? null;
    this.server = http.createServer((req, res) => {
      this.handle(req, res).catch((err: unknown) => this.fail(req, res, '-', err));
    });
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  /** Start listening; resolves with the bound address (port 0 picks a free port). */
  listen(port: number, host: string): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      this.server.once('error', onError);
      this.server.listen(port, host, () => {
        this.server.off('error', onError);
        const address = this.server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error(`Unexpected listen address: ${String(address)}`));
          return;
        }
        log.info(`Listening on http://${host}:${address.port} (MCP at ${MCP_PATH})`);
        resolve(address);
      });
    });
  }

  /** Close every session transport, then the listener. */
  async close(): Promise<void> {
    const sessions = [...this.sessions.values()];
    this.sessions.clear();
    await Promise.all(sessions.map(async (session) => {
      try {
        await session.transport.close();
        await session.server.close();
      } catch (err) {
        log.warn('Failed to close session:', toError(err).message);
      }
    }));

    await new Promise<void>((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()));
      this.server.closeAllConnections();
    });
  }

  // -------------------------------------------------------------------------
  // Request handling
  // -------------------------------------------------------------------------

  private async handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const requestId = randomUUID();
    for (const [name, value] of Object.entries(CORS_HEADERS)) {
      res.setHeader(name, value);
    }

    const url = new URL(req.url || '/', `http://${req.headers.host ?? 'localhost'}`);
    const pathname = url.pathname.length > 1 ? url.pathname.replace(/\/+$/, '') : url.pathname;
    const method = req.method ?? 'GET';

    let body: unknown;
    try {
      body = method === 'POST' ? await readJsonBody(req) : undefined;
    } catch (err) {
      this.logRequest(requestId, req, method, pathname, url, undefined);
      if (err instanceof HttpError) {
        sendJSON(res, err.status, jsonRpcError(err.status === 413 ? -32600 : -32700, err.message));
        return;
      }
      throw err;
    }
    this.logRequest(requestId, req, method, pathname, url, body);
    res.on('finish', () => log.debug(`${method} ${pathname} → ${res.statusCode} (${requestId})`));

    try {
      await this.route(req, res, method, pathname, body);
    } catch (err) {
      this.fail(req, res, requestId, err);
    }
  }

  private async route(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    method: string,
    pathname: string,
    body: unknown,
  ): Promise<void> {
    if (method === 'OPTIONS') {
      if (pathname === OPENAPI_PATH) {
        sendJSON(res, 200, {
          method: 'OPTIONS',
          allowed_methods: ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD', 'OPTIONS'],
          description: 'Custom OPTIONS response for /openapi.json',
        });
        return;
      }
      res.writeHead(204);
      res.end();
      return;
    }

    if (pathname === MCP_PATH) {
      await this.handleMcp(req, res, method, body);
      return;
    }

    if (method === 'GET' && pathname === '/') {
      sendJSON(res, 200, { service: SERVICE_NAME, version: SERVER_VERSION, status: 'running' });
      return;
    }

    if (method === 'GET' && pathname === '/health-check') {
      sendJSON(res, 200, { status: 'healthy' });
      return;
    }

    if (method === 'GET' && pathname === OPENAPI_PATH) {
      sendJSON(res, 200, buildOpenApiDocument());
      return;
    }

    sendJSON(res, 404, { detail: 'Not Found' });
  }

  private async handleMcp(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    method: string,
    body: unknown,
  ): Promise<void> {
    const header = req.headers['mcp-session-id'];
    const sessionId = Array.isArray(header) ? header[0] : header;

    if (sessionId) {
      const session = this.sessions.get(sessionId);
      if (!session) {
        sendJSON(res, 404, jsonRpcError(-32001, 'Session not found'));
        return;
      }
      await session.transport.handleRequest(req, res, body);
      return;
    }

    if (method !== 'POST' || !isInitializeRequest(body)) {
      sendJSON(res, 400, jsonRpcError(-32000, 'Bad Request: No valid session ID provided'));
      return;
    }

    const newSessionId = randomUUID();
    const server = this.createSession(newSessionId);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => newSessionId,
      onsessioninitialized: (id) => {
        this.sessions.set(id, { transport, server });
        log.info(`Session ${id} opened (${this.sessions.size} active)`);
      },
    });
    transport.onclose = () => {
      if (this.sessions.delete(newSessionId)) {
        log.info(`Session ${newSessionId} closed (${this.sessions.size} active)`);
      }
    };

    await server.connect(transport);
    await transport.handleRequest(req, res, body);
  }

  private logRequest(
    requestId: string,
    req: http.IncomingMessage,
    method: string,
    route: string,
    url: URL,
    body: unknown,
  ): void {
    this.activityLog?.logHttpRequest(requestId, {
      method,
      route,
      ip: req.socket.remoteAddress ?? null,
      url: url.toString(),
      host: req.headers.host ?? null,
      headers: req.headers,
      body: body ?? {},
    });
  }

  private fail(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    requestId: string,
    err: unknown,
  ): void {
    const error = toError(err);
    log.error(`Unexpected error on ${req.method ?? '?'} ${req.url ?? '/'} (${requestId}):`, error);
    this.activityLog?.logError(requestId, { error_message: 'ERR_UNEXPECTED', detail: error.message });
    if (!res.headersSent) {
      sendJSON(res, 500, { detail: 'ERR_UNEXPECTED' });
    } else {
      res.end();
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function sendJSON(res: http.ServerResponse, status: number, data: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

function jsonRpcError(code: number, message: string): Record<string, unknown> {
  return { jsonrpc: '2.0', error: { code, message }, id: null };
}

async function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new HttpError(413, 'Request body too large');
    }
    chunks.push(buffer);
  }

  const raw = Buffer.concat(chunks).toString('utf-8');
  if (!raw.trim()) {
    return undefined;
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new HttpError(400, 'Parse error: request body is not valid JSON');
  }
}

/** OpenAPI 3.1 description of the plain HTTP routes. */
export function buildOpenApiDocument(): Record<string, unknown> {
  const jsonResponse = (description: string, properties: Record<string, unknown>) => ({
    description,
    content: {
      'application/json': { schema: { type: 'object', properties } },
    },
  });

  return {
    openapi: '3.1.0',
    info: {
      title: SERVICE_NAME,
      version: SERVER_VERSION,
      description: 'Sequential thinking through a coordinated team of LLM agents, served over MCP.',
    },
    paths: {
      '/': {
        get: {
          summary: 'Service information',
          responses: {
            '200': jsonResponse('Service information', {
              service: { type: 'string' },
              version: { type: 'string' },
              status: { type: 'string' },
            }),
          },
        },
      },
      '/health-check': {
        get: {
          summary: 'Health check',
          responses: {
            '200': jsonResponse('Service is healthy', { status: { type: 'string' } }),
          },
        },
      },
      [MCP_PATH]: {
        post: {
          summary: 'MCP Streamable HTTP endpoint (JSON-RPC)',
          responses: { '200': { description: 'JSON-RPC response or event stream' } },
        },
        get: {
          summary: 'MCP server-to-client event stream',
          responses: { '200': { description: 'Event stream' } },
        },
        delete: {
          summary: 'End an MCP session',
          responses: { '200': { description: 'Session closed' } },
        },
      },
    },
  };
}
