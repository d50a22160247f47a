/**
 * College Football Data MCP HTTP application.
 *
 * Wires the OAuth endpoints, the bearer gate and the Streamable HTTP MCP
 * transport into one Express app. Infrastructure (token store, code store,
 * CFBD client) is passed in so tests can build the app without a listener.
 */

import express, { Express, NextFunction, Request, Response } from 'express';
import { randomUUID } from 'node:crypto';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { logger, errorMessage } from './lib/logger.js';
import { AuthorizationCodeStore } from './auth/code-store.js';
import { TokenStore } from './auth/token-store.js';
import { AuthorizationServer, createAuthRouter } from './auth/router.js';
import { createBearerGate } from './auth/bearer-gate.js';
import { createMcpServer, SERVER_VERSION } from './mcp/index.js';
import type { CfbdClient } from './services/cfbd/index.js';

export interface AppDependencies {
  tokenStore: TokenStore;
  codeStore: AuthorizationCodeStore;
  cfbdClient: CfbdClient;
  /** Operator credential accepted by the bearer gate */
  sharedSecret?: string;
  publicBaseUrl?: string;
  /** Idle time before a session is evicted (default: 30 minutes) */
  sessionTtlMs?: number;
  sweepIntervalMs?: number;
}

export interface SessionEntry {
  transport: StreamableHTTPServerTransport;
  server: McpServer;
  lastActivity: number;
}

export interface CfbdMcpApp {
  app: Express;
  sessions: Map<string, SessionEntry>;
  /** Stops the sweep and closes every open session */
  close(): Promise<void>;
}

const DEFAULT_SESSION_TTL_MS = 30 * 60 * 1000; // 30 minutes
const DEFAULT_SWEEP_INTERVAL_MS = 60 * 1000; // 60 seconds

function jsonRpcError(res: Response, status: number, code: number, message: string): void {
  res.status(status).json({
    jsonrpc: '2.0',
    error: { code, message },
    id: null,
  });
}

function closeTransport(sessionId: string, session: SessionEntry): void {
  session.transport.close().catch((error: unknown) => {
    logger.warn('Failed to close session transport', { sessionId, error: errorMessage(error) });
  });
}

/**
 * Logs method, path and headers of every request at debug level, with the
 * authorization header masked.
 */
function requestLogger(req: Request, _res: Response, next: NextFunction): void {
  if (logger.isDebugEnabled()) {
    const headers = { ...req.headers };
    if (headers.authorization) {
      headers.authorization = '[REDACTED]';
    }
    logger.debug('Incoming request', { method: req.method, path: req.path, headers });
  }
  next();
}

export function createApp(deps: AppDependencies): CfbdMcpApp {
  const sessionTtlMs = deps.sessionTtlMs ?? DEFAULT_SESSION_TTL_MS;
  const sessions = new Map<string, SessionEntry>();

  // --- Session TTL sweep ---

  const sweepInterval = setInterval(() => {
    const now = Date.now();
    for (const [id, session] of sessions.entries()) {
      if (now - session.lastActivity > sessionTtlMs) {
        logger.info('Evicting expired session', { sessionId: id });
        sessions.delete(id);
        closeTransport(id, session);
      }
    }
  }, deps.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS);

  sweepInterval.unref();

  function activeSession(req: Request): { id: string; session: SessionEntry } | undefined {
    const id = req.header('mcp-session-id');
    const session = id ? sessions.get(id) : undefined;
    if (!id || !session) {
      return undefined;
    }
    session.lastActivity = Date.now();
    return { id, session };
  }

  // --- Express app ---

  const app = express();
  app.use(requestLogger);

  // Unauthenticated MCP traffic is turned away before its body is parsed
  app.use('/mcp', createBearerGate({ tokenStore: deps.tokenStore, sharedSecret: deps.sharedSecret }));

  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.get('/', (_req: Request, res: Response) => {
    res.type('text/plain').send('OK');
  });

  app.get('/robots.txt', (_req: Request, res: Response) => {
    res.type('text/plain').send('User-agent: *\nDisallow: /');
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      version: SERVER_VERSION,
      sessions: sessions.size,
      tokens: deps.tokenStore.size,
    });
  });

  // --- OAuth endpoints ---

  app.use(
    createAuthRouter({
      server: new AuthorizationServer(deps.codeStore, deps.tokenStore),
      publicBaseUrl: deps.publicBaseUrl,
    })
  );

  // --- MCP endpoints (bearer protected) ---

  app.post('/mcp', async (req: Request, res: Response) => {
    const sessionId = req.header('mcp-session-id');
    logger.debug('Received MCP POST request', { sessionId: sessionId ?? 'none' });

    try {
      const active = activeSession(req);
      if (active) {
        await active.session.transport.handleRequest(req, res, req.body);
      } else if (!sessionId && isInitializeRequest(req.body)) {
        logger.info('Initializing new MCP session');

        const server = createMcpServer(deps.cfbdClient);
        const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (id) => {
            sessions.set(id, { transport, server, lastActivity: Date.now() });
            logger.info('Session initialized', { sessionId: id });
          },
        });

        transport.onclose = () => {
          const id = transport.sessionId;
          if (id && sessions.get(id)?.transport === transport) {
            sessions.delete(id);
            logger.info('Session closed', { sessionId: id });
          }
        };

        await server.connect(transport);
        await transport.handleRequest(req, res, req.body);
      } else if (sessionId) {
        logger.warn('Invalid session ID provided', { sessionId });
        jsonRpcError(res, 400, -32000, 'Invalid session ID. Session may have expired.');
      } else {
        logger.warn('Missing session ID for non-initialize request');
        jsonRpcError(res, 400, -32000, 'Missing mcp-session-id header. Initialize session first.');
      }
    } catch (error) {
      logger.error('Error handling MCP request', { error: errorMessage(error) });
      if (!res.headersSent) {
        jsonRpcError(res, 500, -32603, 'Internal server error');
      }
    }
  });

  app.get('/mcp', async (req: Request, res: Response) => {
    const active = activeSession(req);
    if (!active) {
      logger.warn('SSE request with invalid session', {
        sessionId: req.header('mcp-session-id') ?? 'none',
      });
      jsonRpcError(res, 400, -32000, 'Invalid or missing session ID');
      return;
    }

    logger.debug('SSE connection established', { sessionId: active.id });
    try {
      await active.session.transport.handleRequest(req, res);
    } catch (error) {
      logger.error('Error handling SSE request', { error: errorMessage(error) });
      if (!res.headersSent) {
        jsonRpcError(res, 500, -32603, 'Internal server error');
      }
    }
  });

  app.delete('/mcp', async (req: Request, res: Response) => {
    const active = activeSession(req);
    if (!active) {
      logger.warn('DELETE request with invalid session', {
        sessionId: req.header('mcp-session-id') ?? 'none',
      });
      jsonRpcError(res, 400, -32000, 'Invalid or missing session ID');
      return;
    }

    logger.info('Terminating session via DELETE', { sessionId: active.id });
    try {
      await active.session.transport.handleRequest(req, res);
    } catch (error) {
      logger.error('Error terminating session', { error: errorMessage(error) });
      if (!res.headersSent) {
        jsonRpcError(res, 500, -32603, 'Internal server error');
      }
    } finally {
      sessions.delete(active.id);
    }
  });

  async function close(): Promise<void> {
    clearInterval(sweepInterval);
    const open = [...sessions.entries()];
    sessions.clear();
    await Promise.all(
      open.map(async ([id, session]) => {
        logger.debug('Closing session during shutdown', { sessionId: id });
        await session.transport.close().catch((error: unknown) => {
          logger.warn('Failed to close session transport', { sessionId: id, error: errorMessage(error) });
        });
      })
    );
  }

  return { app, sessions, close };
}
