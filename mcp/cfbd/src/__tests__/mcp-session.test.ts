/**
 * End-to-end tests: OAuth authorization, bearer-gated MCP sessions and
 * cached tool calls.
 *
 * The app is driven in process through supertest; the upstream API is
 * mocked with vitest-fetch-mock and tokens live in a temporary SQLite file.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import createFetchMock from 'vitest-fetch-mock';
import request from 'supertest';
import type { Express } from 'express';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createApp, type CfbdMcpApp } from '../app.js';
import { AuthorizationCodeStore } from '../auth/code-store.js';
import { TokenStore } from '../auth/token-store.js';
import { MemoryCacheProvider } from '../services/cache/index.js';
import { CfbdClient } from '../services/cfbd/index.js';

const fetchMocker = createFetchMock(vi);
const MCP_ACCEPT_HEADER = 'application/json, text/event-stream';
const SHARED_SECRET = 'test-shared-secret';
const VERIFIER = 'dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk';
const CHALLENGE = 'E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM';
const REDIRECT_URI = 'https://client.example/callback';

/**
 * Parse SSE (Server-Sent Events) response text to extract JSON data.
 * SSE format: "event: message\ndata: {...}\n\n"
 */
function parseSSEResponse(text: string): Record<string, unknown> | null {
  const lines = text.split('\n');
  for (const line of lines) {
    if (line.startsWith('data: ')) {
      try {
        return JSON.parse(line.slice(6));
      } catch {
        return null;
      }
    }
  }
  return null;
}

async function obtainToken(app: Express): Promise<string> {
  const authorize = await request(app).get('/authorize').query({
    response_type: 'code',
    client_id: 'test-client',
    redirect_uri: REDIRECT_URI,
    scope: 'read',
    state: 'test-state',
    code_challenge: CHALLENGE,
    code_challenge_method: 'S256',
  });
  const code = new URL(authorize.headers.location).searchParams.get('code') ?? '';

  const token = await request(app).post('/token').type('form').send({
    grant_type: 'authorization_code',
    code,
    client_id: 'test-client',
    redirect_uri: REDIRECT_URI,
    code_verifier: VERIFIER,
  });
  expect(token.status).toBe(200);
  return token.body.access_token;
}

function postMcp(app: Express, token: string, body: object, sessionId?: string) {
  const req = request(app)
    .post('/mcp')
    .set('Accept', MCP_ACCEPT_HEADER)
    .set('Authorization', `Bearer ${token}`);
  if (sessionId) {
    req.set('mcp-session-id', sessionId);
  }
  return req.send(body);
}

const initializeRequest = {
  jsonrpc: '2.0',
  method: 'initialize',
  params: {
    protocolVersion: '2025-03-26',
    capabilities: {},
    clientInfo: { name: 'test-client', version: '1.0.0' },
  },
  id: 1,
};

async function initializeSession(app: Express, token: string): Promise<string> {
  const response = await postMcp(app, token, initializeRequest);
  expect(response.status).toBe(200);
  const sessionId = response.headers['mcp-session-id'];
  expect(typeof sessionId).toBe('string');

  await postMcp(app, token, { jsonrpc: '2.0', method: 'notifications/initialized' }, sessionId);
  return sessionId;
}

async function rpc(
  app: Express,
  token: string,
  sessionId: string,
  method: string,
  params: Record<string, unknown>
): Promise<Record<string, unknown>> {
  const response = await postMcp(app, token, { jsonrpc: '2.0', method, params, id: 2 }, sessionId);
  const data = parseSSEResponse(response.text);
  if (!data || !data.result) {
    throw new Error(`No result for ${method}: ${response.text}`);
  }
  return data.result as Record<string, unknown>;
}

async function callTool(
  app: Express,
  token: string,
  sessionId: string,
  name: string,
  args: Record<string, unknown>
): Promise<{ text: string; isError: boolean }> {
  const result = await rpc(app, token, sessionId, 'tools/call', { name, arguments: args });
  const content = result.content as Array<{ type: string; text: string }>;
  return { text: content[0].text, isError: result.isError === true };
}

describe('CFBD MCP server', () => {
  let dir: string;
  let tokenStore: TokenStore;
  let mcp: CfbdMcpApp;

  function build(store: TokenStore): CfbdMcpApp {
    return createApp({
      tokenStore: store,
      codeStore: new AuthorizationCodeStore(),
      cfbdClient: new CfbdClient({
        apiKey: 'test-api-key',
        baseUrl: 'https://api.test',
        cache: new MemoryCacheProvider(),
      }),
      sharedSecret: SHARED_SECRET,
    });
  }

  beforeEach(() => {
    fetchMocker.enableMocks();
    fetchMocker.resetMocks();
    dir = mkdtempSync(join(tmpdir(), 'cfbd-mcp-'));
    tokenStore = new TokenStore(join(dir, 'tokens.db'));
    mcp = build(tokenStore);
  });

  afterEach(async () => {
    fetchMocker.disableMocks();
    await mcp.close();
    tokenStore.close();
    rmSync(dir, { recursive: true, force: true });
  });

  describe('plain routes', () => {
    it('answers the root path with OK', async () => {
      const response = await request(mcp.app).get('/');

      expect(response.status).toBe(200);
      expect(response.text).toBe('OK');
    });

    it('disallows crawlers', async () => {
      const response = await request(mcp.app).get('/robots.txt');

      expect(response.text).toBe('User-agent: *\nDisallow: /');
    });

    it('reports health with session and token counts', async () => {
      await obtainToken(mcp.app);

      const response = await request(mcp.app).get('/health');

      expect(response.body).toEqual({ status: 'healthy', version: '0.5.0', sessions: 0, tokens: 1 });
    });
  });

  describe('bearer gate', () => {
    it('rejects a request without an Authorization header', async () => {
      const response = await request(mcp.app)
        .post('/mcp')
        .set('Accept', MCP_ACCEPT_HEADER)
        .send(initializeRequest);

      expect(response.status).toBe(401);
      expect(response.headers['www-authenticate']).toBe('Bearer');
      expect(response.text).toBe('Unauthorized: Missing or invalid header');
      expect(mcp.sessions.size).toBe(0);
    });

    it('rejects an unknown token', async () => {
      const response = await postMcp(mcp.app, 'not-an-issued-token', initializeRequest);

      expect(response.status).toBe(401);
      expect(response.text).toBe('Unauthorized: Token not recognized');
      expect(mcp.sessions.size).toBe(0);
    });

    it('accepts the shared secret', async () => {
      const sessionId = await initializeSession(mcp.app, SHARED_SECRET);

      expect(mcp.sessions.has(sessionId)).toBe(true);
    });

    it('accepts a token issued before a restart', async () => {
      const token = await obtainToken(mcp.app);
      await mcp.close();
      tokenStore.close();

      tokenStore = new TokenStore(join(dir, 'tokens.db'));
      mcp = build(tokenStore);

      const sessionId = await initializeSession(mcp.app, token);
      expect(mcp.sessions.has(sessionId)).toBe(true);
    });
  });

  describe('sessions', () => {
    it('rejects a non-initialize request without a session', async () => {
      const response = await postMcp(mcp.app, SHARED_SECRET, {
        jsonrpc: '2.0',
        method: 'tools/list',
        params: {},
        id: 1,
      });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        jsonrpc: '2.0',
        error: { code: -32000, message: 'Missing mcp-session-id header. Initialize session first.' },
        id: null,
      });
    });

    it('rejects an unknown session ID', async () => {
      const response = await postMcp(
        mcp.app,
        SHARED_SECRET,
        { jsonrpc: '2.0', method: 'tools/list', params: {}, id: 1 },
        'missing-session'
      );

      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe('Invalid session ID. Session may have expired.');
    });
  });

  describe('tools', () => {
    it('lists every catalogue tool with the attribution note', async () => {
      const token = await obtainToken(mcp.app);
      const sessionId = await initializeSession(mcp.app, token);

      const result = await rpc(mcp.app, token, sessionId, 'tools/list', {});
      const tools = result.tools as Array<{ name: string; description: string }>;

      expect(tools.map((tool) => tool.name).sort()).toEqual([
        'get-advanced-box-score',
        'get-drives',
        'get-games',
        'get-games-teams',
        'get-play-stats',
        'get-plays',
        'get-pregame-win-probability',
        'get-rankings',
        'get-records',
      ]);
      for (const tool of tools) {
        expect(tool.description.startsWith('Note: When using this tool')).toBe(true);
      }
    });

    it('returns the upstream body and serves the repeat from cache', async () => {
      const rankings = [{ season: 2023, week: 5, polls: [{ poll: 'AP Top 25', ranks: [] }] }];
      fetchMocker.mockResponseOnce(JSON.stringify(rankings));

      const token = await obtainToken(mcp.app);
      const sessionId = await initializeSession(mcp.app, token);

      const first = await callTool(mcp.app, token, sessionId, 'get-rankings', { year: 2023, week: 5 });
      expect(first).toEqual({ text: JSON.stringify(rankings), isError: false });
      expect(fetchMocker.mock.calls).toHaveLength(1);
      expect(fetchMocker.mock.calls[0][0]).toBe('https://api.test/rankings?week=5&year=2023');

      const otherSession = await initializeSession(mcp.app, token);
      const second = await callTool(mcp.app, token, otherSession, 'get-rankings', { week: 5, year: 2023 });
      expect(second.text).toBe(JSON.stringify(rankings));
      expect(fetchMocker.mock.calls).toHaveLength(1);
    });

    it('lower-cases the classification before sending it upstream', async () => {
      fetchMocker.mockResponseOnce('[]');
      const sessionId = await initializeSession(mcp.app, SHARED_SECRET);

      await callTool(mcp.app, SHARED_SECRET, sessionId, 'get-plays', {
        year: 2023,
        week: 1,
        classification: 'FBS',
      });

      expect(fetchMocker.mock.calls[0][0]).toBe(
        'https://api.test/plays?classification=fbs&week=1&year=2023'
      );
    });

    it('reports a missing parameter group as a validation error', async () => {
      const sessionId = await initializeSession(mcp.app, SHARED_SECRET);

      const result = await callTool(mcp.app, SHARED_SECRET, sessionId, 'get-records', {});

      expect(result).toEqual({
        text: 'Validation error: At least one of year, team, conference is required\n\nSuggestion: Correct the arguments and try again.',
        isError: true,
      });
      expect(fetchMocker.mock.calls).toHaveLength(0);
    });

    it('rejects a misspelled filter instead of widening the query', async () => {
      const sessionId = await initializeSession(mcp.app, SHARED_SECRET);

      const result = await callTool(mcp.app, SHARED_SECRET, sessionId, 'get-games', {
        year: 2023,
        seasonType: 'postseason',
      });

      expect(result).toEqual({
        text: 'Validation error: Unexpected parameter: seasonType\n\nSuggestion: Correct the arguments and try again.',
        isError: true,
      });
      expect(fetchMocker.mock.calls).toHaveLength(0);
    });

    it('maps an upstream 401 to the API key message', async () => {
      fetchMocker.mockResponseOnce('Unauthorized', { status: 401, statusText: 'Unauthorized' });
      const sessionId = await initializeSession(mcp.app, SHARED_SECRET);

      const result = await callTool(mcp.app, SHARED_SECRET, sessionId, 'get-games', { year: 2023 });

      expect(result).toEqual({
        text: '401: API authentication failed. Please check your API key.',
        isError: true,
      });
    });
  });

  describe('resources and prompts', () => {
    it('serves the endpoint schema for rankings', async () => {
      const sessionId = await initializeSession(mcp.app, SHARED_SECRET);

      const result = await rpc(mcp.app, SHARED_SECRET, sessionId, 'resources/read', {
        uri: 'schema://rankings',
      });
      const contents = result.contents as Array<{ uri: string; text: string }>;

      expect(contents[0].uri).toBe('schema://rankings');
      expect(contents[0].text.split('\n').slice(0, 7)).toEqual([
        'Endpoint: /rankings',
        'Description: Get college football rankings data.',
        '',
        'Input Parameters:',
        '- year: integer (required) - Season year (e.g. 2023)',
        '- week: integer (optional) - Week of the season (1-15)',
        '- season_type: string (optional) - Season type: regular or postseason',
      ]);
    });

    it('fills in the compare-teams prompt', async () => {
      const sessionId = await initializeSession(mcp.app, SHARED_SECRET);

      const result = await rpc(mcp.app, SHARED_SECRET, sessionId, 'prompts/get', {
        name: 'compare-teams',
        arguments: { team1: 'Michigan', team2: 'Ohio State', year: '2023' },
      });
      const messages = result.messages as Array<{ role: string; content: { text: string } }>;

      expect(messages).toHaveLength(1);
      expect(messages[0].role).toBe('user');
      expect(messages[0].content.text).toBe(
        'Using the College Football Data API, compare Michigan and Ohio State in the 2023 season. ' +
          'Include their head-to-head game if they played, their records, any common opponents and their statistical performance.'
      );
    });
  });
});
