/**
 * Integration tests for the MCP session protocol.
 *
 * Uses supertest to drive the Express app directly without starting a
 * server. Homebox itself is replaced by a fetch mock.
 *
 * Session IDs land in the transports map via the onsessioninitialized
 * callback after the initialize request completes.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import createFetchMock from 'vitest-fetch-mock';
import { z } from 'zod';
import { app, transports } from '../app.js';
import { resetEnv } from '../lib/env.js';
import { resetHomeboxClient } from '../services/homebox/index.js';

const fetchMocker = createFetchMock(vi);

/**
 * The SDK requires clients to accept both application/json and text/event-stream.
 */
const MCP_ACCEPT_HEADER = 'application/json, text/event-stream';

const INITIALIZE_REQUEST = {
  jsonrpc: '2.0',
  method: 'initialize',
  params: {
    protocolVersion: '2025-03-26',
    capabilities: {},
    clientInfo: {
      name: 'test-client',
      version: '1.0.0',
    },
  },
  id: 1,
};

const toolsListSchema = z.object({
  result: z.object({
    tools: z.array(z.object({ name: z.string() })),
  }),
});

const toolCallSchema = z.object({
  result: z.object({
    content: z.array(z.object({ type: z.string(), text: z.string() })),
    isError: z.boolean().optional(),
  }),
});

/**
 * Extracts the JSON payload from an SSE body ("event: message\ndata: {...}\n\n").
 */
function parseSSEResponse(text: string): unknown {
  for (const line of text.split('\n')) {
    if (line.startsWith('data: ')) {
      return JSON.parse(line.slice(6));
    }
  }
  return undefined;
}

/**
 * Initializes a session, sends the initialized notification and returns
 * the new session ID.
 */
async function initializeSession(): Promise<string> {
  const before = new Set(transports.keys());

  await request(app).post('/mcp').set('Accept', MCP_ACCEPT_HEADER).send(INITIALIZE_REQUEST);

  // onsessioninitialized runs asynchronously
  await new Promise((resolve) => setTimeout(resolve, 10));

  const sessionId = Array.from(transports.keys()).find((id) => !before.has(id));
  if (sessionId === undefined) {
    throw new Error('No session was created');
  }

  await request(app)
    .post('/mcp')
    .set('Accept', MCP_ACCEPT_HEADER)
    .set('mcp-session-id', sessionId)
    .send({ jsonrpc: '2.0', method: 'notifications/initialized' });

  return sessionId;
}

async function callTool(
  sessionId: string,
  name: string,
  args: Record<string, unknown>
): Promise<z.infer<typeof toolCallSchema>['result']> {
  const response = await request(app)
    .post('/mcp')
    .set('Accept', MCP_ACCEPT_HEADER)
    .set('mcp-session-id', sessionId)
    .send({
      jsonrpc: '2.0',
      method: 'tools/call',
      params: { name, arguments: args },
      id: 2,
    });

  expect(response.status).toBe(200);
  return toolCallSchema.parse(parseSSEResponse(response.text)).result;
}

describe('MCP Session Protocol', () => {
  beforeEach(() => {
    vi.stubEnv('HOMEBOX_URL', 'https://homebox.test');
    resetEnv();
    resetHomeboxClient();
    transports.clear();
    fetchMocker.enableMocks();
    fetchMocker.resetMocks();
  });

  afterEach(() => {
    fetchMocker.disableMocks();
    vi.unstubAllEnvs();
    resetEnv();
    resetHomeboxClient();
  });

  describe('Session initialization', () => {
    it('POST /mcp with initialize request returns 200', async () => {
      const response = await request(app)
        .post('/mcp')
        .set('Accept', MCP_ACCEPT_HEADER)
        .send(INITIALIZE_REQUEST);

      expect(response.status).toBe(200);
    });

    it('stores the session in the transports map', async () => {
      expect(transports.size).toBe(0);

      await request(app).post('/mcp').set('Accept', MCP_ACCEPT_HEADER).send(INITIALIZE_REQUEST);
      await new Promise((resolve) => setTimeout(resolve, 10));

      expect(transports.size).toBe(1);
    });

    it('response body carries the server name and version', async () => {
      const response = await request(app)
        .post('/mcp')
        .set('Accept', MCP_ACCEPT_HEADER)
        .send(INITIALIZE_REQUEST);

      expect(parseSSEResponse(response.text)).toMatchObject({
        result: {
          serverInfo: { name: 'homebox-mcp', version: '1.0.0' },
        },
      });
    });
  });

  describe('Session rejection', () => {
    it('rejects a non-initialize request without session ID', async () => {
      const response = await request(app)
        .post('/mcp')
        .set('Accept', MCP_ACCEPT_HEADER)
        .send({ jsonrpc: '2.0', method: 'tools/list', id: 1 });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        jsonrpc: '2.0',
        error: {
          code: -32000,
          message: 'Missing mcp-session-id header. Initialize session first.',
        },
        id: null,
      });
    });

    it('rejects an unknown session ID', async () => {
      const response = await request(app)
        .post('/mcp')
        .set('Accept', MCP_ACCEPT_HEADER)
        .set('mcp-session-id', 'invalid-session-id-12345')
        .send({ jsonrpc: '2.0', method: 'tools/list', id: 1 });

      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe('Invalid session ID. Session may have expired.');
    });

    it('rejects DELETE for an unknown session', async () => {
      const response = await request(app)
        .delete('/mcp')
        .set('mcp-session-id', 'invalid-session-id-12345');

      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe('Invalid or missing session ID');
    });
  });

  describe('Tools', () => {
    it('tools/list returns every Homebox tool', async () => {
      const sessionId = await initializeSession();

      const response = await request(app)
        .post('/mcp')
        .set('Accept', MCP_ACCEPT_HEADER)
        .set('mcp-session-id', sessionId)
        .send({ jsonrpc: '2.0', method: 'tools/list', id: 2 });

      expect(response.status).toBe(200);

      const { result } = toolsListSchema.parse(parseSSEResponse(response.text));
      expect(result.tools.map((tool) => tool.name).sort()).toEqual([
        'get_item_details',
        'homebox_ping',
        'list_locations',
        'search_items',
        'search_items_by_location',
      ]);
    });

    it('homebox_ping answers pong', async () => {
      const sessionId = await initializeSession();

      const result = await callTool(sessionId, 'homebox_ping', {});

      expect(result.content[0].text).toBe('pong');
    });

    it('search_items applies default paging and returns text', async () => {
      fetchMocker.mockResponseOnce(
        JSON.stringify({ total: 1, data: [{ id: 'item-1', name: 'Drill', quantity: 1 }] })
      );
      const sessionId = await initializeSession();

      const result = await callTool(sessionId, 'search_items', { query: 'drill' });

      expect(result.content[0].text).toBe(
        "Found 1 items matching 'drill':\n\n1. Drill\n   Quantity: 1\n\nPage 1 of 1\n"
      );
      expect(fetchMocker.mock.calls[0][0]).toBe(
        'https://homebox.test/api/v1/items?q=drill&page=1&pageSize=20'
      );
    });

    it('search_items reports Homebox failures as error text', async () => {
      fetchMocker.mockResponseOnce('', { status: 500, statusText: 'Internal Server Error' });
      const sessionId = await initializeSession();

      const result = await callTool(sessionId, 'search_items', { query: 'drill' });

      expect(result.content[0].text).toBe('Error searching items: HTTP 500: Internal Server Error');
      expect(result.isError).toBe(true);
    });
  });

  describe('Health endpoint', () => {
    it('reports status, version and configuration', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        status: 'healthy',
        version: '1.0.0',
        sessions: 0,
        configured: true,
      });
    });

    it('reports configured: false without HOMEBOX_URL', async () => {
      vi.stubEnv('HOMEBOX_URL', '');
      resetEnv();
      resetHomeboxClient();

      const response = await request(app).get('/health');

      expect(response.body.configured).toBe(false);
    });

    it('counts active sessions', async () => {
      await initializeSession();

      const response = await request(app).get('/health');

      expect(response.body.sessions).toBe(1);
    });
  });
});
