import WebSocket from 'ws';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { FakeSupabase } from './helpers/fakeSupabase.js';
import { NOW, makeMessage } from './helpers/fixtures.js';

const createClientMock = vi.fn();

vi.mock('@supabase/supabase-js', () => ({
  createClient: createClientMock,
}));

const TABLES = { messages: 'qa_messages', evaluations: 'qa_evaluations' };

describe('Supabase client', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    createClientMock.mockReset();
    vi.restoreAllMocks();
    vi.resetModules();
  });

  it('is never built when the gateway is handed a client', async () => {
    createClientMock.mockImplementation(() => {
      throw new Error('Node.js 20 detected without native WebSocket support');
    });
    const { SupabaseDataGateway } = await import('../src/services/dataGateway.js');
    const store = new FakeSupabase().seed(TABLES.messages, [makeMessage(1)]);

    const messages = await new SupabaseDataGateway(store.asClient(), TABLES).fetchMessages({
      start: null,
      end: NOW,
    });

    expect(messages.map((message) => message.id)).toEqual([1]);
    expect(createClientMock).not.toHaveBeenCalled();
  });

  it('builds one shared service client with a realtime transport', async () => {
    const client = new FakeSupabase().asClient();
    createClientMock.mockReturnValue(client);
    const { getSupabase } = await import('../src/shared/supabase.js');

    expect(getSupabase()).toBe(client);
    expect(getSupabase()).toBe(client);
    expect(createClientMock).toHaveBeenCalledTimes(1);
    expect(createClientMock).toHaveBeenCalledWith('http://127.0.0.1:54321', 'test-secret', {
      auth: { autoRefreshToken: false, persistSession: false },
      realtime: { transport: WebSocket },
    });
  });

  it('probes both record tables', async () => {
    const { testSupabaseConnection } = await import('../src/shared/supabase.js');
    const store = new FakeSupabase();

    await expect(testSupabaseConnection(store.asClient())).resolves.toBe(true);
    expect(store.requests.map((request) => [request.table, request.limit])).toEqual([
      [TABLES.messages, 1],
      [TABLES.evaluations, 1],
    ]);
  });

  it('reports a failed probe without throwing', async () => {
    const { testSupabaseConnection } = await import('../src/shared/supabase.js');
    const store = new FakeSupabase();
    store.errorMessage = 'permission denied';

    await expect(testSupabaseConnection(store.asClient())).resolves.toBe(false);
    expect(store.requests).toHaveLength(1);
  });
});
