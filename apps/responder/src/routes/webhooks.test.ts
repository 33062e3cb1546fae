import { afterEach, describe, expect, it } from 'vitest';
import { inboundEvent } from '../testing/fixtures.js';
import type { RunningServer, TestContext } from '../testing/harness.js';
import { readJson, startServer, testContext } from '../testing/harness.js';
import { LocalRelay } from '../testing/relayServer.js';
import { displayName } from './webhooks.js';

function post(baseUrl: string, path: string, body: unknown) {
  return fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body)
  });
}

describe('displayName', () => {
  it('prefers the real name and falls back to the handle', () => {
    expect(displayName({ id: 'U1', name: 'dana', real_name: 'Dana Reyes' })).toBe('Dana Reyes');
    expect(displayName({ id: 'U1', name: 'dana', real_name: '  ' })).toBe('dana');
    expect(displayName({ id: 'U1', name: 'dana' })).toBe('dana');
  });
});

describe('webhook routes', () => {
  let ctx: TestContext;
  let server: RunningServer;
  let relay: LocalRelay | null = null;

  async function boot(env: Record<string, string> = {}) {
    ctx = testContext(env);
    server = await startServer(ctx);
  }

  afterEach(async () => {
    await server.close();
    await relay?.stop();
    relay = null;
  });

  it('stores a valid event and answers before any processing', async () => {
    await boot();

    const res = await post(server.baseUrl, '/zapier-webhook', inboundEvent());
    const body = await readJson(res);

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ status: 'received', user: 'Dana Reyes', channel: 'general' });
    const stored = await ctx.store.get(String(body.message_id));
    expect(stored).toMatchObject({
      status: 'pending',
      text: 'Can you help with the API docs?',
      channelId: 'C1',
      userId: 'U1',
      sourceTimestamp: '1718000000.000100',
      messageType: 'mention'
    });
    expect(body.timestamp).toBe(stored.receivedAt.toISOString());
    expect(ctx.stats.messagesReceived).toBe(1);
    expect(ctx.dispatcher.depth).toBe(1);
  });

  it('keeps the thread id when present', async () => {
    await boot();

    const res = await post(server.baseUrl, '/zapier-webhook', inboundEvent({ thread_ts: '1717999999.000001' }));
    const { message_id } = await readJson(res);

    expect((await ctx.store.get(String(message_id))).threadId).toBe('1717999999.000001');
  });

  it('rejects an event without text and stores nothing', async () => {
    await boot();
    const { text: _omitted, ...rest } = inboundEvent();

    const res = await post(server.baseUrl, '/zapier-webhook', rest);
    const body = await readJson(res);

    expect(res.status).toBe(400);
    expect(body.issues).toContain('text: Required');
    expect(ctx.repo.rows.size).toBe(0);
    expect(ctx.stats.messagesReceived).toBe(0);
    expect(ctx.dispatcher.depth).toBe(0);
  });

  it('rejects unparseable JSON and stores nothing', async () => {
    await boot();

    const res = await post(server.baseUrl, '/zapier-webhook', '{"text": "unterminated');

    expect(res.status).toBe(400);
    expect(await readJson(res)).toEqual({ ok: false, error: 'invalid JSON body' });
    expect(ctx.repo.rows.size).toBe(0);
  });

  it('rejects bodies over the size limit', async () => {
    await boot({ MAX_BODY_BYTES: '64' });

    const res = await post(server.baseUrl, '/zapier-webhook', inboundEvent({ text: 'x'.repeat(200) }));

    expect(res.status).toBe(413);
    expect(ctx.repo.rows.size).toBe(0);
  });

  it('serves the webhook on a configured path', async () => {
    await boot({ WEBHOOK_PATH: '/hooks/chat' });

    expect((await post(server.baseUrl, '/hooks/chat', inboundEvent())).status).toBe(200);
    expect((await post(server.baseUrl, '/zapier-webhook', inboundEvent())).status).toBe(404);
  });

  it('reports health', async () => {
    await boot();

    const res = await fetch(`${server.baseUrl}/health`);
    const body = await readJson(res);

    expect(res.status).toBe(200);
    expect(body.status).toBe('healthy');
    expect(body.port).toBe(Number(new URL(server.baseUrl).port));
    expect(typeof body.timestamp).toBe('string');
  });

  it('reports status counters', async () => {
    await boot();
    await post(server.baseUrl, '/zapier-webhook', inboundEvent());

    const body = await readJson(await fetch(`${server.baseUrl}/status`));

    expect(body).toMatchObject({
      server: 'running',
      version: '1.0.0',
      messages_received: 1,
      relay_configured: false,
      queue_depth: 1,
      messages: { pending: 1, total: 1 }
    });
    expect(body.connections).toBeGreaterThanOrEqual(1);
    expect(body.endpoints).toContain('POST /zapier-webhook');
  });

  it('stamps the last request on routes other than ingress', async () => {
    await boot();
    await fetch(`${server.baseUrl}/health`);

    expect(ctx.stats.messagesReceived).toBe(0);
    expect(ctx.stats.lastRequestAt).not.toBeNull();
  });

  it('answers 404 for unknown routes and allows any origin', async () => {
    await boot();

    const res = await fetch(`${server.baseUrl}/nope`);

    expect(res.status).toBe(404);
    expect(await readJson(res)).toEqual({ ok: false, error: 'not found' });
    expect(res.headers.get('access-control-allow-origin')).toBe('*');
  });

  it('reports a failed self-test when no relay is configured', async () => {
    await boot();

    const res = await post(server.baseUrl, '/test-response', {});

    expect(res.status).toBe(500);
    expect(await readJson(res)).toEqual({ test_sent: false, message: 'Relay webhook URL is not configured' });
  });

  it('posts the self-test through the relay', async () => {
    relay = new LocalRelay();
    await boot({ RELAY_WEBHOOK_URL: await relay.start() });

    const res = await post(server.baseUrl, '/test-response', {});

    expect(res.status).toBe(200);
    expect((await readJson(res)).test_sent).toBe(true);
    expect(relay.hits).toHaveLength(1);
  });

  describe('response confirmation', () => {
    it('marks a completed message sent', async () => {
      await boot();
      const m = await ctx.store.create({ text: 'hi', channelId: 'C1', userId: 'U1', sourceTimestamp: '1' });
      await ctx.store.claim(m.id);
      await ctx.store.transition(m.id, 'completed', { generatedReply: 'hello' });

      const res = await post(server.baseUrl, '/response-confirmation', { messageId: m.id, status: 'sent' });

      expect(res.status).toBe(200);
      expect(await readJson(res)).toEqual({ ok: true, message_id: m.id, status: 'sent' });
    });

    it('rejects a confirmation without a message id', async () => {
      await boot();

      const res = await post(server.baseUrl, '/response-confirmation', { status: 'sent' });

      expect(res.status).toBe(400);
      expect((await readJson(res)).issues).toEqual(['message_id: Required']);
    });

    it('answers 404 for an unknown message', async () => {
      await boot();

      const res = await post(server.baseUrl, '/response-confirmation', {
        message_id: '00000000-0000-4000-8000-000000000000',
        status: 'sent'
      });

      expect(res.status).toBe(404);
    });
  });
});
