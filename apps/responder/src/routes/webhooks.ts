import { Router } from 'express';
import type { Request } from 'express';
import { z } from 'zod';
import type { AppContext } from '../context.js';
import { asyncRoute, formatIssues } from '../lib/http.js';
import { SERVER_VERSION } from '../services/stats.js';

/**
 * Inbound chat event as delivered by the automation hook. Only these fields
 * are read; anything else in the body is ignored.
 */
export const inboundEventSchema = z.object({
  text: z.string(),
  channel: z.object({ id: z.string().min(1), name: z.string() }),
  user: z.object({ id: z.string().min(1), name: z.string(), real_name: z.string().optional() }),
  ts: z.string().min(1),
  thread_ts: z.string().min(1).optional()
});

export type InboundEvent = z.infer<typeof inboundEventSchema>;

export function displayName(user: InboundEvent['user']): string {
  const real = user.real_name?.trim();
  return real ? real : user.name;
}

const confirmationSchema = z
  .object({
    message_id: z.string().uuid().optional(),
    messageId: z.string().uuid().optional(),
    status: z.string().min(1)
  })
  .transform((v, ctx) => {
    const messageId = v.message_id ?? v.messageId;
    if (!messageId) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['message_id'], message: 'Required' });
      return z.NEVER;
    }
    return { messageId, status: v.status };
  });

function boundPort(req: Request, fallback: number): number {
  return req.socket.localPort ?? fallback;
}

export function webhookRouter(ctx: AppContext): Router {
  const { config, store, relay, dispatcher, stats, logger } = ctx;
  const log = logger.child({ component: 'webhooks' });
  const router = Router();

  router.post(
    config.webhookPath,
    asyncRoute(async (req, res) => {
      const parsed = inboundEventSchema.safeParse(req.body);
      if (!parsed.success) {
        log.warn({ issues: parsed.error.issues.length }, 'rejected malformed inbound event');
        return res.status(400).json({ status: 'error', error: 'invalid payload', issues: formatIssues(parsed.error) });
      }

      const event = parsed.data;
      const message = await store.create({
        text: event.text,
        channelId: event.channel.id,
        channelName: event.channel.name,
        userId: event.user.id,
        userName: displayName(event.user),
        threadId: event.thread_ts ?? null,
        sourceTimestamp: event.ts
      });
      stats.recordReceived();
      dispatcher.enqueue(message.id);
      log.info({ messageId: message.id, channel: message.channelId }, 'inbound message stored');

      return res.json({
        status: 'received',
        message_id: message.id,
        timestamp: message.receivedAt.toISOString(),
        user: message.userName,
        channel: message.channelName
      });
    })
  );

  router.get('/health', (req, res) => {
    res.json({ status: 'healthy', timestamp: new Date().toISOString(), port: boundPort(req, config.port) });
  });

  router.get(
    '/status',
    asyncRoute(async (req, res) => {
      const counts = await store.counts();
      return res.json({
        server: 'running',
        version: SERVER_VERSION,
        port: boundPort(req, config.port),
        messages_received: stats.messagesReceived,
        connections: stats.connectionCount,
        uptime_seconds: stats.uptimeSeconds(),
        started_at: stats.startedAt.toISOString(),
        last_request: stats.lastRequestAt?.toISOString() ?? null,
        relay_configured: relay.configured,
        queue_depth: dispatcher.depth,
        messages: counts,
        endpoints: [
          `POST ${config.webhookPath}`,
          'GET /health',
          'GET /status',
          'POST /test-response',
          'POST /response-confirmation'
        ]
      });
    })
  );

  router.post(
    '/test-response',
    asyncRoute(async (_req, res) => {
      const sent = await relay.sendTest();
      if (!sent.ok) return res.status(500).json({ test_sent: false, message: sent.error.message });
      return res.json({ test_sent: true, message: 'Test response posted to the relay' });
    })
  );

  router.post(
    '/response-confirmation',
    asyncRoute(async (req, res) => {
      const parsed = confirmationSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ ok: false, error: 'invalid confirmation', issues: formatIssues(parsed.error) });
      }
      const message = await relay.confirm(parsed.data.messageId, parsed.data.status);
      return res.json({ ok: true, message_id: message.id, status: message.status });
    })
  );

  return router;
}
