import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import type { AppContext } from '../context.js';
import { MessageNotFoundError } from '../lib/errors.js';
import { asyncRoute } from '../lib/http.js';
import { MESSAGE_STATUSES, replyText } from '../services/lifecycle.js';
import { settingsPatchSchema } from '../services/settings.js';
import type { SimilarityResult } from '../services/similarity/engine.js';
import { formatConfidence } from '../services/similarity/engine.js';

const uuid = z.string().uuid();
const replyBody = z.object({ text: z.string() });
const templateBody = z.object({ isTemplate: z.boolean() });
const listQuery = z.object({
  status: z.enum(MESSAGE_STATUSES).optional(),
  limit: z.coerce.number().int().min(1).max(500).optional()
});

function similarView(r: SimilarityResult) {
  return {
    template_id: r.template.id,
    confidence: r.confidence,
    confidence_label: formatConfidence(r.confidence),
    tier: r.tier,
    text: r.template.text,
    reply: replyText(r.template)
  };
}

function requireAdmin(token: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const given = String(req.header('x-admin-token') ?? '');
    if (!given || given !== token) {
      return res.status(401).json({ ok: false, error: 'unauthorized' });
    }
    return next();
  };
}

/** Operator actions over stored messages. Mounted under /admin. */
export function adminRouter(ctx: AppContext, token: string): Router {
  const { store, similarity, orchestrator, relay, dispatcher, settings, stats } = ctx;
  const router = Router();

  router.use(requireAdmin(token));

  // ids are uuids in storage; anything else cannot exist
  router.param('id', (_req, _res, next, id: string) => {
    next(uuid.safeParse(id).success ? undefined : new MessageNotFoundError(id));
  });

  router.get(
    '/messages',
    asyncRoute(async (req, res) => {
      const { status, limit } = listQuery.parse(req.query);
      return res.json({ ok: true, messages: await store.list({ status, limit }) });
    })
  );

  router.post(
    '/messages/dismiss-pending',
    asyncRoute(async (_req, res) => res.json({ ok: true, dismissed: await store.dismissAllPending() }))
  );

  router.post(
    '/messages/retry-failed',
    asyncRoute(async (_req, res) => {
      const retried = await store.retryAllFailed();
      for (const m of retried) dispatcher.enqueue(m.id);
      return res.json({ ok: true, retried: retried.length });
    })
  );

  router.post(
    '/messages/clear-processed',
    asyncRoute(async (_req, res) => res.json({ ok: true, deleted: await store.clearProcessed() }))
  );

  router.get(
    '/messages/:id',
    asyncRoute(async (req, res) => res.json({ ok: true, message: await store.get(req.params.id) }))
  );

  router.get(
    '/messages/:id/similar',
    asyncRoute(async (req, res) => {
      const similar = await dispatcher.similarFor(req.params.id);
      return res.json({ ok: true, similar: similar.map(similarView) });
    })
  );

  router.delete(
    '/messages/:id/similar/:templateId',
    asyncRoute(async (req, res) => {
      const similar = await dispatcher.hideMatch(req.params.id, uuid.parse(req.params.templateId));
      return res.json({ ok: true, similar: similar.map(similarView) });
    })
  );

  router.post(
    '/messages/:id/generate',
    asyncRoute(async (req, res) => {
      const result = await orchestrator.generate(req.params.id);
      if (!result.ok) {
        return res.status(result.error.status).json({ ok: false, error: result.error.message, code: result.error.code });
      }
      return res.json({ ok: true, message: result.value });
    })
  );

  router.post(
    '/messages/:id/send',
    asyncRoute(async (req, res) => {
      const message = await store.get(req.params.id);
      const text = replyText(message);
      if (!text.trim()) return res.status(400).json({ ok: false, error: 'message has no reply to send' });
      const result = await relay.send(message, text);
      if (!result.ok) {
        return res.status(result.error.status).json({ ok: false, error: result.error.message, code: result.error.code });
      }
      return res.json({ ok: true, message: result.value });
    })
  );

  router.put(
    '/messages/:id/reply',
    asyncRoute(async (req, res) => {
      const { text } = replyBody.parse(req.body);
      return res.json({ ok: true, message: await store.editReply(req.params.id, text) });
    })
  );

  router.put(
    '/messages/:id/template',
    asyncRoute(async (req, res) => {
      const { isTemplate } = templateBody.parse(req.body);
      return res.json({ ok: true, message: await similarity.setTemplate(req.params.id, isTemplate) });
    })
  );

  router.post(
    '/messages/:id/dismiss',
    asyncRoute(async (req, res) => res.json({ ok: true, message: await store.dismiss(req.params.id) }))
  );

  router.post(
    '/messages/:id/retry',
    asyncRoute(async (req, res) => {
      const message = await store.retry(req.params.id);
      const queued = dispatcher.enqueue(message.id);
      return res.json({ ok: true, message, queued });
    })
  );

  router.delete(
    '/messages/:id',
    asyncRoute(async (req, res) => {
      await store.remove(req.params.id);
      return res.json({ ok: true });
    })
  );

  router.get(
    '/stats',
    asyncRoute(async (_req, res) =>
      res.json({
        ok: true,
        counts: await store.counts(),
        messages_received: stats.messagesReceived,
        queue_depth: dispatcher.depth,
        uptime_seconds: stats.uptimeSeconds()
      })
    )
  );

  router.get('/settings', (_req, res) => {
    res.json({ ok: true, settings: settings.get() });
  });

  router.put('/settings', (req, res) => {
    const patch = settingsPatchSchema.parse(req.body);
    res.json({ ok: true, settings: settings.update(patch) });
  });

  return router;
}
