import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import type { Logger } from 'pino';
import { AppError } from './errors.js';
import { errorMessage } from './result.js';

/** Express 4 does not forward rejected promises; this does. */
export function asyncRoute(fn: (req: Request, res: Response) => Promise<unknown>): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

export function formatIssues(error: ZodError): string[] {
  return error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
}

// body-parser tags its errors with a `type`
function bodyParserType(e: unknown): string | null {
  if (typeof e !== 'object' || e === null || !('type' in e)) return null;
  return typeof e.type === 'string' ? e.type : null;
}

export function errorHandler(log: Logger) {
  return (e: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(e);

    const parserType = bodyParserType(e);
    if (parserType === 'entity.too.large') {
      return res.status(413).json({ ok: false, error: 'request body too large' });
    }
    if (parserType === 'entity.parse.failed') {
      return res.status(400).json({ ok: false, error: 'invalid JSON body' });
    }
    if (e instanceof ZodError) {
      return res.status(400).json({ ok: false, error: 'invalid request', issues: formatIssues(e) });
    }
    if (e instanceof AppError) {
      if (e.status >= 500) log.error({ err: e, path: req.path }, e.message);
      return res.status(e.status).json({ ok: false, error: e.message });
    }
    log.error({ err: e, path: req.path }, 'unhandled route error');
    return res.status(500).json({ ok: false, error: errorMessage(e) });
  };
}
