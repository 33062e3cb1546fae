import http from 'node:http';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import { Server } from 'socket.io';
import type { AppContext } from './context.js';
import { errorHandler } from './lib/http.js';
import { errorMessage } from './lib/result.js';
import { adminRouter } from './routes/admin.js';
import { webhookRouter } from './routes/webhooks.js';
import type { SocketNotifier } from './services/notifier.js';

export type ResponderServer = {
  app: express.Express;
  httpServer: http.Server;
  io: Server;
};

/**
 * Builds the express app and the HTTP server it runs on, with socket.io
 * mounted on the same port. Does not listen.
 */
export function createServer(ctx: AppContext, opts: { notifier?: SocketNotifier } = {}): ResponderServer {
  const { config, stats } = ctx;
  const log = ctx.logger.child({ component: 'http' });

  const app = express();
  app.disable('x-powered-by');
  app.set('trust proxy', 1);

  app.use((_req, _res, next) => {
    stats.recordRequest();
    next();
  });
  app.use(helmet());
  app.use(
    cors({
      origin: '*',
      methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['content-type', 'x-admin-token']
    })
  );
  app.use(express.json({ limit: config.maxBodyBytes }));
  if (config.httpLog) app.use(morgan('combined'));

  app.use(webhookRouter(ctx));
  if (config.adminToken) {
    app.use('/admin', adminRouter(ctx, config.adminToken));
  } else {
    log.info('ADMIN_TOKEN not set, admin routes disabled');
  }

  app.use((_req, res) => {
    res.status(404).json({ ok: false, error: 'not found' });
  });
  app.use(errorHandler(log));

  const httpServer = http.createServer(app);
  httpServer.requestTimeout = config.requestTimeoutMs;
  httpServer.headersTimeout = Math.min(config.requestTimeoutMs, 60_000);

  httpServer.on('connection', () => {
    stats.connectionCount += 1;
  });

  // malformed requests and dropped sockets never reach express
  httpServer.on('clientError', (e, socket) => {
    log.warn({ error: errorMessage(e) }, 'client connection error');
    if (socket.writable) {
      socket.end('HTTP/1.1 400 Bad Request\r\nConnection: close\r\n\r\n');
    } else {
      socket.destroy();
    }
  });

  const io = new Server(httpServer, {
    path: '/socket.io',
    cors: { origin: '*', methods: ['GET', 'POST'] }
  });
  io.on('connection', (socket) => {
    log.debug({ socketId: socket.id }, 'socket connected');
    socket.on('disconnect', () => log.debug({ socketId: socket.id }, 'socket disconnected'));
  });
  opts.notifier?.attach(io);

  return { app, httpServer, io };
}
