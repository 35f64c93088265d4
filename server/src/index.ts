import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { cors } from 'hono/cors';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { requestIdMiddleware } from './middleware/request-id.js';
import { createPipelineRoutes } from './routes/pipeline.js';
import { SessionController } from './pipeline/session-controller.js';
import { StageExecutor } from './pipeline/stage-executor.js';
import { loadServerSettings, type ServerSettings } from './lib/settings.js';
import logger from './lib/logger.js';

export function createController(settings: ServerSettings): SessionController {
  const executor = new StageExecutor({
    ideaTool: settings.ideaTool,
    docTool: settings.docTool,
    sessionsDir: settings.sessionsDir,
    killGraceMs: settings.killGraceMs,
  });
  return new SessionController({ executor, maxObserverQueue: settings.maxObserverQueue });
}

export function createApp(controller: SessionController, settings: ServerSettings) {
  const app = new Hono();
  const startTime = Date.now();
  let shuttingDown = false;

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    if (shuttingDown && c.req.path !== '/health') {
      return c.json({ error: 'Server is restarting. Please retry shortly.' }, 503);
    }
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    c.header('Referrer-Policy', 'no-referrer');
  });

  app.use('*', cors({
    origin: settings.allowedOrigins,
    credentials: true,
  }));

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    return c.json({
      status: shuttingDown ? 'draining' : 'ok',
      stage: controller.status().stage,
      observers: controller.observerCount,
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      timestamp: new Date().toISOString(),
    });
  });

  app.route('/api/pipeline', createPipelineRoutes(controller, {
    maxConfigBodyBytes: settings.maxConfigBodyBytes,
    heartbeatMs: settings.heartbeatMs,
  }));

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    logger.error({ err, requestId, path: c.req.path }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  const drain = () => {
    shuttingDown = true;
  };

  return { app, drain };
}

export function startServer(settings: ServerSettings = loadServerSettings()) {
  if (settings.isProduction && settings.allowedOrigins.length === 0) {
    logger.error('ALLOWED_ORIGINS not set in production; all cross-origin requests will be blocked');
  }

  const controller = createController(settings);
  const { app, drain } = createApp(controller, settings);

  logger.info({ port: settings.port }, 'Pipeline orchestrator starting');
  const server = serve({ fetch: app.fetch, port: settings.port });
  logger.info({ port: settings.port }, `Server running at http://localhost:${settings.port}`);

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    drain();
    logger.info({ signal }, 'Graceful shutdown initiated');

    const cancelRun = controller.shutdown().catch((err: unknown) => {
      logger.warn({ error: err instanceof Error ? err.message : String(err) }, 'Pipeline shutdown failed');
    });

    server.close(() => {
      void Promise.race([
        cancelRun,
        new Promise((resolve) => setTimeout(resolve, settings.killGraceMs + 1_000)),
      ]).finally(() => {
        logger.info('HTTP server closed');
        process.exit(0);
      });
    });

    setTimeout(() => {
      logger.warn('Forcing exit after shutdown timeout');
      process.exit(1);
    }, 10_000 + settings.killGraceMs).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
  });

  return { server, controller };
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer();
}
