import express, { Express, Request, RequestHandler, Response, NextFunction } from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import type { Server } from 'http';
import { ServerSettings, WebhookSettings } from '../schema/index.js';
import { ActionLauncher, SpawnActionLauncher } from './action-launcher.js';
import { createWebhookHandler } from './webhooks/handler.js';

export interface AppOptions {
  server: ServerSettings;
  webhook: WebhookSettings | null;
  configErrors?: string[];
  /** Defaults to spawning the configured script */
  launcher?: ActionLauncher;
}

const GREETING = 'Urm, hi?\nHow did you get here?\nThis is an api for computers \'n\' stuff, not for humans :P';

interface HttpError {
  status: number;
  type?: string;
}

function isHttpError(error: unknown): error is HttpError {
  return typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number';
}

export function createApp(options: AppOptions): Express {
  const { server, webhook } = options;
  const launcher = options.launcher ?? new SpawnActionLauncher();

  const app = express();

  if (server.trustProxy > 0) {
    app.set('trust proxy', server.trustProxy);
  }
  app.disable('x-powered-by');

  // No HTML is served, so CSP adds nothing
  app.use(helmet({
    contentSecurityPolicy: false,
  }));

  const webhookMiddleware: RequestHandler[] = [];
  if (server.rateLimitPerMinute > 0) {
    webhookMiddleware.push(rateLimit({
      windowMs: 60 * 1000,
      limit: server.rateLimitPerMinute,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: 'Rate limit exceeded' },
    }));
  }

  app.get('/', (_req: Request, res: Response) => {
    res.type('text/plain').send(GREETING);
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', configured: webhook !== null });
  });

  // The signature covers the exact bytes sent, so the body is never parsed or inflated
  app.post(
    '/',
    ...webhookMiddleware,
    express.raw({ type: () => true, limit: server.bodyLimit, inflate: false }),
    createWebhookHandler({ webhook, configErrors: options.configErrors, launcher })
  );

  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (isHttpError(error) && error.type === 'entity.too.large') {
      console.warn(`[webhook-runner] Rejected ${req.method} ${req.path}: body exceeds ${server.bodyLimit}`);
      res.status(413).json({ error: 'Payload too large' });
      return;
    }

    if (isHttpError(error) && error.type === 'encoding.unsupported') {
      console.warn(`[webhook-runner] Rejected ${req.method} ${req.path}: encoded body ${req.get('Content-Encoding') ?? ''}`);
      res.status(415).json({ error: 'Unsupported content encoding' });
      return;
    }

    const status = isHttpError(error) && error.status >= 400 && error.status < 600 ? error.status : 500;
    console.error(`[webhook-runner] ${req.method} ${req.path} failed:`, error);
    res.status(status).json({ error: status >= 500 ? 'Internal server error' : 'Bad request' });
  });

  return app;
}

// Start server
export function startServer(options: AppOptions): Promise<Server> {
  const app = createApp(options);
  const { port, host } = options.server;

  return new Promise((resolve, reject) => {
    const httpServer = app.listen(port, host, () => {
      httpServer.off('error', reject);
      console.log(`[webhook-runner] Listening on http://${host}:${port}`);
      console.log(`  Webhook: POST http://${host}:${port}/ (${options.server.bodyLimit} max body)`);
      console.log(`  Health:  http://${host}:${port}/health`);
      if (options.webhook) {
        console.log(`  Action:  ${options.webhook.interpreter ? `${options.webhook.interpreter} ` : ''}${options.webhook.scriptPath}`);
      } else {
        console.log(`  Action:  none (webhooks will answer 500 until WEBHOOK_SECRET and WEBHOOK_SCRIPT are set)`);
      }
      resolve(httpServer);
    });
    httpServer.once('error', reject);
  });
}
