import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { apiError } from './models/shared.js';
import { signalRoutes } from './routes/signal.js';
import { SignalGenerator } from './services/signal-generator.js';
import { clientErrorStatus } from './utils/http-errors.js';
import { consoleLogger, type Logger } from './utils/logger.js';

export interface AppOptions {
  generator?: SignalGenerator;
  logger?: Logger;
}

export function createApp(options: AppOptions = {}): express.Express {
  const logger = options.logger ?? consoleLogger;
  const generator = options.generator ?? new SignalGenerator({ logger });
  const app = express();

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'operational', service: 'signal-sim', mode: generator.getMode() });
  });

  app.use(signalRoutes(generator));

  app.use((_req, res) => {
    res.status(404).json(apiError('Not found'));
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = clientErrorStatus(err);
    if (status !== undefined) {
      res.status(status).json(apiError(err instanceof Error ? err.message : 'Bad request'));
      return;
    }
    logger.error('Unhandled request error', err);
    res.status(500).json(apiError('Internal server error'));
  });

  return app;
}
