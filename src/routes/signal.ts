/**
 * Signal generation — Routes
 */
import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import { apiError, modeChanged } from '../models/shared.js';
import { InvalidModeError } from '../models/signal.js';
import type { SignalGenerator } from '../services/signal-generator.js';
import { clientErrorStatus } from '../utils/http-errors.js';

export function signalRoutes(generator: SignalGenerator): Router {
  const router = Router();

  // GET /status — current generation mode
  router.get('/status', (_req, res) => {
    res.json({ mode: generator.getMode() });
  });

  // POST /set_mode/:mode — switch mode
  router.post('/set_mode/:mode', (req, res, next) => {
    try {
      const mode = generator.setMode(req.params.mode);
      res.json(modeChanged(mode));
    } catch (err: unknown) {
      if (err instanceof InvalidModeError) {
        res.status(400).json(apiError(err.message));
        return;
      }
      next(err);
    }
  });

  // A mode Express cannot decode (e.g. a broken %-escape) never reaches the
  // handler above; it is still just an invalid mode.
  router.use('/set_mode', (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (clientErrorStatus(err) === undefined) {
      next(err);
      return;
    }
    res.status(400).json(apiError(new InvalidModeError(req.path.replace(/^\//, '')).message));
  });

  // GET /data — next point, or [] while stopped
  router.get('/data', (_req, res) => {
    res.json(generator.nextPoint());
  });

  return router;
}
