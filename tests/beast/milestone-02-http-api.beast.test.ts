/**
 * Beast Tests — Milestone 2: HTTP API
 *
 * Exercises the status, set_mode, data and health routes end to end.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import type { Express } from 'express';
import { createApp } from '../../src/app.js';
import { SignalGenerator } from '../../src/services/signal-generator.js';
import type { Point } from '../../src/models/signal.js';
import { CaptureLogger, FakeClock, SequenceRandom, request } from './helpers.js';

let logger: CaptureLogger;
let generator: SignalGenerator;
let app: Express;

beforeEach(() => {
  logger = new CaptureLogger();
  generator = new SignalGenerator({ clock: new FakeClock(), random: new SequenceRandom([0.5]), logger });
  app = createApp({ generator, logger });
});

describe('Milestone 2: HTTP API', () => {
  // ─── Status ──────────────────────────────────────────────────

  it('Beast 2.1 — GET /status should report stopped at startup', async () => {
    const res = await request(app, 'GET', '/status');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ mode: 'stopped' });
  });

  // ─── Set Mode ────────────────────────────────────────────────

  it('Beast 2.2 — POST /set_mode/:mode should switch mode', async () => {
    const res = await request(app, 'POST', '/set_mode/abnormal');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'success', new_mode: 'abnormal' });
    expect((await request(app, 'GET', '/status')).body).toEqual({ mode: 'abnormal' });
    expect(logger.lines).toEqual(['Signal mode set to abnormal (was stopped)']);
  });

  it('Beast 2.3 — POST /set_mode/:mode should reject an unknown mode with 400', async () => {
    await request(app, 'POST', '/set_mode/normal');

    const res = await request(app, 'POST', '/set_mode/turbo');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      status: 'error',
      message: 'Invalid mode. Use one of: stopped, normal, abnormal',
    });
    expect(generator.getMode()).toBe('normal');
  });

  it('Beast 2.4 — POST /set_mode/:mode should be case-sensitive', async () => {
    const res = await request(app, 'POST', '/set_mode/Normal');

    expect(res.status).toBe(400);
    expect(generator.getMode()).toBe('stopped');
  });

  // ─── Data ────────────────────────────────────────────────────

  it('Beast 2.5 — GET /data should return an empty list while stopped', async () => {
    const res = await request(app, 'GET', '/data');

    expect(res.status).toBe(200);
    expect(res.body).toEqual([]);
  });

  it('Beast 2.6 — GET /data should return one point per call while running', async () => {
    await request(app, 'POST', '/set_mode/normal');

    const first = await request(app, 'GET', '/data');
    const second = await request(app, 'GET', '/data');

    expect(first.status).toBe(200);
    expect(first.body).toEqual([{ time: '2024-01-01T00:00:00.100Z', value: 60 }]);
    expect(second.body).toEqual([{ time: '2024-01-01T00:00:00.200Z', value: 83.97 }]);
  });

  it('Beast 2.7 — GET /data should go back to empty after stopping', async () => {
    await request(app, 'POST', '/set_mode/normal');
    await request(app, 'GET', '/data');
    await request(app, 'POST', '/set_mode/stopped');

    const res = await request(app, 'GET', '/data');

    expect(res.body).toEqual([]);
  });

  // ─── Health & Errors ─────────────────────────────────────────

  it('Beast 2.8 — GET /health should report the service and mode', async () => {
    const res = await request(app, 'GET', '/health');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'operational', service: 'signal-sim', mode: 'stopped' });
  });

  it('Beast 2.9 — unknown routes and wrong methods should answer 404', async () => {
    const unknown = await request(app, 'GET', '/metrics');
    const wrongMethod = await request(app, 'GET', '/set_mode/normal');

    expect(unknown.status).toBe(404);
    expect(unknown.body).toEqual({ status: 'error', message: 'Not found' });
    expect(wrongMethod.status).toBe(404);
    expect(generator.getMode()).toBe('stopped');
  });

  it('Beast 2.10 — unexpected failures should answer 500 and be logged', async () => {
    class FailingGenerator extends SignalGenerator {
      override nextPoint(): Point[] {
        throw new Error('generator exploded');
      }
    }
    const failing = createApp({ generator: new FailingGenerator({ logger }), logger });

    const res = await request(failing, 'GET', '/data');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ status: 'error', message: 'Internal server error' });
    expect(logger.errors).toEqual(['Unhandled request error']);
  });

  it('Beast 2.11 — createApp should build its own generator when none is given', async () => {
    const standalone = createApp({ logger });

    await request(standalone, 'POST', '/set_mode/normal');
    const res = await request(standalone, 'GET', '/data');

    expect(res.status).toBe(200);
    expect(Array.isArray(res.body)).toBe(true);
    expect(res.body).toHaveLength(1);
  });

  it('Beast 2.12 — POST /set_mode/:mode should answer 400 for an undecodable mode', async () => {
    const res = await request(app, 'POST', '/set_mode/%E0');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      status: 'error',
      message: 'Invalid mode. Use one of: stopped, normal, abnormal',
    });
    expect(generator.getMode()).toBe('stopped');
    expect(logger.errors).toEqual([]);
  });

  it('Beast 2.13 — errors carrying a 4xx status should keep it', async () => {
    class BusyGenerator extends SignalGenerator {
      override nextPoint(): Point[] {
        throw Object.assign(new Error('Generator busy'), { status: 409 });
      }
    }
    const busy = createApp({ generator: new BusyGenerator({ logger }), logger });

    const res = await request(busy, 'GET', '/data');

    expect(res.status).toBe(409);
    expect(res.body).toEqual({ status: 'error', message: 'Generator busy' });
    expect(logger.errors).toEqual([]);
  });
});
