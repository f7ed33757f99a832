/**
 * Monitoring client: polls a signal server, keeps a rolling window of
 * points, flags abnormal readings and alerts on a long abnormal stretch.
 */
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { resolveServerUrl } from '../config.js';
import { MODES } from '../models/signal.js';
import type { Mode, Point } from '../models/signal.js';
import type { MonitorEvent, MonitorUpdate } from '../models/monitor.js';
import { applyPoints, applyStatus, evaluateAlert, initialMonitorState } from '../services/monitor.js';
import { clock as systemClock, type Clock } from '../utils/clock.js';
import { errorMessage, readJsonBody } from './http.js';
import { processIo, type CliIo } from './set-mode.js';

export const DATA_INTERVAL_MS = 500;
export const STATUS_INTERVAL_MS = 2_000;

export const WATCH_USAGE = 'Usage: signal-watch [--url <base-url>] [--duration <seconds>]';

export interface WatchIo extends CliIo {
  clock: Clock;
  sleep(ms: number): Promise<void>;
  signal?: AbortSignal;
}

const PointsSchema = z.array(z.object({ time: z.string().datetime(), value: z.number() }));
const StatusSchema = z.object({ mode: z.enum(MODES) });
const DurationSchema = z.coerce.number().positive();

type FetchResult = { ok: true; body: unknown } | { ok: false };

export function createProcessWatchIo(signal: AbortSignal): WatchIo {
  return {
    ...processIo,
    clock: systemClock,
    signal,
    sleep: (ms) =>
      new Promise<void>((resolve) => {
        const timer = setTimeout(resolve, ms);
        signal.addEventListener(
          'abort',
          () => {
            clearTimeout(timer);
            resolve();
          },
          { once: true },
        );
      }),
  };
}

export function formatEvent(event: MonitorEvent): string {
  switch (event.type) {
    case 'point':
      return `${event.point.time} ${event.point.value.toFixed(2)}`;
    case 'abnormal-reading':
      return `Abnormal reading ${event.reading.value.toFixed(1)} at ${event.reading.time}`;
    case 'mode-changed':
      return `Server mode: ${event.to}`;
    case 'alert-raised':
      return `ALERT: server has been in abnormal mode for ${(event.abnormalForMs / 1000).toFixed(1)}s`;
    case 'alert-cleared':
      return `Alert cleared: server mode is now ${event.mode}`;
  }
}

async function fetchJson(io: WatchIo, url: string, label: string): Promise<FetchResult> {
  let res: Response;
  try {
    res = await io.fetch(url);
  } catch (err: unknown) {
    io.err(`Network error: ${errorMessage(err)}`);
    return { ok: false };
  }
  if (res.status !== 200) {
    io.err(`Error fetching ${label}: server responded with status ${res.status}`);
    return { ok: false };
  }
  const body = await readJsonBody(res);
  if (body === undefined) {
    io.err(`Error decoding ${label}: response is not JSON`);
    return { ok: false };
  }
  return { ok: true, body };
}

async function pollData(io: WatchIo, baseUrl: string): Promise<Point[] | undefined> {
  const result = await fetchJson(io, `${baseUrl}/data`, 'data');
  if (!result.ok) return undefined;
  const parsed = PointsSchema.safeParse(result.body);
  if (!parsed.success) {
    io.err(`Error decoding data: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
    return undefined;
  }
  return parsed.data;
}

async function pollStatus(io: WatchIo, baseUrl: string): Promise<Mode | undefined> {
  const result = await fetchJson(io, `${baseUrl}/status`, 'status');
  if (!result.ok) return undefined;
  const parsed = StatusSchema.safeParse(result.body);
  if (!parsed.success) {
    io.err(`Error decoding status: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
    return undefined;
  }
  return parsed.data.mode;
}

/**
 * Polls `/data` every DATA_INTERVAL_MS and `/status` every
 * STATUS_INTERVAL_MS until `--duration` elapses or the signal aborts.
 * Resolves to 1 when every request failed, 0 otherwise.
 */
export async function runWatch(argv: string[], io: WatchIo): Promise<number> {
  let urlFlag: string | undefined;
  let durationFlag: string | undefined;
  try {
    const { values } = parseArgs({
      args: argv,
      options: { url: { type: 'string' }, duration: { type: 'string' } },
    });
    urlFlag = values.url;
    durationFlag = values.duration;
  } catch (err: unknown) {
    io.err(`Error: ${errorMessage(err)}`);
    io.err(WATCH_USAGE);
    return 1;
  }

  let durationMs: number | undefined;
  if (durationFlag !== undefined) {
    const parsed = DurationSchema.safeParse(durationFlag);
    if (!parsed.success) {
      io.err(`Error: --duration must be a positive number of seconds, got '${durationFlag}'`);
      return 1;
    }
    durationMs = parsed.data * 1000;
  }

  let baseUrl: string;
  try {
    baseUrl = resolveServerUrl(urlFlag, io.env);
  } catch (err: unknown) {
    io.err(`Error: ${errorMessage(err)}`);
    return 1;
  }

  io.out(`Watching ${baseUrl} (data every ${DATA_INTERVAL_MS}ms, status every ${STATUS_INTERVAL_MS}ms)`);

  let state = initialMonitorState();
  let received = 0;
  let flagged = 0;
  let attempted = 0;
  let succeeded = 0;

  const apply = (update: MonitorUpdate): void => {
    state = update.state;
    for (const event of update.events) {
      if (event.type === 'point') received += 1;
      if (event.type === 'abnormal-reading') flagged += 1;
      io.out(formatEvent(event));
    }
  };

  const start = io.clock.now().getTime();
  let nextStatusAt = start;

  while (!io.signal?.aborted) {
    const now = io.clock.now().getTime();
    if (durationMs !== undefined && now - start >= durationMs) {
      break;
    }

    if (now >= nextStatusAt) {
      nextStatusAt = now + STATUS_INTERVAL_MS;
      attempted += 1;
      const mode = await pollStatus(io, baseUrl);
      if (mode !== undefined) {
        succeeded += 1;
        apply(applyStatus(state, mode, now));
      }
    }

    attempted += 1;
    const points = await pollData(io, baseUrl);
    if (points !== undefined) {
      succeeded += 1;
      apply(applyPoints(state, points, now));
    }
    apply(evaluateAlert(state, now));

    await io.sleep(DATA_INTERVAL_MS);
  }

  io.out(`Done: ${received} points received, ${flagged} abnormal readings`);
  return attempted > 0 && succeeded === 0 ? 1 : 0;
}
