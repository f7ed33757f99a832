/**
 * Signal monitoring — Service
 *
 * Pure reducers over MonitorState. Each takes the monitor's current time
 * explicitly and returns the next state with the events it produced.
 */
import type { Mode, Point } from '../models/signal.js';
import type { AbnormalReading, MonitorEvent, MonitorState, MonitorUpdate } from '../models/monitor.js';

export const WINDOW_MS = 10_000;
export const ABNORMAL_THRESHOLD = 140;
export const MAX_ABNORMAL_HISTORY = 5;
export const ALERT_AFTER_MS = 10_000;

export function initialMonitorState(): MonitorState {
  return {
    mode: 'stopped',
    points: [],
    abnormalReadings: [],
    abnormalSinceMs: null,
    alertActive: false,
  };
}

/**
 * Drops leading points once the window spans more than WINDOW_MS, keeping
 * those strictly newer than `last - WINDOW_MS`.
 */
export function trimWindow(points: Point[]): Point[] {
  if (points.length < 2) {
    return points;
  }
  const first = Date.parse(points[0].time);
  const last = Date.parse(points[points.length - 1].time);
  if (last - first <= WINDOW_MS) {
    return points;
  }
  const start = points.findIndex((p) => Date.parse(p.time) > last - WINDOW_MS);
  return points.slice(start);
}

export function applyPoints(state: MonitorState, points: Point[], nowMs: number): MonitorUpdate {
  const events: MonitorEvent[] = [];
  let readings = state.abnormalReadings;

  for (const point of points) {
    events.push({ type: 'point', point });
    if (point.value > ABNORMAL_THRESHOLD) {
      const reading: AbnormalReading = {
        time: point.time,
        value: point.value,
        detectedAt: new Date(nowMs).toISOString(),
      };
      readings = [...readings, reading].slice(-MAX_ABNORMAL_HISTORY);
      events.push({ type: 'abnormal-reading', reading });
    }
  }

  return {
    state: { ...state, points: trimWindow([...state.points, ...points]), abnormalReadings: readings },
    events,
  };
}

/**
 * Raises the alert once the server has stayed in abnormal mode for more
 * than ALERT_AFTER_MS.
 */
export function evaluateAlert(state: MonitorState, nowMs: number): MonitorUpdate {
  if (state.mode !== 'abnormal' || state.abnormalSinceMs === null || state.alertActive) {
    return { state, events: [] };
  }
  const abnormalForMs = nowMs - state.abnormalSinceMs;
  if (abnormalForMs <= ALERT_AFTER_MS) {
    return { state, events: [] };
  }
  return { state: { ...state, alertActive: true }, events: [{ type: 'alert-raised', abnormalForMs }] };
}

export function applyStatus(state: MonitorState, mode: Mode, nowMs: number): MonitorUpdate {
  const events: MonitorEvent[] = [];
  let next = state;

  if (mode !== state.mode) {
    events.push({ type: 'mode-changed', from: state.mode, to: mode });
    next = { ...next, mode };
  }

  if (mode === 'abnormal') {
    if (next.abnormalSinceMs === null) {
      next = { ...next, abnormalSinceMs: nowMs };
    }
  } else {
    if (next.alertActive) {
      events.push({ type: 'alert-cleared', mode });
    }
    next = { ...next, abnormalSinceMs: null, alertActive: false };
  }

  const checked = evaluateAlert(next, nowMs);
  return { state: checked.state, events: [...events, ...checked.events] };
}
