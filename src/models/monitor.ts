/**
 * Signal monitoring — Types
 */
import type { Mode, Point } from './signal.js';

export interface AbnormalReading {
  /** Sample time reported by the server. */
  time: string;
  value: number;
  /** Monitor's own clock when the reading arrived. */
  detectedAt: string;
}

export interface MonitorState {
  mode: Mode;
  /** Rolling window of received points, oldest first. */
  points: Point[];
  /** Most recent abnormal readings, oldest first. */
  abnormalReadings: AbnormalReading[];
  abnormalSinceMs: number | null;
  alertActive: boolean;
}

export type MonitorEvent =
  | { type: 'point'; point: Point }
  | { type: 'abnormal-reading'; reading: AbnormalReading }
  | { type: 'mode-changed'; from: Mode; to: Mode }
  | { type: 'alert-raised'; abnormalForMs: number }
  | { type: 'alert-cleared'; mode: Mode };

export interface MonitorUpdate {
  state: MonitorState;
  events: MonitorEvent[];
}
