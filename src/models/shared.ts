/**
 * Response envelopes shared by the HTTP routes.
 */
import type { Mode } from './signal.js';

export interface ModeChangedResponse {
  status: 'success';
  new_mode: Mode;
}

export interface ErrorResponse {
  status: 'error';
  message: string;
}

export function modeChanged(mode: Mode): ModeChangedResponse {
  return { status: 'success', new_mode: mode };
}

export function apiError(message: string): ErrorResponse {
  return { status: 'error', message };
}
