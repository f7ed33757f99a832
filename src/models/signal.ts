/**
 * Signal generation — Types
 */

export const MODES = ['stopped', 'normal', 'abnormal'] as const;

export type Mode = (typeof MODES)[number];

export function isMode(value: string): value is Mode {
  return MODES.some((mode) => mode === value);
}

export interface Point {
  time: string;
  value: number;
}

export interface GeneratorState {
  mode: Mode;
  timestampMs: number;
  phase: number;
}

export class InvalidModeError extends Error {
  readonly validModes: readonly Mode[] = MODES;

  constructor(readonly requested: string) {
    super(`Invalid mode. Use one of: ${MODES.join(', ')}`);
    this.name = 'InvalidModeError';
  }
}
