/**
 * Signal generation — Service
 *
 * Mode-controlled waveform generator. One instance holds the mode, the
 * simulated clock and the phase accumulator for a whole server process.
 * Every method is synchronous, so on the event loop each call completes
 * before another request can observe the state.
 */
import { clock as systemClock, type Clock } from '../utils/clock.js';
import { mathRandom, type RandomSource } from '../utils/random.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import { InvalidModeError, isMode } from '../models/signal.js';
import type { GeneratorState, Mode, Point } from '../models/signal.js';

const STEP_MS = 100; // 10 points per simulated second

const NORMAL_WAVE = { amplitude: 50, baseline: 60, phaseStep: 0.5 };
const ABNORMAL_WAVE = { amplitude: 40, baseline: 65, phaseStep: 0.45 };

const SPIKE_PROBABILITY = 0.1;
const SPIKE_MIN = 130;
const SPIKE_MAX = 180;

export interface SignalGeneratorOptions {
  clock?: Clock;
  random?: RandomSource;
  logger?: Logger;
}

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

export class SignalGenerator {
  private readonly clock: Clock;
  private readonly random: RandomSource;
  private readonly logger: Logger;

  private mode: Mode = 'stopped';
  private timestampMs: number;
  private phase = 0;

  constructor(options: SignalGeneratorOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? mathRandom;
    this.logger = options.logger ?? consoleLogger;
    this.timestampMs = this.clock.now().getTime();
  }

  getMode(): Mode {
    return this.mode;
  }

  getState(): GeneratorState {
    return { mode: this.mode, timestampMs: this.timestampMs, phase: this.phase };
  }

  /**
   * Switches the generation mode. Leaving `stopped` restarts the simulated
   * clock at wall time and the phase at zero; other transitions keep both.
   *
   * @throws InvalidModeError when `requested` is not an exact mode name.
   */
  setMode(requested: string): Mode {
    if (!isMode(requested)) {
      throw new InvalidModeError(requested);
    }

    const previous = this.mode;
    if (previous === 'stopped' && requested !== 'stopped') {
      this.timestampMs = this.clock.now().getTime();
      this.phase = 0;
    }
    this.mode = requested;
    this.logger.info(`Signal mode set to ${requested} (was ${previous})`);
    return this.mode;
  }

  /**
   * Produces the next sample, or nothing while stopped.
   */
  nextPoint(): Point[] {
    if (this.mode === 'stopped') {
      return [];
    }

    const value = this.mode === 'normal' ? this.normalValue() : this.abnormalValue();

    this.timestampMs += STEP_MS;
    return [
      {
        time: new Date(this.timestampMs).toISOString(),
        value: roundTo2(value),
      },
    ];
  }

  private normalValue(): number {
    const value = Math.sin(this.phase) * NORMAL_WAVE.amplitude + NORMAL_WAVE.baseline;
    this.phase += NORMAL_WAVE.phaseStep;
    return value;
  }

  private abnormalValue(): number {
    if (this.random.next() < SPIKE_PROBABILITY) {
      // Spikes leave the phase where it was.
      return SPIKE_MIN + this.random.next() * (SPIKE_MAX - SPIKE_MIN);
    }
    const value = Math.sin(this.phase) * ABNORMAL_WAVE.amplitude + ABNORMAL_WAVE.baseline;
    this.phase += ABNORMAL_WAVE.phaseStep;
    return value;
  }
}
