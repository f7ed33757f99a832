/**
 * Beast Test Helpers — shared utilities for all Beast test suites.
 */
import { createServer, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Express } from 'express';
import type { Clock } from '../../src/utils/clock.js';
import type { RandomSource } from '../../src/utils/random.js';
import type { Logger } from '../../src/utils/logger.js';

export interface TestResponse {
  status: number;
  body: unknown;
}

/**
 * Clock that only moves when told to.
 */
export class FakeClock implements Clock {
  private current: Date;

  constructor(initial: string | Date = '2024-01-01T00:00:00.000Z') {
    this.current = new Date(initial);
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }

  setTime(time: string | Date): void {
    this.current = new Date(time);
  }
}

/**
 * Replays the given draws in order, then repeats the last one.
 */
export class SequenceRandom implements RandomSource {
  private index = 0;

  constructor(private readonly values: number[]) {}

  next(): number {
    const value = this.values[Math.min(this.index, this.values.length - 1)] ?? 0.5;
    this.index += 1;
    return value;
  }
}

export class CaptureLogger implements Logger {
  readonly lines: string[] = [];
  readonly errors: string[] = [];

  info(message: string): void {
    this.lines.push(message);
  }

  error(message: string): void {
    this.errors.push(message);
  }
}

/**
 * Serve the app on an ephemeral local port.
 */
export async function listen(app: Express): Promise<{ baseUrl: string; close: () => Promise<void> }> {
  const server: Server = createServer(app);
  await new Promise<void>((resolve) => {
    server.listen(0, '127.0.0.1', () => resolve());
  });
  const address: AddressInfo | string | null = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server has no TCP address');
  }
  const { port } = address;
  return {
    baseUrl: `http://127.0.0.1:${port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

/**
 * Make a request to the test app without starting a long-lived server.
 */
export async function request(
  app: Express,
  method: 'GET' | 'POST' | 'PUT' | 'DELETE',
  path: string,
): Promise<TestResponse> {
  const { baseUrl, close } = await listen(app);
  try {
    const res = await fetch(`${baseUrl}${path}`, { method });
    const body: unknown = await res.json();
    return { status: res.status, body };
  } finally {
    await close();
  }
}
