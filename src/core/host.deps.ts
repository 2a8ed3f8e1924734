/**
 * Host Dependencies Contract
 *
 * Services never reach for the process clock or a global logger directly;
 * both are injected so tests can pin time and capture log calls.
 */

import pino from 'pino';

// ═══════════════════════════════════════════════════════════════
// CORE INTERFACES
// ═══════════════════════════════════════════════════════════════

export interface Logger {
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
  debug?: (obj: object, msg?: string) => void;
}

export interface Clock {
  now: () => number; // milliseconds epoch
  utcNow: () => Date;
  toISOString: (ts: number) => string;
}

// ═══════════════════════════════════════════════════════════════
// DEFAULT IMPLEMENTATIONS
// ═══════════════════════════════════════════════════════════════

export function createLogger(level: string, module?: string): pino.Logger {
  const root = pino({ level });
  return module ? root.child({ module }) : root;
}

export const defaultClock: Clock = {
  now: () => Date.now(),
  utcNow: () => new Date(),
  toISOString: (ts) => new Date(ts).toISOString(),
};

/**
 * Clock pinned to a value that tests move by hand.
 */
export function createManualClock(startMs: number): Clock & { advance: (ms: number) => void } {
  let current = startMs;
  return {
    now: () => current,
    utcNow: () => new Date(current),
    toISOString: (ts) => new Date(ts).toISOString(),
    advance: (ms) => {
      current += ms;
    },
  };
}

export function toEpochSeconds(ms: number): number {
  return ms / 1000;
}
