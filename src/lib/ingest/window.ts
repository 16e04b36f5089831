import type { WindowConfig } from '../config-types.js';
import type { FetchWindow } from '../mail/source.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** 00:00 UTC on the first day of `now`'s month. */
export function startOfUtcMonth(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1));
}

/**
 * Fetch window for a run. Re-derived on every run from the clock, never
 * from the checkpoint.
 */
export function resolveWindow(config: WindowConfig, now: Date): FetchWindow {
  const end = new Date(now.getTime());
  if (config.mode === 'days') {
    return { start: new Date(now.getTime() - config.days * DAY_MS), end };
  }
  return { start: startOfUtcMonth(now), end };
}

export function inWindow(timestamp: Date, window: FetchWindow): boolean {
  const t = timestamp.getTime();
  return t >= window.start.getTime() && t <= window.end.getTime();
}
