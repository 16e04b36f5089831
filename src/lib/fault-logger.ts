/**
 * Centralized fault logger for mailrecall.
 *
 * Two channels:
 * 1. Local file: <data dir>/mailrecall-faults.log (JSON lines, with rotation)
 * 2. Webhook: POST to configurable URL (fire-and-forget)
 *
 * Nothing is recorded until configureFaultLogger() is called at startup.
 */

import fs from 'fs';
import path from 'path';

export type FaultLevel = 'error' | 'warn' | 'info' | 'debug';

export interface FaultEntry {
  timestamp: string;
  level: FaultLevel;
  component: string;
  message: string;
  stack?: string;
  context?: Record<string, unknown>;
}

export interface FaultLoggerOptions {
  /** Directory holding mailrecall-faults.log */
  dir: string;
  enabled?: boolean;
  level?: FaultLevel;
  maxFileSizeMb?: number;
  webhookUrl?: string;
  webhookHeaders?: Record<string, string>;
}

export const FAULT_LOG_FILE = 'mailrecall-faults.log';

const LEVEL_ORDER: Record<FaultLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

type ResolvedFaultLoggerOptions = Required<Omit<FaultLoggerOptions, 'webhookUrl' | 'webhookHeaders'>> &
  Pick<FaultLoggerOptions, 'webhookUrl' | 'webhookHeaders'>;

let options: ResolvedFaultLoggerOptions | null = null;

/** Install logger settings. Called once by the application context. */
export function configureFaultLogger(opts: FaultLoggerOptions): void {
  options = {
    dir: opts.dir,
    enabled: opts.enabled ?? true,
    level: opts.level ?? 'warn',
    maxFileSizeMb: opts.maxFileSizeMb ?? 5,
    webhookUrl: opts.webhookUrl,
    webhookHeaders: opts.webhookHeaders,
  };
}

/** Drop logger settings (for tests). */
export function resetFaultLogger(): void {
  options = null;
}

function reportInternal(what: string, err: unknown): void {
  // Last resort: the logger itself must not throw into callers
  process.stderr.write(`[mailrecall] fault logger ${what}: ${err instanceof Error ? err.message : String(err)}\n`);
}

// ---------------------------------------------------------------------------
// Channel 1: Local file with rotation
// ---------------------------------------------------------------------------

function rotateIfNeeded(logPath: string, maxSizeMb: number): void {
  if (!fs.existsSync(logPath)) return;
  const stats = fs.statSync(logPath);
  if (stats.size > maxSizeMb * 1024 * 1024) {
    fs.renameSync(logPath, logPath + '.1');
  }
}

function writeToFile(entry: FaultEntry, dir: string, maxSizeMb: number): void {
  try {
    const logPath = path.join(dir, FAULT_LOG_FILE);
    fs.mkdirSync(dir, { recursive: true });
    rotateIfNeeded(logPath, maxSizeMb);
    fs.appendFileSync(logPath, JSON.stringify(entry) + '\n');
  } catch (err) {
    reportInternal('file write failed', err);
  }
}

// ---------------------------------------------------------------------------
// Channel 2: Webhook (fire-and-forget)
// ---------------------------------------------------------------------------

function sendToWebhook(entry: FaultEntry, url: string, headers?: Record<string, string>): void {
  void fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(entry),
  }).catch((err: unknown) => reportInternal('webhook failed', err));
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Log a fault to all configured channels.
 * Never throws.
 */
export function logFault(
  level: FaultLevel,
  component: string,
  message: string,
  opts?: { error?: Error; context?: Record<string, unknown> }
): void {
  const config = options;
  if (!config || !config.enabled) return;
  if (LEVEL_ORDER[level] < LEVEL_ORDER[config.level]) return;

  const entry: FaultEntry = {
    timestamp: new Date().toISOString(),
    level,
    component,
    message,
    stack: opts?.error?.stack,
    context: opts?.context,
  };

  writeToFile(entry, config.dir, config.maxFileSizeMb);

  if (config.webhookUrl) {
    sendToWebhook(entry, config.webhookUrl, config.webhookHeaders);
  }
}

/** Log an error (convenience wrapper). Non-Error values land in context. */
export function logError(
  component: string,
  message: string,
  error?: unknown,
  context?: Record<string, unknown>
): void {
  if (error === undefined || error instanceof Error) {
    logFault('error', component, message, { error, context });
    return;
  }
  logFault('error', component, message, { context: { ...context, error: String(error) } });
}

/** Log a warning (convenience wrapper). */
export function logWarn(
  component: string,
  message: string,
  context?: Record<string, unknown>
): void {
  logFault('warn', component, message, { context });
}

/** Log an info message (convenience wrapper). */
export function logInfo(
  component: string,
  message: string,
  context?: Record<string, unknown>
): void {
  logFault('info', component, message, { context });
}

/** Log a debug message (convenience wrapper). */
export function logDebug(
  component: string,
  message: string,
  context?: Record<string, unknown>
): void {
  logFault('debug', component, message, { context });
}
