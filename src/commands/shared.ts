import { createAppContext } from '../lib/app.js';
import type { AppContext } from '../lib/app.js';
import { loadConfig } from '../lib/config.js';
import type { MailRecallConfig } from '../lib/config-types.js';
import { ValidationError, errorMessage } from '../lib/errors.js';
import { logError } from '../lib/fault-logger.js';

export interface OpenAppOptions {
  /** Already-loaded configuration; defaults to the working directory's */
  config?: MailRecallConfig;
  /** Commands that only read open the store read-only */
  readOnly?: boolean;
}

/** Load configuration from the working directory and build the app context. */
export async function openApp(options: OpenAppOptions = {}): Promise<AppContext> {
  return createAppContext(options.config ?? loadConfig(), { readOnly: options.readOnly });
}

/** Report a failed command and set a non-zero exit code. */
export function failCommand(command: string, error: unknown): void {
  logError(command, `${command} failed`, error);
  console.error(`${command} failed: ${errorMessage(error)}`);
  process.exitCode = 1;
}

/** Parse a positive integer CLI option; undefined when absent. */
export function parsePositiveInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new ValidationError(`--${name} must be a positive integer, got "${value}"`);
  }
  return n;
}
