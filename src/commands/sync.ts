import path from 'path';
import ora from 'ora';
import { loadConfig } from '../lib/config.js';
import type { RunReport } from '../lib/ingest/pipeline.js';
import { withLock } from '../lib/lock.js';
import { JsonMailSource } from '../lib/mail/json-source.js';
import { failCommand, openApp, parsePositiveInt } from './shared.js';

interface SyncOptions {
  source: string;
  max?: string;
  days?: string;
}

/**
 * Human-readable run report, one line per entry.
 */
export function formatRunReport(report: RunReport): string[] {
  const lines = [
    `Status:      ${report.status}`,
    `Window:      ${report.window.start.toISOString()} .. ${report.window.end.toISOString()}`,
    `Query:       ${report.query === '' ? '(all)' : report.query}`,
    `Fetched:     ${report.fetched}`,
    `Inserted:    ${report.inserted}`,
    `Duplicates:  ${report.duplicates}`,
    `Skipped:     ${report.skippedOutsideWindow} outside window, ${report.skippedIrrelevant} not relevant`,
    `Failed:      ${report.failed}`,
    `Checkpoint:  ${report.checkpointBefore.toISOString()} -> ${report.checkpointAfter.toISOString()}`,
  ];
  if (report.limitReached) {
    lines.push('Per-run limit reached; remaining messages will be picked up by the next sync.');
  }
  for (const failure of report.failures) {
    lines.push(`  ✗ ${failure.sourceId} [${failure.stage}]: ${failure.reason}`);
  }
  return lines;
}

export async function sync(options: SyncOptions): Promise<void> {
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once('SIGINT', onSigint);

  try {
    const maxPerRun = parsePositiveInt(options.max, 'max');
    const days = parsePositiveInt(options.days, 'days');
    const config = loadConfig();
    const source = new JsonMailSource(path.resolve(options.source));

    const spinner = ora(`Syncing from ${source.name}`).start();
    let report: RunReport;
    try {
      // Opening the store may repair the index, so the lock covers it too
      report = await withLock(config.data_dir, 'sync', async () => {
        const app = await openApp({ config });
        try {
          const pipeline = app.createPipeline(source, {
            maxPerRun,
            window: days !== undefined ? { mode: 'days', days } : undefined,
          });
          return await pipeline.run({
            signal: controller.signal,
            onProgress: (p) => {
              spinner.text = `Processed ${p.fetched} (inserted ${p.inserted}, failed ${p.failed})`;
            },
          });
        } finally {
          await app.close();
        }
      });
    } catch (err) {
      spinner.fail('Sync failed');
      throw err;
    }

    if (report.status === 'cancelled') spinner.warn('Sync cancelled');
    else spinner.succeed('Sync complete');

    for (const line of formatRunReport(report)) console.log(line);
  } catch (error) {
    failCommand('sync', error);
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}
