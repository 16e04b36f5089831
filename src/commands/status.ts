import type { AppContext } from '../lib/app.js';
import { getLockStatus } from '../lib/lock.js';
import { EPOCH } from '../lib/storage/types.js';
import type { StorageInfo } from '../lib/storage/types.js';
import { failCommand, openApp } from './shared.js';

export function formatStatus(info: StorageInfo, dataDir: string): string[] {
  const checkpoint =
    info.checkpoint.getTime() === EPOCH.getTime() ? 'never synced' : info.checkpoint.toISOString();
  return [
    `Data dir:    ${dataDir}`,
    `Backend:     ${info.backend} (${info.driver})`,
    `Location:    ${info.location}`,
    `Dimensions:  ${info.dimensions}`,
    `Records:     ${info.records}`,
    `Last sync:   ${checkpoint}`,
  ];
}

export async function status(): Promise<void> {
  let app: AppContext | undefined;
  try {
    app = await openApp({ readOnly: true });
    const info = await app.backend.info();

    console.log('mailrecall status\n');
    for (const line of formatStatus(info, app.config.data_dir)) console.log(line);

    const lock = getLockStatus(app.config.data_dir);
    if (lock.locked && lock.info) {
      console.log(`\nSync in progress (pid ${lock.info.pid}, started ${new Date(lock.info.timestamp).toISOString()})`);
    }
  } catch (error) {
    failCommand('status', error);
  } finally {
    await app?.close();
  }
}
