import { loadConfig } from '../lib/config.js';
import { withLock } from '../lib/lock.js';
import { isRebuildable } from '../lib/storage/backends/interface.js';
import { failCommand, openApp } from './shared.js';

/**
 * Rebuild the vector index from the metadata store (indexed backend).
 */
export async function reindex(): Promise<void> {
  try {
    const config = loadConfig();
    await withLock(config.data_dir, 'reindex', async () => {
      const app = await openApp({ config });
      try {
        const backend = app.backend;
        if (!isRebuildable(backend)) {
          console.log(`The ${backend.kind} backend keeps embeddings inline; nothing to rebuild.`);
          return;
        }
        const vectors = await backend.rebuildIndex();
        console.log(`Rebuilt vector index with ${vectors} vectors.`);
      } finally {
        await app.close();
      }
    });
  } catch (error) {
    failCommand('reindex', error);
  }
}
