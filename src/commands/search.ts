import type { AppContext } from '../lib/app.js';
import { NO_RESULTS } from '../lib/storage/types.js';
import type { RankedRecord } from '../lib/storage/types.js';
import { failCommand, openApp, parsePositiveInt } from './shared.js';

interface SearchOptions {
  limit?: string;
}

export function formatSearchResults(results: RankedRecord[]): string[] {
  if (results.length === 0) return [NO_RESULTS];

  const lines: string[] = [];
  results.forEach(({ record, distance }, i) => {
    lines.push(`${i + 1}. ${record.subject || '(no subject)'}`);
    lines.push(`   From: ${record.sender}  Date: ${record.timestamp.toISOString()}`);
    lines.push(`   Distance: ${distance.toFixed(4)}`);
    lines.push(`   ${record.summary.slice(0, 200).replace(/\n/g, ' ')}`);
    lines.push('');
  });
  return lines;
}

export async function search(query: string, options: SearchOptions = {}): Promise<void> {
  let app: AppContext | undefined;
  try {
    const limit = parsePositiveInt(options.limit, 'limit');
    app = await openApp({ readOnly: true });
    const k = limit ?? app.config.retrieval.top_k;

    console.log(`Searching for: "${query}" (top ${k})\n`);
    const embedding = await app.embed(query);
    const results = await app.backend.searchRecords(embedding, k);

    for (const line of formatSearchResults(results)) console.log(line);
  } catch (error) {
    failCommand('search', error);
  } finally {
    await app?.close();
  }
}
