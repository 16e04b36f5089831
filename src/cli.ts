#!/usr/bin/env node

import { Command } from 'commander';
import { ask } from './commands/ask.js';
import { reindex } from './commands/reindex.js';
import { search } from './commands/search.js';
import { status } from './commands/status.js';
import { sync } from './commands/sync.js';

const VERSION = '0.3.0';

const program = new Command();

program
  .name('mailrecall')
  .description('Ingest email into a local vector store and ask questions about it')
  .version(VERSION);

program
  .command('sync')
  .description('Ingest new messages from a mailbox export (JSON or JSON lines)')
  .requiredOption('-s, --source <file>', 'Mailbox export file')
  .option('-m, --max <number>', 'Maximum new messages to store this run')
  .option('-d, --days <number>', 'Fetch window in days (default: current month)')
  .action(sync);

program
  .command('search <query>')
  .description('Show the stored messages nearest to a query')
  .option('-n, --limit <number>', 'Number of results')
  .action(search);

program
  .command('ask <question>')
  .description('Answer a question from the stored messages')
  .action(ask);

program
  .command('status')
  .description('Show backend, record count and last sync time')
  .action(status);

program
  .command('reindex')
  .description('Rebuild the vector index from stored messages (indexed backend)')
  .action(reindex);

await program.parseAsync(process.argv);
