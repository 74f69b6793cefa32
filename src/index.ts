#!/usr/bin/env node

import dotenv from 'dotenv';
import { BookStackClient } from './api/bookstack.js';
import { loadConfig, type ConfigOverrides } from './config.js';
import { ConfigurationError, SyncError, exitCodeFor } from './errors.js';
import { downloadBook, formatDownloadSummary } from './download/index.js';
import { consoleLogger, formatSummary, syncFolder } from './sync/index.js';

// Parse CLI arguments
const args = process.argv.slice(2);
const overrides: ConfigOverrides = {};
let envFile: string | undefined;
let command: 'sync' | 'download' = 'sync';

for (let i = 0; i < args.length; i++) {
  if (i === 0 && (args[i] === 'sync' || args[i] === 'download')) {
    command = args[i] === 'download' ? 'download' : 'sync';
  } else if (args[i] === '--content-dir' && args[i + 1]) {
    overrides.contentDir = args[++i];
  } else if (args[i] === '--book' && args[i + 1]) {
    overrides.bookName = args[++i];
  } else if (args[i] === '--base-url' && args[i + 1]) {
    overrides.baseUrl = args[++i];
  } else if (args[i] === '--env-file' && args[i + 1]) {
    envFile = args[++i];
  } else if (args[i] === '--dry-run') {
    overrides.dryRun = true;
  } else if (args[i] === '--help') {
    console.error(`
bookstack-sync: Sync a folder of Markdown files into a BookStack book

Usage:
  bookstack-sync [sync] [options]     Upload the folder into the book
  bookstack-sync download [options]   Write the book into the folder

Folder layout:
  <content>/01 Intro.md            page in the book root
  <content>/10 Appendix/           chapter
  <content>/10 Appendix/01 Extra.md  page in that chapter
  Number prefixes set the order; they are stripped from titles.
  A download writes each item's priority as a two-digit prefix.

Options:
  --content-dir <path>   Folder to read or write (or CONTENT_DIR; default: ./<book name>)
  --book <name>          Exact name of the target book (or BOOKSTACK_BOOK_NAME)
  --base-url <url>       BookStack URL (or BOOKSTACK_BASE_URL)
  --env-file <path>      Load settings from this file instead of ./.env
  --dry-run              Show what would change without writing (or BOOKSTACK_DRY_RUN=1)
  --help                 Show this help message

Environment:
  BOOKSTACK_TOKEN_ID, BOOKSTACK_TOKEN_SECRET   API token (required)
  BOOKSTACK_TIMEOUT_MS                         Request timeout (default: 60000)

Exit status:
  0 success, 2 configuration error, 3 book not found, 4 API error, 1 other failure
`);
    process.exit(0);
  } else {
    console.error(`Unknown argument: ${args[i]} (see --help)`);
    process.exit(2);
  }
}

async function main(): Promise<void> {
  const loaded = dotenv.config(envFile ? { path: envFile } : undefined);
  if (envFile && loaded.error) {
    throw new ConfigurationError(`Cannot read env file ${envFile}: ${loaded.error.message}`);
  }

  const config = loadConfig(process.env, overrides, process.cwd(), {
    contentRootMustExist: command === 'sync',
  });
  if (config.dryRun) {
    console.log('[!] Dry run: no changes will be written.');
  }

  const api = new BookStackClient(config);
  if (command === 'download') {
    console.log(formatDownloadSummary(await downloadBook(config, api, consoleLogger)));
  } else {
    console.log(formatSummary(await syncFolder(config, api, consoleLogger)));
  }
}

main().catch((error: unknown) => {
  if (error instanceof SyncError) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error('Fatal error:', error);
  }
  process.exit(exitCodeFor(error));
});
