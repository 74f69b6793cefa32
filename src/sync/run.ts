import type { SyncConfig } from '../config.js';
import type { WikiApi } from '../api/wiki-api.js';
import { buildLocalTree } from '../content/tree.js';
import type { SyncResult } from '../types.js';
import { Reconciler } from './reconcile.js';

export interface SyncLogger {
  /** Progress lines. */
  info(line: string): void;
  /** Non-fatal problems. */
  warn(line: string): void;
}

export const consoleLogger: SyncLogger = {
  info: (line) => console.log(line),
  warn: (line) => console.error(`Warning: ${line}`),
};

/**
 * Sync the configured content folder into the configured book.
 *
 * The folder is read (and validated) in full before the first remote call,
 * so local problems never leave the book half-updated.
 */
export async function syncFolder(
  config: SyncConfig,
  api: WikiApi,
  logger: SyncLogger = consoleLogger,
): Promise<SyncResult> {
  const tree = buildLocalTree(config.contentRoot, { onWarning: logger.warn });
  const chapterPages = tree.chapters.reduce((n, c) => n + c.pages.length, 0);
  logger.info(`[=] Content source: ${tree.contentRoot}`);
  logger.info(
    `[=] Local: ${tree.chapters.length} chapter(s), ${tree.pages.length + chapterPages} page(s)`,
  );

  const reconciler = new Reconciler(api, config, logger.info);
  return reconciler.run(tree);
}
