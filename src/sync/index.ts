/**
 * Sync layer: folder-to-book reconciliation.
 *
 * The local folder is the source of truth for titles, content and order.
 * The remote book is read, matched by exact title and updated in place;
 * nothing on the remote side is ever deleted.
 */

export { hasContentChanged, renderMarkdown } from './change.js';
export { RemoteIndex, resolveBook } from './remote-index.js';
export { Reconciler, formatSummary } from './reconcile.js';
export type { ReconcilerConfig } from './reconcile.js';
export { syncFolder, consoleLogger } from './run.js';
export type { SyncLogger } from './run.js';
