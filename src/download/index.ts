/**
 * Download layer: write a remote book back into the prefixed folder layout.
 */

export { downloadBook, formatDownloadSummary, storedToMarkdown } from './download.js';
export type { DownloadConfig } from './download.js';
export { htmlToMarkdown } from './markdown.js';
