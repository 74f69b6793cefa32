/**
 * Book download: write a remote book into the folder layout the sync reads.
 *
 *   root pages      -> "<NN> <title>.md" in the output folder
 *   chapters        -> "<NN> <title>/" directories
 *   chapter pages   -> "<NN> <title>.md" inside their chapter directory
 *
 * NN is the remote priority, so a later sync keeps the same order. Files whose
 * content already matches are left untouched. Nothing local is deleted.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { withEntity } from '../errors.js';
import type { SyncConfig } from '../config.js';
import type { WikiApi } from '../api/wiki-api.js';
import { formatEntryName } from '../content/names.js';
import { resolveBook } from '../sync/remote-index.js';
import { consoleLogger, type SyncLogger } from '../sync/run.js';
import type { DownloadResult, RemotePageSummary, StoredContent } from '../types.js';
import { htmlToMarkdown } from './markdown.js';

export type DownloadConfig = Pick<SyncConfig, 'bookName' | 'contentRoot' | 'dryRun'>;

/** Remote listing order: priority, then case-insensitive name. */
function byPriority(a: { priority: number; name: string }, b: { priority: number; name: string }): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  return a.name.toLowerCase().localeCompare(b.name.toLowerCase());
}

/** Markdown to write for a page. HTML-only pages are converted. */
export function storedToMarkdown(stored: StoredContent): string {
  return stored.kind === 'markdown' ? stored.markdown : htmlToMarkdown(stored.html);
}

/** One-line summary of a finished download. */
export function formatDownloadSummary(result: DownloadResult): string {
  return (
    `[✓] Download ${result.dryRun ? 'dry run ' : ''}complete: ` +
    `${result.chapters} chapter(s); files ${result.written} written, ${result.unchanged} unchanged`
  );
}

class BookDownloader {
  private readonly api: WikiApi;
  private readonly config: DownloadConfig;
  private readonly logger: SyncLogger;
  private readonly result: DownloadResult;

  constructor(api: WikiApi, config: DownloadConfig, logger: SyncLogger) {
    this.api = api;
    this.config = config;
    this.logger = logger;
    this.result = { dryRun: config.dryRun, chapters: 0, written: 0, unchanged: 0 };
  }

  async run(): Promise<DownloadResult> {
    const book = await resolveBook(this.api, this.config.bookName);
    this.logger.info(`[=] Source book: ${book.name} (id=${book.id})`);
    this.logger.info(`[=] Output folder: ${this.config.contentRoot}`);

    const chapters = await withEntity('chapter list', () => this.api.listChapters(book.id));
    const pages = await withEntity('page list', () => this.api.listPages(book.id));

    const byChapter = new Map<number | null, RemotePageSummary[]>();
    for (const page of pages) {
      const scope = byChapter.get(page.chapterId) ?? [];
      scope.push(page);
      byChapter.set(page.chapterId, scope);
    }

    this.ensureDir(this.config.contentRoot);
    await this.writePages(this.config.contentRoot, byChapter.get(null) ?? [], '');

    for (const chapter of [...chapters].sort(byPriority)) {
      const dirName = formatEntryName(chapter.priority, chapter.name);
      const dir = join(this.config.contentRoot, dirName);
      this.ensureDir(dir);
      this.result.chapters++;
      this.report(`[=] Chapter: ${dirName}`);
      await this.writePages(dir, byChapter.get(chapter.id) ?? [], '    ');
    }

    return this.result;
  }

  private async writePages(dir: string, pages: RemotePageSummary[], indent: string): Promise<void> {
    const used = new Set<string>();
    for (const page of [...pages].sort(byPriority)) {
      let fileName = `${formatEntryName(page.priority, page.name)}.md`;
      if (used.has(fileName)) {
        const renamed = `${formatEntryName(page.priority, page.name)} (${page.id}).md`;
        this.logger.warn(`Two pages map to "${fileName}" in ${dir}; writing page ${page.id} as "${renamed}"`);
        fileName = renamed;
      }
      used.add(fileName);

      const stored = await withEntity(`page "${page.name}"`, () => this.api.getPageContent(page.id));
      if (this.writeIfChanged(join(dir, fileName), storedToMarkdown(stored))) {
        this.result.written++;
        this.report(`${indent}[+] Wrote: ${fileName}`);
      } else {
        this.result.unchanged++;
        this.report(`${indent}[=] No change: ${fileName}`);
      }
    }
  }

  /** Returns false when the file already holds `content`. */
  private writeIfChanged(path: string, content: string): boolean {
    if (existsSync(path) && readFileSync(path, 'utf-8') === content) {
      return false;
    }
    if (!this.config.dryRun) {
      writeFileSync(path, content, 'utf-8');
    }
    return true;
  }

  private ensureDir(dir: string): void {
    if (!this.config.dryRun) {
      mkdirSync(dir, { recursive: true });
    }
  }

  private report(line: string): void {
    this.logger.info(this.config.dryRun ? `${line} (dry run)` : line);
  }
}

/**
 * Write the configured book into the configured folder, creating it if needed.
 * Pages are fetched one at a time; the first failed call aborts the download.
 */
export async function downloadBook(
  config: DownloadConfig,
  api: WikiApi,
  logger: SyncLogger = consoleLogger,
): Promise<DownloadResult> {
  return new BookDownloader(api, config, logger).run();
}
