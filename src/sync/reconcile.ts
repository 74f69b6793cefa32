/**
 * Reconciler: apply the local book model to the remote book.
 *
 * Processing order is fixed so parents always have remote ids before their
 * children: book lookup, chapters, root pages, then each chapter's pages.
 *
 * Per entity:
 *   - no remote match by title      -> create
 *   - content changed               -> full update (content + priority)
 *   - only the priority differs     -> order-only update
 *   - otherwise                     -> skip
 *
 * The first failing remote call aborts the run. Nothing is ever deleted.
 */

import { withEntity } from '../errors.js';
import type { SyncConfig } from '../config.js';
import type { WikiApi } from '../api/wiki-api.js';
import type { LocalChapter, LocalPage, LocalTree, RemoteBook, SyncResult } from '../types.js';
import { hasContentChanged } from './change.js';
import { RemoteIndex, resolveBook } from './remote-index.js';

export type ReconcilerConfig = Pick<SyncConfig, 'bookName' | 'dryRun'>;

/** Where a page lives remotely. */
type PageScope =
  | { kind: 'book' }
  | { kind: 'chapter'; chapterId: number; title: string }
  // dry run: the chapter would be created, so it has no id yet
  | { kind: 'planned-chapter'; title: string };

function emptyResult(dryRun: boolean): SyncResult {
  return {
    dryRun,
    chapters: { created: 0, reordered: 0, unchanged: 0 },
    pages: { created: 0, updated: 0, reordered: 0, unchanged: 0 },
  };
}

function pageLabel(scope: PageScope, page: LocalPage): string {
  return scope.kind === 'book' ? page.title : `${scope.title} / ${page.title}`;
}

/** One-line summary of a finished run. */
export function formatSummary(result: SyncResult): string {
  const { chapters: c, pages: p } = result;
  return (
    `[✓] Sync ${result.dryRun ? 'dry run ' : ''}complete: ` +
    `chapters ${c.created} created, ${c.reordered} reordered, ${c.unchanged} unchanged; ` +
    `pages ${p.created} created, ${p.updated} updated, ${p.reordered} reordered, ${p.unchanged} unchanged`
  );
}

export class Reconciler {
  private readonly api: WikiApi;
  private readonly config: ReconcilerConfig;
  private readonly log: (line: string) => void;

  constructor(api: WikiApi, config: ReconcilerConfig, log: (line: string) => void = console.log) {
    this.api = api;
    this.config = config;
    this.log = log;
  }

  async run(tree: LocalTree): Promise<SyncResult> {
    const result = emptyResult(this.config.dryRun);

    const book = await resolveBook(this.api, this.config.bookName);
    this.log(`[=] Target book: ${book.name} (id=${book.id})`);

    const index = await RemoteIndex.load(this.api, book.id);
    this.log(`[=] Remote: ${index.chapterCount} chapter(s), ${index.pageCount} page(s)`);

    const scopes = new Map<LocalChapter, PageScope>();
    for (const chapter of tree.chapters) {
      scopes.set(chapter, await this.syncChapter(book, index, chapter, result));
    }

    for (const page of tree.pages) {
      await this.syncPage(book, index, { kind: 'book' }, page, result);
    }

    for (const chapter of tree.chapters) {
      const scope: PageScope = scopes.get(chapter) ?? { kind: 'planned-chapter', title: chapter.title };
      for (const page of chapter.pages) {
        await this.syncPage(book, index, scope, page, result);
      }
    }

    return result;
  }

  private async syncChapter(
    book: RemoteBook,
    index: RemoteIndex,
    chapter: LocalChapter,
    result: SyncResult,
  ): Promise<PageScope> {
    const label = `chapter "${chapter.title}"`;
    const existing = index.findChapter(chapter.title);

    if (!existing) {
      this.report(`[+] Creating chapter: ${chapter.title}`);
      result.chapters.created++;
      if (this.config.dryRun) {
        return { kind: 'planned-chapter', title: chapter.title };
      }
      const created = await withEntity(label, () =>
        this.api.createChapter(book.id, chapter.title, chapter.priority),
      );
      index.addChapter(created);
      return { kind: 'chapter', chapterId: created.id, title: chapter.title };
    }

    if (existing.priority !== chapter.priority) {
      this.report(`[~] Updating chapter order: ${chapter.title} -> ${chapter.priority}`);
      result.chapters.reordered++;
      if (!this.config.dryRun) {
        await withEntity(label, () => this.api.updateChapter(existing.id, { priority: chapter.priority }));
      }
    } else {
      this.report(`[=] Chapter order OK: ${chapter.title}`);
      result.chapters.unchanged++;
    }
    return { kind: 'chapter', chapterId: existing.id, title: chapter.title };
  }

  private async syncPage(
    book: RemoteBook,
    index: RemoteIndex,
    scope: PageScope,
    page: LocalPage,
    result: SyncResult,
  ): Promise<void> {
    const name = pageLabel(scope, page);
    const label = `page "${name}"`;

    const existing =
      scope.kind === 'book'
        ? index.findPage(null, page.title)
        : scope.kind === 'chapter'
          ? index.findPage(scope.chapterId, page.title)
          : undefined;

    if (!existing) {
      this.report(`[+] Creating page: ${name}`);
      result.pages.created++;
      if (this.config.dryRun || scope.kind === 'planned-chapter') return;

      const created = await withEntity(label, () =>
        this.api.createPage({
          bookId: book.id,
          chapterId: scope.kind === 'chapter' ? scope.chapterId : null,
          name: page.title,
          markdown: page.bodyMarkdown,
          priority: page.priority,
        }),
      );
      index.addPage(created);
      return;
    }

    const stored = await withEntity(label, () => this.api.getPageContent(existing.id));

    if (hasContentChanged(page.bodyMarkdown, stored)) {
      this.report(`[~] Updating page: ${name}`);
      result.pages.updated++;
      if (!this.config.dryRun) {
        await withEntity(label, () =>
          this.api.updatePage(existing.id, { markdown: page.bodyMarkdown, priority: page.priority }),
        );
      }
    } else if (existing.priority !== page.priority) {
      this.report(`[~] No content change; updating priority only: ${name} -> ${page.priority}`);
      result.pages.reordered++;
      if (!this.config.dryRun) {
        await withEntity(label, () => this.api.updatePage(existing.id, { priority: page.priority }));
      }
    } else {
      this.report(`[=] No change: ${name}`);
      result.pages.unchanged++;
    }
  }

  private report(line: string): void {
    this.log(this.config.dryRun ? `${line} (dry run)` : line);
  }
}
