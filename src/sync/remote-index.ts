/**
 * Remote index: the target book's current chapters and pages, keyed by
 * exact title within their scope (book root or one chapter).
 *
 * When the wiki holds several entities with the same title in one scope, the
 * first one in API list order is the match.
 */

import { ResolutionError } from '../errors.js';
import type { WikiApi } from '../api/wiki-api.js';
import type { RemoteBook, RemoteChapter, RemotePageSummary } from '../types.js';

/** Find the one book named exactly `name`. */
export async function resolveBook(api: WikiApi, name: string): Promise<RemoteBook> {
  const matches = await api.findBooksByName(name);
  if (matches.length === 0) {
    throw new ResolutionError(`Book "${name}" not found. Create it first (exact name required).`);
  }
  if (matches.length > 1) {
    const ids = matches.map((b) => b.id).join(', ');
    throw new ResolutionError(`Book name "${name}" is ambiguous: ${matches.length} books match (ids ${ids})`);
  }
  return matches[0];
}

export class RemoteIndex {
  readonly bookId: number;
  private readonly chapters = new Map<string, RemoteChapter>();
  // null key = pages placed directly in the book
  private readonly pages = new Map<number | null, Map<string, RemotePageSummary>>();

  constructor(bookId: number, chapters: RemoteChapter[], pages: RemotePageSummary[]) {
    this.bookId = bookId;
    for (const chapter of chapters) this.addChapter(chapter);
    for (const page of pages) this.addPage(page);
  }

  /** Fetch the book's chapters and pages. */
  static async load(api: WikiApi, bookId: number): Promise<RemoteIndex> {
    const chapters = await api.listChapters(bookId);
    const pages = await api.listPages(bookId);
    return new RemoteIndex(bookId, chapters, pages);
  }

  findChapter(title: string): RemoteChapter | undefined {
    return this.chapters.get(title);
  }

  /** Look up a page by title in the book root (`chapterId` null) or in a chapter. */
  findPage(chapterId: number | null, title: string): RemotePageSummary | undefined {
    return this.pages.get(chapterId)?.get(title);
  }

  /** Record a chapter. An existing entry with the same title is kept. */
  addChapter(chapter: RemoteChapter): void {
    if (!this.chapters.has(chapter.name)) {
      this.chapters.set(chapter.name, chapter);
    }
  }

  /** Record a page. An existing entry with the same title in the same scope is kept. */
  addPage(page: RemotePageSummary): void {
    let scope = this.pages.get(page.chapterId);
    if (!scope) {
      scope = new Map();
      this.pages.set(page.chapterId, scope);
    }
    if (!scope.has(page.name)) {
      scope.set(page.name, page);
    }
  }

  get chapterCount(): number {
    return this.chapters.size;
  }

  get pageCount(): number {
    let count = 0;
    for (const scope of this.pages.values()) count += scope.size;
    return count;
  }
}
