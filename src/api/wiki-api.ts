import type { RemoteBook, RemoteChapter, RemotePageSummary, StoredContent } from '../types.js';

export interface CreatePageInput {
  bookId: number;
  /** null places the page directly in the book. */
  chapterId: number | null;
  name: string;
  markdown: string;
  priority: number;
}

export interface UpdatePageInput {
  /** Omitted for order-only updates. */
  markdown?: string;
  priority: number;
}

/**
 * WikiApi: the remote calls a sync run needs.
 * Every method rejects with a TransportError when the call fails.
 */
export interface WikiApi {
  /** Books whose name is exactly `name`. */
  findBooksByName(name: string): Promise<RemoteBook[]>;

  listChapters(bookId: number): Promise<RemoteChapter[]>;

  /**
   * Pages of a book. With `chapterId`, only that chapter's pages; without it,
   * every page of the book (root pages have `chapterId: null`).
   */
  listPages(bookId: number, chapterId?: number): Promise<RemotePageSummary[]>;

  /** Fetch what the wiki stores for one page. */
  getPageContent(pageId: number): Promise<StoredContent>;

  createChapter(bookId: number, name: string, priority: number): Promise<RemoteChapter>;

  createPage(input: CreatePageInput): Promise<RemotePageSummary>;

  updateChapter(chapterId: number, fields: { priority: number }): Promise<void>;

  updatePage(pageId: number, fields: UpdatePageInput): Promise<void>;
}
