import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import type { CreatePageInput, UpdatePageInput, WikiApi } from '../api/wiki-api.js';
import type { RemoteBook, RemoteChapter, RemotePageSummary, StoredContent } from '../types.js';

/**
 * Create a temp content folder. Keys are relative paths; a key ending in "/"
 * creates an empty directory.
 */
export function makeContentRoot(files: Record<string, string | Buffer>): string {
  const root = mkdtempSync(join(tmpdir(), 'bookstack-sync-'));
  for (const [relPath, content] of Object.entries(files)) {
    const full = join(root, relPath);
    if (relPath.endsWith('/')) {
      mkdirSync(full, { recursive: true });
      continue;
    }
    mkdirSync(dirname(full), { recursive: true });
    writeFileSync(full, content);
  }
  return root;
}

export function removeContentRoot(root: string): void {
  rmSync(root, { recursive: true, force: true });
}

export interface FakeCall {
  method: keyof WikiApi;
  args: unknown[];
}

interface FakeChapter extends RemoteChapter {
  bookId: number;
}

interface FakePage extends RemotePageSummary {
  bookId: number;
  content: StoredContent;
}

const WRITE_METHODS = new Set<keyof WikiApi>(['createChapter', 'createPage', 'updateChapter', 'updatePage']);

/**
 * In-memory WikiApi. Stores what it is given, records every call and can be
 * told to fail a method.
 */
export class FakeWikiApi implements WikiApi {
  books: RemoteBook[] = [];
  chapters: FakeChapter[] = [];
  pages: FakePage[] = [];
  calls: FakeCall[] = [];

  private nextId = 100;
  private failures = new Map<keyof WikiApi, Error>();

  /** Make every call of `method` reject with `error`. */
  failOn(method: keyof WikiApi, error: Error): void {
    this.failures.set(method, error);
  }

  /** Calls that change remote state. */
  writes(): FakeCall[] {
    return this.calls.filter((c) => WRITE_METHODS.has(c.method));
  }

  addChapter(bookId: number, name: string, priority: number): FakeChapter {
    const chapter = { id: this.nextId++, bookId, name, priority };
    this.chapters.push(chapter);
    return chapter;
  }

  addPage(
    bookId: number,
    chapterId: number | null,
    name: string,
    priority: number,
    content: StoredContent,
  ): FakePage {
    const page = { id: this.nextId++, bookId, chapterId, name, priority, content };
    this.pages.push(page);
    return page;
  }

  async findBooksByName(name: string): Promise<RemoteBook[]> {
    this.record('findBooksByName', [name]);
    return this.books.filter((b) => b.name === name);
  }

  async listChapters(bookId: number): Promise<RemoteChapter[]> {
    this.record('listChapters', [bookId]);
    return this.chapters
      .filter((c) => c.bookId === bookId)
      .map((c) => ({ id: c.id, name: c.name, priority: c.priority }));
  }

  async listPages(bookId: number, chapterId?: number): Promise<RemotePageSummary[]> {
    this.record('listPages', [bookId, chapterId]);
    return this.pages
      .filter((p) => p.bookId === bookId && (chapterId === undefined || p.chapterId === chapterId))
      .map((p) => ({ id: p.id, name: p.name, priority: p.priority, chapterId: p.chapterId }));
  }

  async getPageContent(pageId: number): Promise<StoredContent> {
    this.record('getPageContent', [pageId]);
    return this.page(pageId).content;
  }

  async createChapter(bookId: number, name: string, priority: number): Promise<RemoteChapter> {
    this.record('createChapter', [bookId, name, priority]);
    const chapter = this.addChapter(bookId, name, priority);
    return { id: chapter.id, name, priority };
  }

  async createPage(input: CreatePageInput): Promise<RemotePageSummary> {
    this.record('createPage', [input]);
    const page = this.addPage(input.bookId, input.chapterId, input.name, input.priority, {
      kind: 'markdown',
      markdown: input.markdown,
    });
    return { id: page.id, name: page.name, priority: page.priority, chapterId: page.chapterId };
  }

  async updateChapter(chapterId: number, fields: { priority: number }): Promise<void> {
    this.record('updateChapter', [chapterId, fields]);
    const chapter = this.chapters.find((c) => c.id === chapterId);
    if (!chapter) throw new Error(`No chapter ${chapterId}`);
    chapter.priority = fields.priority;
  }

  async updatePage(pageId: number, fields: UpdatePageInput): Promise<void> {
    this.record('updatePage', [pageId, fields]);
    const page = this.page(pageId);
    page.priority = fields.priority;
    if (fields.markdown !== undefined) {
      page.content = { kind: 'markdown', markdown: fields.markdown };
    }
  }

  private page(pageId: number): FakePage {
    const page = this.pages.find((p) => p.id === pageId);
    if (!page) throw new Error(`No page ${pageId}`);
    return page;
  }

  private record(method: keyof WikiApi, args: unknown[]): void {
    this.calls.push({ method, args });
    const failure = this.failures.get(method);
    if (failure) throw failure;
  }
}
