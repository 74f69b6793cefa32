/**
 * BookStack REST client.
 *
 * Requests run one at a time and are never retried: any failure surfaces as a
 * TransportError naming the request, and the caller decides what to do.
 */

import type { z } from 'zod';
import { TransportError } from '../errors.js';
import type { RemoteBook, RemoteChapter, RemotePageSummary, StoredContent } from '../types.js';
import {
  BookListSchema,
  ChapterListSchema,
  ChapterSchema,
  IgnoredBodySchema,
  PageDetailSchema,
  PageListSchema,
  PageSummarySchema,
  type ChapterJSON,
  type PageSummaryJSON,
} from './schemas.js';
import type { CreatePageInput, UpdatePageInput, WikiApi } from './wiki-api.js';

const DEFAULT_TIMEOUT_MS = 60_000;
const LIST_PAGE_SIZE = 500;
const USER_AGENT = 'bookstack-folder-sync/1.0';

type HttpMethod = 'GET' | 'POST' | 'PUT';
type QueryParams = Record<string, string | number>;

export interface BookStackClientOptions {
  baseUrl: string;
  tokenId: string;
  tokenSecret: string;
  timeoutMs?: number;
  /** Override for tests. Defaults to the global fetch. */
  fetch?: typeof fetch;
}

function toChapter(json: ChapterJSON): RemoteChapter {
  return { id: json.id, name: json.name, priority: json.priority };
}

function toPageSummary(json: PageSummaryJSON): RemotePageSummary {
  return {
    id: json.id,
    name: json.name,
    priority: json.priority,
    chapterId: json.chapter_id ? json.chapter_id : null,
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class BookStackClient implements WikiApi {
  private readonly baseUrl: string;
  private readonly authorization: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: BookStackClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.authorization = `Token ${options.tokenId}:${options.tokenSecret}`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  // ==========================================================================
  // Books
  // ==========================================================================

  async findBooksByName(name: string): Promise<RemoteBook[]> {
    // filter[name] narrows server-side; the exact comparison is ours
    const books = await this.listAll('/api/books', BookListSchema, { 'filter[name]': name });
    return books.filter((b) => b.name === name).map((b) => ({ id: b.id, name: b.name }));
  }

  // ==========================================================================
  // Chapters
  // ==========================================================================

  async listChapters(bookId: number): Promise<RemoteChapter[]> {
    const chapters = await this.listAll('/api/chapters', ChapterListSchema, { 'filter[book_id]': bookId });
    return chapters.filter((c) => c.book_id === bookId).map(toChapter);
  }

  async createChapter(bookId: number, name: string, priority: number): Promise<RemoteChapter> {
    const json = await this.request('POST', '/api/chapters', ChapterSchema, {
      body: { book_id: bookId, name, priority },
    });
    return toChapter(json);
  }

  async updateChapter(chapterId: number, fields: { priority: number }): Promise<void> {
    await this.request('PUT', `/api/chapters/${chapterId}`, IgnoredBodySchema, {
      body: { priority: fields.priority },
    });
  }

  // ==========================================================================
  // Pages
  // ==========================================================================

  async listPages(bookId: number, chapterId?: number): Promise<RemotePageSummary[]> {
    const query: QueryParams = { 'filter[book_id]': bookId };
    if (chapterId !== undefined) {
      query['filter[chapter_id]'] = chapterId;
    }
    const pages = await this.listAll('/api/pages', PageListSchema, query);
    return pages
      .filter((p) => p.book_id === bookId && !p.draft)
      .map(toPageSummary)
      .filter((p) => chapterId === undefined || p.chapterId === chapterId);
  }

  async getPageContent(pageId: number): Promise<StoredContent> {
    const page = await this.request('GET', `/api/pages/${pageId}`, PageDetailSchema);
    // WYSIWYG pages come back with an empty markdown field
    if (page.markdown) {
      return { kind: 'markdown', markdown: page.markdown };
    }
    return { kind: 'html', html: page.html ?? '' };
  }

  async createPage(input: CreatePageInput): Promise<RemotePageSummary> {
    const body: Record<string, unknown> = {
      name: input.name,
      markdown: input.markdown,
      priority: input.priority,
    };
    if (input.chapterId !== null) {
      body.chapter_id = input.chapterId;
    } else {
      body.book_id = input.bookId;
    }
    const json = await this.request('POST', '/api/pages', PageSummarySchema, { body });
    return toPageSummary(json);
  }

  async updatePage(pageId: number, fields: UpdatePageInput): Promise<void> {
    const body: Record<string, unknown> = { priority: fields.priority };
    if (fields.markdown !== undefined) {
      body.markdown = fields.markdown;
    }
    await this.request('PUT', `/api/pages/${pageId}`, IgnoredBodySchema, { body });
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  /** Read every item of a list endpoint, following count/offset paging. */
  private async listAll<T>(
    path: string,
    schema: z.ZodType<{ data: T[]; total: number }, z.ZodTypeDef, unknown>,
    filters: QueryParams,
  ): Promise<T[]> {
    const items: T[] = [];
    let offset = 0;
    for (;;) {
      const page = await this.request('GET', path, schema, {
        query: { ...filters, count: LIST_PAGE_SIZE, offset },
      });
      items.push(...page.data);
      offset += page.data.length;
      if (page.data.length === 0 || offset >= page.total) break;
    }
    return items;
  }

  private async request<T>(
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: { query?: QueryParams; body?: Record<string, unknown> } = {},
  ): Promise<T> {
    const operation = `${method} ${path}`;
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, String(value));
    }

    const headers: Record<string, string> = {
      Authorization: this.authorization,
      Accept: 'application/json',
      'User-Agent': USER_AGENT,
    };
    if (options.body) {
      headers['Content-Type'] = 'application/json';
    }

    // The timeout covers the body read as well as the response headers.
    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        body: options.body ? JSON.stringify(options.body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      text = await response.text();
    } catch (error) {
      throw new TransportError(operation, errorMessage(error));
    }

    if (!response.ok) {
      throw new TransportError(operation, text || response.statusText, response.status);
    }

    let data: unknown = {};
    if (text.trim()) {
      try {
        data = JSON.parse(text);
      } catch (error) {
        throw new TransportError(operation, `Invalid JSON response: ${errorMessage(error)}`, response.status);
      }
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw new TransportError(operation, `Unexpected response: ${issues}`, response.status);
    }
    return parsed.data;
  }
}
