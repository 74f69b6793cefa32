// === Image inlining ===

export const IMAGE_EXTENSIONS = ['png', 'jpg', 'jpeg', 'gif', 'webp', 'svg'] as const;

export type ImageExtension = (typeof IMAGE_EXTENSIONS)[number];

export const IMAGE_MIME_TYPES: Record<ImageExtension, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  webp: 'image/webp',
  svg: 'image/svg+xml',
};

// === Local model ===

/** A Markdown file that becomes one remote page. */
export interface LocalPage {
  sourcePath: string;
  /** Numeric filename prefix, used only as a sort key. */
  rawOrderPrefix?: number;
  title: string;
  /** File contents after image inlining. */
  bodyMarkdown: string;
  /** 1-based position within its scope. */
  priority: number;
}

/** A first-level directory that becomes one remote chapter. */
export interface LocalChapter {
  sourceDir: string;
  rawOrderPrefix?: number;
  title: string;
  priority: number;
  pages: LocalPage[];
}

export interface LocalTree {
  contentRoot: string;
  /** Pages placed directly in the book. */
  pages: LocalPage[];
  chapters: LocalChapter[];
}

// === Remote model ===

export interface RemoteBook {
  id: number;
  name: string;
}

export interface RemoteChapter {
  id: number;
  name: string;
  priority: number;
}

export interface RemotePageSummary {
  id: number;
  name: string;
  priority: number;
  /** null for pages placed directly in the book. */
  chapterId: number | null;
}

/**
 * What the wiki stores for a page. Resolved once when the page is fetched:
 * `markdown` when the API returns the page's Markdown source, `html` when only
 * the rendered body is available.
 */
export type StoredContent =
  | { kind: 'markdown'; markdown: string }
  | { kind: 'html'; html: string };

// === Sync results ===

export interface SyncResult {
  dryRun: boolean;
  chapters: {
    created: number;
    reordered: number;
    unchanged: number;
  };
  pages: {
    created: number;
    updated: number;
    reordered: number;
    unchanged: number;
  };
}

/** Counts from writing a book out to a folder. */
export interface DownloadResult {
  dryRun: boolean;
  chapters: number;
  /** Files created or overwritten (or that would be, in a dry run). */
  written: number;
  unchanged: number;
}
