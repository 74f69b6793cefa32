/**
 * Build the local book model from a content folder.
 *
 * Layout:
 *   <root>/*.md            pages placed directly in the book
 *   <root>/<dir>/          chapters (one per first-level directory, even empty)
 *   <root>/<dir>/*.md      pages of that chapter
 *
 * Deeper directories, non-Markdown files, dot-entries and broken symlinks
 * are ignored.
 * The folder is re-read on every run; nothing is cached between runs.
 */

import { readdirSync, readFileSync, statSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { ConfigurationError } from '../errors.js';
import type { LocalChapter, LocalPage, LocalTree } from '../types.js';
import { inlineImages } from './images.js';
import { compareDigits, parseEntryName, type ParsedName } from './names.js';

export interface BuildTreeOptions {
  /** Receives non-fatal problems (unresolved images, fallback titles). */
  onWarning?: (message: string) => void;
}

interface NamedEntry {
  name: string;
  path: string;
  parsed: ParsedName;
}

function defaultWarning(message: string): void {
  console.error(`Warning: ${message}`);
}

/** Verify the content root exists and is a directory. Returns its absolute path. */
export function assertContentRoot(contentRoot: string): string {
  const root = resolve(contentRoot);
  let isDir = false;
  try {
    isDir = statSync(root).isDirectory();
  } catch {
    isDir = false;
  }
  if (!isDir) {
    throw new ConfigurationError(`Content folder not found: ${root}`);
  }
  return root;
}

/**
 * Sort order within one scope: prefixed entries by prefix, then unprefixed
 * ones. Ties fall back to the raw name, compared by code unit.
 */
export function compareEntries(
  a: { prefix?: string; name: string },
  b: { prefix?: string; name: string },
): number {
  if (a.prefix !== undefined && b.prefix !== undefined) {
    const byPrefix = compareDigits(a.prefix, b.prefix);
    if (byPrefix !== 0) return byPrefix;
  } else if (a.prefix !== undefined) {
    return -1;
  } else if (b.prefix !== undefined) {
    return 1;
  }
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

function listEntries(dir: string, kind: 'file' | 'directory'): NamedEntry[] {
  const entries: NamedEntry[] = [];
  for (const name of readdirSync(dir)) {
    if (name.startsWith('.')) continue;
    const path = join(dir, name);
    // undefined for a symlink whose target is gone
    const stats = statSync(path, { throwIfNoEntry: false });
    if (!stats) continue;
    if (kind === 'directory' ? !stats.isDirectory() : !(stats.isFile() && name.endsWith('.md'))) {
      continue;
    }
    entries.push({ name, path, parsed: parseEntryName(name) });
  }
  return entries.sort((a, b) =>
    compareEntries({ prefix: a.parsed.prefix, name: a.name }, { prefix: b.parsed.prefix, name: b.name }),
  );
}

/** Reject two entries of one scope that would map to the same remote title. */
function assertUniqueTitles(entries: NamedEntry[], scope: string): void {
  const seen = new Map<string, string>();
  for (const entry of entries) {
    const previous = seen.get(entry.parsed.title);
    if (previous !== undefined) {
      throw new ConfigurationError(
        `Duplicate title "${entry.parsed.title}" in ${scope}: "${previous}" and "${entry.name}"`,
      );
    }
    seen.set(entry.parsed.title, entry.name);
  }
}

function warnOnFallback(entry: NamedEntry, warn: (message: string) => void): void {
  if (entry.parsed.titleFallback) {
    warn(`"${entry.name}" has no title after its number prefix; using "${entry.parsed.title}"`);
  }
}

function readPages(dir: string, contentRoot: string, scope: string, warn: (message: string) => void): LocalPage[] {
  const files = listEntries(dir, 'file');
  assertUniqueTitles(files, scope);

  return files.map((file, index) => {
    warnOnFallback(file, warn);
    const raw = readFileSync(file.path, 'utf-8');
    return {
      sourcePath: file.path,
      rawOrderPrefix: file.parsed.order,
      title: file.parsed.title,
      bodyMarkdown: inlineImages(raw, { pageDir: dir, contentRoot, onWarning: warn }),
      priority: index + 1,
    };
  });
}

/**
 * Walk the content root and return its chapters and pages in sync order,
 * with priorities 1..N in each scope and images inlined into page bodies.
 */
export function buildLocalTree(contentRoot: string, options: BuildTreeOptions = {}): LocalTree {
  const root = assertContentRoot(contentRoot);
  const warn = options.onWarning ?? defaultWarning;

  const pages = readPages(root, root, 'the book root', warn);

  const dirs = listEntries(root, 'directory');
  assertUniqueTitles(dirs, 'the chapter list');

  const chapters: LocalChapter[] = dirs.map((dir, index) => {
    warnOnFallback(dir, warn);
    return {
      sourceDir: dir.path,
      rawOrderPrefix: dir.parsed.order,
      title: dir.parsed.title,
      priority: index + 1,
      pages: readPages(dir.path, root, `chapter "${dir.parsed.title}"`, warn),
    };
  });

  return { contentRoot: root, pages, chapters };
}
