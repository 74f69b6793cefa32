/**
 * Ordering keys and display titles from file and directory names.
 *
 *   "03-Advanced Topics.md"  -> order 3, title "Advanced Topics"
 *   "10 Appendix"            -> order 10, title "Appendix"
 *   "Glossary.md"            -> no order, title "Glossary"
 *   "07.md"                  -> order 7, title "07" (fallback, flagged)
 *
 * formatEntryName goes the other way when a book is written to disk:
 *   priority 3, "Advanced Topics" -> "03 Advanced Topics"
 */

const MARKDOWN_EXT_RE = /\.md$/;
const ORDER_PREFIX_RE = /^(\d+)[ _-]?(.*)$/s;
const SEPARATOR_RE = /[_-]/g;
const INVALID_FS_CHARS_RE = /[\\/:*?"<>|]/g;

export interface ParsedName {
  /** Numeric prefix, when the name starts with digits. */
  order?: number;
  /** The prefix digits as written. Sorting uses these, so long prefixes keep their order. */
  prefix?: string;
  title: string;
  /**
   * True when nothing was left after the prefix and the raw name
   * (minus `.md`) became the title.
   */
  titleFallback: boolean;
}

/** Strip a trailing `.md` extension, if any. */
export function stripMarkdownExtension(name: string): string {
  return name.replace(MARKDOWN_EXT_RE, '');
}

/** Turn underscores and hyphens into spaces. Case is kept as-is. */
export function normalizeTitle(source: string): string {
  return source.replace(SEPARATOR_RE, ' ').trim();
}

/**
 * Compare two digit strings by numeric value without converting them, so
 * prefixes past the safe integer range still sort correctly.
 */
export function compareDigits(a: string, b: string): number {
  const x = a.replace(/^0+(?=\d)/, '');
  const y = b.replace(/^0+(?=\d)/, '');
  if (x.length !== y.length) return x.length - y.length;
  if (x < y) return -1;
  if (x > y) return 1;
  return 0;
}

/**
 * Parse a file or directory name (no path) into its ordering key and title.
 * A name that is only a prefix falls back to the raw name as its title.
 */
export function parseEntryName(name: string): ParsedName {
  const stem = stripMarkdownExtension(name);
  const match = ORDER_PREFIX_RE.exec(stem);

  let order: number | undefined;
  let prefix: string | undefined;
  let titleSource = stem;
  if (match) {
    prefix = match[1];
    order = parseInt(prefix, 10);
    titleSource = match[2];
  }

  const title = normalizeTitle(titleSource);
  if (title) {
    return { order, prefix, title, titleFallback: false };
  }
  return { order, prefix, title: stem, titleFallback: true };
}

/**
 * Make a title usable as a file or directory name on common filesystems.
 * Path and reserved characters become underscores, whitespace runs collapse,
 * and trailing dots and spaces are dropped. Case is kept.
 */
export function sanitizeName(title: string): string {
  const name = title
    .replace(INVALID_FS_CHARS_RE, '_')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/[ .]+$/, '');
  return name || 'untitled';
}

/** Entry name for a remote item: priority padded to two digits, then the title. */
export function formatEntryName(priority: number, title: string): string {
  return `${String(priority).padStart(2, '0')} ${sanitizeName(title)}`;
}
