/**
 * Inline local images into Markdown as base64 data URIs.
 *
 * Only relative references with an allowed image extension are touched.
 * Each is looked up next to the page first, then under the content root.
 * References that cannot be resolved are left exactly as written.
 */

import { readFileSync, statSync } from 'node:fs';
import { extname, isAbsolute, resolve } from 'node:path';
import { IMAGE_EXTENSIONS, IMAGE_MIME_TYPES, type ImageExtension } from '../types.js';

// ![alt](path) or ![alt](path "title")
const MD_IMAGE_RE = /!\[([^\]]*)\]\(([^)\s]+)(\s+"[^"]*")?\)/g;
// data:, http:, https:, C: ... and protocol-relative //host/...
const URL_RE = /^(?:[a-z][a-z0-9+.-]*:|\/\/)/i;

const ALLOWED_EXTENSIONS = new Set<string>(IMAGE_EXTENSIONS);

export interface InlineContext {
  /** Directory of the Markdown file being transformed. */
  pageDir: string;
  contentRoot: string;
  /** Called for each allowed image reference that could not be found. */
  onWarning?: (message: string) => void;
}

function isImageExtension(ext: string): ext is ImageExtension {
  return ALLOWED_EXTENSIONS.has(ext);
}

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/** Find the referenced file next to the page, then under the content root. */
export function resolveImagePath(ref: string, pageDir: string, contentRoot: string): string | null {
  for (const base of [pageDir, contentRoot]) {
    const candidate = resolve(base, ref);
    if (isFile(candidate)) return candidate;
  }
  return null;
}

/** Encode a file as a data URI using the MIME type of its extension. */
export function toDataUri(path: string, ext: ImageExtension): string {
  const data = readFileSync(path).toString('base64');
  return `data:${IMAGE_MIME_TYPES[ext]};base64,${data}`;
}

/** Replace every resolvable image reference in `markdown` with a data URI. */
export function inlineImages(markdown: string, ctx: InlineContext): string {
  return markdown.replace(
    MD_IMAGE_RE,
    (whole: string, alt: string, rawRef: string, title: string | undefined) => {
      if (URL_RE.test(rawRef) || isAbsolute(rawRef)) return whole;

      const ref = rawRef.replace(/%20/g, ' ');
      const ext = extname(ref).slice(1).toLowerCase();
      if (!isImageExtension(ext)) return whole;

      const imagePath = resolveImagePath(ref, ctx.pageDir, ctx.contentRoot);
      if (!imagePath) {
        ctx.onWarning?.(`Image not found, left as-is: ${rawRef} (in ${ctx.pageDir})`);
        return whole;
      }

      return `![${alt}](${toDataUri(imagePath, ext)}${title ?? ''})`;
    },
  );
}
