/**
 * Change detection for page content.
 *
 * Compares the Markdown we are about to send with what the wiki stores.
 * When the wiki returns the page's Markdown source, the two strings are
 * compared directly. When it only returns rendered HTML, the new Markdown is
 * rendered and the HTML strings are compared, so Markdown that differs only
 * in ways the renderer ignores counts as unchanged.
 */

import { Marked } from 'marked';
import type { StoredContent } from '../types.js';

// Own instance; global marked options do not apply.
const renderer = new Marked({ gfm: true });

/** Render Markdown to HTML synchronously. */
export function renderMarkdown(markdown: string): string {
  const html = renderer.parse(markdown, { async: false });
  if (typeof html !== 'string') {
    throw new Error('Markdown renderer returned a promise; async extensions are not supported');
  }
  return html;
}

/** True when `newMarkdown` differs from the stored page content. */
export function hasContentChanged(newMarkdown: string, stored: StoredContent): boolean {
  if (stored.kind === 'markdown') {
    return newMarkdown !== stored.markdown;
  }
  return renderMarkdown(newMarkdown) !== stored.html;
}
