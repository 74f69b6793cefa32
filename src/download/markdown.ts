/**
 * HTML to Markdown for pages the wiki only returns as rendered HTML.
 */

import TurndownService from 'turndown';

// Checked in order; the first class found names the callout.
const CALLOUT_TYPES = [
  ['danger', 'DANGER'],
  ['warning', 'WARNING'],
  ['success', 'SUCCESS'],
  ['tip', 'TIP'],
  ['info', 'INFO'],
  ['note', 'NOTE'],
] as const;

function isCallout(node: HTMLElement): boolean {
  return node.classList.contains('callout');
}

function calloutType(node: HTMLElement): string {
  for (const [cls, type] of CALLOUT_TYPES) {
    if (node.classList.contains(cls)) return type;
  }
  return 'INFO';
}

const turndown = new TurndownService({
  headingStyle: 'atx',
  codeBlockStyle: 'fenced',
  bulletListMarker: '-',
  // Trailing-space hard breaks would not survive the whitespace cleanup below.
  br: '\\',
});

// Callouts (<p class="callout warning">) become admonition blockquotes.
turndown.addRule('callout', {
  filter: (node) => isCallout(node),
  replacement: (content, node) => {
    const type = 'classList' in node ? calloutType(node) : 'INFO';
    const lines = [`[!${type}]`, ...content.trim().split('\n')];
    return `\n\n${lines.map((line) => (line ? `> ${line}` : '>')).join('\n')}\n\n`;
  },
});

// No Markdown form without the GFM plugin; Markdown allows raw HTML blocks.
turndown.keep(['table']);

/** Convert page HTML to Markdown, ending with a single newline. */
export function htmlToMarkdown(html: string): string {
  if (!html.trim()) return '';
  const markdown = turndown
    .turndown(html)
    .replace(/[ \t]+$/gm, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
  return markdown ? `${markdown}\n` : '';
}
