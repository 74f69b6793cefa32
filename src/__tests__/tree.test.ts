/**
 * Tests for the content folder walk: ordering, priorities, scoping rules and
 * local validation. Uses temp directories for each content root.
 */
import { describe, it, expect, afterEach, vi } from 'vitest';
import { symlinkSync } from 'node:fs';
import { join } from 'node:path';
import { buildLocalTree, compareEntries } from '../content/tree.js';
import { ConfigurationError } from '../errors.js';
import { makeContentRoot, removeContentRoot } from './helpers.js';

describe('buildLocalTree', () => {
  let root: string | undefined;

  afterEach(() => {
    if (root) removeContentRoot(root);
    root = undefined;
  });

  it('should order pages and chapters and number them from 1', () => {
    root = makeContentRoot({
      'Zeta.md': 'z',
      'Alpha.md': 'a',
      '02 Setup.md': 'setup',
      '01 Intro.md': 'intro',
      '02 Another.md': 'another',
      'notes.txt': 'ignored',
      '.hidden.md': 'ignored',
      '10 Appendix/01 Extra.md': 'extra',
      '10 Appendix/nested/deep.md': 'ignored',
      '03_Guides/b.md': 'b',
      '03_Guides/01 a.md': 'a',
      'Empty Chapter/': '',
    });

    const tree = buildLocalTree(root, { onWarning: () => {} });

    expect(tree.contentRoot).toBe(root);
    expect(tree.pages.map((p) => [p.title, p.priority])).toEqual([
      ['Intro', 1],
      ['Another', 2],
      ['Setup', 3],
      ['Alpha', 4],
      ['Zeta', 5],
    ]);
    expect(tree.chapters.map((c) => [c.title, c.priority, c.pages.map((p) => p.title)])).toEqual([
      ['Guides', 1, ['a', 'b']],
      ['Appendix', 2, ['Extra']],
      ['Empty Chapter', 3, []],
    ]);
    expect(tree.chapters[0].pages.map((p) => p.priority)).toEqual([1, 2]);
  });

  it('should keep the source path, raw prefix and body of each page', () => {
    root = makeContentRoot({
      '05 Intro.md': '# Intro\n\nHello',
      '10 Appendix/Extra.md': 'extra',
    });

    const tree = buildLocalTree(root, { onWarning: () => {} });
    const [intro] = tree.pages;
    const [appendix] = tree.chapters;

    expect(intro).toEqual({
      sourcePath: join(root, '05 Intro.md'),
      rawOrderPrefix: 5,
      title: 'Intro',
      bodyMarkdown: '# Intro\n\nHello',
      priority: 1,
    });
    expect(appendix.sourceDir).toBe(join(root, '10 Appendix'));
    expect(appendix.rawOrderPrefix).toBe(10);
    expect(appendix.pages[0].rawOrderPrefix).toBeUndefined();
  });

  it('should sort unprefixed names by code unit, keeping case', () => {
    root = makeContentRoot({ 'banana.md': '', 'Cherry.md': '', 'apple.md': '' });
    const tree = buildLocalTree(root, { onWarning: () => {} });
    expect(tree.pages.map((p) => p.title)).toEqual(['Cherry', 'apple', 'banana']);
  });

  it('should inline images in page bodies', () => {
    root = makeContentRoot({
      'Pics.md': 'See ![dot](dot.gif)',
      'dot.gif': Buffer.from([1, 2, 3]),
    });
    const tree = buildLocalTree(root, { onWarning: () => {} });
    expect(tree.pages[0].bodyMarkdown).toBe('See ![dot](data:image/gif;base64,AQID)');
  });

  it('should report unresolved images as warnings', () => {
    root = makeContentRoot({ 'Broken.md': '![x](missing.png)' });
    const onWarning = vi.fn();

    const tree = buildLocalTree(root, { onWarning });

    expect(tree.pages[0].bodyMarkdown).toBe('![x](missing.png)');
    expect(onWarning).toHaveBeenCalledWith(`Image not found, left as-is: missing.png (in ${root})`);
  });

  it('should use the raw name for a prefix-only file and warn about it', () => {
    root = makeContentRoot({ '07.md': 'body' });
    const onWarning = vi.fn();

    const tree = buildLocalTree(root, { onWarning });

    expect(tree.pages[0].title).toBe('07');
    expect(onWarning).toHaveBeenCalledWith('"07.md" has no title after its number prefix; using "07"');
  });

  it('should reject two root pages with the same title', () => {
    root = makeContentRoot({ '01 Intro.md': 'a', '02_Intro.md': 'b' });
    const contentRoot = root;
    expect(() => buildLocalTree(contentRoot, { onWarning: () => {} })).toThrow(
      new ConfigurationError('Duplicate title "Intro" in the book root: "01 Intro.md" and "02_Intro.md"'),
    );
  });

  it('should reject two chapters with the same title', () => {
    root = makeContentRoot({ '01 Guide/': '', 'Guide/': '' });
    const contentRoot = root;
    expect(() => buildLocalTree(contentRoot, { onWarning: () => {} })).toThrow(
      'Duplicate title "Guide" in the chapter list: "01 Guide" and "Guide"',
    );
  });

  it('should reject duplicate page titles inside a chapter', () => {
    root = makeContentRoot({ 'Guide/a-b.md': '', 'Guide/a_b.md': '' });
    const contentRoot = root;
    expect(() => buildLocalTree(contentRoot, { onWarning: () => {} })).toThrow(
      'Duplicate title "a b" in chapter "Guide": "a-b.md" and "a_b.md"',
    );
  });

  it('should skip symlinks whose target is missing', () => {
    root = makeContentRoot({ 'Intro.md': 'intro', 'Guide/Page.md': 'page' });
    symlinkSync(join(root, 'missing-target.md'), join(root, 'stale-link.md'));
    symlinkSync(join(root, 'missing-dir'), join(root, 'Stale Chapter'));
    symlinkSync(join(root, 'Guide', 'gone.md'), join(root, 'Guide', 'stale.md'));

    const tree = buildLocalTree(root, { onWarning: () => {} });

    expect(tree.pages.map((p) => p.title)).toEqual(['Intro']);
    expect(tree.chapters.map((c) => [c.title, c.pages.map((p) => p.title)])).toEqual([['Guide', ['Page']]]);
  });

  it('should order prefixes too long for a safe integer by their digits', () => {
    root = makeContentRoot({
      '12345678901234567891 Second.md': '',
      '12345678901234567890 First.md': '',
      '9 Early.md': '',
    });
    const tree = buildLocalTree(root, { onWarning: () => {} });
    expect(tree.pages.map((p) => p.title)).toEqual(['Early', 'First', 'Second']);
  });

  it('should allow the same title in different scopes', () => {
    root = makeContentRoot({ 'Overview.md': '', 'Guide/Overview.md': '' });
    const tree = buildLocalTree(root, { onWarning: () => {} });
    expect(tree.pages[0].title).toBe('Overview');
    expect(tree.chapters[0].pages[0].title).toBe('Overview');
  });

  it('should fail with a configuration error when the folder is missing', () => {
    root = makeContentRoot({});
    const missing = join(root, 'nope');
    expect(() => buildLocalTree(missing)).toThrow(new ConfigurationError(`Content folder not found: ${missing}`));
  });
});

describe('compareEntries', () => {
  it('should put prefixed entries before unprefixed ones', () => {
    expect(compareEntries({ prefix: '99', name: 'z' }, { name: 'a' })).toBeLessThan(0);
    expect(compareEntries({ name: 'a' }, { prefix: '1', name: 'z' })).toBeGreaterThan(0);
  });

  it('should break prefix ties by name', () => {
    expect(compareEntries({ prefix: '02', name: '02 B' }, { prefix: '02', name: '02 A' })).toBeGreaterThan(0);
    expect(compareEntries({ prefix: '02', name: '02 A' }, { prefix: '02', name: '02 A' })).toBe(0);
  });
});
