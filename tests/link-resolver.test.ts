import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import path from 'path';
import { remove } from 'fs-extra';
import { IndexStore } from '../src/services/index-store';
import { LinkResolver, displayText, parseLinkToken } from '../src/services/link-resolver';
import { createCanonicalizer } from '../src/services/path-canonicalizer';
import { Logger } from '../src/utils/logger';
import { quietLogger, testDir, writeFixture } from './helpers';

const INDEX_DIR = path.join(testDir('link-resolver'), 'Index');

const BASE_URLS = {
  en: 'https://example.com',
  es: 'https://example.es/',
};

describe('LinkResolver', () => {
  let logger: Logger;
  let resolver: LinkResolver;

  beforeEach(async () => {
    logger = quietLogger();
    await writeFixture(
      INDEX_DIR,
      'Drugs/Venlafaxine.md',
      '---\nen-slug: venlafaxine-guide\nes-slug: guia-venlafaxina\nfr-slug: guide-venlafaxine\n---\n'
    );
    await writeFixture(INDEX_DIR, 'Drugs/Bupropion.md', '---\nes-slug: guia-bupropion\n---\n');
    resolver = new LinkResolver(new IndexStore(INDEX_DIR, logger), BASE_URLS, logger);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await remove(testDir('link-resolver'));
  });

  it('should resolve an aliased link to the language slug', async () => {
    const output = await resolver.resolveLinks('[[Drugs/Venlafaxine|Venlafaxine]]', 'en');

    expect(output).toBe('[Venlafaxine](https://example.com/venlafaxine-guide)');
  });

  it('should use the last path segment as display text without an alias', async () => {
    const output = await resolver.resolveLinks('[[../../../Index/Drugs/Venlafaxine]]', 'en');

    expect(output).toBe('[Venlafaxine](https://example.com/venlafaxine-guide)');
  });

  it('should leave a link unchanged when the entry has no slug for the language', async () => {
    const output = await resolver.resolveLinks('[[Drugs/Bupropion|Bupropion]]', 'en');

    expect(output).toBe('[[Drugs/Bupropion|Bupropion]]');
  });

  it('should leave a link unchanged when no index document exists', async () => {
    const body = 'Compare [[Index/Drugs/Sertraline|the SSRI]] later.';

    expect(await resolver.resolveLinks(body, 'en')).toBe(body);
  });

  it('should leave a link unchanged when the language has no base URL', async () => {
    expect(await resolver.resolveLinks('[[Drugs/Venlafaxine]]', 'fr')).toBe('[[Drugs/Venlafaxine]]');
  });

  it('should leave a link unchanged for language codes that name object properties', async () => {
    expect(await resolver.resolveLinks('[[Drugs/Venlafaxine]]', 'constructor')).toBe('[[Drugs/Venlafaxine]]');
    expect(await resolver.resolveLinks('[[Drugs/Venlafaxine]]', 'toString')).toBe('[[Drugs/Venlafaxine]]');
  });

  it('should not double a trailing slash on the base URL', async () => {
    const output = await resolver.resolveLinks('[[Drugs/Venlafaxine|venlafaxina]]', 'es');

    expect(output).toBe('[venlafaxina](https://example.es/guia-venlafaxina)');
  });

  it('should rewrite several links in order and keep surrounding text', async () => {
    const body =
      'See [[Drugs/Venlafaxine]] and [[Drugs/Unknown|other]].\nAlso [[Brain Guides/Index/Drugs/Venlafaxine.md|SNRI]].';

    expect(await resolver.resolveLinks(body, 'en')).toBe(
      'See [Venlafaxine](https://example.com/venlafaxine-guide) and [[Drugs/Unknown|other]].\n' +
        'Also [SNRI](https://example.com/venlafaxine-guide).'
    );
  });

  it('should produce the same output when run on its own output', async () => {
    const body = 'A [[Drugs/Venlafaxine]] and [[Drugs/Bupropion]] and [[Nope]].';
    const first = await resolver.resolveLinks(body, 'en');

    expect(await resolver.resolveLinks(first, 'en')).toBe(first);
  });

  it('should return a body without links untouched', async () => {
    expect(await resolver.resolveLinks('No links here.', 'en')).toBe('No links here.');
  });

  it('should canonicalize with a configured alias set', async () => {
    const custom = new LinkResolver(
      new IndexStore(INDEX_DIR, logger),
      BASE_URLS,
      logger,
      createCanonicalizer(['Library'])
    );

    expect(await custom.resolveLinks('[[Library/Drugs/Venlafaxine]]', 'en')).toBe(
      '[Venlafaxine](https://example.com/venlafaxine-guide)'
    );
  });
});

describe('parseLinkToken', () => {
  it('should split on the first pipe only', () => {
    expect(parseLinkToken('[[a|b|c]]', 'a|b|c')).toEqual({
      raw: '[[a|b|c]]',
      targetPath: 'a',
      alias: 'b|c',
    });
  });

  it('should leave the alias undefined without a pipe', () => {
    expect(parseLinkToken('[[Drugs/Venlafaxine]]', 'Drugs/Venlafaxine')).toEqual({
      raw: '[[Drugs/Venlafaxine]]',
      targetPath: 'Drugs/Venlafaxine',
    });
  });
});

describe('displayText', () => {
  it('should keep the final segment as written', () => {
    expect(displayText({ raw: '', targetPath: 'Drugs/Venlafaxine.md' })).toBe('Venlafaxine.md');
    expect(displayText({ raw: '', targetPath: 'Drugs\\Venlafaxine' })).toBe('Venlafaxine');
  });

  it('should prefer the alias, even when empty', () => {
    expect(displayText({ raw: '', targetPath: 'Drugs/Venlafaxine', alias: '' })).toBe('');
  });
});
