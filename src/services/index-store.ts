import fs from 'fs/promises';
import path from 'path';
import { parseDocument } from './document';
import { Logger } from '../utils/logger';
import { FrontMatter, IndexEntry, IndexLookup } from '../types/index';

const SLUG_KEY = /^(.+)-slug$/;

/**
 * Lazily loaded, per-run cache of index documents keyed by canonical path.
 *
 * Every lookup result is memoized, absent ones included, so a path that
 * has no index document is read from disk at most once. A store is built
 * for one run and never invalidated.
 */
export class IndexStore {
  private cache: Map<string, IndexLookup> = new Map();

  constructor(
    private indexRoot: string,
    private logger: Logger
  ) {}

  /**
   * Look up the index entry for a canonical path
   */
  async get(canonicalPath: string): Promise<IndexLookup> {
    const cached = this.cache.get(canonicalPath);
    if (cached) return cached;

    const result = await this.load(canonicalPath);
    this.cache.set(canonicalPath, result);
    return result;
  }

  /**
   * Path of the index document backing a canonical path
   */
  resolveIndexFile(canonicalPath: string): string {
    return path.join(this.indexRoot, `${canonicalPath}.md`);
  }

  getStats(): { cached: number; found: number; absent: number } {
    let found = 0;
    for (const lookup of this.cache.values()) {
      if (lookup.kind === 'found') found++;
    }

    return {
      cached: this.cache.size,
      found,
      absent: this.cache.size - found,
    };
  }

  private async load(canonicalPath: string): Promise<IndexLookup> {
    if (!canonicalPath) {
      return { kind: 'absent', reason: 'empty-path' };
    }

    const indexFile = this.resolveIndexFile(canonicalPath);

    let content: string;
    try {
      content = await fs.readFile(indexFile, 'utf-8');
    } catch {
      this.logger.debug('No index document', { path: canonicalPath, indexFile });
      return { kind: 'absent', reason: 'missing' };
    }

    try {
      const { frontMatter } = parseDocument(content, indexFile);
      return {
        kind: 'found',
        entry: { canonicalPath, slugs: extractSlugs(frontMatter) },
      };
    } catch (error) {
      this.logger.debug('Failed to load index document', {
        indexFile,
        error: error instanceof Error ? error.message : String(error),
      });
      return { kind: 'absent', reason: 'malformed' };
    }
  }
}

/**
 * Collect `<lang>-slug` keys with a non-empty string value
 */
export function extractSlugs(frontMatter: FrontMatter): IndexEntry['slugs'] {
  const slugs: Array<[string, string]> = [];

  for (const [key, value] of Object.entries(frontMatter)) {
    const match = SLUG_KEY.exec(key);
    if (match && typeof value === 'string' && value.trim()) {
      slugs.push([match[1], value.trim()]);
    }
  }

  // fromEntries defines own properties, so `__proto__-slug` stays data
  return Object.fromEntries(slugs);
}
