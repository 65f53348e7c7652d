import { IndexStore } from './index-store';
import { canonicalizePath } from './path-canonicalizer';
import { Logger } from '../utils/logger';
import { LinkToken } from '../types/index';

const WIKI_LINK = /\[\[(.*?)\]\]/g;

/**
 * Split the inside of a `[[...]]` token on its first `|`
 */
export function parseLinkToken(raw: string, inner: string): LinkToken {
  const separator = inner.indexOf('|');
  if (separator === -1) {
    return { raw, targetPath: inner };
  }

  return {
    raw,
    targetPath: inner.slice(0, separator),
    alias: inner.slice(separator + 1),
  };
}

/**
 * Text shown for a link: its alias, or the last segment of its target
 */
export function displayText(token: LinkToken): string {
  if (token.alias !== undefined) return token.alias;

  const segments = token.targetPath.split(/[\\/]/);
  return segments[segments.length - 1];
}

/**
 * Rewrites wiki links into markdown links against an index store.
 *
 * A token whose target has no index entry, whose entry has no slug for
 * the language, or whose language has no base URL is left exactly as it
 * was written so that a later run can still resolve it.
 */
export class LinkResolver {
  constructor(
    private store: IndexStore,
    private baseUrls: Record<string, string>,
    private logger: Logger,
    private canonicalize: (rawPath: string) => string = canonicalizePath
  ) {}

  /**
   * Resolve every wiki link in a document body
   */
  async resolveLinks(body: string, language: string): Promise<string> {
    const tokens = Array.from(body.matchAll(WIKI_LINK), match => parseLinkToken(match[0], match[1]));
    if (tokens.length === 0) return body;

    const replacements: string[] = [];
    for (const token of tokens) {
      replacements.push(await this.resolveToken(token, language));
    }

    let index = 0;
    return body.replace(WIKI_LINK, () => replacements[index++]);
  }

  /**
   * Resolve a single token, returning its raw text when unresolved
   */
  async resolveToken(token: LinkToken, language: string): Promise<string> {
    const canonicalPath = this.canonicalize(token.targetPath);
    const display = displayText(token);

    this.logger.debug('Processing link', {
      original: token.raw,
      display,
      canonicalPath,
      indexFile: canonicalPath ? this.store.resolveIndexFile(canonicalPath) : null,
    });

    const lookup = await this.store.get(canonicalPath);
    if (lookup.kind === 'absent') {
      this.logger.debug('No index data found', { link: token.raw, reason: lookup.reason });
      return token.raw;
    }

    const slug = ownValue(lookup.entry.slugs, language);
    if (!slug) {
      this.logger.debug(`No ${language} slug found`, { link: token.raw });
      return token.raw;
    }

    const baseUrl = ownValue(this.baseUrls, language);
    if (!baseUrl) {
      this.logger.debug(`No base URL configured for language ${language}`, { link: token.raw });
      return token.raw;
    }

    const url = `${baseUrl.replace(/\/+$/, '')}/${slug}`;
    this.logger.debug('Generated URL', { link: token.raw, url });

    return `[${display}](${url})`;
  }
}

// Language codes come from documents; keys like `constructor` must not
// reach Object.prototype
function ownValue(record: Record<string, string>, key: string): string | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}
