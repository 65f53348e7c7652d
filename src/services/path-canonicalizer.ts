/**
 * Directory names that only mark the root of the index tree. Links may or
 * may not include them, so they never take part in the lookup key.
 */
export const DEFAULT_INDEX_ALIASES = ['Index', 'Brain Guides'] as const;

/**
 * Normalize a wiki-link target into the key used to look up its index
 * document.
 *
 * Separators are unified to `/`; empty, `.`, `..` and index-root alias
 * segments are removed, and a markdown extension on the final segment is
 * dropped. `../../../Index/Drugs/Venlafaxine.md` and `Drugs/Venlafaxine`
 * both become `Drugs/Venlafaxine`.
 */
export function canonicalizePath(
  rawPath: string,
  aliases: readonly string[] = DEFAULT_INDEX_ALIASES
): string {
  const ignored = new Set<string>(['', '.', '..', ...aliases]);

  const segments = rawPath
    .replace(/\\/g, '/')
    .split('/')
    .map(segment => segment.trim())
    .filter(segment => !ignored.has(segment));

  // Stripping the file name can leave an alias (`Index.md`), which is then
  // dropped and exposes the segment before it
  for (let last = segments.at(-1); last !== undefined; last = segments.at(-1)) {
    const stripped = stripExtension(last);
    if (stripped === last) break;

    segments.pop();
    if (!ignored.has(stripped)) segments.push(stripped);
  }

  return segments.join('/');
}

/**
 * Build a canonicalizer bound to a configured alias set
 */
export function createCanonicalizer(aliases: readonly string[]): (rawPath: string) => string {
  return rawPath => canonicalizePath(rawPath, aliases);
}

// Document extensions only; "St. John's Wort" keeps its dot
const DOCUMENT_EXTENSION = /(\.(md|markdown))+$/i;

function stripExtension(segment: string): string {
  const stripped = segment.replace(DOCUMENT_EXTENSION, '');
  // ".md" on its own is a hidden file name, not an extension
  return stripped === '' ? segment : stripped;
}
