import fs from 'fs/promises';
import matter from 'gray-matter';
import yaml from 'js-yaml';
import { DocumentParseError } from '../utils/errors';
import { FrontMatter, ParsedDocument } from '../types/index';

// A delimited block: opening `---` line, optional YAML, closing `---` line
const FRONT_MATTER_BLOCK = /^---[ \t]*\r?\n(?:[\s\S]*?\r?\n)?---[ \t]*(?:\r?\n|$)/;

// Core schema: no implicit timestamps, so `date: 2024-03-05` stays a
// string and is written back unchanged
const MATTER_OPTIONS = {
  engines: {
    yaml: {
      parse: (input: string): object => {
        const data: unknown = yaml.load(input, { schema: yaml.CORE_SCHEMA });
        if (data === null || data === undefined) return {};
        if (typeof data !== 'object') {
          throw new Error('Front matter is not a mapping');
        }
        return data;
      },
      stringify: (data: object): string => yaml.dump(data, { schema: yaml.CORE_SCHEMA }),
    },
  },
};

/**
 * Split a document into front matter and body.
 *
 * Text without a complete leading `---` block has empty front matter and
 * the whole text as body. YAML that fails to parse, or that is not a
 * mapping, raises a DocumentParseError.
 */
export function parseDocument(content: string, filePath?: string): ParsedDocument {
  if (!FRONT_MATTER_BLOCK.test(content)) {
    return { frontMatter: {}, body: content };
  }

  let parsed: matter.GrayMatterFile<string>;
  try {
    // Passing options also keeps gray-matter from caching (and sharing) the data object
    parsed = matter(content, MATTER_OPTIONS);
  } catch (error) {
    throw new DocumentParseError(
      `Failed to parse front matter${filePath ? ` in ${filePath}` : ''}: ${
        error instanceof Error ? error.message : String(error)
      }`,
      filePath
    );
  }

  if (!isMapping(parsed.data)) {
    throw new DocumentParseError(
      `Front matter is not a mapping${filePath ? ` in ${filePath}` : ''}`,
      filePath
    );
  }

  return {
    frontMatter: { ...parsed.data },
    body: parsed.content,
  };
}

/**
 * Read and parse a markdown file
 */
export async function readDocument(filePath: string): Promise<ParsedDocument> {
  const content = await fs.readFile(filePath, 'utf-8');
  return parseDocument(content, filePath);
}

/**
 * Serialize a document back to markdown. Empty front matter produces the
 * body alone.
 */
export function serializeDocument(document: ParsedDocument): string {
  return matter.stringify(document.body, document.frontMatter, MATTER_OPTIONS);
}

function isMapping(value: unknown): value is FrontMatter {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
