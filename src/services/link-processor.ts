import fs from 'fs/promises';
import path from 'path';
import glob from 'fast-glob';
import { IndexStore } from './index-store';
import { LinkResolver } from './link-resolver';
import { createCanonicalizer } from './path-canonicalizer';
import { readDocument, serializeDocument } from './document';
import { Logger } from '../utils/logger';
import { LinkConfig } from '../utils/config';
import { ConfigurationError } from '../utils/errors';
import { writeFileAtomic } from '../utils/files';
import { LinkProcessingOptions, ParsedDocument, ProcessingResult } from '../types/index';

export const READY_STATUS = 'interlinking-ready';
export const DONE_STATUS = 'html-ready';

/**
 * Processed document ready to be written
 */
export interface ProcessedDocument {
  document: ParsedDocument;
  outputPath: string;
}

/**
 * File and directory driver for link resolution.
 *
 * Each processor owns one IndexStore, so building a new processor starts
 * with an empty cache.
 */
export class LinkProcessor {
  private resolver: LinkResolver;
  private store: IndexStore;

  constructor(
    config: LinkConfig,
    private logger: Logger
  ) {
    this.store = new IndexStore(config.indexPath, logger);
    this.resolver = new LinkResolver(
      this.store,
      config.baseUrls,
      logger,
      createCanonicalizer(config.indexAliases)
    );
  }

  /**
   * Process a single file or every markdown file under a directory
   */
  async processPath(
    inputPath: string,
    options: LinkProcessingOptions = {}
  ): Promise<ProcessingResult> {
    const stats = await fs.stat(inputPath).catch(() => {
      throw new ConfigurationError(`Input path does not exist: ${inputPath}`);
    });

    const files = stats.isDirectory()
      ? (await glob('**/*.md', { cwd: inputPath, absolute: true, onlyFiles: true })).sort()
      : [path.resolve(inputPath)];

    const result: ProcessingResult = { processed: 0, skipped: 0, errors: 0 };

    for (const filePath of files) {
      try {
        const processed = await this.processFile(filePath);
        if (!processed) {
          result.skipped++;
          continue;
        }

        if (!options.dryRun) {
          await this.saveProcessedFile(processed);
        }
        this.logger.info('Resolved links', {
          file: path.basename(filePath),
          output: path.basename(processed.outputPath),
          dryRun: Boolean(options.dryRun),
        });
        result.processed++;
      } catch (error) {
        this.logger.error('Failed to process file', {
          file: filePath,
          error: error instanceof Error ? error.message : String(error),
        });
        result.errors++;
      }
    }

    this.logger.debug('Index cache', this.store.getStats());

    return result;
  }

  /**
   * Resolve the links of one document. Returns null when the document is
   * not marked ready for interlinking or has no language.
   */
  async processFile(filePath: string): Promise<ProcessedDocument | null> {
    const { frontMatter, body } = await readDocument(filePath);

    if (frontMatter.status !== READY_STATUS) {
      this.logger.debug('Skipping file: not ready for interlinking', { file: filePath });
      return null;
    }

    const language = frontMatter.language;
    if (typeof language !== 'string' || !language) {
      this.logger.debug('Skipping file: no language specified', { file: filePath });
      return null;
    }

    const resolvedBody = await this.resolver.resolveLinks(body, language);

    return {
      document: {
        frontMatter: { ...frontMatter, status: DONE_STATUS },
        body: resolvedBody,
      },
      outputPath: generateOutputPath(filePath, frontMatter.code, language),
    };
  }

  /**
   * Write a processed document
   */
  async saveProcessedFile(processed: ProcessedDocument): Promise<void> {
    try {
      await writeFileAtomic(processed.outputPath, serializeDocument(processed.document));
    } catch (error) {
      throw new Error(
        `Failed to write processed file: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}

/**
 * `<code>.md` for English, `<code>_<language>.md` otherwise, beside the
 * source file. The code defaults to the source file's stem.
 */
export function generateOutputPath(sourcePath: string, code: unknown, language: string): string {
  const stem =
    typeof code === 'string' && code.trim()
      ? code.trim()
      : typeof code === 'number'
        ? String(code)
        : path.basename(sourcePath, path.extname(sourcePath));

  const fileName = language === 'en' ? `${stem}.md` : `${stem}_${language}.md`;
  return path.join(path.dirname(sourcePath), fileName);
}
