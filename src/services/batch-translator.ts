import path from 'path';
import { readDocument, serializeDocument } from './document';
import { Ledger } from './ledger';
import { Logger } from '../utils/logger';
import { formatDate } from '../utils/date';
import { writeFileAtomic } from '../utils/files';
import { BatchStats, FrontMatter, JobRecord, ParsedDocument, Translator } from '../types/index';

export interface BatchTranslatorOptions {
  sourceRoot: string;
  outputRoot: string;
  logger: Logger;
  /** Checked before each entry; the entry in flight always finishes */
  signal?: AbortSignal;
  now?: () => Date;
}

/**
 * Request text sent to the translator, with the title (when present) as
 * its first paragraph
 */
export interface TranslationPayload {
  text: string;
  hasTitle: boolean;
}

/**
 * Drains pending ledger entries one at a time.
 *
 * Each entry's outcome is written to the ledger before the next entry
 * starts. A failed read, translation or write marks only that entry as
 * failed.
 */
export class BatchTranslator {
  private logger: Logger;
  private now: () => Date;

  constructor(
    private ledger: Ledger,
    private translator: Translator,
    private options: BatchTranslatorOptions
  ) {
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Translate up to `limit` pending entries
   */
  async run(limit?: number): Promise<BatchStats> {
    const entries = await this.ledger.pending(limit);
    const stats: BatchStats = { attempted: 0, succeeded: 0, failed: 0, interrupted: false };

    this.logger.info('Starting translation batch', { pending: entries.length, limit: limit ?? null });

    for (const entry of entries) {
      if (this.options.signal?.aborted) {
        stats.interrupted = true;
        this.logger.warn('Translation interrupted; progress is saved in the ledger', {
          remaining: entries.length - stats.attempted,
        });
        break;
      }

      stats.attempted++;
      const success = await this.translateEntry(entry);
      await this.ledger.recordResult(entry, success);

      if (success) {
        stats.succeeded++;
      } else {
        stats.failed++;
      }

      this.logger.info('Progress', {
        processed: stats.attempted,
        total: entries.length,
        succeeded: stats.succeeded,
        failed: stats.failed,
      });
    }

    return stats;
  }

  /**
   * Translate one entry and write its target document. Returns false on
   * any failure.
   */
  async translateEntry(entry: JobRecord): Promise<boolean> {
    const sourcePath = path.join(this.options.sourceRoot, entry.sourceFile);
    const targetPath = this.targetPath(entry);

    try {
      this.logger.info('Translating', { file: entry.sourceFile, language: entry.language });

      const source = await readDocument(sourcePath);
      const payload = buildPayload(source);
      const translated = await this.translator.translate(payload.text, entry.language);
      const document = buildTranslatedDocument(
        source,
        translated,
        payload.hasTitle,
        entry.language,
        formatDate(this.now())
      );

      await writeFileAtomic(targetPath, serializeDocument(document));

      this.logger.info('Saved translation', { file: entry.sourceFile, output: targetPath });
      return true;
    } catch (error) {
      this.logger.error('Translation failed', {
        file: entry.sourceFile,
        language: entry.language,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  targetPath(entry: Pick<JobRecord, 'sourceFile' | 'language'>): string {
    return path.join(this.options.outputRoot, entry.language, entry.sourceFile);
  }
}

/**
 * Prefix the title, when there is one, to the body
 */
export function buildPayload(source: ParsedDocument): TranslationPayload {
  const title = source.frontMatter.title;
  if (typeof title === 'string' || typeof title === 'number') {
    return { text: `${title}\n\n${source.body}`, hasTitle: true };
  }
  return { text: source.body, hasTitle: false };
}

/**
 * Split the translator's response back into title and body and mark the
 * front matter as translated
 */
export function buildTranslatedDocument(
  source: ParsedDocument,
  translated: string,
  hasTitle: boolean,
  language: string,
  date: string
): ParsedDocument {
  const frontMatter: FrontMatter = { ...source.frontMatter };
  let body = translated.trim();

  if (hasTitle) {
    const separator = body.indexOf('\n\n');
    if (separator !== -1) {
      frontMatter.title = body.slice(0, separator).trim();
      body = body.slice(separator + 2).trim();
    }
  }

  frontMatter.language = language;
  frontMatter.translation_status = 'translated';
  frontMatter.translation_date = date;

  return { frontMatter, body: `\n${body}\n` };
}
