import fs from 'fs/promises';
import path from 'path';
import glob from 'fast-glob';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { parseDocument, readDocument } from './document';
import { reconcileRecord, toJobStatus } from './reconcile';
import { Logger } from '../utils/logger';
import { LedgerError } from '../utils/errors';
import { formatDate } from '../utils/date';
import { writeFileAtomic } from '../utils/files';
import {
  JobRecord,
  JobStatus,
  LedgerSummary,
  ObservedTarget,
  ScanOptions,
  ScanResult,
} from '../types/index';

export const LEDGER_COLUMNS = ['source_file', 'language', 'status', 'last_updated', 'title'] as const;

const CsvRowsSchema = z.array(z.array(z.string()));

/**
 * CSV-backed translation job ledger.
 *
 * One row per (source file, language). Every mutation re-reads the file
 * and rewrites it in full through a temporary file, so an interrupted run
 * keeps every result recorded before the interruption. A single writer
 * per ledger file is assumed.
 */
export class Ledger {
  constructor(
    private ledgerPath: string,
    private logger: Logger,
    private now: () => Date = () => new Date()
  ) {}

  get filePath(): string {
    return this.ledgerPath;
  }

  /**
   * Discover (file, language) pairs under the source directories and merge
   * them into the ledger
   */
  async scan(options: ScanOptions): Promise<ScanResult> {
    const records = new Map<string, JobRecord>();
    for (const record of await this.readRecords(false)) {
      records.set(recordKey(record), record);
    }

    const files = await findMarkdownFiles(options.sourceRoot, options.sourceDirectories, this.logger);
    const today = formatDate(this.now());
    let created = 0;
    let updated = 0;

    for (const sourceFile of files) {
      let title: string | undefined;

      for (const language of options.targetLanguages) {
        const key = recordKey({ sourceFile, language });
        const existing = records.get(key);
        const observed = await observeTarget(path.join(options.outputRoot, language, sourceFile));

        if (!existing && title === undefined) {
          title = await this.readTitle(path.join(options.sourceRoot, sourceFile));
        }

        const next = reconcileRecord(existing, observed, {
          sourceFile,
          language,
          title: title ?? '',
          today,
        });

        if (!existing) {
          created++;
        } else if (next !== existing) {
          this.logger.info('Ledger status corrected from target document', {
            file: sourceFile,
            language,
            from: existing.status,
            to: next.status,
          });
          updated++;
        }

        records.set(key, next);
      }
    }

    const sorted = sortRecords(Array.from(records.values()));
    await this.writeRecords(sorted);

    return { files: files.length, created, updated, total: sorted.length };
  }

  /**
   * Entries waiting for translation, in ledger order
   */
  async pending(limit?: number): Promise<JobRecord[]> {
    const pending = (await this.readRecords(true)).filter(record => record.status === 'pending');
    return limit !== undefined ? pending.slice(0, limit) : pending;
  }

  /**
   * Record the outcome of one translation attempt
   */
  async recordResult(
    entry: Pick<JobRecord, 'sourceFile' | 'language'>,
    success: boolean
  ): Promise<JobRecord> {
    const records = await this.readRecords(true);
    const key = recordKey(entry);
    const index = records.findIndex(record => recordKey(record) === key);

    if (index === -1) {
      throw new LedgerError(`No ledger entry for ${entry.sourceFile} (${entry.language})`);
    }

    const updated: JobRecord = {
      ...records[index],
      status: success ? 'translated' : 'failed',
      lastUpdated: formatDate(this.now()),
    };
    records[index] = updated;
    await this.writeRecords(records);

    return updated;
  }

  /**
   * Put failed entries back to pending, optionally for one language only.
   * Returns the number of entries reset.
   */
  async resetFailed(language?: string): Promise<number> {
    const records = await this.readRecords(true);
    const today = formatDate(this.now());
    let reset = 0;

    const next = records.map(record => {
      if (record.status !== 'failed' || (language && record.language !== language)) {
        return record;
      }
      reset++;
      return { ...record, status: 'pending' as const, lastUpdated: today };
    });

    if (reset > 0) {
      await this.writeRecords(next);
    }

    return reset;
  }

  /**
   * Entry counts per status and per language
   */
  async summary(): Promise<LedgerSummary> {
    const records = await this.readRecords(true);
    const summary: LedgerSummary = {
      total: records.length,
      byStatus: emptyCounts(),
      byLanguage: {},
    };

    for (const record of records) {
      summary.byStatus[record.status]++;
      summary.byLanguage[record.language] ??= emptyCounts();
      summary.byLanguage[record.language][record.status]++;
    }

    return summary;
  }

  /**
   * Read every ledger row
   */
  async load(): Promise<JobRecord[]> {
    return this.readRecords(true);
  }

  private async readRecords(mustExist: boolean): Promise<JobRecord[]> {
    let content: string;
    try {
      content = await fs.readFile(this.ledgerPath, 'utf-8');
    } catch (error) {
      if (!mustExist && isNotFound(error)) return [];
      if (isNotFound(error)) {
        throw new LedgerError(`Ledger not found: ${this.ledgerPath}. Run scan first.`);
      }
      throw new LedgerError(
        `Failed to read ledger: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    return this.parseRecords(content);
  }

  private parseRecords(content: string): JobRecord[] {
    let rows: string[][];
    try {
      rows = CsvRowsSchema.parse(
        parse(content, { bom: true, skip_empty_lines: true, relax_column_count: true })
      );
    } catch (error) {
      throw new LedgerError(
        `Invalid ledger file ${this.ledgerPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (rows.length === 0) return [];

    const [header, ...body] = rows;
    const missing = LEDGER_COLUMNS.filter(column => !header.includes(column));
    if (missing.length > 0) {
      throw new LedgerError(`Ledger is missing columns: ${missing.join(', ')}`);
    }

    const column = (row: string[], name: (typeof LEDGER_COLUMNS)[number]): string =>
      row[header.indexOf(name)] ?? '';

    const seen = new Set<string>();
    const records: JobRecord[] = [];

    for (const row of body) {
      const record: JobRecord = {
        sourceFile: column(row, 'source_file'),
        language: column(row, 'language'),
        status: toJobStatus(column(row, 'status')),
        lastUpdated: column(row, 'last_updated'),
        title: column(row, 'title'),
      };

      if (!record.sourceFile || !record.language) {
        this.logger.warn('Ignoring ledger row without source file or language', { row });
        continue;
      }

      const key = recordKey(record);
      if (seen.has(key)) {
        this.logger.warn('Ignoring duplicate ledger row', {
          file: record.sourceFile,
          language: record.language,
        });
        continue;
      }

      seen.add(key);
      records.push(record);
    }

    return records;
  }

  private async writeRecords(records: JobRecord[]): Promise<void> {
    const content = stringify(
      records.map(record => ({
        source_file: record.sourceFile,
        language: record.language,
        status: record.status,
        last_updated: record.lastUpdated,
        title: record.title,
      })),
      { header: true, columns: [...LEDGER_COLUMNS] }
    );

    try {
      await writeFileAtomic(this.ledgerPath, content);
    } catch (error) {
      throw new LedgerError(
        `Failed to write ledger: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  private async readTitle(sourcePath: string): Promise<string> {
    try {
      const { frontMatter } = await readDocument(sourcePath);
      const title = frontMatter.title;
      return typeof title === 'string' || typeof title === 'number' ? String(title) : '';
    } catch (error) {
      this.logger.debug('Could not read source title', {
        file: sourcePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return '';
    }
  }
}

/**
 * Markdown files under the given source directories, as sorted
 * `/`-separated paths relative to the source root
 */
export async function findMarkdownFiles(
  sourceRoot: string,
  sourceDirectories: string[],
  logger: Logger
): Promise<string[]> {
  const files = new Set<string>();

  for (const directory of sourceDirectories) {
    const directoryPath = path.join(sourceRoot, directory);
    try {
      await fs.access(directoryPath);
    } catch {
      logger.warn('Source directory not found', { directory: directoryPath });
      continue;
    }

    const matches = await glob('**/*.{md,markdown}', {
      cwd: directoryPath,
      absolute: true,
      onlyFiles: true,
      caseSensitiveMatch: false,
    });

    for (const match of matches) {
      files.add(path.relative(sourceRoot, match).split(path.sep).join('/'));
    }
  }

  return Array.from(files).sort();
}

/**
 * Status declared by the document at a target path
 */
export async function observeTarget(targetPath: string): Promise<ObservedTarget> {
  let content: string;
  try {
    content = await fs.readFile(targetPath, 'utf-8');
  } catch (error) {
    return isNotFound(error) ? { kind: 'missing' } : { kind: 'present', status: 'unknown' };
  }

  try {
    const { frontMatter } = parseDocument(content, targetPath);
    return { kind: 'present', status: toJobStatus(frontMatter.translation_status) };
  } catch {
    return { kind: 'present', status: 'unknown' };
  }
}

export function sortRecords(records: JobRecord[]): JobRecord[] {
  return [...records].sort(
    (a, b) => compare(a.sourceFile, b.sourceFile) || compare(a.language, b.language)
  );
}

function recordKey(record: Pick<JobRecord, 'sourceFile' | 'language'>): string {
  return `${record.sourceFile}\u0000${record.language}`;
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function emptyCounts(): Record<JobStatus, number> {
  return { pending: 0, translated: 0, failed: 0, unknown: 0 };
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
