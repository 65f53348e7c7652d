/**
 * Front matter of a corpus document. Only the keys the pipeline reads are
 * named; everything else is carried through untouched.
 */
export interface FrontMatter {
  type?: string;
  order?: number;
  code?: string;
  language?: string;
  status?: string;
  title?: string;
  translation_status?: string;
  translation_date?: string;
  [key: string]: unknown;
}

/**
 * Parsed markdown document
 */
export interface ParsedDocument {
  frontMatter: FrontMatter;
  body: string;
}

/**
 * Slugs of one index document, keyed by language code
 */
export interface IndexEntry {
  canonicalPath: string;
  slugs: Record<string, string>;
}

export type AbsentReason = 'missing' | 'malformed' | 'empty-path';

/**
 * Index store lookup result. "Not found" and "malformed" are both plain
 * results, never thrown.
 */
export type IndexLookup =
  | { kind: 'found'; entry: IndexEntry }
  | { kind: 'absent'; reason: AbsentReason };

/**
 * A single `[[target|alias]]` occurrence in a document body
 */
export interface LinkToken {
  raw: string;
  targetPath: string;
  alias?: string;
}

/**
 * Outcome of processing a file or directory of files
 */
export interface ProcessingResult {
  processed: number;
  skipped: number;
  errors: number;
}

export interface LinkProcessingOptions {
  dryRun?: boolean;
}

export const JOB_STATUSES = ['pending', 'translated', 'failed', 'unknown'] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

/**
 * Statuses a target document can declare that override the ledger on scan
 */
export const TERMINAL_STATUSES: readonly JobStatus[] = ['translated', 'failed'];

/**
 * One ledger row, unique by (sourceFile, language)
 */
export interface JobRecord {
  sourceFile: string;
  language: string;
  status: JobStatus;
  lastUpdated: string;
  title: string;
}

/**
 * What scan found at a record's target path
 */
export type ObservedTarget = { kind: 'missing' } | { kind: 'present'; status: JobStatus };

export interface ScanOptions {
  sourceRoot: string;
  sourceDirectories: string[];
  outputRoot: string;
  targetLanguages: string[];
}

export interface ScanResult {
  files: number;
  created: number;
  updated: number;
  total: number;
}

export interface LedgerSummary {
  total: number;
  byStatus: Record<JobStatus, number>;
  byLanguage: Record<string, Record<JobStatus, number>>;
}

export interface BatchStats {
  attempted: number;
  succeeded: number;
  failed: number;
  interrupted: boolean;
}

/**
 * External translation collaborator
 */
export interface Translator {
  translate(text: string, targetLanguage: string): Promise<string>;
}

/**
 * DeepL target codes for project language codes that differ from DeepL's
 */
export const DEEPL_LANGUAGE_MAP: Record<string, string> = {
  en: 'en-US',
  pt: 'pt-BR',
  'pt-br': 'pt-BR',
  'pt-pt': 'pt-PT',
  zh: 'zh',
  'zh-cn': 'zh',
  'zh-tw': 'zh-HANT',
};
