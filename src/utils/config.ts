import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { DEFAULT_INDEX_ALIASES } from '../services/path-canonicalizer';

export const DEFAULT_CONFIG_FILE = 'config.json';
export const DEFAULT_LEDGER_FILE = 'translation_status.csv';

/**
 * Settings read by the link commands
 */
export const LinkConfigSchema = z.object({
  base_urls: z
    .record(z.string().min(1))
    .refine(urls => Object.keys(urls).length > 0, 'At least one base URL is required'),
  content: z.object({
    local_path: z.string().min(1),
    index_path: z.string().min(1),
    index_aliases: z.array(z.string()).default([...DEFAULT_INDEX_ALIASES]),
  }),
});

/**
 * Settings read by the ledger and batch commands
 */
export const TranslationConfigSchema = z.object({
  source_path: z.string().min(1),
  output_path: z.string().min(1),
  source_directories: z.array(z.string().min(1)).min(1),
  target_languages: z.array(z.string().min(1)).min(1),
  batch_size: z.number().int().positive().optional(),
  ledger_path: z.string().min(1).default(DEFAULT_LEDGER_FILE),
});

export interface LinkConfig {
  baseUrls: Record<string, string>;
  localPath: string;
  indexPath: string;
  indexAliases: string[];
}

export interface TranslationConfig {
  sourcePath: string;
  outputPath: string;
  sourceDirectories: string[];
  targetLanguages: string[];
  batchSize?: number;
  ledgerPath: string;
}

/**
 * Read and JSON-parse a config file. Relative paths inside it are later
 * resolved against the file's directory.
 */
export async function readConfigFile(configPath: string): Promise<unknown> {
  let data: string;
  try {
    data = await fs.readFile(configPath, 'utf-8');
  } catch {
    throw new ConfigurationError(`Config file not found: ${configPath}`);
  }

  try {
    return JSON.parse(data);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid JSON in config file: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Load the link-resolution settings and check that the content and index
 * directories exist.
 */
export async function loadLinkConfig(configPath: string): Promise<LinkConfig> {
  const raw = await readConfigFile(configPath);
  const parsed = validate(LinkConfigSchema, raw);
  const baseDir = path.dirname(path.resolve(configPath));

  const config: LinkConfig = {
    baseUrls: parsed.base_urls,
    localPath: path.resolve(baseDir, parsed.content.local_path),
    indexPath: path.resolve(baseDir, parsed.content.index_path),
    indexAliases: parsed.content.index_aliases,
  };

  await assertExists(config.localPath, 'Content path');
  await assertExists(config.indexPath, 'Index path');

  return config;
}

/**
 * Load the ledger and batch settings and check that the source root exists.
 */
export async function loadTranslationConfig(configPath: string): Promise<TranslationConfig> {
  const raw = await readConfigFile(configPath);
  const parsed = validate(TranslationConfigSchema, raw);
  const baseDir = path.dirname(path.resolve(configPath));

  const config: TranslationConfig = {
    sourcePath: path.resolve(baseDir, parsed.source_path),
    outputPath: path.resolve(baseDir, parsed.output_path),
    sourceDirectories: parsed.source_directories,
    targetLanguages: parsed.target_languages,
    batchSize: parsed.batch_size,
    ledgerPath: path.resolve(baseDir, parsed.ledger_path),
  };

  await assertExists(config.sourcePath, 'Source path');

  return config;
}

function validate<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map(
      issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'} (${issue.message})`
    );
    throw new ConfigurationError(`Invalid configuration: ${problems.join(', ')}`);
  }
  return result.data;
}

async function assertExists(target: string, label: string): Promise<void> {
  try {
    await fs.access(target);
  } catch {
    throw new ConfigurationError(`${label} does not exist: ${target}`);
  }
}
