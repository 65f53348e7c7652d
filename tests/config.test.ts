import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import { ensureDir, remove } from 'fs-extra';
import { loadLinkConfig, loadTranslationConfig } from '../src/utils/config';
import { ConfigurationError } from '../src/utils/errors';
import { testDir, writeFixture } from './helpers';

const ROOT = testDir('config');
const CONFIG_PATH = path.join(ROOT, 'config.json');

const writeConfig = (config: unknown): Promise<string> =>
  writeFixture(ROOT, 'config.json', JSON.stringify(config));

describe('loadLinkConfig', () => {
  const valid = {
    base_urls: { en: 'https://example.com', es: 'https://example.es' },
    content: { local_path: 'content', index_path: 'content/Index' },
  };

  beforeEach(async () => {
    await ensureDir(path.join(ROOT, 'content', 'Index'));
  });

  afterEach(async () => {
    await remove(ROOT);
  });

  it('should resolve paths against the config file directory', async () => {
    await writeConfig(valid);

    expect(await loadLinkConfig(CONFIG_PATH)).toEqual({
      baseUrls: valid.base_urls,
      localPath: path.join(ROOT, 'content'),
      indexPath: path.join(ROOT, 'content', 'Index'),
      indexAliases: ['Index', 'Brain Guides'],
    });
  });

  it('should accept configured index aliases', async () => {
    await writeConfig({ ...valid, content: { ...valid.content, index_aliases: ['Guides'] } });

    expect((await loadLinkConfig(CONFIG_PATH)).indexAliases).toEqual(['Guides']);
  });

  it('should report a missing config file', async () => {
    await expect(loadLinkConfig(CONFIG_PATH)).rejects.toThrow(
      `Config file not found: ${CONFIG_PATH}`
    );
  });

  it('should report invalid JSON', async () => {
    await writeFixture(ROOT, 'config.json', '{ "base_urls": ');

    await expect(loadLinkConfig(CONFIG_PATH)).rejects.toThrow('Invalid JSON in config file');
  });

  it('should name missing fields', async () => {
    await writeConfig({ ...valid, content: { index_path: 'content/Index' } });

    await expect(loadLinkConfig(CONFIG_PATH)).rejects.toThrow(
      'Invalid configuration: content.local_path (Required)'
    );
  });

  it('should require at least one base URL', async () => {
    await writeConfig({ ...valid, base_urls: {} });

    await expect(loadLinkConfig(CONFIG_PATH)).rejects.toThrow(
      'Invalid configuration: base_urls (At least one base URL is required)'
    );
  });

  it('should require the content directory to exist', async () => {
    await writeConfig({ ...valid, content: { local_path: 'missing', index_path: 'content/Index' } });

    await expect(loadLinkConfig(CONFIG_PATH)).rejects.toThrow(
      `Content path does not exist: ${path.join(ROOT, 'missing')}`
    );
  });

  it('should raise ConfigurationError', async () => {
    await writeConfig({});

    await expect(loadLinkConfig(CONFIG_PATH)).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('loadTranslationConfig', () => {
  const valid = {
    source_path: 'source',
    output_path: 'translated',
    source_directories: ['Guides'],
    target_languages: ['es', 'fr'],
  };

  beforeEach(async () => {
    await ensureDir(path.join(ROOT, 'source'));
  });

  afterEach(async () => {
    await remove(ROOT);
  });

  it('should apply defaults', async () => {
    await writeConfig(valid);

    expect(await loadTranslationConfig(CONFIG_PATH)).toEqual({
      sourcePath: path.join(ROOT, 'source'),
      outputPath: path.join(ROOT, 'translated'),
      sourceDirectories: ['Guides'],
      targetLanguages: ['es', 'fr'],
      batchSize: undefined,
      ledgerPath: path.join(ROOT, 'translation_status.csv'),
    });
  });

  it('should read batch size and ledger path', async () => {
    await writeConfig({ ...valid, batch_size: 10, ledger_path: 'state/ledger.csv' });

    const config = await loadTranslationConfig(CONFIG_PATH);

    expect(config.batchSize).toBe(10);
    expect(config.ledgerPath).toBe(path.join(ROOT, 'state', 'ledger.csv'));
  });

  it('should reject a non-positive batch size', async () => {
    await writeConfig({ ...valid, batch_size: 0 });

    await expect(loadTranslationConfig(CONFIG_PATH)).rejects.toThrow(
      'Invalid configuration: batch_size (Number must be greater than 0)'
    );
  });

  it('should require target languages', async () => {
    await writeConfig({ ...valid, target_languages: [] });

    await expect(loadTranslationConfig(CONFIG_PATH)).rejects.toThrow(
      'Invalid configuration: target_languages (Array must contain at least 1 element(s))'
    );
  });

  it('should require the source path to exist', async () => {
    await writeConfig({ ...valid, source_path: 'elsewhere' });

    await expect(loadTranslationConfig(CONFIG_PATH)).rejects.toThrow(
      `Source path does not exist: ${path.join(ROOT, 'elsewhere')}`
    );
  });
});
