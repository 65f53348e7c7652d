import { BatchTranslator } from '../services/batch-translator';
import { Ledger } from '../services/ledger';
import { TranslationService } from '../services/translation';
import { loadTranslationConfig } from '../utils/config';
import { ConfigurationError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { Translator } from '../types/index';
import { EXIT_FATAL, EXIT_OK, EXIT_PARTIAL_FAILURE } from './exit-codes';

export interface TranslateCommandOptions {
  config: string;
  limit?: string;
}

export interface TranslateCommandDeps {
  createTranslator?: () => Translator;
  now?: () => Date;
}

/**
 * Translate pending ledger entries. SIGINT and SIGTERM stop the batch
 * after the entry in flight has been recorded.
 */
export async function runTranslateCommand(
  options: TranslateCommandOptions,
  logger: Logger,
  deps: TranslateCommandDeps = {}
): Promise<number> {
  const controller = new AbortController();
  const onSignal = (): void => {
    logger.warn('Interrupt received, stopping after the current entry');
    controller.abort();
  };

  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const config = await loadTranslationConfig(options.config);
    const limit = options.limit !== undefined ? parseLimit(options.limit) : config.batchSize;
    const translator = deps.createTranslator
      ? deps.createTranslator()
      : new TranslationService(process.env.DEEPL_API_KEY);

    logger.info('Starting translation process', {
      sourcePath: config.sourcePath,
      outputPath: config.outputPath,
      ledger: config.ledgerPath,
    });

    const ledger = new Ledger(config.ledgerPath, logger, deps.now);
    const batch = new BatchTranslator(ledger, translator, {
      sourceRoot: config.sourcePath,
      outputRoot: config.outputPath,
      logger,
      signal: controller.signal,
      now: deps.now,
    });

    const stats = await batch.run(limit);
    logger.info('Translation completed', { ...stats });

    return stats.failed > 0 ? EXIT_PARTIAL_FAILURE : EXIT_OK;
  } catch (error) {
    logger.error('Translation failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    return EXIT_FATAL;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new ConfigurationError(`Invalid --limit value: ${value}`);
  }
  return limit;
}
