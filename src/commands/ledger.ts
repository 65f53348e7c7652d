import { Ledger } from '../services/ledger';
import { loadTranslationConfig } from '../utils/config';
import { Logger } from '../utils/logger';
import { EXIT_FATAL, EXIT_OK } from './exit-codes';

export interface LedgerCommandOptions {
  config: string;
}

/**
 * Refresh the ledger from the source tree and existing translations
 */
export async function runScanCommand(
  options: LedgerCommandOptions,
  logger: Logger,
  now?: () => Date
): Promise<number> {
  try {
    const config = await loadTranslationConfig(options.config);
    const ledger = new Ledger(config.ledgerPath, logger, now);

    logger.info('Scanning source files', {
      sourcePath: config.sourcePath,
      outputPath: config.outputPath,
      ledger: config.ledgerPath,
      targetLanguages: config.targetLanguages,
    });

    const result = await ledger.scan({
      sourceRoot: config.sourcePath,
      sourceDirectories: config.sourceDirectories,
      outputRoot: config.outputPath,
      targetLanguages: config.targetLanguages,
    });

    logger.info('Ledger updated', { ...result });
    return EXIT_OK;
  } catch (error) {
    logger.error('Scan failed', { error: error instanceof Error ? error.message : String(error) });
    return EXIT_FATAL;
  }
}

/**
 * Print entry counts per status and language
 */
export async function runStatusCommand(
  options: LedgerCommandOptions,
  logger: Logger
): Promise<number> {
  try {
    const config = await loadTranslationConfig(options.config);
    const summary = await new Ledger(config.ledgerPath, logger).summary();

    logger.info('Ledger summary', { ledger: config.ledgerPath, ...summary });
    return EXIT_OK;
  } catch (error) {
    logger.error('Failed to read ledger', {
      error: error instanceof Error ? error.message : String(error),
    });
    return EXIT_FATAL;
  }
}

/**
 * Put failed entries back to pending so the next batch retries them
 */
export async function runResetCommand(
  options: LedgerCommandOptions & { language?: string },
  logger: Logger,
  now?: () => Date
): Promise<number> {
  try {
    const config = await loadTranslationConfig(options.config);
    const reset = await new Ledger(config.ledgerPath, logger, now).resetFailed(options.language);

    logger.info('Failed entries reset to pending', { reset, language: options.language ?? 'all' });
    return EXIT_OK;
  } catch (error) {
    logger.error('Reset failed', { error: error instanceof Error ? error.message : String(error) });
    return EXIT_FATAL;
  }
}
