import path from 'path';
import { LinkProcessor } from '../services/link-processor';
import { canonicalizePath } from '../services/path-canonicalizer';
import { loadLinkConfig } from '../utils/config';
import { Logger } from '../utils/logger';
import { EXIT_FATAL, EXIT_OK, EXIT_PARTIAL_FAILURE } from './exit-codes';

export interface LinksCommandOptions {
  config: string;
  dryRun?: boolean;
}

// Spellings of one index document that must share a lookup key
const PATH_RESOLUTION_CASES: Array<[string, string]> = [
  ['../../../Index/Drugs/Venlafaxine', 'Drugs/Venlafaxine'],
  ['../../../Brain Guides/Index/Drugs/Venlafaxine', 'Drugs/Venlafaxine'],
  ['Index/Drugs/Venlafaxine', 'Drugs/Venlafaxine'],
  ['Brain Guides/Index/Drugs/Venlafaxine', 'Drugs/Venlafaxine'],
  ['Drugs/Venlafaxine', 'Drugs/Venlafaxine'],
  ['../../../Index/Drugs/Venlafaxine.md', 'Drugs/Venlafaxine'],
];

/**
 * Rewrite wiki links in a file or directory. The input defaults to the
 * configured content path.
 */
export async function runLinksCommand(
  input: string | undefined,
  options: LinksCommandOptions,
  logger: Logger
): Promise<number> {
  try {
    const config = await loadLinkConfig(options.config);

    if (logger.isVerbose) {
      checkPathResolution(logger, config.indexAliases);
    }

    const inputPath = input ? path.resolve(input) : config.localPath;
    logger.info('Resolving links', { input: inputPath, dryRun: Boolean(options.dryRun) });

    const processor = new LinkProcessor(config, logger);
    const result = await processor.processPath(inputPath, { dryRun: options.dryRun });

    logger.info('Link resolution completed', { ...result });

    return result.errors > 0 ? EXIT_PARTIAL_FAILURE : EXIT_OK;
  } catch (error) {
    logger.error('Link resolution failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    return EXIT_FATAL;
  }
}

/**
 * Log how the reference spellings canonicalize under the configured aliases
 */
export function checkPathResolution(logger: Logger, aliases: readonly string[]): boolean {
  let allPassed = true;

  for (const [input, expected] of PATH_RESOLUTION_CASES) {
    const result = canonicalizePath(input, aliases);
    const passed = result === expected;
    allPassed &&= passed;
    logger.debug(`Path resolution ${passed ? '✓' : '✗'}`, { input, expected, result });
  }

  return allPassed;
}
