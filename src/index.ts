#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import { runLinksCommand } from './commands/links';
import { runResetCommand, runScanCommand, runStatusCommand } from './commands/ledger';
import { runTranslateCommand } from './commands/translate';
import { DEFAULT_CONFIG_FILE } from './utils/config';
import { Logger } from './utils/logger';

const program = new Command();

program
  .name('content-pipeline')
  .description('Resolve wiki links and batch-translate a markdown corpus')
  .version('0.1.0');

program
  .command('links')
  .description('Rewrite [[wiki links]] into markdown links using the index documents')
  .argument('[input]', 'Markdown file or directory (default: content.local_path from the config)')
  .option('-c, --config <path>', 'Path to configuration JSON file', DEFAULT_CONFIG_FILE)
  .option('-v, --verbose', 'Enable verbose output', false)
  .option('--json', 'Output structured JSON logs', false)
  .option('--dry-run', 'Resolve links without writing files', false)
  .action(async (input: string | undefined, options) => {
    const logger = new Logger(options.json, options.verbose);
    process.exitCode = await runLinksCommand(input, options, logger);
  });

program
  .command('scan')
  .description('Scan the source tree and refresh the translation ledger')
  .option('-c, --config <path>', 'Path to configuration JSON file', DEFAULT_CONFIG_FILE)
  .option('-v, --verbose', 'Enable verbose output', false)
  .option('--json', 'Output structured JSON logs', false)
  .action(async options => {
    const logger = new Logger(options.json, options.verbose);
    process.exitCode = await runScanCommand(options, logger);
  });

program
  .command('translate')
  .description('Translate pending ledger entries')
  .option('-c, --config <path>', 'Path to configuration JSON file', DEFAULT_CONFIG_FILE)
  .option('-l, --limit <number>', 'Maximum number of entries to translate (default: batch_size)')
  .option('-v, --verbose', 'Enable verbose output', false)
  .option('--json', 'Output structured JSON logs', false)
  .action(async options => {
    const logger = new Logger(options.json, options.verbose);
    process.exitCode = await runTranslateCommand(options, logger);
  });

program
  .command('status')
  .description('Show ledger entry counts per status and language')
  .option('-c, --config <path>', 'Path to configuration JSON file', DEFAULT_CONFIG_FILE)
  .option('--json', 'Output structured JSON logs', false)
  .action(async options => {
    const logger = new Logger(options.json);
    process.exitCode = await runStatusCommand(options, logger);
  });

program
  .command('reset')
  .description('Reset failed ledger entries to pending')
  .option('-c, --config <path>', 'Path to configuration JSON file', DEFAULT_CONFIG_FILE)
  .option('--language <code>', 'Only reset entries for this language')
  .option('--json', 'Output structured JSON logs', false)
  .action(async options => {
    const logger = new Logger(options.json);
    process.exitCode = await runResetCommand(options, logger);
  });

program.parseAsync().catch(error => {
  console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
