#!/usr/bin/env tsx
/**
 * CLI Entry Point
 *
 * Terminal front end for the conversion queue.
 * Everything it does goes through @encodeq/processing.
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { convertCommand, type ConvertOptions } from './commands/convert.js';
import { probeCommand } from './commands/probe.js';
import { profilesCommand } from './commands/profiles.js';
import { parsePositiveInt } from './lib/format.js';

interface GlobalOptions {
  debug?: boolean;
}

const program = new Command();

program
  .name('encodeq')
  .description('Queue-based media conversion')
  .version('1.0.0')
  .option('--debug', 'Enable debug logging');

program
  .command('convert <files...>')
  .description('Convert media files with a profile')
  .requiredOption('-p, --profile <id>', 'Conversion profile id')
  .requiredOption('-o, --output <dir>', 'Output directory')
  .option('-c, --concurrency <n>', 'Jobs to run at the same time', parsePositiveInt)
  .option('--tag <prefix>', 'Prefix for output file names')
  .option('--overwrite', 'Replace existing output files')
  .option('--subtitles', 'Keep subtitle streams')
  .option('--delete-source', 'Delete each source after a successful conversion')
  .addOption(
    new Option('--silence-timeout <ms>', 'Treat the encoder as hung after this much silence')
      .argParser(parsePositiveInt)
  )
  .option('--no-probe', 'Do not read durations before converting')
  .action((files: string[], options: ConvertOptions) =>
    convertCommand(files, { ...options, debug: program.opts<GlobalOptions>().debug })
  );

program
  .command('profiles')
  .description('List conversion profiles')
  .option('--json', 'Output in JSON format')
  .action(profilesCommand);

program
  .command('probe <file>')
  .description('Show container and stream details')
  .option('--json', 'Output in JSON format')
  .action((file: string, options: { json?: boolean }) =>
    probeCommand(file, { ...options, debug: program.opts<GlobalOptions>().debug })
  );

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('encodeq --help'), 'for available commands');
  }
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  process.exit(1);
});

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('✗'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
