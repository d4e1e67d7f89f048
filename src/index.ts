#!/usr/bin/env node

/**
 * Main entry point for the Trello → Day One migration
 */

import { Command } from 'commander';
import { version } from '../package.json';
import { displayConfig, loadConfig } from './config';
import { CONSTANTS } from './constants';
import { DayOnePackager } from './dayone';
import { describeError } from './errors';
import { MigrationEngine } from './migrationEngine';
import { TrelloIntegration } from './trello';

interface CliOptions {
  config: string;
  dryRun: boolean;
  outputDir?: string;
}

export function buildProgram(): Command {
  return new Command()
    .name('trello-dayone')
    .description('Migrate Trello cards to Day One journal entries')
    .version(version)
    .option('-c, --config <path>', 'path to config file', CONSTANTS.DEFAULT_CONFIG_PATH)
    .option('--dry-run', 'preview without writing output', false)
    .option('-o, --output-dir <dir>', 'output directory (overrides options.outputDir)');
}

function printImportInstructions(zipPath: string): void {
  console.log(`\nDay One import zip written to: ${zipPath}`);
  console.log('\nTo import into Day One:');
  console.log('  1. Go to dayone.me (web app) or open Day One on iOS/Android/Mac');
  console.log('  2. Settings -> Import (web) or File -> Import (desktop/mobile)');
  console.log(`  3. Select ${zipPath}`);
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  program.parse(argv);
  const options = program.opts<CliOptions>();

  const config = loadConfig(options.config);
  const outputDir = options.outputDir ?? config.options.outputDir;
  displayConfig(config);

  const trello = new TrelloIntegration(config.trello.apiKey, config.trello.apiToken);
  const engine = new MigrationEngine(trello, new DayOnePackager(), config);

  const result = await engine.run({ dryRun: options.dryRun, outputDir });

  if (result.archivePath) {
    printImportInstructions(result.archivePath);
  }
}

// Run if executed directly
if (require.main === module) {
  main().catch(error => {
    console.error(`Error: ${describeError(error)}`);
    process.exit(1);
  });
}
