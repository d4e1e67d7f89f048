/**
 * Configuration management
 */

import * as dotenv from 'dotenv';
import * as fs from 'fs';
import { z } from 'zod';
import { CONSTANTS } from './constants';
import { ConfigError } from './errors';

dotenv.config();

export const TrelloConfigSchema = z.object({
  apiKey: z.string().default(''),
  apiToken: z.string().default(''),
  boardId: z.string().default(''),
});

export const DayOneConfigSchema = z.object({
  journalName: z.string().min(1).default(CONSTANTS.DEFAULT_JOURNAL_NAME),
});

export const OptionsSchema = z.object({
  includeArchived: z.boolean().default(false),
  includeAttachments: z.boolean().default(true),
  listFilter: z.array(z.string()).default([]),
  outputDir: z.string().min(1).default(CONSTANTS.DEFAULT_OUTPUT_DIR),
});

export const ConfigSchema = z.object({
  trello: TrelloConfigSchema.default({}),
  dayone: DayOneConfigSchema.default({}),
  options: OptionsSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type TrelloConfig = z.infer<typeof TrelloConfigSchema>;
export type MigrationOptions = z.infer<typeof OptionsSchema>;

const REMEDIATION_HINT = 'Copy config.example.json to config.json and fill in your credentials.';

/**
 * Load and validate the JSON config file.
 * TRELLO_API_KEY, TRELLO_API_TOKEN and TRELLO_BOARD_ID from the environment
 * take precedence over the file.
 */
export function loadConfig(
  configPath: string = CONSTANTS.DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env
): Config {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}\n${REMEDIATION_HINT}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Invalid JSON in config file: ${configPath}`, error);
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid config file ${configPath}:\n${issues}`, parsed.error);
  }

  const config = parsed.data;
  config.trello = {
    apiKey: env.TRELLO_API_KEY || config.trello.apiKey,
    apiToken: env.TRELLO_API_TOKEN || config.trello.apiToken,
    boardId: env.TRELLO_BOARD_ID || config.trello.boardId,
  };

  // Validate required settings
  const missing: string[] = [];
  if (!config.trello.apiKey) missing.push('trello.apiKey (or TRELLO_API_KEY)');
  if (!config.trello.apiToken) missing.push('trello.apiToken (or TRELLO_API_TOKEN)');
  if (!config.trello.boardId) missing.push('trello.boardId (or TRELLO_BOARD_ID)');

  if (missing.length > 0) {
    throw new ConfigError(
      `Missing required settings: ${missing.join(', ')}\n` +
      `Please check ${configPath} or your .env file.`
    );
  }

  return config;
}

export function displayConfig(config: Config): void {
  const { options } = config;
  console.log('\nConfiguration:');
  console.log(`  Board: ${config.trello.boardId}`);
  console.log(`  Journal: ${config.dayone.journalName}`);
  console.log(`  Include archived: ${options.includeArchived}`);
  console.log(`  Include attachments: ${options.includeAttachments}`);
  console.log(`  List filter: ${options.listFilter.length > 0 ? options.listFilter.join(', ') : '(all lists)'}`);
  console.log(`  Output directory: ${options.outputDir}`);
  console.log('');
}
