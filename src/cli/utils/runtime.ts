// Shared CLI options and the runtime they resolve to

import * as path from 'path';
import { Command } from 'commander';
import { Logger, LogLevel, logger } from '../../core/logger.js';
import { ConfigService, DEFAULT_CONFIG_FILE, type RetentionConfig } from '../../services/config/config-service.js';
import type { UsagePaths } from '../../services/usage/usage-reporter.js';

// File and directory names inside the data directory
export const DATA_LAYOUT = {
  historyFile: 'email_history_log.json',
  planFile: 'campaign_plans.json',
  outputsDir: 'outputs',
  tracesDir: 'traces'
} as const;

export interface CommonOptions {
  config: string;
  dataDir: string;
  verbose?: boolean;
  quiet?: boolean;
}

export interface Runtime {
  config: RetentionConfig;
  paths: UsagePaths;
}

/**
 * Adds the options every command accepts
 */
export function withCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'Retention config file', DEFAULT_CONFIG_FILE)
    .option('-d, --data-dir <dir>', 'Directory holding the stores and artifact directories', process.cwd())
    .option('-v, --verbose', 'Log debug output')
    .option('-q, --quiet', 'Log errors only');
}

/**
 * Configures logging and loads the retention config
 */
export async function resolveRuntime(options: CommonOptions): Promise<Runtime> {
  Logger.configure({
    level: options.quiet ? LogLevel.ERROR : options.verbose ? LogLevel.DEBUG : LogLevel.INFO
  });

  const configService = new ConfigService({ configPath: options.config });
  const config = await configService.getConfig();
  logger.debug('Loaded configuration', { configPath: configService.getConfigPath(), config });

  return {
    config,
    paths: {
      historyFile: path.join(options.dataDir, DATA_LAYOUT.historyFile),
      planFile: path.join(options.dataDir, DATA_LAYOUT.planFile),
      outputsDir: path.join(options.dataDir, DATA_LAYOUT.outputsDir),
      tracesDir: path.join(options.dataDir, DATA_LAYOUT.tracesDir)
    }
  };
}
