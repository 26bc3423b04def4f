// src/cli/commands/run.ts
import { Command } from 'commander';
import { BatchRunner, type RunSummary } from '../../core/batch/runner.js';
import { DEFAULT_CONFIG_FILE, loadConfig } from '../../core/config/config.js';
import { readManifest } from '../../core/manifest/reader.js';
import { SitewatchError, errorMessage } from '../../core/errors.js';
import { logger } from '../../core/logger.js';

export interface RunCommandOptions {
  config: string;
  dryRun?: boolean;
}

export async function runWatch(options: RunCommandOptions): Promise<RunSummary> {
  const config = loadConfig(options.config, { dryRun: options.dryRun });
  if (config.log_path) {
    logger.attachLogFile(config.log_path);
  }

  const rows = readManifest(config.manifest_path);
  logger.info(`Loaded ${rows.length} rows from ${config.manifest_path}`);

  const runner = new BatchRunner({ config });
  return runner.run(rows);
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Search every manifest row and download newer documents')
    .option('-c, --config <path>', 'Config file', DEFAULT_CONFIG_FILE)
    .option('--dry-run', 'Search and filter only; download nothing', false)
    .action(async (options: RunCommandOptions) => {
      try {
        await runWatch(options);
      } catch (error) {
        console.error('Error:', errorMessage(error));
        if (error instanceof SitewatchError && error.suggestion) {
          console.error(`Hint: ${error.suggestion}`);
        }
        process.exit(1);
      }
    });
}
