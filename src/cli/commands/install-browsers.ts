// src/cli/commands/install-browsers.ts
import { Command } from 'commander';
import { execSync } from 'child_process';
import { errorMessage } from '../../core/errors.js';

export function registerInstallBrowsersCommand(program: Command): void {
  program
    .command('install-browsers')
    .description('Install the Chromium build used for rule sites with fetch_mode = "browser"')
    .action(() => {
      try {
        execSync('npx playwright install chromium', {
          stdio: 'inherit',
        });
        console.log('✓ Chromium installed');
      } catch (error) {
        console.error(`✗ Failed to install Chromium: ${errorMessage(error)}`);
        console.error('Only sites rendered in the browser need it; plain HTTP sites keep working.');
        process.exit(1);
      }
    });
}
