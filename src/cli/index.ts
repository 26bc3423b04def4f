#!/usr/bin/env node

import { Command } from 'commander';
import { registerInstallBrowsersCommand } from './commands/install-browsers.js';
import { registerRunCommand } from './commands/run.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('sitewatch')
    .description('Watch sites for documents newer than a manifest date and download them')
    .version('0.1.0');

  registerRunCommand(program);
  registerInstallBrowsersCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  void runCli();
}
