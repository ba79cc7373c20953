// Assembles the retention CLI program

import { Command } from 'commander';
import { registerReportUsageCommand } from './commands/report-usage.js';
import { registerSweepArtifactsCommand } from './commands/sweep-artifacts.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('retention')
    .description('Retention and lifecycle management for campaign history, plans and artifacts')
    .version('0.1.0');

  registerReportUsageCommand(program);
  registerSweepArtifactsCommand(program);

  return program;
}
