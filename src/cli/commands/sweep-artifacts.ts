// Sweep-artifacts command - Archive aged outputs and delete aged traces

import type { Command } from 'commander';
import { ArtifactSweeper } from '../../services/sweeper/artifact-sweeper.js';
import { handleError } from '../utils/error-handler.js';
import { formatSweepReport } from '../utils/format.js';
import { resolveRuntime, withCommonOptions, type CommonOptions } from '../utils/runtime.js';

interface SweepArtifactsOptions extends CommonOptions {
  dryRun?: boolean;
  json?: boolean;
}

export function registerSweepArtifactsCommand(program: Command): void {
  withCommonOptions(
    program
      .command('sweep-artifacts')
      .description('Archive old output files and delete old trace files')
      .option('--dry-run', 'Report what would be moved or deleted without touching files')
      .option('--json', 'Output as JSON')
  ).action(async (options: SweepArtifactsOptions) => {
    try {
      const { config, paths } = await resolveRuntime(options);
      const sweeper = new ArtifactSweeper({
        ...config.artifacts,
        outputsDir: paths.outputsDir,
        tracesDir: paths.tracesDir,
        dryRun: options.dryRun ?? false
      });
      const report = await sweeper.sweep();

      if (options.json) {
        console.log(JSON.stringify(report, null, 2)); // eslint-disable-line no-console
      } else {
        console.log(formatSweepReport(report)); // eslint-disable-line no-console
      }

      // Partial sweeps still complete; the exit code flags the failures
      if (report.errors.length > 0) {
        process.exitCode = 1;
      }
    } catch (error) {
      handleError(error);
    }
  });
}
