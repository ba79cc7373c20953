// Report-usage command - Show store sizes, record counts and retention limits

import type { Command } from 'commander';
import { UsageReporter } from '../../services/usage/usage-reporter.js';
import { handleError } from '../utils/error-handler.js';
import { formatUsageReport } from '../utils/format.js';
import { resolveRuntime, withCommonOptions, type CommonOptions } from '../utils/runtime.js';

interface ReportUsageOptions extends CommonOptions {
  forceCleanup?: boolean;
  json?: boolean;
}

export function registerReportUsageCommand(program: Command): void {
  withCommonOptions(
    program
      .command('report-usage')
      .description('Show store and artifact usage')
      .option('--force-cleanup', 'Apply retention to each existing store before reporting')
      .option('--json', 'Output as JSON')
  ).action(async (options: ReportUsageOptions) => {
    try {
      const { config, paths } = await resolveRuntime(options);
      const reporter = new UsageReporter({ paths, config });
      const report = await reporter.report({ forceCleanup: options.forceCleanup });

      if (options.json) {
        console.log(JSON.stringify(report, null, 2)); // eslint-disable-line no-console
        return;
      }

      console.log(formatUsageReport(report)); // eslint-disable-line no-console
    } catch (error) {
      handleError(error);
    }
  });
}
