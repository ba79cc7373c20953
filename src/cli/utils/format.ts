// Text rendering for usage and sweep reports

import type { DirectoryUsage, StoreUsage, UsageReport } from '../../services/usage/usage-reporter.js';
import type { SweepReport } from '../../services/sweeper/artifact-sweeper.js';

const UNITS = ['B', 'KB', 'MB', 'GB'];

/**
 * Human-readable byte count, e.g. 1536 -> "1.5 KB"
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(1)} ${UNITS[unit]}`;
}

function sortedCounts(counts: Record<string, number>): [string, number][] {
  return Object.entries(counts).sort(([a], [b]) => a.localeCompare(b));
}

function formatStore(store: StoreUsage): string[] {
  const title = store.name === 'history' ? 'Email history' : 'Campaign plans';
  const lines = [`${title} (${store.filePath})`];

  if (!store.exists) {
    lines.push('  File not found');
    return lines;
  }

  lines.push(`  Size: ${formatBytes(store.sizeBytes)}`);
  lines.push(`  Records: ${store.records}`);

  if (store.cleanup) {
    lines.push(`  Cleanup: ${store.cleanup.before} -> ${store.cleanup.after}`);
  }

  const groups = sortedCounts(store.byGroup);
  if (groups.length > 0) {
    lines.push('  By group:');
    for (const [group, count] of groups) {
      lines.push(`    ${group}: ${count}`);
    }
  }

  if (store.byStatus) {
    const statuses = Object.entries(store.byStatus).sort(([a], [b]) => a.localeCompare(b));
    if (statuses.length > 0) {
      lines.push('  By status:');
      for (const [status, count] of statuses) {
        lines.push(`    ${status}: ${count}`);
      }
    }
  }

  return lines;
}

function formatDirectory(label: string, usage: DirectoryUsage): string {
  if (!usage.exists) {
    return `  ${label}: not found`;
  }
  return `  ${label}: ${usage.files} files, ${formatBytes(usage.bytes)}`;
}

/**
 * Plain-text usage report
 */
export function formatUsageReport(report: UsageReport): string {
  const { limits } = report;
  const lines = ['', '📊 Data Usage Report', ''];

  for (const store of report.stores) {
    lines.push(...formatStore(store), '');
  }

  lines.push('Artifacts');
  lines.push(formatDirectory('Outputs', report.artifacts.outputs));
  lines.push(formatDirectory('Archive', report.artifacts.archive));
  lines.push(formatDirectory('Traces', report.artifacts.traces));
  lines.push('');

  lines.push('Retention limits');
  lines.push(`  History: ${limits.history.maxPerGroup} per group, ${limits.history.maxTotal} total`);
  lines.push(`  Plans: ${limits.plans.maxActivePerGroup} active per group`);
  lines.push(`  Plans: archive completed after ${limits.plans.archiveAfterDays} days, delete archived after ${limits.plans.deleteAfterDays} days`);
  lines.push(`  Outputs: archive after ${limits.artifacts.archiveDays} days`);
  lines.push(`  Traces: delete after ${limits.artifacts.traceRetentionDays} days`);

  return lines.join('\n');
}

/**
 * Plain-text sweep report
 */
export function formatSweepReport(report: SweepReport): string {
  const header = report.dryRun ? '🧹 Artifact Sweep (dry run)' : '🧹 Artifact Sweep';
  const lines = ['', header, ''];

  lines.push(`Archived: ${report.archivedCount}`);
  for (const entry of report.archived) {
    lines.push(`  ${entry.from} -> ${entry.to}`);
  }

  lines.push(`Deleted: ${report.deletedCount}`);
  for (const deleted of report.deleted) {
    lines.push(`  ${deleted}`);
  }

  if (report.errors.length > 0) {
    lines.push(`Errors: ${report.errors.length}`);
    for (const failure of report.errors) {
      lines.push(`  ${failure.message}`);
    }
  }

  return lines.join('\n');
}
