/**
 * Filesystem Archival Sweeper
 *
 * Moves aged output files into outputs/archive/YYYY-MM/ and deletes aged trace files.
 * Works on file metadata only and runs on demand, independent of the record stores.
 * A failure on one file is recorded in the report and the sweep moves on; re-running
 * after a partial sweep only touches what is still left.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ArtifactIOError, errnoCode } from '../../core/errors.js';
import { Logger, logger as defaultLogger } from '../../core/logger.js';
import { ageMs, daysToMs, monthKey } from '../../core/time.js';

export interface ArtifactRetentionConfig {
  /** Output files older than this many days are archived */
  archiveDays: number;
  /** Trace files older than this many days are deleted */
  traceRetentionDays: number;
}

export const DEFAULT_ARTIFACT_RETENTION: ArtifactRetentionConfig = {
  archiveDays: 30,
  traceRetentionDays: 7
};

export const ARCHIVE_DIR_NAME = 'archive';

export interface ArtifactSweeperConfig extends ArtifactRetentionConfig {
  outputsDir: string;
  tracesDir: string;
  /** Report what would happen without touching any file */
  dryRun: boolean;
}

export interface ArchivedArtifact {
  from: string;
  to: string;
}

export interface SweepReport {
  archivedCount: number;
  deletedCount: number;
  archived: ArchivedArtifact[];
  deleted: string[];
  errors: ArtifactIOError[];
  dryRun: boolean;
}

const DEFAULT_CONFIG: ArtifactSweeperConfig = {
  ...DEFAULT_ARTIFACT_RETENTION,
  outputsDir: 'outputs',
  tracesDir: 'traces',
  dryRun: false
};

export class ArtifactSweeper {
  private config: ArtifactSweeperConfig;
  private clock: () => Date;
  private logger: Logger;

  constructor(
    config: Partial<ArtifactSweeperConfig> = {},
    options: { clock?: () => Date; logger?: Logger } = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Runs one sweep over the outputs and trace directories
   */
  async sweep(): Promise<SweepReport> {
    const now = this.clock();
    const report: SweepReport = {
      archivedCount: 0,
      deletedCount: 0,
      archived: [],
      deleted: [],
      errors: [],
      dryRun: this.config.dryRun
    };

    await this.archiveOutputs(now, report);
    await this.deleteTraces(now, report);

    report.archivedCount = report.archived.length;
    report.deletedCount = report.deleted.length;

    this.logger.info('Sweep complete', {
      archived: report.archivedCount,
      deleted: report.deletedCount,
      errors: report.errors.length,
      dryRun: report.dryRun
    });

    return report;
  }

  private async archiveOutputs(now: Date, report: SweepReport): Promise<void> {
    const thresholdMs = daysToMs(this.config.archiveDays);

    for (const source of await this.listFiles(this.config.outputsDir, report)) {
      try {
        const stats = await fs.stat(source);
        if (ageMs(stats.mtime, now) <= thresholdMs) continue;

        const monthDir = path.join(this.config.outputsDir, ARCHIVE_DIR_NAME, monthKey(stats.mtime));

        if (this.config.dryRun) {
          report.archived.push({ from: source, to: path.join(monthDir, path.basename(source)) });
          continue;
        }

        await fs.mkdir(monthDir, { recursive: true });
        const target = await moveWithoutOverwrite(source, monthDir);

        report.archived.push({ from: source, to: target });
        this.logger.info('Archived output', { from: source, to: target });
      } catch (error) {
        this.recordFailure(report, source, error);
      }
    }
  }

  private async deleteTraces(now: Date, report: SweepReport): Promise<void> {
    const thresholdMs = daysToMs(this.config.traceRetentionDays);

    for (const trace of await this.listFiles(this.config.tracesDir, report)) {
      try {
        const stats = await fs.stat(trace);
        if (ageMs(stats.mtime, now) <= thresholdMs) continue;

        if (!this.config.dryRun) {
          await fs.unlink(trace);
          this.logger.info('Deleted trace', { path: trace });
        }
        report.deleted.push(trace);
      } catch (error) {
        this.recordFailure(report, trace, error);
      }
    }
  }

  /**
   * Regular files directly inside `dir`. A missing directory has no files.
   */
  private async listFiles(dir: string, report: SweepReport): Promise<string[]> {
    try {
      const entries = await fs.readdir(dir, { withFileTypes: true });
      return entries
        .filter(entry => entry.isFile())
        .map(entry => path.join(dir, entry.name))
        .sort();
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        this.logger.debug('Artifact directory not found', { dir });
        return [];
      }
      this.recordFailure(report, dir, error);
      return [];
    }
  }

  private recordFailure(report: SweepReport, filePath: string, error: unknown): void {
    const failure = new ArtifactIOError(filePath, error instanceof Error ? error.message : String(error));
    report.errors.push(failure);
    this.logger.warn('Sweep skipped file', { path: filePath, reason: failure.reason });
  }
}

/**
 * Moves `source` into `dir` under its own name, or `stem-N.ext` for the first N that is
 * free. The hard link is created exclusively, so a file that appears in `dir` meanwhile
 * is never replaced.
 */
async function moveWithoutOverwrite(source: string, dir: string): Promise<string> {
  const { name: stem, ext, base } = path.parse(source);

  for (let suffix = 0; ; suffix++) {
    const candidate = path.join(dir, suffix === 0 ? base : `${stem}-${suffix}${ext}`);
    try {
      await fs.link(source, candidate);
    } catch (error) {
      if (errnoCode(error) === 'EEXIST') continue;
      throw error;
    }
    await fs.unlink(source);
    return candidate;
  }
}
