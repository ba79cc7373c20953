/**
 * Usage Reporter
 *
 * Read-only view of store files and artifact directories: sizes, counts per group and
 * per status. With `forceCleanup` each existing store runs its own retention pass first;
 * the reporter never applies retention rules itself.
 */

import type { Dirent } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { StoredPlanStatus } from '../../models/types.js';
import { errnoCode } from '../../core/errors.js';
import { Logger, logger as defaultLogger } from '../../core/logger.js';
import { DEFAULT_RETENTION_CONFIG, type RetentionConfig } from '../config/config-service.js';
import { HistoryStore } from '../history/history-store.js';
import { PlanStore } from '../plans/plan-store.js';
import { ARCHIVE_DIR_NAME } from '../sweeper/artifact-sweeper.js';
import type { RetentionOutcome } from '../storage/record-store.js';

export interface UsagePaths {
  historyFile: string;
  planFile: string;
  outputsDir: string;
  tracesDir: string;
}

export interface UsageReporterOptions {
  paths: UsagePaths;
  config?: RetentionConfig;
  clock?: () => Date;
  logger?: Logger;
}

export interface StoreUsage {
  name: 'history' | 'plans';
  filePath: string;
  exists: boolean;
  sizeBytes: number;
  records: number;
  byGroup: Record<string, number>;
  /** Plans only */
  byStatus?: Partial<Record<StoredPlanStatus, number>>;
  /** Present when a forced retention pass ran */
  cleanup?: RetentionOutcome;
}

export interface DirectoryUsage {
  path: string;
  exists: boolean;
  files: number;
  bytes: number;
}

export interface UsageReport {
  generatedAt: Date;
  stores: StoreUsage[];
  artifacts: {
    outputs: DirectoryUsage;
    archive: DirectoryUsage;
    traces: DirectoryUsage;
  };
  limits: RetentionConfig;
}

export class UsageReporter {
  private paths: UsagePaths;
  private config: RetentionConfig;
  private clock: () => Date;
  private logger: Logger;

  constructor(options: UsageReporterOptions) {
    this.paths = options.paths;
    this.config = options.config ?? DEFAULT_RETENTION_CONFIG;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Builds the usage report.
   *
   * @throws CorruptStoreError if a store file cannot be parsed
   */
  async report(options: { forceCleanup?: boolean } = {}): Promise<UsageReport> {
    const forceCleanup = options.forceCleanup ?? false;

    const stores = [
      await this.historyUsage(forceCleanup),
      await this.planUsage(forceCleanup)
    ];

    return {
      generatedAt: this.clock(),
      stores,
      artifacts: {
        outputs: await measureDirectory(this.paths.outputsDir, false),
        archive: await measureDirectory(path.join(this.paths.outputsDir, ARCHIVE_DIR_NAME), true),
        traces: await measureDirectory(this.paths.tracesDir, false)
      },
      limits: this.config
    };
  }

  private async historyUsage(forceCleanup: boolean): Promise<StoreUsage> {
    const filePath = this.paths.historyFile;
    const store = await HistoryStore.open(filePath, {
      retention: this.config.history,
      clock: this.clock,
      logger: this.logger
    });
    const exists = (await fileSize(filePath)) !== null;
    const cleanup = exists && forceCleanup ? await store.applyRetention() : undefined;
    const stats = store.stats();

    return {
      name: 'history',
      filePath,
      exists,
      sizeBytes: (await fileSize(filePath)) ?? 0,
      records: stats.totalEntries,
      byGroup: stats.entriesByGroup,
      cleanup
    };
  }

  private async planUsage(forceCleanup: boolean): Promise<StoreUsage> {
    const filePath = this.paths.planFile;
    const store = await PlanStore.open(filePath, {
      lifecycle: this.config.plans,
      clock: this.clock,
      logger: this.logger
    });
    const exists = (await fileSize(filePath)) !== null;
    const cleanup = exists && forceCleanup ? await store.applyRetention() : undefined;
    const stats = store.stats();

    return {
      name: 'plans',
      filePath,
      exists,
      sizeBytes: (await fileSize(filePath)) ?? 0,
      records: stats.totalPlans,
      byGroup: stats.plansByGroup,
      byStatus: stats.plansByStatus,
      cleanup
    };
  }
}

/**
 * Size of a file in bytes, or null if it does not exist
 */
async function fileSize(filePath: string): Promise<number | null> {
  try {
    return (await fs.stat(filePath)).size;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * File count and total bytes of the regular files in `dir` (and below, if recursive)
 */
async function measureDirectory(dir: string, recursive: boolean): Promise<DirectoryUsage> {
  const usage: DirectoryUsage = { path: dir, exists: true, files: 0, bytes: 0 };

  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return { ...usage, exists: false };
    }
    throw error;
  }

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isFile()) {
      usage.files++;
      usage.bytes += (await fileSize(entryPath)) ?? 0;
    } else if (recursive && entry.isDirectory()) {
      const nested = await measureDirectory(entryPath, true);
      usage.files += nested.files;
      usage.bytes += nested.bytes;
    }
  }

  return usage;
}
