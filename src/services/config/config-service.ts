/**
 * Configuration Service
 *
 * Loads retention thresholds from retention.yaml. Every key is optional; anything
 * omitted falls back to the documented default. The resolved structure is handed to
 * each store and to the sweeper explicitly.
 */

import * as fs from 'fs/promises';
import * as yaml from 'yaml';
import { z } from 'zod';
import { ValidationError, errnoCode } from '../../core/errors.js';
import { formatIssues } from '../../core/schemas.js';
import { DEFAULT_HISTORY_RETENTION, type HistoryRetentionConfig } from '../history/history-retention.js';
import { DEFAULT_PLAN_LIFECYCLE, type PlanLifecycleConfig } from '../plans/plan-lifecycle.js';
import { DEFAULT_ARTIFACT_RETENTION, type ArtifactRetentionConfig } from '../sweeper/artifact-sweeper.js';

export const DEFAULT_CONFIG_FILE = 'retention.yaml';

/**
 * Fully resolved configuration
 */
export interface RetentionConfig {
  history: HistoryRetentionConfig;
  plans: PlanLifecycleConfig;
  artifacts: ArtifactRetentionConfig;
}

export const DEFAULT_RETENTION_CONFIG: RetentionConfig = {
  history: DEFAULT_HISTORY_RETENTION,
  plans: DEFAULT_PLAN_LIFECYCLE,
  artifacts: DEFAULT_ARTIFACT_RETENTION
};

const Threshold = z.number().int().positive();

/**
 * Shape of retention.yaml
 */
export const RetentionConfigFileSchema = z
  .object({
    history: z
      .object({
        maxPerGroup: Threshold.optional(),
        maxTotal: Threshold.optional()
      })
      .strict()
      .optional(),
    plans: z
      .object({
        maxActivePerGroup: Threshold.optional(),
        archiveAfterDays: Threshold.optional(),
        deleteAfterDays: Threshold.optional()
      })
      .strict()
      .optional(),
    artifacts: z
      .object({
        archiveDays: Threshold.optional(),
        traceRetentionDays: Threshold.optional()
      })
      .strict()
      .optional()
  })
  .strict();

export type RetentionConfigFile = z.infer<typeof RetentionConfigFileSchema>;

/**
 * Merges a parsed config file over the defaults
 */
export function resolveRetentionConfig(file: RetentionConfigFile = {}): RetentionConfig {
  return {
    history: {
      maxPerGroup: file.history?.maxPerGroup ?? DEFAULT_HISTORY_RETENTION.maxPerGroup,
      maxTotal: file.history?.maxTotal ?? DEFAULT_HISTORY_RETENTION.maxTotal
    },
    plans: {
      maxActivePerGroup: file.plans?.maxActivePerGroup ?? DEFAULT_PLAN_LIFECYCLE.maxActivePerGroup,
      archiveAfterDays: file.plans?.archiveAfterDays ?? DEFAULT_PLAN_LIFECYCLE.archiveAfterDays,
      deleteAfterDays: file.plans?.deleteAfterDays ?? DEFAULT_PLAN_LIFECYCLE.deleteAfterDays
    },
    artifacts: {
      archiveDays: file.artifacts?.archiveDays ?? DEFAULT_ARTIFACT_RETENTION.archiveDays,
      traceRetentionDays: file.artifacts?.traceRetentionDays ?? DEFAULT_ARTIFACT_RETENTION.traceRetentionDays
    }
  };
}

/**
 * Configuration Service
 *
 * Provides access to retention.yaml with defaults when the file is absent.
 * Unlike a missing file, an unreadable or invalid one is an error.
 */
export class ConfigService {
  private configPath: string;
  private cachedConfig: RetentionConfig | null = null;

  constructor(options: { configPath?: string } = {}) {
    this.configPath = options.configPath || DEFAULT_CONFIG_FILE;
  }

  /**
   * Load configuration from file, with caching
   *
   * @throws ValidationError if the file is not valid YAML or holds unknown keys or bad values
   */
  async getConfig(): Promise<RetentionConfig> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        this.cachedConfig = resolveRetentionConfig();
        return this.cachedConfig;
      }
      throw new ValidationError(`Cannot read config file: ${this.configPath}`, 'config', {
        cause: error instanceof Error ? error.message : String(error)
      });
    }

    let parsed: unknown;
    try {
      parsed = yaml.parse(content);
    } catch (error) {
      throw new ValidationError(`Invalid YAML in ${this.configPath}`, 'config', {
        cause: error instanceof Error ? error.message : String(error)
      });
    }

    const result = RetentionConfigFileSchema.safeParse(parsed ?? {});
    if (!result.success) {
      throw new ValidationError(`Invalid configuration in ${this.configPath}`, 'config', {
        issues: formatIssues(result.error)
      });
    }

    this.cachedConfig = resolveRetentionConfig(result.data);
    return this.cachedConfig;
  }

  /**
   * Clear the cached configuration (useful for testing or after config changes)
   */
  clearCache(): void {
    this.cachedConfig = null;
  }

  getConfigPath(): string {
    return this.configPath;
  }
}
