// Retention policy for plan stores: age sweep before the write, active cap after it

import type { PlanRecord } from '../../models/plan.js';
import { Logger, logger as defaultLogger } from '../../core/logger.js';
import type { RetentionPolicy } from '../storage/record-store.js';
import {
  DEFAULT_PLAN_LIFECYCLE,
  applyLifecycle,
  enforceActiveCap,
  type PlanLifecycleConfig
} from './plan-lifecycle.js';

export class PlanRetentionPolicy implements RetentionPolicy<PlanRecord> {
  readonly name = 'plans';
  readonly config: PlanLifecycleConfig;

  constructor(config: Partial<PlanLifecycleConfig> = {}, private readonly logger: Logger = defaultLogger) {
    this.config = { ...DEFAULT_PLAN_LIFECYCLE, ...config };
  }

  beforeWrite(records: readonly PlanRecord[], now: Date): PlanRecord[] {
    const { plans, archived, deleted } = applyLifecycle(records, now, this.config);

    if (archived.length > 0 || deleted.length > 0) {
      this.logger.info('Plan lifecycle sweep', { archived, deleted });
    }

    return plans;
  }

  afterWrite(records: readonly PlanRecord[], now: Date): PlanRecord[] {
    const { plans, archived } = enforceActiveCap(records, now, this.config.maxActivePerGroup);

    if (archived.length > 0) {
      this.logger.info('Active plan cap reached, archived oldest', {
        archived,
        maxActivePerGroup: this.config.maxActivePerGroup
      });
    }

    return plans;
  }
}
