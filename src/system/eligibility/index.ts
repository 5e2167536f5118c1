/**
 * Eligibility Gate
 *
 * Decides whether a destination may receive content of a category. Polls are
 * gated on the live member count; every other category is always allowed.
 * A count that cannot be fetched means "not eligible".
 */

import { toError } from '../error-handling';
import { MemberCountSource } from '../../analytics/types';
import { MetricsCollector } from '../monitoring';
import { BroadcastLogger, createComponentLogger } from '../../utils/logger';

export const POLL_CATEGORY = 'poll';
export const DEFAULT_POLL_THRESHOLD = 500;

export type EligibilityReason = 'not-gated' | 'above-threshold' | 'below-threshold' | 'fetch-failed';

export interface EligibilityResult {
  destinationId: string;
  category: string;
  eligible: boolean;
  reason: EligibilityReason;
  count: number | null;
  threshold: number | null;
  error?: string;
}

export interface EligibilityGateOptions {
  threshold?: number;
  logger?: BroadcastLogger;
  metrics?: MetricsCollector;
}

export class EligibilityGate {
  private readonly source: MemberCountSource;
  private readonly threshold: number;
  private readonly logger: BroadcastLogger;
  private readonly metrics?: MetricsCollector;

  constructor(source: MemberCountSource, options: EligibilityGateOptions = {}) {
    this.source = source;
    this.threshold = options.threshold ?? DEFAULT_POLL_THRESHOLD;
    this.logger = options.logger ?? createComponentLogger('eligibility');
    this.metrics = options.metrics;
  }

  getThreshold(): number {
    return this.threshold;
  }

  async isEligible(destinationId: string, category: string): Promise<boolean> {
    const result = await this.evaluate(destinationId, category);
    return result.eligible;
  }

  /**
   * Never rejects; a failed fetch is reported through `reason` and `error`.
   */
  async evaluate(destinationId: string, category: string): Promise<EligibilityResult> {
    if (category !== POLL_CATEGORY) {
      return { destinationId, category, eligible: true, reason: 'not-gated', count: null, threshold: null };
    }

    let result: EligibilityResult;
    try {
      const count = await this.source.fetchMemberCount(destinationId);
      const eligible = count >= this.threshold;
      result = {
        destinationId,
        category,
        eligible,
        reason: eligible ? 'above-threshold' : 'below-threshold',
        count,
        threshold: this.threshold
      };
      this.logger.debug(`${destinationId} has ${count} members (threshold ${this.threshold})`, undefined, 'evaluate');
    } catch (caught) {
      const error = toError(caught);
      this.logger.error(`Could not fetch member count for ${destinationId}`, error, undefined, 'evaluate');
      result = {
        destinationId,
        category,
        eligible: false,
        reason: 'fetch-failed',
        count: null,
        threshold: this.threshold,
        error: error.message
      };
    }

    this.metrics?.recordGateDecision(destinationId, result.eligible);
    return result;
  }
}
