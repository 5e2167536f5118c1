/**
 * Analytics Aggregator
 *
 * Appends subscriber snapshots and message outcomes to an append-only event
 * log and answers windowed growth and engagement queries over it.
 */

import { ValidationError, toError } from '../system/error-handling';
import { BroadcastLogger, createComponentLogger } from '../utils/logger';
import { AnalyticsStore } from './analytics-store';
import { buildReport, summarizeGrowth } from './report-builder';
import {
  DashboardData,
  EngagementStats,
  MemberCountSource,
  MessageOutcomeEvent,
  StatEvent,
  SubscriberSnapshotEvent,
  WeeklyBucket
} from './types';

const DAY_MS = 86_400_000;

export interface AnalyticsAggregatorOptions {
  clock?: () => Date;
  logger?: BroadcastLogger;
}

function isSnapshot(event: StatEvent): event is SubscriberSnapshotEvent {
  return event.kind === 'subscriberSnapshot';
}

function isOutcome(event: StatEvent): event is MessageOutcomeEvent {
  return event.kind === 'messageOutcome';
}

function assertCount(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative integer`, [`${field}: ${value}`]);
  }
}

export class AnalyticsAggregator {
  private readonly store: AnalyticsStore;
  private readonly clock: () => Date;
  private readonly logger: BroadcastLogger;

  constructor(store: AnalyticsStore, options: AnalyticsAggregatorOptions = {}) {
    this.store = store;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createComponentLogger('analytics');
  }

  async recordSnapshot(destinationId: string, metricValue: number): Promise<SubscriberSnapshotEvent> {
    assertCount(metricValue, 'subscriberCount');

    const event: SubscriberSnapshotEvent = {
      destinationId,
      timestamp: this.clock().toISOString(),
      kind: 'subscriberSnapshot',
      payload: { subscriberCount: metricValue }
    };

    await this.store.transact(document => {
      document.events.push(event);
    });

    this.logger.info(`Recorded ${metricValue} subscribers for ${destinationId}`, undefined, 'recordSnapshot');
    return event;
  }

  async recordOutcome(
    destinationId: string,
    messageKind: string,
    views: number,
    reactions: number
  ): Promise<MessageOutcomeEvent> {
    assertCount(views, 'views');
    assertCount(reactions, 'reactions');

    const event: MessageOutcomeEvent = {
      destinationId,
      timestamp: this.clock().toISOString(),
      kind: 'messageOutcome',
      payload: { messageKind, views, reactions }
    };

    await this.store.transact(document => {
      document.events.push(event);
    });

    this.logger.info(`Recorded ${messageKind} outcome for ${destinationId}`, { views, reactions }, 'recordOutcome');
    return event;
  }

  /**
   * Fetches the live member count and records it. Returns null when the
   * count cannot be fetched.
   */
  async captureSnapshot(source: MemberCountSource, destinationId: string): Promise<number | null> {
    let count: number;
    try {
      count = await source.fetchMemberCount(destinationId);
    } catch (error) {
      this.logger.error(`Failed to fetch member count for ${destinationId}`, toError(error), undefined, 'captureSnapshot');
      return null;
    }

    await this.recordSnapshot(destinationId, count);
    return count;
  }

  /**
   * Snapshots for the destination within the last `windowDays`, oldest first.
   */
  async growth(destinationId: string, windowDays: number): Promise<SubscriberSnapshotEvent[]> {
    const cutoff = this.clock().getTime() - windowDays * DAY_MS;
    return this.snapshotsBetween(destinationId, cutoff, Number.POSITIVE_INFINITY);
  }

  async engagement(destinationId: string, windowDays: number): Promise<EngagementStats> {
    const cutoff = this.clock().getTime() - windowDays * DAY_MS;
    const document = await this.store.read();
    const outcomes = document.events
      .filter(isOutcome)
      .filter(event => event.destinationId === destinationId && Date.parse(event.timestamp) >= cutoff);

    if (outcomes.length === 0) {
      return { totalMessages: 0, avgViews: 0, avgReactions: 0, engagementRate: 0, periodDays: windowDays };
    }

    const totalViews = outcomes.reduce((sum, event) => sum + event.payload.views, 0);
    const totalReactions = outcomes.reduce((sum, event) => sum + event.payload.reactions, 0);

    return {
      totalMessages: outcomes.length,
      avgViews: totalViews / outcomes.length,
      avgReactions: totalReactions / outcomes.length,
      engagementRate: totalViews > 0 ? (totalReactions / totalViews) * 100 : 0,
      periodDays: windowDays
    };
  }

  async report(destinationId: string, windowDays: number): Promise<string> {
    const [snapshots, engagement] = await Promise.all([
      this.growth(destinationId, windowDays),
      this.engagement(destinationId, windowDays)
    ]);

    return buildReport({
      destinationId,
      windowDays,
      growth: summarizeGrowth(snapshots),
      engagement,
      generatedAt: this.clock()
    });
  }

  async weeklyReport(destinationId: string): Promise<string> {
    return this.report(destinationId, 7);
  }

  /**
   * 30-day report with average daily growth and four 7-day buckets.
   */
  async monthlyReport(destinationId: string): Promise<string> {
    const [snapshots, engagement, weeklyBreakdown] = await Promise.all([
      this.growth(destinationId, 30),
      this.engagement(destinationId, 30),
      this.weeklyBreakdown(destinationId, 4)
    ]);

    return buildReport({
      destinationId,
      windowDays: 30,
      growth: summarizeGrowth(snapshots),
      engagement,
      generatedAt: this.clock(),
      weeklyBreakdown
    });
  }

  /**
   * Consecutive 7-day windows ending now, oldest first. Each window is
   * half-open [from, to), except the most recent which includes `now`.
   */
  async weeklyBreakdown(destinationId: string, weeks: number): Promise<WeeklyBucket[]> {
    const now = this.clock().getTime();
    const all = await this.snapshotsBetween(destinationId, now - weeks * 7 * DAY_MS, now + 1);
    const buckets: WeeklyBucket[] = [];

    for (let i = 0; i < weeks; i++) {
      const weeksAgo = weeks - 1 - i;
      const from = now - (weeksAgo + 1) * 7 * DAY_MS;
      const to = now - weeksAgo * 7 * DAY_MS;
      const upper = weeksAgo === 0 ? to + 1 : to;

      const snapshots = all.filter(event => {
        const timestamp = Date.parse(event.timestamp);
        return timestamp >= from && timestamp < upper;
      });
      const summary = summarizeGrowth(snapshots);

      buckets.push({
        weekIndex: i + 1,
        from: new Date(from),
        to: new Date(to),
        delta: summary ? summary.delta : null,
        snapshots: snapshots.length
      });
    }

    return buckets;
  }

  async dashboard(destinationId: string): Promise<DashboardData> {
    const [recent, engagement] = await Promise.all([
      this.growth(destinationId, 7),
      this.engagement(destinationId, 7)
    ]);

    const summary = summarizeGrowth(recent);

    return {
      currentSubscribers: summary ? summary.endSubscribers : 0,
      growth7d: summary && recent.length >= 2 ? summary.delta : 0,
      engagementRate: engagement.engagementRate,
      totalMessages: engagement.totalMessages,
      avgViews: engagement.avgViews
    };
  }

  /** Snapshots with from <= timestamp < to, oldest first. */
  private async snapshotsBetween(destinationId: string, from: number, to: number): Promise<SubscriberSnapshotEvent[]> {
    const document = await this.store.read();
    return document.events
      .filter(isSnapshot)
      .filter(event => {
        if (event.destinationId !== destinationId) {
          return false;
        }
        const timestamp = Date.parse(event.timestamp);
        return timestamp >= from && timestamp < to;
      })
      .sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
  }
}
