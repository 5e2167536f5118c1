/**
 * Analytics domain types
 */

import { StoredDocument } from '../store';

export interface SubscriberSnapshotEvent {
  destinationId: string;
  timestamp: string;
  kind: 'subscriberSnapshot';
  payload: {
    subscriberCount: number;
  };
}

export interface MessageOutcomeEvent {
  destinationId: string;
  timestamp: string;
  kind: 'messageOutcome';
  payload: {
    messageKind: string;
    views: number;
    reactions: number;
  };
}

export type StatEvent = SubscriberSnapshotEvent | MessageOutcomeEvent;

export interface AnalyticsDocument extends StoredDocument {
  events: StatEvent[];
}

export interface EngagementStats {
  totalMessages: number;
  avgViews: number;
  avgReactions: number;
  /** Reactions per hundred views */
  engagementRate: number;
  periodDays: number;
}

export interface GrowthSummary {
  startSubscribers: number;
  endSubscribers: number;
  delta: number;
  /** 0 when the window starts at zero subscribers */
  deltaPercent: number;
}

export interface WeeklyBucket {
  weekIndex: number;
  from: Date;
  to: Date;
  /** null when the week holds no snapshot */
  delta: number | null;
  snapshots: number;
}

export interface DashboardData {
  currentSubscribers: number;
  growth7d: number;
  engagementRate: number;
  totalMessages: number;
  avgViews: number;
}

/** Anything able to report a destination's member count. */
export interface MemberCountSource {
  fetchMemberCount(destinationId: string): Promise<number>;
}
