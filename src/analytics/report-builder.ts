/**
 * Text rendering for analytics reports. Markdown-flavoured, as sent to
 * channel admins.
 */

import { EngagementStats, GrowthSummary, SubscriberSnapshotEvent, WeeklyBucket } from './types';

const NUMBER_FORMAT = new Intl.NumberFormat('en-US');

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatCount(value: number): string {
  return NUMBER_FORMAT.format(value);
}

export function formatSigned(value: number): string {
  return value < 0 ? `-${formatCount(-value)}` : `+${formatCount(value)}`;
}

export function formatSignedPercent(value: number): string {
  return `${value < 0 ? '' : '+'}${value.toFixed(1)}%`;
}

export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export function formatDay(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function reportTitle(windowDays: number): string {
  if (windowDays === 7) return 'Weekly Report';
  if (windowDays === 30) return 'Monthly Report';
  return `${windowDays}-Day Report`;
}

export function summarizeGrowth(snapshots: readonly SubscriberSnapshotEvent[]): GrowthSummary | null {
  if (snapshots.length === 0) {
    return null;
  }

  const startSubscribers = snapshots[0].payload.subscriberCount;
  const endSubscribers = snapshots[snapshots.length - 1].payload.subscriberCount;
  const delta = endSubscribers - startSubscribers;

  return {
    startSubscribers,
    endSubscribers,
    delta,
    deltaPercent: startSubscribers > 0 ? (delta / startSubscribers) * 100 : 0
  };
}

export interface ReportInput {
  destinationId: string;
  windowDays: number;
  growth: GrowthSummary | null;
  engagement: EngagementStats;
  generatedAt: Date;
  weeklyBreakdown?: WeeklyBucket[];
}

export function buildReport(input: ReportInput): string {
  const title = reportTitle(input.windowDays);

  if (!input.growth) {
    return `📊 *${title} - Channel ${input.destinationId}*\n\nNo data available for this period.`;
  }

  const { growth, engagement } = input;
  const lines: string[] = [
    `📊 *${title} - Channel ${input.destinationId}*`,
    '',
    `*Subscriber growth (${input.windowDays} days):*`,
    `• Start: ${formatCount(growth.startSubscribers)} subscribers`,
    `• End: ${formatCount(growth.endSubscribers)} subscribers`,
    `• Growth: ${formatSigned(growth.delta)} (${formatSignedPercent(growth.deltaPercent)})`
  ];

  if (input.weeklyBreakdown) {
    const perDay = growth.delta / input.windowDays;
    lines.push(`• Average daily growth: ${perDay < 0 ? '' : '+'}${perDay.toFixed(1)}`);
  }

  lines.push(
    '',
    '*Engagement:*',
    `• Messages sent: ${engagement.totalMessages}`,
    `• Average views: ${engagement.avgViews.toFixed(0)}`,
    `• Average reactions: ${engagement.avgReactions.toFixed(0)}`,
    `• Engagement rate: ${engagement.engagementRate.toFixed(1)}%`
  );

  if (input.weeklyBreakdown) {
    lines.push('', '*Weekly breakdown:*');
    for (const bucket of input.weeklyBreakdown) {
      const value = bucket.delta === null ? 'no data' : formatSigned(bucket.delta);
      lines.push(`• Week ${bucket.weekIndex} (${formatDay(bucket.from)} to ${formatDay(bucket.to)}): ${value}`);
    }
  }

  lines.push(
    '',
    `*Period:* last ${input.windowDays} days`,
    `*Generated:* ${formatTimestamp(input.generatedAt)}`
  );

  return lines.join('\n');
}
