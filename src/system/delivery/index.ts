/**
 * Delivery Service
 *
 * The job bodies of the broadcast service. Each fan-out walks the active
 * channels in configured order, sends one at a time with a fixed pause
 * between sends, and never lets one channel's failure stop the others.
 */

import { BroadcastError, NotFoundError, Sleep, sleep, toError } from '../error-handling';
import { ConfigManager } from '../config';
import { EligibilityGate, POLL_CATEGORY } from '../eligibility';
import { MetricsCollector } from '../monitoring';
import { SentMessage, Transport } from '../transport';
import { AnalyticsAggregator } from '../../analytics/analytics-aggregator';
import { RotationSelector } from '../../content/rotation-selector';
import { ScheduledMessageRepository } from '../../content/scheduled-messages';
import { BroadcastLogger, createComponentLogger } from '../../utils/logger';

const DAY_MS = 86_400_000;

export type DeliveryStatus = 'sent' | 'failed' | 'skipped';

export interface DeliveryResult {
  destinationId: string;
  status: DeliveryStatus;
  messageId?: number;
  reason?: string;
}

export interface BatchSummary {
  job: string;
  results: DeliveryResult[];
  sent: number;
  failed: number;
  skipped: number;
}

export interface SnapshotResult {
  destinationId: string;
  subscriberCount: number | null;
}

/** The configuration reads the service depends on. */
export type DeliverySettings = Pick<
  ConfigManager,
  | 'getActiveChannels'
  | 'getDailyMessages'
  | 'getDailyMessageConfig'
  | 'getPollConfig'
  | 'getDeliveryConfig'
  | 'getTimezone'
  | 'getWelcomeMessage'
>;

export interface DeliveryServiceOptions {
  settings: DeliverySettings;
  transport: Transport;
  gate: EligibilityGate;
  selector: RotationSelector;
  scheduledMessages: ScheduledMessageRepository;
  analytics: AnalyticsAggregator;
  metrics?: MetricsCollector;
  logger?: BroadcastLogger;
  clock?: () => Date;
  sleep?: Sleep;
}

/**
 * 1-based day of the year of `date` in the calendar of `timezone`.
 */
export function dayOfYear(date: Date, timezone?: string): number {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    year: 'numeric',
    month: 'numeric',
    day: 'numeric'
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find(candidate => candidate.type === type)?.value);

  const year = part('year');
  const month = part('month');
  const day = part('day');

  return Math.round((Date.UTC(year, month - 1, day) - Date.UTC(year, 0, 1)) / DAY_MS) + 1;
}

export function formatWelcome(template: string, username?: string): string {
  return template.replace(/\{username\}/g, username ? `@${username}` : 'new subscriber');
}

function summarize(job: string, results: DeliveryResult[]): BatchSummary {
  return {
    job,
    results,
    sent: results.filter(result => result.status === 'sent').length,
    failed: results.filter(result => result.status === 'failed').length,
    skipped: results.filter(result => result.status === 'skipped').length
  };
}

function describeError(error: Error): string {
  return error instanceof BroadcastError ? error.toString() : error.message;
}

export class DeliveryService {
  private readonly settings: DeliverySettings;
  private readonly transport: Transport;
  private readonly gate: EligibilityGate;
  private readonly selector: RotationSelector;
  private readonly scheduledMessages: ScheduledMessageRepository;
  private readonly analytics: AnalyticsAggregator;
  private readonly metrics?: MetricsCollector;
  private readonly logger: BroadcastLogger;
  private readonly clock: () => Date;
  private readonly wait: Sleep;

  constructor(options: DeliveryServiceOptions) {
    this.settings = options.settings;
    this.transport = options.transport;
    this.gate = options.gate;
    this.selector = options.selector;
    this.scheduledMessages = options.scheduledMessages;
    this.analytics = options.analytics;
    this.metrics = options.metrics;
    this.logger = options.logger ?? createComponentLogger('delivery');
    this.clock = options.clock ?? (() => new Date());
    this.wait = options.sleep ?? sleep;
  }

  /**
   * Today's message from the pool (indexed by day of year), or a rotated
   * template per channel when the daily source is `rotation`.
   */
  async dailyBroadcast(): Promise<BatchSummary> {
    const job = 'dailyBroadcast';
    const dailyConfig = this.settings.getDailyMessageConfig();
    const messages = this.settings.getDailyMessages();
    const poolMessage = messages.length > 0
      ? messages[dayOfYear(this.clock(), this.settings.getTimezone()) % messages.length]
      : null;

    if (dailyConfig.source === 'pool' && poolMessage === null) {
      this.logger.warn('No daily messages configured, nothing to send', undefined, job);
      return summarize(job, []);
    }

    const channels = this.settings.getActiveChannels();
    const results = await this.fanOut(job, channels.map(channel => channel.id), async destinationId => {
      const text = dailyConfig.source === 'rotation'
        ? await this.rotatedText(destinationId, dailyConfig.rotationCategory, poolMessage)
        : poolMessage;
      if (text === null) {
        return { destinationId, status: 'skipped', reason: 'no content available' };
      }
      return this.send(job, destinationId, () => this.transport.sendMessage(destinationId, text));
    });

    return this.finish(job, results);
  }

  async dailyPoll(): Promise<BatchSummary> {
    const job = 'dailyPoll';
    const poll = this.settings.getPollConfig();

    if (poll.options.length === 0) {
      this.logger.warn('No poll options configured, nothing to send', undefined, job);
      return summarize(job, []);
    }

    const channels = this.settings.getActiveChannels();
    const results = await this.fanOut(job, channels.map(channel => channel.id), async destinationId => {
      const decision = await this.gate.evaluate(destinationId, POLL_CATEGORY);
      if (!decision.eligible) {
        const reason = decision.reason === 'fetch-failed'
          ? `member count unavailable: ${decision.error ?? 'unknown error'}`
          : `${decision.count ?? 0} members, below ${decision.threshold ?? this.gate.getThreshold()}`;
        this.logger.info(`Skipping poll for ${destinationId}: ${reason}`, undefined, job);
        return { destinationId, status: 'skipped', reason };
      }

      return this.send(job, destinationId, () => this.transport.sendPoll(destinationId, poll.question, poll.options, {
        isAnonymous: true,
        allowsMultipleAnswers: false
      }));
    });

    return this.finish(job, results);
  }

  /**
   * Sends every pending message that is due, oldest first. A message is
   * marked sent only after the transport accepted it.
   */
  async sweepDue(): Promise<BatchSummary> {
    const job = 'scheduledSweep';
    const due = await this.scheduledMessages.getDue(this.clock());
    if (due.length === 0) {
      return summarize(job, []);
    }

    const results: DeliveryResult[] = [];
    const { pacingMs } = this.settings.getDeliveryConfig();

    for (let i = 0; i < due.length; i++) {
      const message = due[i];
      if (i > 0 && pacingMs > 0) {
        await this.wait(pacingMs);
      }

      const result = await this.send(job, message.destinationId, () =>
        this.transport.sendMessage(message.destinationId, message.body));

      if (result.status === 'sent') {
        try {
          await this.scheduledMessages.markSent(message.id);
        } catch (error) {
          // Cancelled while the send was in flight.
          this.logger.warn(`Could not mark ${message.id} as sent`, { error: toError(error).message }, job);
        }
      }
      results.push(result);
    }

    return this.finish(job, results);
  }

  /**
   * Records a subscriber snapshot for every active channel.
   */
  async captureSnapshots(): Promise<SnapshotResult[]> {
    const results: SnapshotResult[] = [];
    for (const channel of this.settings.getActiveChannels()) {
      const subscriberCount = await this.analytics.captureSnapshot(this.transport, channel.id);
      results.push({ destinationId: channel.id, subscriberCount });
    }

    this.logger.info('Captured subscriber snapshots', {
      captured: results.filter(result => result.subscriberCount !== null).length,
      channels: results.length
    }, 'captureSnapshots');
    return results;
  }

  async sendWelcome(destinationId: string, username?: string): Promise<DeliveryResult> {
    const job = 'welcome';
    const template = this.settings.getWelcomeMessage();
    if (!template.trim()) {
      return { destinationId, status: 'skipped', reason: 'no welcome message configured' };
    }

    const text = formatWelcome(template, username);
    return this.send(job, destinationId, () => this.transport.sendMessage(destinationId, text));
  }

  private async rotatedText(destinationId: string, category: string, fallback: string | null): Promise<string | null> {
    try {
      const item = await this.selector.getRotatedContent(destinationId, category);
      return item.body;
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        throw error;
      }
      this.logger.warn(`No ${category} templates for ${destinationId}, using the daily pool`, undefined, 'dailyBroadcast');
      return fallback;
    }
  }

  /**
   * Runs `deliver` for each destination in order, pausing between sends.
   * A throwing `deliver` becomes a failed result.
   */
  private async fanOut(
    job: string,
    destinationIds: string[],
    deliver: (destinationId: string) => Promise<DeliveryResult>
  ): Promise<DeliveryResult[]> {
    const results: DeliveryResult[] = [];
    const { pacingMs } = this.settings.getDeliveryConfig();
    let attempted = false;

    for (const destinationId of destinationIds) {
      if (attempted && pacingMs > 0) {
        await this.wait(pacingMs);
      }

      let result: DeliveryResult;
      try {
        result = await deliver(destinationId);
      } catch (caught) {
        const error = toError(caught);
        this.logger.error(`Delivery to ${destinationId} failed`, error, undefined, job);
        result = { destinationId, status: 'failed', reason: describeError(error) };
        this.metrics?.recordDelivery(job, destinationId, 'failed');
      }

      if (result.status === 'skipped') {
        this.metrics?.recordDelivery(job, destinationId, 'skipped');
      } else {
        attempted = true;
      }
      results.push(result);
    }

    return results;
  }

  private async send(
    job: string,
    destinationId: string,
    operation: () => Promise<SentMessage>
  ): Promise<DeliveryResult> {
    try {
      const sent = await operation();
      this.metrics?.recordDelivery(job, destinationId, 'sent');
      this.logger.info(`Sent to ${destinationId}`, { messageId: sent.messageId }, job);
      return { destinationId, status: 'sent', messageId: sent.messageId };
    } catch (caught) {
      const error = toError(caught);
      this.metrics?.recordDelivery(job, destinationId, 'failed');
      this.logger.error(`Failed to send to ${destinationId}`, error, undefined, job);
      return { destinationId, status: 'failed', reason: describeError(error) };
    }
  }

  private finish(job: string, results: DeliveryResult[]): BatchSummary {
    const summary = summarize(job, results);
    this.logger.info(`${job} finished`, {
      sent: summary.sent,
      failed: summary.failed,
      skipped: summary.skipped
    }, job);
    return summary;
  }
}
