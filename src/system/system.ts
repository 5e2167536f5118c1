/**
 * System Core
 *
 * Builds every long-lived service once and wires them together. Nothing is a
 * module singleton: callers construct a `System` and pass in the pieces they
 * want to replace (transport, trigger registry, persistence, clock).
 */

import path from 'path';
import { ConfigManager, JobName } from './config';
import { DeliveryResult, DeliveryService } from './delivery';
import { EligibilityGate } from './eligibility';
import { Sleep, sleep, ValidationError } from './error-handling';
import { MetricsCollector } from './monitoring';
import { CronTriggerRegistry, JobScheduler, TriggerRegistry, TriggerSpec } from './scheduler';
import { TelegramTransport, Transport } from './transport';
import { AnalyticsAggregator } from '../analytics/analytics-aggregator';
import { AnalyticsStore, createAnalyticsStore } from '../analytics/analytics-store';
import { ContentCatalog } from '../content/content-catalog';
import { ContentStore, createContentStore } from '../content/content-store';
import { RandomSource, RotationSelector } from '../content/rotation-selector';
import { ScheduledMessageRepository } from '../content/scheduled-messages';
import { DocumentPersistence, FileDocumentPersistence } from '../store';
import { BroadcastLogger } from '../utils/logger';

export interface SystemOptions {
  config: ConfigManager;
  transport?: Transport;
  triggerRegistry?: TriggerRegistry;
  contentPersistence?: DocumentPersistence;
  analyticsPersistence?: DocumentPersistence;
  logger?: BroadcastLogger;
  clock?: () => Date;
  sleep?: Sleep;
  random?: RandomSource;
}

export interface ComponentHealth {
  healthy: boolean;
  message?: string;
}

export interface SystemHealth {
  healthy: boolean;
  components: Record<string, ComponentHealth>;
}

export interface MemberJoinedResult {
  subscriberCount: number | null;
  welcome: DeliveryResult;
}

export class System {
  public readonly config: ConfigManager;
  public readonly logger: BroadcastLogger;
  public readonly metrics: MetricsCollector;
  public readonly transport: Transport;
  public readonly scheduler: JobScheduler;
  public readonly contentStore: ContentStore;
  public readonly analyticsStore: AnalyticsStore;
  public readonly catalog: ContentCatalog;
  public readonly selector: RotationSelector;
  public readonly scheduledMessages: ScheduledMessageRepository;
  public readonly analytics: AnalyticsAggregator;
  public readonly gate: EligibilityGate;
  public readonly delivery: DeliveryService;

  private isStarted = false;

  constructor(options: SystemOptions) {
    const config = options.config;
    const clock = options.clock ?? (() => new Date());
    const settings = config.getConfig();
    const storage = config.getStorageConfig();
    const delivery = config.getDeliveryConfig();
    const telegram = config.getTelegramConfig();

    this.config = config;
    this.logger = options.logger ?? new BroadcastLogger({
      minLevel: settings.logLevel,
      fileOutput: settings.logFile !== undefined,
      filePath: settings.logFile
    });
    this.metrics = new MetricsCollector({ clock });

    this.transport = options.transport ?? new TelegramTransport({
      botToken: telegram.botToken,
      apiBaseUrl: telegram.apiBaseUrl,
      timeoutMs: telegram.timeoutMs,
      maxRetries: delivery.maxRetries,
      retryDelayMs: delivery.retryDelayMs,
      logger: this.logger.createSubLogger('transport'),
      sleep: options.sleep ?? sleep
    });

    this.contentStore = createContentStore(
      options.contentPersistence ?? new FileDocumentPersistence(path.join(storage.dataDir, storage.contentFile)),
      this.logger.createSubLogger('store.content'),
      clock
    );
    this.analyticsStore = createAnalyticsStore(
      options.analyticsPersistence ?? new FileDocumentPersistence(path.join(storage.dataDir, storage.analyticsFile)),
      this.logger.createSubLogger('store.analytics'),
      clock
    );

    this.catalog = new ContentCatalog(this.contentStore, { clock, logger: this.logger.createSubLogger('catalog') });
    this.selector = new RotationSelector(this.contentStore, {
      clock,
      random: options.random,
      logger: this.logger.createSubLogger('rotation')
    });
    this.scheduledMessages = new ScheduledMessageRepository(this.contentStore, {
      clock,
      logger: this.logger.createSubLogger('scheduled-messages')
    });
    this.analytics = new AnalyticsAggregator(this.analyticsStore, { clock, logger: this.logger.createSubLogger('analytics') });
    this.gate = new EligibilityGate(this.transport, {
      threshold: config.getPollConfig().minSubscribers,
      metrics: this.metrics,
      logger: this.logger.createSubLogger('eligibility')
    });

    this.delivery = new DeliveryService({
      settings: config,
      transport: this.transport,
      gate: this.gate,
      selector: this.selector,
      scheduledMessages: this.scheduledMessages,
      analytics: this.analytics,
      metrics: this.metrics,
      logger: this.logger.createSubLogger('delivery'),
      clock,
      sleep: options.sleep ?? sleep
    });

    this.scheduler = new JobScheduler({
      registry: options.triggerRegistry ?? new CronTriggerRegistry(config.getTimezone()),
      logger: this.logger.createSubLogger('scheduler')
    });
    this.scheduler.on('jobCompleted', (name: string, duration: number) => {
      this.metrics.recordJobDuration(name, duration, true);
    });
    this.scheduler.on('jobFailed', (name: string) => {
      this.metrics.recordJobDuration(name, 0, false);
    });
  }

  /**
   * Registers the enabled jobs. A job that cannot be registered aborts
   * startup with every timer already installed cancelled.
   */
  async start(): Promise<void> {
    if (this.isStarted) {
      this.logger.warn('System is already started', undefined, 'start');
      return;
    }

    const problems = this.config.validate();
    if (problems.length > 0) {
      this.logger.warn('Configuration validation warnings', { problems }, 'start');
    }

    const daily = this.config.getDailyMessageConfig();
    const poll = this.config.getPollConfig();
    const sweep = this.config.getSweepConfig();

    this.scheduler.start();
    try {
      if (daily.enabled) {
        this.scheduler.register('dailyBroadcast', { kind: 'daily', hour: daily.hour, minute: daily.minute }, async () => {
          await this.delivery.dailyBroadcast();
        });
      }
      if (poll.enabled) {
        this.scheduler.register('dailyPoll', { kind: 'daily', hour: poll.hour, minute: poll.minute }, async () => {
          await this.delivery.dailyPoll();
        });
      }
      if (sweep.enabled) {
        this.scheduler.register('scheduledSweep', { kind: 'interval', everyMinutes: sweep.intervalMinutes }, async () => {
          await this.delivery.sweepDue();
        });
      }
    } catch (error) {
      this.scheduler.stop();
      throw error;
    }

    this.isStarted = true;
    this.logger.info('Broadcast service started', {
      jobs: this.scheduler.getJobs().map(job => job.name),
      channels: this.config.getActiveChannels().length
    }, 'start');
  }

  /**
   * Cancels every timer and waits for queued job runs to finish.
   */
  async stop(): Promise<void> {
    this.scheduler.stop();
    await this.scheduler.idle();

    if (this.isStarted) {
      this.isStarted = false;
      this.logger.info('Broadcast service stopped', undefined, 'stop');
    }
  }

  isRunning(): boolean {
    return this.isStarted;
  }

  /**
   * Moves a daily job to a new time and saves the change. Only a job with a
   * live timer is moved right away. Before `start()` or after `stop()` the
   * saved time is what the next `start()` registers, and a job disabled in
   * the configuration stays unregistered.
   */
  reschedule(job: Exclude<JobName, 'scheduledSweep'>, hour: number, minute: number): void {
    this.config.setSchedule(job, hour, minute);

    const trigger: TriggerSpec = { kind: 'daily', hour, minute };
    if (this.scheduler.hasJob(job)) {
      this.scheduler.reschedule(job, trigger);
    }
  }

  /**
   * Records a fresh subscriber count for the channel and greets the member.
   */
  async onMemberJoined(destinationId: string, username?: string): Promise<MemberJoinedResult> {
    if (!destinationId.trim()) {
      throw new ValidationError('Destination id is required', undefined, { operation: 'onMemberJoined' });
    }

    const subscriberCount = await this.analytics.captureSnapshot(this.transport, destinationId);
    const welcome = await this.delivery.sendWelcome(destinationId, username);
    return { subscriberCount, welcome };
  }

  getHealth(): SystemHealth {
    const components: Record<string, ComponentHealth> = {};

    const jobs = this.scheduler.getJobs();
    const failing = jobs.filter(job => job.lastError !== null);
    components.scheduler = {
      healthy: !this.isStarted || !this.scheduler.isStopped(),
      message: `${jobs.length} jobs registered${failing.length > 0 ? `, ${failing.length} failing` : ''}`
    };

    const monitoring = this.metrics.healthCheck();
    components.monitoring = {
      healthy: monitoring.healthy,
      message: monitoring.message
    };

    for (const store of [this.contentStore, this.analyticsStore]) {
      const writeError = store.getLastWriteError();
      components[`store.${store.name}`] = {
        healthy: writeError === null,
        message: writeError ? writeError.message : 'Last write succeeded'
      };
    }

    return {
      healthy: Object.values(components).every(component => component.healthy),
      components
    };
  }
}
