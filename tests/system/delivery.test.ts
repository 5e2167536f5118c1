import { AnalyticsAggregator } from '../../src/analytics/analytics-aggregator';
import { createAnalyticsStore } from '../../src/analytics/analytics-store';
import { ContentCatalog } from '../../src/content/content-catalog';
import { createContentStore } from '../../src/content/content-store';
import { RotationSelector } from '../../src/content/rotation-selector';
import { ScheduledMessageRepository } from '../../src/content/scheduled-messages';
import { BotConfig, ChannelConfig, createDefaultConfig } from '../../src/system/config';
import { DeliveryService, DeliverySettings, dayOfYear, formatWelcome } from '../../src/system/delivery';
import { EligibilityGate } from '../../src/system/eligibility';
import { MetricsCollector } from '../../src/system/monitoring';
import { FakeTransport, MemoryPersistence, createTestClock, sequenceRandom, silentLogger } from '../helpers/fakes';

function channel(id: string, active = true): ChannelConfig {
  return { id, displayName: id, active };
}

function settingsFrom(config: BotConfig): DeliverySettings {
  return {
    getActiveChannels: () => config.channels.filter(candidate => candidate.active),
    getDailyMessages: () => [...config.dailyMessages],
    getDailyMessageConfig: () => ({ ...config.dailyMessage }),
    getPollConfig: () => ({ ...config.poll, options: [...config.poll.options] }),
    getDeliveryConfig: () => ({ ...config.delivery }),
    getTimezone: () => config.timezone,
    getWelcomeMessage: () => config.welcomeMessage
  };
}

describe('DeliveryService', () => {
  let config: BotConfig;
  let transport: FakeTransport;
  let sleep: jest.Mock<Promise<void>, [number]>;
  let testClock: ReturnType<typeof createTestClock>;
  let metrics: MetricsCollector;
  let catalog: ContentCatalog;
  let scheduledMessages: ScheduledMessageRepository;
  let analytics: AnalyticsAggregator;
  let service: DeliveryService;

  beforeEach(() => {
    config = createDefaultConfig();
    config.timezone = 'UTC';
    config.delivery.pacingMs = 0;
    config.dailyMessages = ['Hello', 'World'];
    config.channels = [channel('A'), channel('B', false)];

    transport = new FakeTransport();
    sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
    testClock = createTestClock('2026-01-10T12:00:00.000Z');
    const clock = testClock.clock;
    const logger = silentLogger();
    metrics = new MetricsCollector({ clock });

    const contentStore = createContentStore(new MemoryPersistence(), logger, clock);
    catalog = new ContentCatalog(contentStore, { clock, logger });
    scheduledMessages = new ScheduledMessageRepository(contentStore, { clock, logger });
    analytics = new AnalyticsAggregator(createAnalyticsStore(new MemoryPersistence(), logger, clock), { clock, logger });

    service = new DeliveryService({
      settings: settingsFrom(config),
      transport,
      gate: new EligibilityGate(transport, { threshold: 500, logger }),
      selector: new RotationSelector(contentStore, { clock, logger, random: sequenceRandom([0]) }),
      scheduledMessages,
      analytics,
      metrics,
      logger,
      clock,
      sleep
    });
  });

  describe('dailyBroadcast', () => {
    it('should send the message of the day to active channels only', async () => {
      const summary = await service.dailyBroadcast();

      expect(transport.sent).toEqual([{ kind: 'message', destinationId: 'A', text: 'Hello' }]);
      expect(summary).toMatchObject({ job: 'dailyBroadcast', sent: 1, failed: 0, skipped: 0 });
    });

    it('should pick the next message the next day', async () => {
      testClock.set('2026-01-11T12:00:00.000Z');

      await service.dailyBroadcast();

      expect(transport.sent).toEqual([{ kind: 'message', destinationId: 'A', text: 'World' }]);
    });

    it('should keep going when a channel fails', async () => {
      config.channels = [channel('A'), channel('C')];
      transport.failingDestinations.add('A');

      const summary = await service.dailyBroadcast();

      expect(summary.results).toEqual([
        { destinationId: 'A', status: 'failed', reason: '[fetch] chat A unavailable (sendMessage @ A)' },
        { destinationId: 'C', status: 'sent', messageId: 1 }
      ]);
      expect(metrics.calculateDeliverySuccessRate(new Date(0), testClock.clock())).toBe(50);
    });

    it('should pause between sends', async () => {
      config.channels = [channel('A'), channel('C'), channel('D')];
      config.delivery.pacingMs = 500;

      await service.dailyBroadcast();

      expect(sleep.mock.calls).toEqual([[500], [500]]);
    });

    it('should send nothing when the pool is empty', async () => {
      config.dailyMessages = [];

      const summary = await service.dailyBroadcast();

      expect(transport.sent).toEqual([]);
      expect(summary).toEqual({ job: 'dailyBroadcast', results: [], sent: 0, failed: 0, skipped: 0 });
    });

    it('should rotate templates per channel in rotation mode', async () => {
      config.dailyMessage.source = 'rotation';
      config.dailyMessage.rotationCategory = 'tips';
      await catalog.createTemplate({ name: 'Hydrate', category: 'tips', body: 'Drink water 💧' });

      await service.dailyBroadcast();

      expect(transport.sent).toEqual([{ kind: 'message', destinationId: 'A', text: 'Drink water 💧' }]);
      expect((await catalog.getTemplates('tips'))[0].usageCount).toBe(1);
    });

    it('should fall back to the pool when the rotation category is empty', async () => {
      config.dailyMessage.source = 'rotation';
      config.dailyMessage.rotationCategory = 'news';

      await service.dailyBroadcast();

      expect(transport.sent).toEqual([{ kind: 'message', destinationId: 'A', text: 'Hello' }]);
    });

    it('should skip channels with no content at all', async () => {
      config.dailyMessage.source = 'rotation';
      config.dailyMessage.rotationCategory = 'news';
      config.dailyMessages = [];

      const summary = await service.dailyBroadcast();

      expect(summary.results).toEqual([{ destinationId: 'A', status: 'skipped', reason: 'no content available' }]);
    });
  });

  describe('dailyPoll', () => {
    beforeEach(() => {
      config.channels = [channel('C'), channel('D')];
      transport.memberCounts.set('C', 300);
      transport.memberCounts.set('D', 600);
    });

    it('should poll only channels at or above the threshold', async () => {
      const summary = await service.dailyPoll();

      expect(transport.sent).toEqual([{
        kind: 'poll',
        destinationId: 'D',
        question: 'How are you feeling today?',
        options: ['Motivated 💪', 'Tired 😴', 'Neutral 😐'],
        settings: { isAnonymous: true, allowsMultipleAnswers: false }
      }]);
      expect(summary.results[0]).toEqual({ destinationId: 'C', status: 'skipped', reason: '300 members, below 500' });
    });

    it('should skip a channel whose count cannot be fetched', async () => {
      transport.failingCounts.add('D');

      const summary = await service.dailyPoll();

      expect(transport.sent).toEqual([]);
      expect(summary.results[1]).toEqual({
        destinationId: 'D',
        status: 'skipped',
        reason: 'member count unavailable: chat D unavailable'
      });
    });

    it('should not pause for skipped channels', async () => {
      config.channels = [channel('C'), channel('D'), channel('E')];
      config.delivery.pacingMs = 500;
      transport.memberCounts.set('E', 700);

      await service.dailyPoll();

      expect(transport.sent.map(record => record.destinationId)).toEqual(['D', 'E']);
      expect(sleep.mock.calls).toEqual([[500]]);
    });

    it('should send nothing without options', async () => {
      config.poll.options = [];

      const summary = await service.dailyPoll();

      expect(transport.sent).toEqual([]);
      expect(summary.results).toEqual([]);
    });
  });

  describe('sweepDue', () => {
    it('should send due messages oldest first and mark them sent', async () => {
      const later = await scheduledMessages.schedule({ destinationId: 'A', body: 'second', dueAt: new Date('2026-01-10T11:00:00.000Z') });
      const earlier = await scheduledMessages.schedule({ destinationId: 'A', body: 'first', dueAt: new Date('2026-01-10T10:00:00.000Z') });
      const future = await scheduledMessages.schedule({ destinationId: 'A', body: 'later', dueAt: new Date('2026-01-10T13:00:00.000Z') });

      const summary = await service.sweepDue();

      expect(transport.sent.map(record => record.kind === 'message' ? record.text : record.question)).toEqual(['first', 'second']);
      expect(summary.sent).toBe(2);
      expect((await scheduledMessages.get(earlier.id)).status).toBe('sent');
      expect((await scheduledMessages.get(later.id)).status).toBe('sent');
      expect((await scheduledMessages.listPending()).map(message => message.id)).toEqual([future.id]);
    });

    it('should leave failed messages pending for the next sweep', async () => {
      transport.failingDestinations.add('X');
      const failing = await scheduledMessages.schedule({ destinationId: 'X', body: 'nope', dueAt: new Date('2026-01-10T10:00:00.000Z') });

      const summary = await service.sweepDue();

      expect(summary.failed).toBe(1);
      expect((await scheduledMessages.get(failing.id)).status).toBe('pending');
    });

    it('should do nothing when nothing is due', async () => {
      expect(await service.sweepDue()).toEqual({ job: 'scheduledSweep', results: [], sent: 0, failed: 0, skipped: 0 });
    });
  });

  describe('captureSnapshots', () => {
    it('should record a count per active channel', async () => {
      config.channels = [channel('C'), channel('Z')];
      transport.memberCounts.set('C', 300);

      expect(await service.captureSnapshots()).toEqual([
        { destinationId: 'C', subscriberCount: 300 },
        { destinationId: 'Z', subscriberCount: null }
      ]);
      expect((await analytics.growth('C', 1)).map(snapshot => snapshot.payload.subscriberCount)).toEqual([300]);
    });
  });

  describe('sendWelcome', () => {
    it('should greet the member by username', async () => {
      const result = await service.sendWelcome('A', 'alice');

      expect(result.status).toBe('sent');
      expect(transport.sent).toEqual([{ kind: 'message', destinationId: 'A', text: 'Welcome, @alice! Thanks for joining us 🎉' }]);
    });

    it('should skip when no welcome message is configured', async () => {
      config.welcomeMessage = '  ';

      expect(await service.sendWelcome('A')).toEqual({
        destinationId: 'A',
        status: 'skipped',
        reason: 'no welcome message configured'
      });
    });
  });
});

describe('formatWelcome', () => {
  it('should use a neutral name without a username', () => {
    expect(formatWelcome('Hi {username}!', undefined)).toBe('Hi new subscriber!');
  });
});

describe('dayOfYear', () => {
  it('should count from one', () => {
    expect(dayOfYear(new Date('2026-01-01T00:30:00.000Z'), 'UTC')).toBe(1);
    expect(dayOfYear(new Date('2024-12-31T12:00:00.000Z'), 'UTC')).toBe(366);
  });

  it('should use the calendar of the timezone', () => {
    expect(dayOfYear(new Date('2026-01-01T00:30:00.000Z'), 'America/New_York')).toBe(365);
  });
});
