/**
 * System Integration Tests
 *
 * Wires the whole service with in-process stand-ins for the Bot API, the
 * timers and the JSON files, then drives it through the scheduler.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import { ConfigManager } from '../../src/system/config';
import { ValidationError } from '../../src/system/error-handling';
import { TriggerCallback, TriggerHandle, TriggerSpec } from '../../src/system/scheduler';
import { System } from '../../src/system/system';
import { FakeTransport, ManualTriggerRegistry, MemoryPersistence, createTestClock, silentLogger } from '../helpers/fakes';

class IntervalRefusingRegistry extends ManualTriggerRegistry {
  register(spec: TriggerSpec, callback: TriggerCallback): TriggerHandle {
    if (spec.kind === 'interval') {
      throw new Error('interval refused');
    }
    return super.register(spec, callback);
  }
}

describe('System Integration', () => {
  let tempDir: string;
  let configPath: string;
  let registry: ManualTriggerRegistry;
  let transport: FakeTransport;
  let contentPersistence: MemoryPersistence;
  let testClock: ReturnType<typeof createTestClock>;
  let sys: System;

  const createSystem = (triggerRegistry: ManualTriggerRegistry = registry) => new System({
    config: new ConfigManager(configPath, { logger: silentLogger(), ignoreEnvironment: true }),
    transport,
    triggerRegistry,
    contentPersistence,
    analyticsPersistence: new MemoryPersistence(),
    logger: silentLogger(),
    clock: testClock.clock,
    sleep: async () => undefined
  });

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'broadcast-system-'));
    configPath = path.join(tempDir, 'bot-config.yaml');
    fs.writeFileSync(configPath, yaml.dump({
      timezone: 'UTC',
      telegram: { botToken: 'test-secret' },
      delivery: { pacingMs: 0 },
      dailyMessages: ['Rise and shine'],
      channels: [
        { id: '-100', displayName: 'Main', active: true },
        { id: '-200', displayName: 'Archive', active: false }
      ]
    }), 'utf-8');

    registry = new ManualTriggerRegistry();
    transport = new FakeTransport();
    contentPersistence = new MemoryPersistence();
    testClock = createTestClock('2026-01-10T09:00:00.000Z');
    sys = createSystem();
  });

  afterEach(async () => {
    await sys.stop();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('system lifecycle', () => {
    it('should register the three jobs on start', async () => {
      await sys.start();

      expect(sys.isRunning()).toBe(true);
      expect(sys.scheduler.getJobs().map(job => job.name)).toEqual(['dailyBroadcast', 'dailyPoll', 'scheduledSweep']);
      expect(registry.active().map(trigger => trigger.spec)).toEqual([
        { kind: 'daily', hour: 9, minute: 0 },
        { kind: 'daily', hour: 10, minute: 0 },
        { kind: 'interval', everyMinutes: 1 }
      ]);
    });

    it('should not register twice when started again', async () => {
      await sys.start();
      await sys.start();

      expect(registry.triggers).toHaveLength(3);
    });

    it('should abort startup and cancel installed timers when a job cannot be registered', async () => {
      const refusing = new IntervalRefusingRegistry();
      sys = createSystem(refusing);

      await expect(sys.start()).rejects.toThrow('interval refused');

      expect(sys.isRunning()).toBe(false);
      expect(refusing.triggers).toHaveLength(2);
      expect(refusing.active()).toHaveLength(0);
    });

    it('should ignore firings after stop', async () => {
      await sys.start();
      await sys.stop();

      registry.fireIncludingStopped(testClock.clock());
      await sys.scheduler.idle();

      expect(sys.isRunning()).toBe(false);
      expect(transport.sent).toEqual([]);
    });
  });

  describe('scheduled jobs', () => {
    it('should broadcast to active channels when the daily trigger fires', async () => {
      await sys.start();

      registry.active()[0].callback(testClock.clock());
      await sys.scheduler.idle();

      expect(transport.sent).toEqual([{ kind: 'message', destinationId: '-100', text: 'Rise and shine' }]);
      expect(sys.scheduler.getJobs()[0]).toMatchObject({ name: 'dailyBroadcast', runCount: 1, lastError: null });
    });

    it('should deliver queued messages on the sweep', async () => {
      await sys.start();
      const queued = await sys.scheduledMessages.schedule({
        destinationId: '-100',
        body: 'Maintenance tonight',
        dueAt: new Date('2026-01-10T08:59:00.000Z')
      });

      await sys.scheduler.runNow('scheduledSweep');

      expect(transport.sent).toEqual([{ kind: 'message', destinationId: '-100', text: 'Maintenance tonight' }]);
      expect((await sys.scheduledMessages.get(queued.id)).status).toBe('sent');
    });
  });

  describe('reschedule', () => {
    it('should leave one live timer per job after rescheduling twice', async () => {
      await sys.start();

      sys.reschedule('dailyPoll', 11, 30);
      sys.reschedule('dailyPoll', 12, 15);

      expect(registry.active().map(trigger => trigger.spec)).toEqual([
        { kind: 'daily', hour: 9, minute: 0 },
        { kind: 'interval', everyMinutes: 1 },
        { kind: 'daily', hour: 12, minute: 15 }
      ]);
      expect(new ConfigManager(configPath, { logger: silentLogger(), ignoreEnvironment: true }).getPollConfig())
        .toMatchObject({ hour: 12, minute: 15 });
    });

    it('should install no timer after the system stopped', async () => {
      await sys.start();
      await sys.stop();

      sys.reschedule('dailyPoll', 11, 30);

      expect(registry.active()).toEqual([]);
      expect(sys.scheduler.hasJob('dailyPoll')).toBe(false);
      expect(new ConfigManager(configPath, { logger: silentLogger(), ignoreEnvironment: true }).getPollConfig())
        .toMatchObject({ hour: 11, minute: 30 });
    });

    it('should register the saved time on the next start', async () => {
      sys.reschedule('dailyPoll', 11, 30);
      expect(registry.active()).toEqual([]);

      await sys.start();

      expect(registry.active().map(trigger => trigger.spec)).toEqual([
        { kind: 'daily', hour: 9, minute: 0 },
        { kind: 'daily', hour: 11, minute: 30 },
        { kind: 'interval', everyMinutes: 1 }
      ]);
    });

    it('should leave a disabled job unregistered', async () => {
      fs.writeFileSync(configPath, yaml.dump({
        timezone: 'UTC',
        telegram: { botToken: 'test-secret' },
        dailyMessages: ['Rise and shine'],
        poll: { enabled: false },
        channels: [{ id: '-100', displayName: 'Main', active: true }]
      }), 'utf-8');
      sys = createSystem();
      await sys.start();

      sys.reschedule('dailyPoll', 11, 30);

      expect(sys.scheduler.hasJob('dailyPoll')).toBe(false);
      expect(registry.active().map(trigger => trigger.spec)).toEqual([
        { kind: 'daily', hour: 9, minute: 0 },
        { kind: 'interval', everyMinutes: 1 }
      ]);
    });

    it('should refuse an invalid time and keep the running timer', async () => {
      await sys.start();

      expect(() => sys.reschedule('dailyBroadcast', 9, 60)).toThrow(ValidationError);
      expect(registry.active()[0].spec).toEqual({ kind: 'daily', hour: 9, minute: 0 });
    });
  });

  describe('member joined', () => {
    it('should record the count and greet the member', async () => {
      transport.memberCounts.set('-100', 42);

      const result = await sys.onMemberJoined('-100', 'bob');

      expect(result.subscriberCount).toBe(42);
      expect(result.welcome).toEqual({ destinationId: '-100', status: 'sent', messageId: 1 });
      expect(transport.sent).toEqual([{ kind: 'message', destinationId: '-100', text: 'Welcome, @bob! Thanks for joining us 🎉' }]);
    });

    it('should require a destination', async () => {
      await expect(sys.onMemberJoined(' ')).rejects.toThrow(ValidationError);
    });
  });

  describe('health', () => {
    it('should report every component', async () => {
      await sys.start();

      const health = sys.getHealth();

      expect(health.healthy).toBe(true);
      expect(Object.keys(health.components)).toEqual(['scheduler', 'monitoring', 'store.content', 'store.analytics']);
      expect(health.components.scheduler.message).toBe('3 jobs registered');
    });

    it('should surface a failing content file', async () => {
      contentPersistence.failWrites = true;
      await sys.scheduledMessages.schedule({ destinationId: '-100', body: 'x', dueAt: new Date('2026-01-11T00:00:00.000Z') });

      const health = sys.getHealth();

      expect(health.healthy).toBe(false);
      expect(health.components['store.content']).toEqual({ healthy: false, message: 'Failed to write content document' });
    });
  });
});
