/**
 * Scheduler Module
 *
 * Owns the named jobs of the broadcast service. Time triggers come from a
 * `TriggerRegistry` (node-cron in production); job callbacks are run one at a
 * time through a promise queue so a slow job never blocks the timer itself.
 */

import cron from 'node-cron';
import { EventEmitter } from 'events';
import { NotFoundError, ValidationError, toError } from '../error-handling';
import { BroadcastLogger, createComponentLogger } from '../../utils/logger';

export type TriggerSpec =
  | { kind: 'daily'; hour: number; minute: number }
  | { kind: 'interval'; everyMinutes: number };

export interface TriggerHandle {
  stop(): void;
}

export type TriggerCallback = (firedAt: Date) => void;

export interface TriggerRegistry {
  /** Installs a timer; throws when the trigger cannot be registered */
  register(spec: TriggerSpec, callback: TriggerCallback): TriggerHandle;
}

export function toCronExpression(spec: TriggerSpec): string {
  if (spec.kind === 'daily') {
    return `${spec.minute} ${spec.hour} * * *`;
  }
  return `*/${spec.everyMinutes} * * * *`;
}

export function describeTrigger(spec: TriggerSpec): string {
  if (spec.kind === 'daily') {
    return `daily at ${String(spec.hour).padStart(2, '0')}:${String(spec.minute).padStart(2, '0')}`;
  }
  return `every ${spec.everyMinutes} minute(s)`;
}

export class CronTriggerRegistry implements TriggerRegistry {
  private readonly timezone: string;

  constructor(timezone: string) {
    this.timezone = timezone;
  }

  register(spec: TriggerSpec, callback: TriggerCallback): TriggerHandle {
    const expression = toCronExpression(spec);
    if (!cron.validate(expression)) {
      throw new ValidationError(`Invalid cron expression: ${expression}`, undefined, { operation: 'register' });
    }

    const task = cron.schedule(expression, () => callback(new Date()), {
      scheduled: true,
      timezone: this.timezone
    });

    return { stop: () => task.stop() };
  }
}

export type JobCallback = () => Promise<void>;

export interface JobStatus {
  name: string;
  trigger: TriggerSpec;
  lastFiredAt: Date | null;
  lastRunDuration?: number; // milliseconds
  lastError: string | null;
  runCount: number;
  failureCount: number;
  isRunning: boolean;
}

interface JobEntry {
  callback: JobCallback;
  trigger: TriggerSpec;
  handle: TriggerHandle | null;
  /** Bumped on every (re)registration; firings from older timers are dropped */
  generation: number;
  /** Minute slot of the last accepted firing */
  lastSlot: string | null;
  status: JobStatus;
}

export interface JobSchedulerOptions {
  registry: TriggerRegistry;
  logger?: BroadcastLogger;
}

/** A firing is identified by the minute it happened in. */
export function slotKey(firedAt: Date): string {
  return firedAt.toISOString().slice(0, 16);
}

export class JobScheduler extends EventEmitter {
  private readonly registry: TriggerRegistry;
  private readonly logger: BroadcastLogger;
  private readonly jobs: Map<string, JobEntry> = new Map();
  private queue: Promise<void> = Promise.resolve();
  private stopped = false;

  constructor(options: JobSchedulerOptions) {
    super();
    this.registry = options.registry;
    this.logger = options.logger ?? createComponentLogger('scheduler');
  }

  /**
   * Installs a job. A job registered under an existing name replaces it.
   * Errors from the trigger registry propagate.
   */
  register(name: string, trigger: TriggerSpec, callback: JobCallback): void {
    const existing = this.jobs.get(name);
    const generation = (existing?.generation ?? 0) + 1;
    const handle = this.registry.register(trigger, firedAt => this.onTrigger(name, generation, firedAt));
    existing?.handle?.stop();

    this.jobs.set(name, {
      callback,
      trigger,
      handle,
      generation,
      lastSlot: existing?.lastSlot ?? null,
      status: existing
        ? { ...existing.status, trigger }
        : {
            name,
            trigger,
            lastFiredAt: null,
            lastError: null,
            runCount: 0,
            failureCount: 0,
            isRunning: false
          }
    });

    this.logger.info(`Registered job ${name} (${describeTrigger(trigger)})`, undefined, 'register');
    this.emit('jobRegistered', name, trigger);
  }

  /**
   * Moves a job to a new trigger, keeping its callback. The old timer is
   * gone before this returns; if the new one cannot be installed the old one
   * stays and the error propagates. A stopped scheduler only records the new
   * trigger and installs no timer.
   */
  reschedule(name: string, trigger: TriggerSpec): void {
    const job = this.jobs.get(name);
    if (!job) {
      throw new NotFoundError(`Job not found: ${name}`, { operation: 'reschedule' });
    }

    if (this.stopped) {
      job.generation += 1;
      job.trigger = trigger;
      job.status.trigger = trigger;
      this.logger.info(`Recorded ${describeTrigger(trigger)} for stopped job ${name}`, undefined, 'reschedule');
      return;
    }

    const generation = job.generation + 1;
    const handle = this.registry.register(trigger, firedAt => this.onTrigger(name, generation, firedAt));
    job.handle?.stop();
    job.handle = handle;
    job.generation = generation;
    job.trigger = trigger;
    job.status.trigger = trigger;

    this.logger.info(`Rescheduled job ${name} (${describeTrigger(trigger)})`, undefined, 'reschedule');
    this.emit('jobRescheduled', name, trigger);
  }

  /**
   * Accepts firings again after `stop()`.
   */
  start(): void {
    this.stopped = false;
    this.emit('schedulerStarted');
  }

  /**
   * Cancels every timer. Jobs already queued still run; later firings are
   * ignored and `hasJob` reports every job as unregistered. Safe to call at
   * any time.
   */
  stop(): void {
    this.stopped = true;
    for (const job of this.jobs.values()) {
      job.handle?.stop();
      job.handle = null;
    }
    this.logger.info('Scheduler stopped', { jobs: this.jobs.size }, 'stop');
    this.emit('schedulerStopped');
  }

  isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Queues a job outside its schedule and resolves once it has run.
   */
  runNow(name: string): Promise<void> {
    if (!this.jobs.has(name)) {
      return Promise.reject(new NotFoundError(`Job not found: ${name}`, { operation: 'runNow' }));
    }
    return this.enqueue(name);
  }

  /** Resolves when every queued run has finished. */
  idle(): Promise<void> {
    return this.queue;
  }

  /** Whether the job has a live timer; stopped jobs keep only their status. */
  hasJob(name: string): boolean {
    return !this.stopped && this.jobs.has(name);
  }

  getJobs(): JobStatus[] {
    return Array.from(this.jobs.values()).map(job => ({ ...job.status }));
  }

  private onTrigger(name: string, generation: number, firedAt: Date): void {
    if (this.stopped) {
      this.logger.debug(`Ignoring ${name} firing after stop`, undefined, 'trigger');
      return;
    }

    const job = this.jobs.get(name);
    if (!job || job.generation !== generation) {
      return;
    }

    const slot = slotKey(firedAt);
    if (job.lastSlot === slot) {
      this.logger.debug(`Job ${name} already fired in slot ${slot}`, undefined, 'trigger');
      return;
    }

    job.lastSlot = slot;
    job.status.lastFiredAt = firedAt;
    this.queue = this.enqueue(name);
  }

  private enqueue(name: string): Promise<void> {
    const run = this.queue.then(() => this.runJob(name));
    this.queue = run;
    return run;
  }

  private async runJob(name: string): Promise<void> {
    const job = this.jobs.get(name);
    if (!job) {
      return;
    }

    const startTime = Date.now();
    job.status.isRunning = true;
    job.status.runCount++;
    this.emit('jobStarted', name);

    try {
      await job.callback();
      job.status.lastError = null;
      job.status.lastRunDuration = Date.now() - startTime;
      this.emit('jobCompleted', name, job.status.lastRunDuration);
    } catch (caught) {
      const error = toError(caught);
      job.status.failureCount++;
      job.status.lastError = error.message;
      job.status.lastRunDuration = Date.now() - startTime;
      this.logger.error(`Job ${name} failed`, error, undefined, 'run');
      this.emit('jobFailed', name, error);
    } finally {
      job.status.isRunning = false;
    }
  }
}
