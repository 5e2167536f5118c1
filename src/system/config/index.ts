/**
 * Configuration Management Module
 *
 * Loads the bot configuration from a YAML file merged over built-in defaults,
 * then applies environment overrides. Mutations made through the manager are
 * written back to the YAML file; environment overrides never are.
 */

import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { ValidationError, toError } from '../error-handling';
import { ContentCategory, isContentCategory } from '../../content/types';
import { BroadcastLogger, LogLevel, createComponentLogger, parseLogLevel } from '../../utils/logger';
import { env } from '../../utils/env';

export type JobName = 'dailyBroadcast' | 'dailyPoll' | 'scheduledSweep';

export interface ScheduleSlotConfig {
  enabled: boolean;
  hour: number;
  minute: number;
}

export interface DailyMessageConfig extends ScheduleSlotConfig {
  /** `pool` sends the day-of-year message; `rotation` picks a template per channel */
  source: 'pool' | 'rotation';
  rotationCategory: ContentCategory;
}

export interface PollConfig extends ScheduleSlotConfig {
  question: string;
  minSubscribers: number;
  options: string[];
}

export interface SweepConfig {
  enabled: boolean;
  intervalMinutes: number;
}

export interface DeliveryConfig {
  /** Pause between two sends of one batch */
  pacingMs: number;
  maxRetries: number;
  retryDelayMs: number;
}

export interface TelegramConfig {
  botToken: string;
  apiBaseUrl: string;
  timeoutMs: number;
}

export interface StorageConfig {
  dataDir: string;
  contentFile: string;
  analyticsFile: string;
}

export interface ChannelConfig {
  id: string;
  displayName: string;
  active: boolean;
  metadata?: Record<string, string>;
}

export interface BotConfig {
  timezone: string;
  logLevel: LogLevel;
  logFile?: string;
  dailyMessage: DailyMessageConfig;
  poll: PollConfig;
  sweep: SweepConfig;
  delivery: DeliveryConfig;
  telegram: TelegramConfig;
  storage: StorageConfig;
  channels: ChannelConfig[];
  dailyMessages: string[];
  welcomeMessage: string;
}

export const MIN_POLL_OPTIONS = 2;
export const MAX_POLL_OPTIONS = 10;
export const MAX_POLL_OPTION_LENGTH = 100;

const CHANNEL_ID_PATTERN = /^(-\d+|@[A-Za-z][A-Za-z0-9_]{4,})$/;

export function isValidChannelId(id: string): boolean {
  return CHANNEL_ID_PATTERN.test(id);
}

export function createDefaultConfig(): BotConfig {
  return {
    timezone: 'Europe/Paris',
    logLevel: LogLevel.INFO,
    dailyMessage: {
      enabled: true,
      hour: 9,
      minute: 0,
      source: 'pool',
      rotationCategory: 'motivation'
    },
    poll: {
      enabled: true,
      hour: 10,
      minute: 0,
      question: 'How are you feeling today?',
      minSubscribers: 500,
      options: ['Motivated 💪', 'Tired 😴', 'Neutral 😐']
    },
    sweep: {
      enabled: true,
      intervalMinutes: 1
    },
    delivery: {
      pacingMs: 1000,
      maxRetries: 2,
      retryDelayMs: 2000
    },
    telegram: {
      botToken: '',
      apiBaseUrl: 'https://api.telegram.org',
      timeoutMs: 10000
    },
    storage: {
      dataDir: './data',
      contentFile: 'content.json',
      analyticsFile: 'analytics.json'
    },
    channels: [],
    dailyMessages: [
      'New day, new energy! 🔥 Have an excellent day!',
      'Good morning! 🌅 May today bring you some nice surprises!',
      'Have a great day, everyone! 💪 Let\'s stay motivated together!',
      'Hello community! ☀️ A new day full of possibilities!',
      'Hello! 🚀 Ready to take on the day?',
      'Good morning! 🌟 Together we are stronger!',
      'Have a good day! 🎯 Let\'s set ourselves great goals today!'
    ],
    welcomeMessage: 'Welcome, {username}! Thanks for joining us 🎉'
  };
}

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawRecord, key: string): RawRecord {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

function readNumber(raw: RawRecord, key: string, fallback: number): number {
  const value = raw[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function readBoolean(raw: RawRecord, key: string, fallback: boolean): boolean {
  const value = raw[key];
  return typeof value === 'boolean' ? value : fallback;
}

function readString(raw: RawRecord, key: string, fallback: string): string {
  const value = raw[key];
  return typeof value === 'string' ? value : fallback;
}

function readStringArray(raw: RawRecord, key: string, fallback: string[]): string[] {
  const value = raw[key];
  if (!Array.isArray(value)) {
    return fallback;
  }
  return value.filter((item): item is string => typeof item === 'string');
}

function readChannels(raw: RawRecord, fallback: ChannelConfig[]): ChannelConfig[] {
  const value = raw.channels;
  if (!Array.isArray(value)) {
    return fallback;
  }

  const channels: ChannelConfig[] = [];
  for (const entry of value) {
    if (!isRecord(entry)) {
      continue;
    }
    // Numeric ids are common in hand-written YAML (`id: -1001234`).
    const rawId = entry.id;
    const id = typeof rawId === 'number' ? String(rawId) : typeof rawId === 'string' ? rawId : '';
    if (!id) {
      continue;
    }

    const metadata: Record<string, string> = {};
    for (const [key, metaValue] of Object.entries(section(entry, 'metadata'))) {
      metadata[key] = String(metaValue);
    }

    channels.push({
      id,
      displayName: readString(entry, 'displayName', id),
      active: readBoolean(entry, 'active', true),
      ...(Object.keys(metadata).length > 0 ? { metadata } : {})
    });
  }
  return channels;
}

/**
 * Merges a parsed YAML document over the defaults. Values of the wrong type
 * are ignored in favour of the default.
 */
export function mergeConfig(defaults: BotConfig, raw: unknown): BotConfig {
  if (!isRecord(raw)) {
    return defaults;
  }

  const daily = section(raw, 'dailyMessage');
  const poll = section(raw, 'poll');
  const sweep = section(raw, 'sweep');
  const delivery = section(raw, 'delivery');
  const telegram = section(raw, 'telegram');
  const storage = section(raw, 'storage');

  const source = readString(daily, 'source', defaults.dailyMessage.source);
  const rotationCategory = readString(daily, 'rotationCategory', defaults.dailyMessage.rotationCategory);
  const logFile = readString(raw, 'logFile', defaults.logFile ?? '');

  return {
    timezone: readString(raw, 'timezone', defaults.timezone),
    logLevel: parseLogLevel(readString(raw, 'logLevel', defaults.logLevel), defaults.logLevel),
    ...(logFile ? { logFile } : {}),
    dailyMessage: {
      enabled: readBoolean(daily, 'enabled', defaults.dailyMessage.enabled),
      hour: readNumber(daily, 'hour', defaults.dailyMessage.hour),
      minute: readNumber(daily, 'minute', defaults.dailyMessage.minute),
      source: source === 'rotation' ? 'rotation' : 'pool',
      rotationCategory: isContentCategory(rotationCategory) ? rotationCategory : defaults.dailyMessage.rotationCategory
    },
    poll: {
      enabled: readBoolean(poll, 'enabled', defaults.poll.enabled),
      hour: readNumber(poll, 'hour', defaults.poll.hour),
      minute: readNumber(poll, 'minute', defaults.poll.minute),
      question: readString(poll, 'question', defaults.poll.question),
      minSubscribers: readNumber(poll, 'minSubscribers', defaults.poll.minSubscribers),
      options: readStringArray(poll, 'options', defaults.poll.options)
    },
    sweep: {
      enabled: readBoolean(sweep, 'enabled', defaults.sweep.enabled),
      intervalMinutes: readNumber(sweep, 'intervalMinutes', defaults.sweep.intervalMinutes)
    },
    delivery: {
      pacingMs: readNumber(delivery, 'pacingMs', defaults.delivery.pacingMs),
      maxRetries: readNumber(delivery, 'maxRetries', defaults.delivery.maxRetries),
      retryDelayMs: readNumber(delivery, 'retryDelayMs', defaults.delivery.retryDelayMs)
    },
    telegram: {
      botToken: readString(telegram, 'botToken', defaults.telegram.botToken),
      apiBaseUrl: readString(telegram, 'apiBaseUrl', defaults.telegram.apiBaseUrl),
      timeoutMs: readNumber(telegram, 'timeoutMs', defaults.telegram.timeoutMs)
    },
    storage: {
      dataDir: readString(storage, 'dataDir', defaults.storage.dataDir),
      contentFile: readString(storage, 'contentFile', defaults.storage.contentFile),
      analyticsFile: readString(storage, 'analyticsFile', defaults.storage.analyticsFile)
    },
    channels: readChannels(raw, defaults.channels),
    dailyMessages: readStringArray(raw, 'dailyMessages', defaults.dailyMessages),
    welcomeMessage: readString(raw, 'welcomeMessage', defaults.welcomeMessage)
  };
}

export function validatePollOptions(options: string[]): string[] {
  const problems: string[] = [];
  if (options.length < MIN_POLL_OPTIONS || options.length > MAX_POLL_OPTIONS) {
    problems.push(`Polls need between ${MIN_POLL_OPTIONS} and ${MAX_POLL_OPTIONS} options (got ${options.length})`);
  }
  options.forEach((option, index) => {
    if (!option.trim()) {
      problems.push(`Poll option ${index + 1} is empty`);
    } else if (option.length > MAX_POLL_OPTION_LENGTH) {
      problems.push(`Poll option ${index + 1} is longer than ${MAX_POLL_OPTION_LENGTH} characters`);
    }
  });
  return problems;
}

export function validateTimeOfDay(hour: number, minute: number): string[] {
  const problems: string[] = [];
  if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
    problems.push(`Hour must be an integer between 0 and 23 (got ${hour})`);
  }
  if (!Number.isInteger(minute) || minute < 0 || minute > 59) {
    problems.push(`Minute must be an integer between 0 and 59 (got ${minute})`);
  }
  return problems;
}

export interface ConfigManagerOptions {
  logger?: BroadcastLogger;
  /** Ignore environment overrides (tests) */
  ignoreEnvironment?: boolean;
}

export class ConfigManager {
  private readonly configPath: string;
  private readonly logger: BroadcastLogger;
  private readonly ignoreEnvironment: boolean;
  /** Defaults merged with the file; what gets written back */
  private fileConfig: BotConfig;
  /** fileConfig plus environment overrides; what the service runs with */
  private config: BotConfig;

  constructor(configPath: string = path.join(process.cwd(), 'config', 'bot-config.yaml'), options: ConfigManagerOptions = {}) {
    this.configPath = path.resolve(configPath);
    this.logger = options.logger ?? createComponentLogger('config');
    this.ignoreEnvironment = options.ignoreEnvironment ?? false;
    this.fileConfig = createDefaultConfig();
    this.config = this.fileConfig;
    this.loadConfig();
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getConfig(): BotConfig {
    return structuredClone(this.config);
  }

  getDailyMessageConfig(): DailyMessageConfig {
    return { ...this.config.dailyMessage };
  }

  getPollConfig(): PollConfig {
    return { ...this.config.poll, options: [...this.config.poll.options] };
  }

  getSweepConfig(): SweepConfig {
    return { ...this.config.sweep };
  }

  getDeliveryConfig(): DeliveryConfig {
    return { ...this.config.delivery };
  }

  getTelegramConfig(): TelegramConfig {
    return { ...this.config.telegram };
  }

  getStorageConfig(): StorageConfig {
    return { ...this.config.storage };
  }

  getTimezone(): string {
    return this.config.timezone;
  }

  getLogLevel(): LogLevel {
    return this.config.logLevel;
  }

  /** Channels in configured order */
  getChannels(): ChannelConfig[] {
    return this.config.channels.map(channel => ({ ...channel }));
  }

  getActiveChannels(): ChannelConfig[] {
    return this.getChannels().filter(channel => channel.active);
  }

  getDailyMessages(): string[] {
    return [...this.config.dailyMessages];
  }

  getWelcomeMessage(): string {
    return this.config.welcomeMessage;
  }

  reload(): void {
    this.loadConfig();
  }

  updatePollOptions(options: string[]): void {
    const trimmed = options.map(option => option.trim());
    const problems = validatePollOptions(trimmed);
    if (problems.length > 0) {
      throw new ValidationError('Invalid poll options', problems, { operation: 'updatePollOptions' });
    }

    this.mutate(config => {
      config.poll.options = trimmed;
    });
    this.logger.info('Updated poll options', { options: trimmed }, 'updatePollOptions');
  }

  setSchedule(job: 'dailyBroadcast' | 'dailyPoll', hour: number, minute: number): void {
    const problems = validateTimeOfDay(hour, minute);
    if (problems.length > 0) {
      throw new ValidationError('Invalid schedule time', problems, { operation: 'setSchedule' });
    }

    this.mutate(config => {
      const slot = job === 'dailyBroadcast' ? config.dailyMessage : config.poll;
      slot.hour = hour;
      slot.minute = minute;
    });
  }

  addChannel(channel: ChannelConfig): void {
    if (!isValidChannelId(channel.id)) {
      throw new ValidationError(`Invalid channel id: ${channel.id}`, undefined, { operation: 'addChannel' });
    }

    this.mutate(config => {
      const existing = config.channels.findIndex(candidate => candidate.id === channel.id);
      if (existing >= 0) {
        config.channels[existing] = { ...channel };
      } else {
        config.channels.push({ ...channel });
      }
    });
    this.logger.info(`Added channel ${channel.id}`, undefined, 'addChannel');
  }

  removeChannel(id: string): boolean {
    const present = this.fileConfig.channels.some(channel => channel.id === id);
    if (present) {
      this.mutate(config => {
        config.channels = config.channels.filter(channel => channel.id !== id);
      });
      this.logger.info(`Removed channel ${id}`, undefined, 'removeChannel');
    }
    return present;
  }

  setChannelActive(id: string, active: boolean): boolean {
    const present = this.fileConfig.channels.some(channel => channel.id === id);
    if (present) {
      this.mutate(config => {
        for (const channel of config.channels) {
          if (channel.id === id) {
            channel.active = active;
          }
        }
      });
      this.logger.info(`Channel ${id} is now ${active ? 'active' : 'inactive'}`, undefined, 'setChannelActive');
    }
    return present;
  }

  /**
   * Problems that would make the service misbehave; empty when the
   * configuration is usable.
   */
  validate(): string[] {
    const errors: string[] = [];
    const { dailyMessage, poll, sweep, delivery, channels } = this.config;

    errors.push(...validateTimeOfDay(dailyMessage.hour, dailyMessage.minute).map(p => `dailyMessage: ${p}`));
    errors.push(...validateTimeOfDay(poll.hour, poll.minute).map(p => `poll: ${p}`));

    if (poll.enabled) {
      errors.push(...validatePollOptions(poll.options).map(p => `poll: ${p}`));
      if (!poll.question.trim()) {
        errors.push('poll: question is required');
      }
    }
    if (poll.minSubscribers < 0) {
      errors.push('poll: minSubscribers must not be negative');
    }
    if (dailyMessage.enabled && dailyMessage.source === 'pool' && this.config.dailyMessages.length === 0) {
      errors.push('dailyMessages: at least one message is required when daily messages are enabled');
    }
    if (sweep.enabled && (!Number.isInteger(sweep.intervalMinutes) || sweep.intervalMinutes < 1 || sweep.intervalMinutes > 59)) {
      errors.push('sweep: intervalMinutes must be an integer between 1 and 59');
    }
    if (delivery.pacingMs < 0 || delivery.maxRetries < 0 || delivery.retryDelayMs < 0) {
      errors.push('delivery: pacingMs, maxRetries and retryDelayMs must not be negative');
    }

    const seen = new Set<string>();
    for (const channel of channels) {
      if (!isValidChannelId(channel.id)) {
        errors.push(`channels: invalid channel id ${channel.id}`);
      }
      if (seen.has(channel.id)) {
        errors.push(`channels: duplicate channel id ${channel.id}`);
      }
      seen.add(channel.id);
    }

    if (!this.config.telegram.botToken) {
      errors.push('telegram: bot token is not set (TELEGRAM_BOT_TOKEN)');
    }

    return errors;
  }

  private loadConfig(): void {
    const defaults = createDefaultConfig();

    if (!fs.existsSync(this.configPath)) {
      this.fileConfig = defaults;
      this.logger.info(`Configuration file not found, creating ${this.configPath}`, undefined, 'load');
      this.saveConfig();
    } else {
      try {
        const raw = yaml.load(fs.readFileSync(this.configPath, 'utf-8'));
        this.fileConfig = mergeConfig(defaults, raw);
      } catch (error) {
        this.logger.error(`Failed to load ${this.configPath}, using defaults`, toError(error), undefined, 'load');
        this.fileConfig = defaults;
      }
    }

    this.config = this.applyEnvironmentOverrides(structuredClone(this.fileConfig));
  }

  private applyEnvironmentOverrides(config: BotConfig): BotConfig {
    if (this.ignoreEnvironment) {
      return config;
    }

    const token = env.get('TELEGRAM_BOT_TOKEN');
    if (token) {
      config.telegram.botToken = token;
    }

    const timezone = env.get('BOT_TIMEZONE');
    if (timezone) {
      config.timezone = timezone;
    }

    config.logLevel = parseLogLevel(env.get('LOG_LEVEL'), config.logLevel);

    const dataDir = env.get('DATA_DIR');
    if (dataDir) {
      config.storage.dataDir = dataDir;
    }

    const pacing = env.getNumber('BROADCAST_PACING_MS');
    if (pacing !== undefined && pacing >= 0) {
      config.delivery.pacingMs = pacing;
    }

    return config;
  }

  private mutate(change: (config: BotConfig) => void): void {
    const next = structuredClone(this.fileConfig);
    change(next);
    this.fileConfig = next;
    this.saveConfig();
    this.config = this.applyEnvironmentOverrides(structuredClone(this.fileConfig));
  }

  private saveConfig(): void {
    try {
      fs.mkdirSync(path.dirname(this.configPath), { recursive: true });
      fs.writeFileSync(this.configPath, yaml.dump(this.fileConfig, { lineWidth: 120 }), 'utf-8');
    } catch (error) {
      this.logger.error(`Failed to save ${this.configPath}`, toError(error), undefined, 'save');
    }
  }
}
