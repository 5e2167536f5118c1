import { DocumentPersistence, DocumentStore } from '../store';
import { BroadcastLogger } from '../utils/logger';
import {
  ChannelPreferences,
  ContentDocument,
  ContentItem,
  RotationState,
  ScheduledMessage,
  isContentCategory
} from './types';

export type ContentStore = DocumentStore<ContentDocument>;

export function createEmptyContentDocument(now: Date): ContentDocument {
  return {
    templates: [],
    rotation: {},
    scheduledMessages: [],
    channelPreferences: {},
    lastUpdated: now.toISOString()
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isContentItem(value: unknown): value is ContentItem {
  return isRecord(value)
    && typeof value.id === 'string'
    && typeof value.name === 'string'
    && typeof value.category === 'string'
    && isContentCategory(value.category)
    && typeof value.body === 'string'
    && isStringArray(value.variablePlaceholders)
    && typeof value.usageCount === 'number'
    && typeof value.createdAt === 'string';
}

function isScheduledMessage(value: unknown): value is ScheduledMessage {
  return isRecord(value)
    && typeof value.id === 'string'
    && typeof value.destinationId === 'string'
    && typeof value.body === 'string'
    && typeof value.dueAt === 'string'
    && typeof value.category === 'string'
    && (value.status === 'pending' || value.status === 'sent' || value.status === 'cancelled')
    && typeof value.createdAt === 'string';
}

function isRotationState(value: unknown): value is RotationState {
  return isRecord(value) && isStringArray(value.usedItemIds) && typeof value.epochStartedAt === 'string';
}

function isChannelPreferences(value: unknown): value is ChannelPreferences {
  return isRecord(value)
    && Array.isArray(value.preferredCategories)
    && value.preferredCategories.every(category => typeof category === 'string' && isContentCategory(category))
    && (value.postFrequency === 'daily' || value.postFrequency === 'weekly')
    && isStringArray(value.bestTimes)
    && typeof value.language === 'string'
    && typeof value.tone === 'string';
}

function pickEntries<V>(value: Record<string, unknown>, guard: (entry: unknown) => entry is V): Record<string, V> {
  const result: Record<string, V> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (guard(entry)) {
      result[key] = entry;
    }
  }
  return result;
}

/**
 * Accepts documents that lack some sections; entries that do not match the
 * expected record shape are dropped. Returns null when a section has the
 * wrong container type altogether.
 */
export function normalizeContentDocument(raw: unknown, now: Date): ContentDocument | null {
  if (!isRecord(raw)) {
    return null;
  }

  const { templates = [], rotation = {}, scheduledMessages = [], channelPreferences = {}, lastUpdated } = raw;

  if (!Array.isArray(templates) || !Array.isArray(scheduledMessages)) return null;
  if (!isRecord(rotation) || !isRecord(channelPreferences)) return null;

  return {
    templates: templates.filter(isContentItem),
    rotation: pickEntries(rotation, isRotationState),
    scheduledMessages: scheduledMessages.filter(isScheduledMessage),
    channelPreferences: pickEntries(channelPreferences, isChannelPreferences),
    lastUpdated: typeof lastUpdated === 'string' ? lastUpdated : now.toISOString()
  };
}

export function createContentStore(
  persistence: DocumentPersistence,
  logger?: BroadcastLogger,
  clock?: () => Date
): ContentStore {
  return new DocumentStore<ContentDocument>({
    name: 'content',
    persistence,
    createDefault: createEmptyContentDocument,
    normalize: normalizeContentDocument,
    logger,
    clock
  });
}
