import { DocumentPersistence, DocumentStore } from '../store';
import { BroadcastLogger } from '../utils/logger';
import { AnalyticsDocument, StatEvent } from './types';

export type AnalyticsStore = DocumentStore<AnalyticsDocument>;

export function createEmptyAnalyticsDocument(now: Date): AnalyticsDocument {
  return {
    events: [],
    lastUpdated: now.toISOString()
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStatEvent(value: unknown): value is StatEvent {
  if (!isRecord(value) || typeof value.destinationId !== 'string' || typeof value.timestamp !== 'string') {
    return false;
  }

  const payload = value.payload;
  if (!isRecord(payload)) {
    return false;
  }

  if (value.kind === 'subscriberSnapshot') {
    return typeof payload.subscriberCount === 'number';
  }
  if (value.kind === 'messageOutcome') {
    return typeof payload.messageKind === 'string'
      && typeof payload.views === 'number'
      && typeof payload.reactions === 'number';
  }
  return false;
}

export function normalizeAnalyticsDocument(raw: unknown, now: Date): AnalyticsDocument | null {
  if (!isRecord(raw)) {
    return null;
  }

  const { events = [], lastUpdated } = raw;
  if (!Array.isArray(events)) {
    return null;
  }

  return {
    events: events.filter(isStatEvent),
    lastUpdated: typeof lastUpdated === 'string' ? lastUpdated : now.toISOString()
  };
}

export function createAnalyticsStore(
  persistence: DocumentPersistence,
  logger?: BroadcastLogger,
  clock?: () => Date
): AnalyticsStore {
  return new DocumentStore<AnalyticsDocument>({
    name: 'analytics',
    persistence,
    createDefault: createEmptyAnalyticsDocument,
    normalize: normalizeAnalyticsDocument,
    logger,
    clock
  });
}
