/**
 * Content domain types
 */

import { StoredDocument } from '../store';

export const CONTENT_CATEGORIES = {
  motivation: '💪 Motivation',
  news: '📰 News',
  tips: '💡 Tips',
  entertainment: '🎮 Entertainment',
  community: '👥 Community',
  announcement: '📢 Announcements',
  general: '📝 General'
} as const;

export type ContentCategory = keyof typeof CONTENT_CATEGORIES;

export function isContentCategory(value: string): value is ContentCategory {
  return Object.prototype.hasOwnProperty.call(CONTENT_CATEGORIES, value);
}

export interface ContentItem {
  id: string;
  name: string;
  category: ContentCategory;
  /** Text with `{placeholder}` variables */
  body: string;
  variablePlaceholders: string[];
  usageCount: number;
  createdAt: string;
  updatedAt?: string;
}

export interface NewContentItem {
  name: string;
  category: string;
  body: string;
  variablePlaceholders?: string[];
}

export type ContentItemUpdate = Partial<Pick<NewContentItem, 'name' | 'category' | 'body' | 'variablePlaceholders'>>;

/** Rotation tracking for one destination × category pair */
export interface RotationScope {
  destinationId: string;
  category: string;
}

export interface RotationState {
  usedItemIds: string[];
  epochStartedAt: string;
}

export type ScheduledMessageStatus = 'pending' | 'sent' | 'cancelled';

export interface ScheduledMessage {
  id: string;
  destinationId: string;
  body: string;
  dueAt: string;
  category: string;
  status: ScheduledMessageStatus;
  createdAt: string;
  sentAt?: string;
  cancelledAt?: string;
}

export interface ChannelPreferences {
  preferredCategories: ContentCategory[];
  postFrequency: 'daily' | 'weekly';
  bestTimes: string[];
  language: string;
  tone: string;
  updatedAt?: string;
}

export interface ContentDocument extends StoredDocument {
  templates: ContentItem[];
  rotation: Record<string, RotationState>;
  scheduledMessages: ScheduledMessage[];
  channelPreferences: Record<string, ChannelPreferences>;
}
