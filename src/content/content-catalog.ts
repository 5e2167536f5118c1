/**
 * Content Catalog
 *
 * Template CRUD, placeholder rendering and per-channel content preferences.
 */

import { NotFoundError, ValidationError } from '../system/error-handling';
import { BroadcastLogger, createComponentLogger } from '../utils/logger';
import { ContentStore } from './content-store';
import {
  CONTENT_CATEGORIES,
  ChannelPreferences,
  ContentCategory,
  ContentItem,
  ContentItemUpdate,
  NewContentItem,
  isContentCategory
} from './types';

const PLACEHOLDER_PATTERN = /\{([a-zA-Z_][a-zA-Z0-9_]*)\}/g;

export const DEFAULT_CHANNEL_PREFERENCES: ChannelPreferences = {
  preferredCategories: ['motivation', 'community'],
  postFrequency: 'daily',
  bestTimes: ['09:00', '18:00'],
  language: 'en',
  tone: 'friendly'
};

export function extractPlaceholders(body: string): string[] {
  const names = new Set<string>();
  for (const match of body.matchAll(PLACEHOLDER_PATTERN)) {
    names.add(match[1]);
  }
  return Array.from(names);
}

/**
 * Replaces `{name}` placeholders; unknown placeholders are left as written.
 */
export function renderTemplate(body: string, variables: Record<string, string>): string {
  return body.replace(PLACEHOLDER_PATTERN, (whole, name: string) =>
    Object.prototype.hasOwnProperty.call(variables, name) ? variables[name] : whole
  );
}

export function categoryLabel(category: ContentCategory): string {
  return CONTENT_CATEGORIES[category];
}

export type ChannelPreferencesInput = Partial<Omit<ChannelPreferences, 'preferredCategories' | 'updatedAt'>> & {
  preferredCategories?: string[];
};

export interface ContentCatalogOptions {
  clock?: () => Date;
  logger?: BroadcastLogger;
  idGenerator?: (prefix: string) => string;
}

export function generateId(prefix: string): string {
  return `${prefix}_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`;
}

export class ContentCatalog {
  private readonly store: ContentStore;
  private readonly clock: () => Date;
  private readonly logger: BroadcastLogger;
  private readonly idGenerator: (prefix: string) => string;

  constructor(store: ContentStore, options: ContentCatalogOptions = {}) {
    this.store = store;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createComponentLogger('catalog');
    this.idGenerator = options.idGenerator ?? generateId;
  }

  async createTemplate(input: NewContentItem): Promise<ContentItem> {
    const category = this.validateTemplateInput(input.name, input.category, input.body);

    const item: ContentItem = {
      id: this.idGenerator('tpl'),
      name: input.name.trim(),
      category,
      body: input.body,
      variablePlaceholders: input.variablePlaceholders ?? extractPlaceholders(input.body),
      usageCount: 0,
      createdAt: this.clock().toISOString()
    };

    await this.store.transact(document => {
      document.templates.push(item);
    });

    this.logger.info(`Created template ${item.name}`, { id: item.id, category }, 'createTemplate');
    return item;
  }

  async updateTemplate(id: string, update: ContentItemUpdate): Promise<ContentItem> {
    const updated = await this.store.transact(document => {
      const existing = document.templates.find(template => template.id === id);
      if (!existing) {
        throw new NotFoundError(`Template ${id} not found`, { operation: 'updateTemplate' });
      }

      const name = update.name ?? existing.name;
      const body = update.body ?? existing.body;
      const category = this.validateTemplateInput(name, update.category ?? existing.category, body);

      existing.name = name.trim();
      existing.category = category;
      existing.body = body;
      existing.variablePlaceholders = update.variablePlaceholders
        ?? (update.body !== undefined ? extractPlaceholders(body) : existing.variablePlaceholders);
      existing.updatedAt = this.clock().toISOString();

      return { ...existing };
    });

    this.logger.info(`Updated template ${updated.name}`, { id }, 'updateTemplate');
    return updated;
  }

  async getTemplates(category?: string): Promise<ContentItem[]> {
    const document = await this.store.read();
    return category
      ? document.templates.filter(template => template.category === category)
      : document.templates;
  }

  async getTemplate(id: string): Promise<ContentItem> {
    const document = await this.store.read();
    const template = document.templates.find(candidate => candidate.id === id);
    if (!template) {
      throw new NotFoundError(`Template ${id} not found`, { operation: 'getTemplate' });
    }
    return template;
  }

  /**
   * Renders a template and counts the use.
   */
  async useTemplate(id: string, variables: Record<string, string>): Promise<string> {
    return this.store.transact(document => {
      const template = document.templates.find(candidate => candidate.id === id);
      if (!template) {
        throw new NotFoundError(`Template ${id} not found`, { operation: 'useTemplate' });
      }

      template.usageCount += 1;
      return renderTemplate(template.body, variables);
    });
  }

  async setChannelPreferences(
    destinationId: string,
    preferences: ChannelPreferencesInput
  ): Promise<ChannelPreferences> {
    const { preferredCategories, ...rest } = preferences;
    let categories: ContentCategory[] | undefined;

    if (preferredCategories) {
      const unknown = preferredCategories.filter(category => !isContentCategory(category));
      if (unknown.length > 0) {
        throw new ValidationError(`Unknown categories: ${unknown.join(', ')}`);
      }
      categories = preferredCategories.filter(isContentCategory);
    }

    return this.store.transact(document => {
      const current = document.channelPreferences[destinationId] ?? DEFAULT_CHANNEL_PREFERENCES;
      const merged: ChannelPreferences = {
        ...current,
        ...rest,
        preferredCategories: categories ?? current.preferredCategories,
        updatedAt: this.clock().toISOString()
      };
      document.channelPreferences[destinationId] = merged;
      return merged;
    });
  }

  async getChannelPreferences(destinationId: string): Promise<ChannelPreferences> {
    const document = await this.store.read();
    return document.channelPreferences[destinationId] ?? { ...DEFAULT_CHANNEL_PREFERENCES };
  }

  private validateTemplateInput(name: string, category: string, body: string): ContentCategory {
    const problems: string[] = [];

    if (!name.trim()) {
      problems.push('Template name is required');
    }
    if (!body.trim()) {
      problems.push('Template body is required');
    }
    if (!isContentCategory(category)) {
      problems.push(`Unknown category: ${category}`);
    }

    if (problems.length > 0 || !isContentCategory(category)) {
      throw new ValidationError('Invalid template', problems);
    }

    return category;
  }
}
