/**
 * Rotation Selector
 *
 * Picks the next content item for a destination × category scope. Within an
 * epoch no item repeats; once every candidate has been used the epoch resets.
 * Inside an epoch, items with a lower usage count are favoured: each remaining
 * candidate is drawn with probability proportional to 1 / (usageCount + 1).
 */

import { NotFoundError } from '../system/error-handling';
import { BroadcastLogger, createComponentLogger } from '../utils/logger';
import { ContentStore } from './content-store';
import { ContentDocument, ContentItem, RotationScope, RotationState } from './types';

export type RandomSource = () => number;

export function rotationKey(scope: RotationScope): string {
  return `${scope.destinationId}:${scope.category}`;
}

export function selectionWeight(usageCount: number): number {
  return 1 / (Math.max(0, usageCount) + 1);
}

/**
 * Cumulative-weight sampling. `random` must return a value in [0, 1).
 */
export function pickWeighted<T>(items: readonly T[], weightOf: (item: T) => number, random: RandomSource): T {
  if (items.length === 0) {
    throw new NotFoundError('Cannot pick from an empty set');
  }

  const weights = items.map(weightOf);
  const total = weights.reduce((sum, weight) => sum + weight, 0);
  const target = random() * total;

  let cumulative = 0;
  for (let i = 0; i < items.length; i++) {
    cumulative += weights[i];
    if (target < cumulative) {
      return items[i];
    }
  }

  // Floating point rounding can leave target == total.
  return items[items.length - 1];
}

export interface RotationSelectorOptions {
  random?: RandomSource;
  clock?: () => Date;
  logger?: BroadcastLogger;
}

export interface RotationSelection {
  item: ContentItem;
  epochReset: boolean;
  state: RotationState;
}

export class RotationSelector {
  private readonly store: ContentStore;
  private readonly random: RandomSource;
  private readonly clock: () => Date;
  private readonly logger: BroadcastLogger;

  constructor(store: ContentStore, options: RotationSelectorOptions = {}) {
    this.store = store;
    this.random = options.random ?? Math.random;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createComponentLogger('rotation');
  }

  /**
   * Selects the next item among `candidates` for `scope` and records the use.
   */
  async selectNext(scope: RotationScope, candidates: readonly ContentItem[]): Promise<ContentItem> {
    if (candidates.length === 0) {
      throw new NotFoundError(`No content available for ${scope.category}`, {
        operation: 'selectNext',
        destinationId: scope.destinationId
      });
    }

    const selection = await this.store.transact(document => this.selectWithin(document, scope, candidates));
    return selection.item;
  }

  /**
   * Uses every catalog template of `category` as candidates.
   */
  async getRotatedContent(destinationId: string, category: string): Promise<ContentItem> {
    const scope: RotationScope = { destinationId, category };

    const selection = await this.store.transact(document => {
      const candidates = document.templates.filter(template => template.category === category);
      if (candidates.length === 0) {
        throw new NotFoundError(`No templates in category ${category}`, {
          operation: 'getRotatedContent',
          destinationId
        });
      }
      return this.selectWithin(document, scope, candidates);
    });

    return selection.item;
  }

  async getState(scope: RotationScope): Promise<RotationState | undefined> {
    const document = await this.store.read();
    return document.rotation[rotationKey(scope)];
  }

  private selectWithin(
    document: ContentDocument,
    scope: RotationScope,
    candidates: readonly ContentItem[]
  ): RotationSelection {
    const key = rotationKey(scope);
    const now = this.clock().toISOString();

    // Deduplicate by id; the catalog's usage count wins over a stale caller copy.
    const byId = new Map<string, ContentItem>();
    for (const candidate of candidates) {
      if (!byId.has(candidate.id)) {
        const stored = document.templates.find(template => template.id === candidate.id);
        byId.set(candidate.id, stored ? { ...candidate, usageCount: stored.usageCount } : { ...candidate });
      }
    }
    const pool = Array.from(byId.values());

    const state: RotationState = document.rotation[key] ?? { usedItemIds: [], epochStartedAt: now };
    state.usedItemIds = state.usedItemIds.filter(id => byId.has(id));

    let available = pool.filter(item => !state.usedItemIds.includes(item.id));
    let epochReset = false;

    if (available.length === 0) {
      state.usedItemIds = [];
      state.epochStartedAt = now;
      available = pool;
      epochReset = true;
      this.logger.debug(`Rotation epoch reset for ${key}`, { candidates: pool.length }, 'selectNext');
    }

    const chosen = pickWeighted(available, item => selectionWeight(item.usageCount), this.random);

    state.usedItemIds.push(chosen.id);
    document.rotation[key] = state;

    const stored = document.templates.find(template => template.id === chosen.id);
    if (stored) {
      stored.usageCount += 1;
    }

    return {
      item: { ...chosen, usageCount: chosen.usageCount + 1 },
      epochReset,
      state: { usedItemIds: [...state.usedItemIds], epochStartedAt: state.epochStartedAt }
    };
  }
}
