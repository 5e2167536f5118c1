import { ContentCatalog } from '../../src/content/content-catalog';
import { ContentStore, createContentStore } from '../../src/content/content-store';
import { RotationSelector, pickWeighted, rotationKey, selectionWeight } from '../../src/content/rotation-selector';
import { ContentItem } from '../../src/content/types';
import { NotFoundError } from '../../src/system/error-handling';
import { MemoryPersistence, createTestClock, silentLogger } from '../helpers/fakes';

function item(id: string, usageCount = 0): ContentItem {
  return {
    id,
    name: id,
    category: 'motivation',
    body: `body of ${id}`,
    variablePlaceholders: [],
    usageCount,
    createdAt: '2026-01-01T00:00:00.000Z'
  };
}

describe('weighted sampling', () => {
  it('should weigh items by 1 / (usageCount + 1)', () => {
    expect(selectionWeight(0)).toBe(1);
    expect(selectionWeight(1)).toBe(0.5);
    expect(selectionWeight(3)).toBe(0.25);
  });

  it('should walk the cumulative weights', () => {
    const items = [item('low', 0), item('high', 3)];
    const weightOf = (candidate: ContentItem) => selectionWeight(candidate.usageCount);

    // total weight 1.25: [0, 1) picks "low", [1, 1.25) picks "high"
    expect(pickWeighted(items, weightOf, () => 0.7).id).toBe('low');
    expect(pickWeighted(items, weightOf, () => 0.85).id).toBe('high');
  });

  it('should favour the less used item over many draws', () => {
    const items = [item('low', 0), item('high', 3)];
    let picksOfLow = 0;

    for (let k = 0; k < 1000; k++) {
      const chosen = pickWeighted(items, candidate => selectionWeight(candidate.usageCount), () => k / 1000);
      if (chosen.id === 'low') picksOfLow++;
    }

    expect(picksOfLow).toBeGreaterThanOrEqual(795);
    expect(picksOfLow).toBeLessThanOrEqual(805);
  });

  it('should refuse an empty set', () => {
    expect(() => pickWeighted([], () => 1, () => 0)).toThrow(NotFoundError);
  });
});

describe('RotationSelector', () => {
  let store: ContentStore;
  let catalog: ContentCatalog;
  let selector: RotationSelector;
  let random: () => number;

  beforeEach(() => {
    let nextId = 0;
    const { clock } = createTestClock('2026-02-01T09:00:00.000Z');
    store = createContentStore(new MemoryPersistence(), silentLogger(), clock);
    catalog = new ContentCatalog(store, { clock, logger: silentLogger(), idGenerator: prefix => `${prefix}_${++nextId}` });
    random = () => 0;
    selector = new RotationSelector(store, { clock, logger: silentLogger(), random: () => random() });
  });

  async function seedTemplates(count: number): Promise<ContentItem[]> {
    const created: ContentItem[] = [];
    for (let i = 1; i <= count; i++) {
      created.push(await catalog.createTemplate({ name: `Tip ${i}`, category: 'tips', body: `Tip number ${i}` }));
    }
    return created;
  }

  it('should return every candidate exactly once per epoch', async () => {
    const candidates = await seedTemplates(4);
    const scope = { destinationId: '-100', category: 'tips' };
    const draws = [0.9, 0.1, 0.5, 0.3];
    let drawIndex = 0;
    random = () => draws[drawIndex++];

    const picked: string[] = [];
    for (let i = 0; i < candidates.length; i++) {
      picked.push((await selector.selectNext(scope, candidates)).id);
    }

    expect([...picked].sort()).toEqual(['tpl_1', 'tpl_2', 'tpl_3', 'tpl_4']);
  });

  it('should start a new epoch once every candidate has been used', async () => {
    const candidates = await seedTemplates(3);
    const scope = { destinationId: '-100', category: 'tips' };

    const first = await Promise.all([0, 1, 2].map(() => selector.selectNext(scope, candidates)));
    expect(first.map(chosen => chosen.id)).toEqual(['tpl_1', 'tpl_2', 'tpl_3']);
    expect((await selector.getState(scope))?.usedItemIds).toEqual(['tpl_1', 'tpl_2', 'tpl_3']);

    const next = await selector.selectNext(scope, candidates);

    expect(next.id).toBe('tpl_1');
    expect((await selector.getState(scope))?.usedItemIds).toEqual(['tpl_1']);
  });

  it('should count every use in the catalog', async () => {
    const candidates = await seedTemplates(2);
    const scope = { destinationId: '-100', category: 'tips' };

    const chosen = await selector.selectNext(scope, candidates);

    expect(chosen.usageCount).toBe(1);
    expect((await catalog.getTemplate(chosen.id)).usageCount).toBe(1);
  });

  it('should prefer the catalog usage count over the caller copy', async () => {
    const [first, second] = await seedTemplates(2);
    await catalog.useTemplate(first.id, {});
    await catalog.useTemplate(first.id, {});
    await catalog.useTemplate(first.id, {});
    const scope = { destinationId: '-100', category: 'tips' };

    // Stale copies both claim zero uses: weights would be 1 and 1, but the
    // stored counts (3 and 0) give 0.25 and 1.
    random = () => 0.5;
    const chosen = await selector.selectNext(scope, [first, second]);

    expect(chosen.id).toBe(second.id);
  });

  it('should keep scopes independent', async () => {
    const candidates = await seedTemplates(2);

    await selector.selectNext({ destinationId: '-100', category: 'tips' }, candidates);
    const other = await selector.selectNext({ destinationId: '-200', category: 'tips' }, candidates);

    expect(other.id).toBe('tpl_1');
    expect(rotationKey({ destinationId: '-200', category: 'tips' })).toBe('-200:tips');
  });

  it('should forget used ids that are no longer candidates', async () => {
    const candidates = await seedTemplates(3);
    const scope = { destinationId: '-100', category: 'tips' };

    await selector.selectNext(scope, [candidates[0], candidates[1]]);
    const chosen = await selector.selectNext(scope, [candidates[1], candidates[2]]);

    expect(chosen.id).toBe('tpl_2');
    expect((await selector.getState(scope))?.usedItemIds).toEqual(['tpl_2']);
  });

  it('should accept candidates that are not in the catalog', async () => {
    const scope = { destinationId: '-100', category: 'adhoc' };

    const chosen = await selector.selectNext(scope, [item('external', 4)]);

    expect(chosen.id).toBe('external');
    expect(chosen.usageCount).toBe(5);
  });

  it('should not lose updates under concurrent selections', async () => {
    const candidates = await seedTemplates(3);

    await Promise.all(Array.from({ length: 12 }, (_, i) =>
      selector.selectNext({ destinationId: i % 2 === 0 ? '-100' : '-200', category: 'tips' }, candidates)
    ));

    const templates = await catalog.getTemplates('tips');
    expect(templates.reduce((sum, template) => sum + template.usageCount, 0)).toBe(12);
    expect(templates.map(template => template.usageCount)).toEqual([4, 4, 4]);
  });

  it('should reject an empty candidate list without touching state', async () => {
    const scope = { destinationId: '-100', category: 'tips' };

    await expect(selector.selectNext(scope, [])).rejects.toThrow(NotFoundError);
    expect(await selector.getState(scope)).toBeUndefined();
  });

  it('should rotate through catalog templates of a category', async () => {
    await seedTemplates(2);
    await catalog.createTemplate({ name: 'News', category: 'news', body: 'Headline' });

    const first = await selector.getRotatedContent('-100', 'tips');
    const second = await selector.getRotatedContent('-100', 'tips');

    expect([first.body, second.body].sort()).toEqual(['Tip number 1', 'Tip number 2']);
  });

  it('should fail when a category has no templates', async () => {
    await expect(selector.getRotatedContent('-100', 'news')).rejects.toThrow(NotFoundError);
  });
});
