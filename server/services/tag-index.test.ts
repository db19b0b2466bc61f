import { describe, it, expect, vi } from 'vitest';
import { buildTagIndex, suggestTags, TagService, POPULAR_TAG_LIMIT, SUGGESTION_LIMIT } from './tag-index';
import { createMemoryStores } from './stores/memory';
import { seedCatalog, steppingClock } from '../tests/fixtures/catalog';

describe('buildTagIndex', () => {
  it('collects values per key and ranks pairs by usage', () => {
    const index = buildTagIndex([
      { Env: 'prod', Team: 'web' },
      { Env: 'prod' },
      '{"Env":"dev"}',
      {},
    ]);

    expect([...(index.tagValuesByKey.get('Env') ?? [])].sort()).toEqual(['dev', 'prod']);
    expect(index.popularTags).toEqual([
      { key: 'Env', value: 'prod', count: 2 },
      { key: 'Env', value: 'dev', count: 1 },
      { key: 'Team', value: 'web', count: 1 },
    ]);
  });

  it('skips blobs that are not flat string maps', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const index = buildTagIndex(['not json', { a: 1 }, { Env: 'x' }]);

    expect(index.popularTags).toEqual([{ key: 'Env', value: 'x', count: 1 }]);
    expect(warn).toHaveBeenCalledWith('[TagIndex] Skipped 2 unparseable tag blob(s)');
  });

  it('keeps only the most used pairs', () => {
    const blobs = Array.from({ length: 25 }, (_, i) => ({ [`k${String(i).padStart(2, '0')}`]: 'v' }));
    const index = buildTagIndex(blobs);
    expect(index.popularTags).toHaveLength(POPULAR_TAG_LIMIT);
    expect(index.popularTags[0].key).toBe('k00');
  });
});

describe('suggestTags', () => {
  it('matches keys and values case-insensitively, once per pair', () => {
    const suggestions = suggestTags(
      [{ Env: 'prod' }, { Env: 'prod', Provisioner: 'terraform' }, { Team: 'web' }],
      'PRO'
    );
    expect(suggestions).toEqual([
      { key: 'Env', value: 'prod', display: 'Env:prod' },
      { key: 'Provisioner', value: 'terraform', display: 'Provisioner:terraform' },
    ]);
  });

  it('puts exact key or value matches first', () => {
    const suggestions = suggestTags([{ Alpha: 'prod-eu' }, { Env: 'prod' }], 'prod');
    expect(suggestions.map((s) => s.display)).toEqual(['Env:prod', 'Alpha:prod-eu']);
  });

  it('keeps surrounding whitespace in the query', () => {
    const blobs = [{ Env: 'prod' }, { Owner: 'team prod' }];
    expect(suggestTags(blobs, ' prod').map((s) => s.display)).toEqual(['Owner:team prod']);
  });

  it('limits the number of suggestions', () => {
    const blobs = Array.from({ length: 15 }, (_, i) => ({ [`key${i}`]: 'x' }));
    expect(suggestTags(blobs, 'key')).toHaveLength(SUGGESTION_LIMIT);
  });
});

describe('TagService', () => {
  it('indexes the tags stored on resources', async () => {
    const stores = createMemoryStores({ now: steppingClock() });
    await seedCatalog(stores);
    const service = new TagService(stores.resources);

    const index = await service.index();
    expect(index.popularTags[0]).toEqual({ key: 'Env', value: 'prod', count: 3 });
    expect(index.tagValuesByKey.get('Provisioner')).toEqual(new Set(['terraform']));

    expect((await service.suggest('terra')).map((s) => s.display)).toEqual(['Provisioner:terraform']);
  });

  it('scans no more blobs than its limit', async () => {
    const stores = createMemoryStores({ now: steppingClock() });
    await seedCatalog(stores);
    const index = await new TagService(stores.resources, 1).index();
    expect(index.popularTags).toEqual([
      { key: 'Env', value: 'prod', count: 1 },
      { key: 'Team', value: 'web', count: 1 },
    ]);
  });
});
