// =============================================================================
// Tag Index
// Built from the raw tag blobs on every call; nothing is cached between
// requests, which is fine while the catalog stays in the tens of thousands.
// =============================================================================

import { TagMap } from '../types/catalog';
import { TagIndex, TagSuggestion, TagUsage } from '../types/dashboard';
import { ResourceStore } from '../types/stores';
import { parseTagBlob } from '../lib/tags';
import { MAX_SCAN_LIMIT } from '../lib/config';

export const POPULAR_TAG_LIMIT = 20;
export const SUGGESTION_LIMIT = 10;

function pairKey(key: string, value: string): string {
  return `${key}:${value}`;
}

/** Parse each blob, skipping (and logging) the ones that are not flat string maps. */
function parseAll(blobs: unknown[]): TagMap[] {
  const maps: TagMap[] = [];
  let skipped = 0;
  for (const blob of blobs) {
    const tags = parseTagBlob(blob);
    if (tags) {
      maps.push(tags);
    } else {
      skipped++;
    }
  }
  if (skipped > 0) {
    console.warn(`[TagIndex] Skipped ${skipped} unparseable tag blob(s)`);
  }
  return maps;
}

export function buildTagIndex(blobs: unknown[]): TagIndex {
  const tagValuesByKey = new Map<string, Set<string>>();
  const usage = new Map<string, TagUsage>();

  for (const tags of parseAll(blobs)) {
    for (const [key, value] of Object.entries(tags)) {
      let values = tagValuesByKey.get(key);
      if (!values) {
        values = new Set<string>();
        tagValuesByKey.set(key, values);
      }
      values.add(value);

      const id = pairKey(key, value);
      const entry = usage.get(id);
      if (entry) {
        entry.count++;
      } else {
        usage.set(id, { key, value, count: 1 });
      }
    }
  }

  const popularTags = [...usage.values()]
    .sort((a, b) => {
      if (b.count !== a.count) return b.count - a.count;
      const left = pairKey(a.key, a.value);
      const right = pairKey(b.key, b.value);
      return left < right ? -1 : left > right ? 1 : 0;
    })
    .slice(0, POPULAR_TAG_LIMIT);

  return { tagValuesByKey, popularTags };
}

export function suggestTags(blobs: unknown[], query: string): TagSuggestion[] {
  // Whitespace in the query is significant
  const needle = query.toLowerCase();
  const seen = new Set<string>();
  const candidates: Array<TagSuggestion & { exact: boolean }> = [];

  for (const tags of parseAll(blobs)) {
    for (const [key, value] of Object.entries(tags)) {
      const display = pairKey(key, value);
      if (seen.has(display)) continue;

      const lowerKey = key.toLowerCase();
      const lowerValue = value.toLowerCase();
      if (!lowerKey.includes(needle) && !lowerValue.includes(needle)) continue;

      seen.add(display);
      candidates.push({ key, value, display, exact: lowerKey === needle || lowerValue === needle });
    }
  }

  return candidates
    .sort((a, b) => {
      if (a.exact !== b.exact) return a.exact ? -1 : 1;
      return a.display < b.display ? -1 : a.display > b.display ? 1 : 0;
    })
    .slice(0, SUGGESTION_LIMIT)
    .map(({ key, value, display }) => ({ key, value, display }));
}

export class TagService {
  constructor(
    private readonly resources: ResourceStore,
    private readonly scanLimit: number = MAX_SCAN_LIMIT
  ) {}

  async index(): Promise<TagIndex> {
    return buildTagIndex(await this.resources.listTagBlobs(this.scanLimit));
  }

  async suggest(query: string): Promise<TagSuggestion[]> {
    return suggestTags(await this.resources.listTagBlobs(this.scanLimit), query);
  }
}
