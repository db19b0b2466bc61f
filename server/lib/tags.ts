// =============================================================================
// Tag Blob Parsing
// =============================================================================

import { z } from 'zod';
import { TagMap } from '../types/catalog';

const tagMapSchema = z.record(z.string(), z.string());

/**
 * Parse a persisted tag blob into a flat string map. Accepts the decoded jsonb
 * value or its JSON text; anything that is not an object of string values
 * yields null.
 */
export function parseTagBlob(blob: unknown): TagMap | null {
  let value = blob;
  if (typeof value === 'string') {
    try {
      value = JSON.parse(value);
    } catch {
      return null;
    }
  }
  const result = tagMapSchema.safeParse(value);
  return result.success ? result.data : null;
}
