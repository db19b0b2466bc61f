import { describe, it, expect } from 'vitest';
import { parseTagBlob } from './tags';

describe('parseTagBlob', () => {
  it('accepts decoded objects of strings', () => {
    expect(parseTagBlob({ Env: 'prod', Owner: 'ops' })).toEqual({ Env: 'prod', Owner: 'ops' });
  });

  it('decodes JSON text', () => {
    expect(parseTagBlob('{"Env":"dev"}')).toEqual({ Env: 'dev' });
  });

  it('returns null for anything that is not a flat string map', () => {
    expect(parseTagBlob('{not json')).toBeNull();
    expect(parseTagBlob({ Env: 3 })).toBeNull();
    expect(parseTagBlob(['a'])).toBeNull();
    expect(parseTagBlob(null)).toBeNull();
  });
});
