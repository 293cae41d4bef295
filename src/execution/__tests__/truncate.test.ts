import { describe, it, expect } from 'vitest';
import { byteLength, itemsMarker, serializePayload, sliceToBytes, truncatePayload, TEXT_MARKER } from '../truncate';

describe('truncatePayload', () => {
  it('keeps payloads within budget untouched', () => {
    expect(truncatePayload({ a: 1 }, 100)).toEqual({ payload: '{"a":1}', truncated: false, bytes: 7 });
  });

  it('keeps the leading array items that fit with the marker', () => {
    const rows = Array.from({ length: 50 }, (_, i) => ({ rank: i + 1, name: `Artist ${i + 1}` }));
    const result = truncatePayload(rows, 200);

    expect(result.truncated).toBe(true);
    expect(result.bytes).toBeLessThanOrEqual(200);
    const match = /…\[truncated: kept (\d+) of 50 items\]$/.exec(result.payload);
    expect(match).not.toBeNull();
    const kept = Number(match?.[1]);
    expect(kept).toBeGreaterThan(0);
    const body = result.payload.slice(0, result.payload.length - itemsMarker(kept, 50).length);
    expect(JSON.parse(body)).toEqual(rows.slice(0, kept));
    // one more item would not have fit
    expect(byteLength(serializePayload(rows.slice(0, kept + 1)) + itemsMarker(kept + 1, 50))).toBeGreaterThan(200);
  });

  it('cuts text on a character boundary and counts the marker', () => {
    const text = 'é'.repeat(100);
    const even = truncatePayload(text, 50);
    expect(even).toEqual({ payload: 'é'.repeat(18) + TEXT_MARKER, truncated: true, bytes: 50 });

    const odd = truncatePayload(text, 51);
    expect(odd.payload).toBe('é'.repeat(18) + TEXT_MARKER);
    expect(odd.bytes).toBe(50);
  });

  it('falls back to a text cut when not even one array item fits', () => {
    const rows = ['x'.repeat(500)];
    const result = truncatePayload(rows, 128);
    expect(result.truncated).toBe(true);
    expect(result.payload.endsWith(TEXT_MARKER)).toBe(true);
    expect(result.bytes).toBeLessThanOrEqual(128);
  });

  it('is deterministic for equal input', () => {
    const rows = Array.from({ length: 30 }, (_, i) => ({ bucket: String(i), minutesPlayed: i }));
    expect(truncatePayload(rows, 150)).toEqual(truncatePayload(rows, 150));
  });
});

describe('sliceToBytes', () => {
  it('never splits a multi-byte character', () => {
    expect(sliceToBytes('a€b', 2)).toBe('a');
    expect(sliceToBytes('a€b', 4)).toBe('a€');
    expect(sliceToBytes('abc', 0)).toBe('');
  });
});
