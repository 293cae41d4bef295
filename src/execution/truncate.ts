export type TruncatedPayload = { payload: string; truncated: boolean; bytes: number };

export function byteLength(text: string): number {
  return Buffer.byteLength(text, "utf8");
}

export function serializePayload(data: unknown): string {
  if (typeof data === "string") return data;
  try {
    const json = JSON.stringify(data);
    return json === undefined ? String(data) : json;
  } catch {
    return String(data);
  }
}

/** Longest prefix of `text` whose UTF-8 encoding fits `maxBytes`, cut on a character boundary. */
export function sliceToBytes(text: string, maxBytes: number): string {
  if (maxBytes <= 0) return "";
  const buf = Buffer.from(text, "utf8");
  if (buf.length <= maxBytes) return text;
  let end = maxBytes;
  // back off continuation bytes (10xxxxxx) so a multi-byte character is never split
  while (end > 0 && (buf[end] & 0xc0) === 0x80) end--;
  return buf.subarray(0, end).toString("utf8");
}

export function itemsMarker(kept: number, total: number): string {
  return `…[truncated: kept ${kept} of ${total} items]`;
}

export const TEXT_MARKER = "…[truncated]";

/**
 * Serializes a tool result and fits it into `budget` bytes. Arrays keep their
 * leading items, which the query layer orders most relevant first; anything
 * else is cut as text. The marker is counted against the budget.
 */
export function truncatePayload(data: unknown, budget: number): TruncatedPayload {
  const serialized = serializePayload(data);
  const size = byteLength(serialized);
  if (size <= budget) {
    return { payload: serialized, truncated: false, bytes: size };
  }

  if (Array.isArray(data)) {
    const total = data.length;
    let lo = 1;
    let hi = total - 1;
    let best = "";
    // largest prefix whose serialization plus marker fits
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      const candidate = serializePayload(data.slice(0, mid)) + itemsMarker(mid, total);
      if (byteLength(candidate) <= budget) {
        best = candidate;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    if (best) {
      return { payload: best, truncated: true, bytes: byteLength(best) };
    }
  }

  const room = budget - byteLength(TEXT_MARKER);
  const payload = sliceToBytes(serialized, room) + TEXT_MARKER;
  return { payload, truncated: true, bytes: byteLength(payload) };
}
