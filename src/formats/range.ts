import type { AddressRange, EmittedByteMap } from './types.js';

/**
 * Contiguous written segments of a byte map, as half-open `[start, end)` ranges in address order.
 */
export function getWrittenSegments(map: EmittedByteMap): AddressRange[] {
  const sorted = [...map.bytes.keys()].sort((a, b) => a - b);
  const segments: AddressRange[] = [];
  let current: AddressRange | undefined;
  for (const addr of sorted) {
    if (current !== undefined && addr === current.end) {
      current.end = addr + 1;
      continue;
    }
    current = { start: addr, end: addr + 1 };
    segments.push(current);
  }
  return segments;
}

/**
 * `map.writtenRange` when set, else the span from the lowest to the highest written address.
 * An empty map gives `{ start: 0, end: 0 }`.
 */
export function getWrittenRange(map: EmittedByteMap): AddressRange {
  if (map.writtenRange) return map.writtenRange;
  const segments = getWrittenSegments(map);
  const first = segments[0];
  const last = segments[segments.length - 1];
  if (first === undefined || last === undefined) return { start: 0, end: 0 };
  return { start: first.start, end: last.end };
}
