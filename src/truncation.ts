/**
 * Byte-budget truncation for payloads that re-enter the conversation.
 *
 * - `split` keeps the first and last halves with a marker in between
 * - `head` keeps the beginning and appends the marker
 * - The marker reports what was omitted: [···TRUNCATED N bytes···]
 * - Payloads that already fit are returned unchanged
 */

// Worst-case marker: [···TRUNCATED 9999999999 bytes···] ≈ 34 bytes
const MARKER_OVERHEAD = 50;

// Middle dot character for marker (U+00B7)
const MIDDLE_DOT = '·';

export type TruncationMode = 'split' | 'head';

export function buildTruncationMarker(omittedCount: number, unit: string): string {
  return `[${MIDDLE_DOT}${MIDDLE_DOT}${MIDDLE_DOT}TRUNCATED ${String(omittedCount)} ${unit}${MIDDLE_DOT}${MIDDLE_DOT}${MIDDLE_DOT}]`;
}

/**
 * Find a safe UTF-8 byte boundary at or before the given byte offset.
 */
function findSafeUtf8Boundary(buffer: Buffer, targetOffset: number): number {
  if (targetOffset >= buffer.length) return buffer.length;
  if (targetOffset <= 0) return 0;

  let offset = targetOffset;
  // UTF-8 continuation bytes start with 10xxxxxx (0x80-0xBF)
  // eslint-disable-next-line functional/no-loop-statements -- iterative byte scanning
  while (offset > 0 && (buffer[offset] & 0xc0) === 0x80) {
    offset--;
  }
  return offset;
}

/**
 * Find a safe UTF-8 byte boundary at or after the given byte offset.
 */
function findSafeUtf8BoundaryAfter(buffer: Buffer, targetOffset: number): number {
  if (targetOffset >= buffer.length) return buffer.length;
  if (targetOffset <= 0) return 0;

  let offset = targetOffset;
  // eslint-disable-next-line functional/no-loop-statements -- iterative byte scanning
  while (offset < buffer.length && (buffer[offset] & 0xc0) === 0x80) {
    offset++;
  }
  return offset;
}

/**
 * Truncate a string to at most `targetBytes` UTF-8 bytes (marker included).
 * A target too small to hold the marker yields a plain cut.
 */
export function truncateToBytes(payload: string, targetBytes: number, mode: TruncationMode = 'split'): string {
  const buffer = Buffer.from(payload, 'utf8');
  const inputBytes = buffer.length;

  if (inputBytes <= targetBytes) {
    return payload;
  }

  const contentBudget = targetBytes - MARKER_OVERHEAD;
  if (contentBudget <= 0) {
    return buffer.subarray(0, findSafeUtf8Boundary(buffer, Math.max(0, targetBytes))).toString('utf8');
  }

  if (mode === 'head') {
    const end = findSafeUtf8Boundary(buffer, contentBudget);
    // Prefer cutting at a line boundary so previews never end mid-row
    const lastNewline = buffer.lastIndexOf(0x0a, end - 1);
    const cut = lastNewline > 0 ? lastNewline + 1 : end;
    const head = buffer.subarray(0, cut).toString('utf8');
    return head + buildTruncationMarker(inputBytes - cut, 'bytes');
  }

  const firstHalfBudget = Math.floor(contentBudget / 2);
  const lastHalfBudget = contentBudget - firstHalfBudget;

  const firstEnd = findSafeUtf8Boundary(buffer, firstHalfBudget);
  const lastStart = findSafeUtf8BoundaryAfter(buffer, inputBytes - lastHalfBudget);

  const firstPart = buffer.subarray(0, firstEnd).toString('utf8');
  const lastPart = buffer.subarray(lastStart).toString('utf8');

  const omittedBytes = lastStart - firstEnd;
  return firstPart + buildTruncationMarker(omittedBytes, 'bytes') + lastPart;
}

/**
 * Keep the first `maxItems` entries of a list, reporting how many were dropped.
 */
export function truncateList<T>(items: readonly T[], maxItems: number): { items: T[]; omitted: number } {
  if (items.length <= maxItems) return { items: [...items], omitted: 0 };
  return { items: items.slice(0, maxItems), omitted: items.length - maxItems };
}
