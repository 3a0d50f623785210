/**
 * Address Normalizer
 *
 * Deterministic text cleanup applied before any lookup. The steps run in a
 * fixed order; changing the order changes the cache keys of existing runs.
 *
 * 1. Lowercase
 * 2. Strip floor references ("3rd floor", "floor 2")
 * 3. Strip room references ("101 room", "2nd room")
 * 4. Strip the words "next to" and "off"
 * 5. Compress road/street/avenue/opposite/near
 * 6. Collapse whitespace and trim
 *
 * Removing a filler can bring two words together that an earlier step would
 * have matched ("2 off floor" becomes "2 floor"), so the pass repeats until
 * the text stops changing. Every step after the first pass only shortens
 * the text, which bounds the loop.
 *
 * @module normalization/address-normalizer
 */

const ORDINAL = '(?:st|nd|rd|th)?';

const FLOOR_PATTERNS: readonly RegExp[] = [
  new RegExp(`\\b\\d+${ORDINAL}\\s*floor\\b`, 'g'),
  new RegExp(`\\bfloor\\s*\\d+${ORDINAL}\\b`, 'g'),
];

const ROOM_PATTERN = new RegExp(`\\b\\d+${ORDINAL}\\s*room\\b`, 'g');

const FILLER_PATTERNS: readonly RegExp[] = [/\bnext\s+to\b/g, /\boff\b/g];

/**
 * Whole-word compressions, applied in declaration order
 */
export const SUFFIX_COMPRESSIONS: ReadonlyArray<readonly [RegExp, string]> = [
  [/\broad\b/g, 'rd'],
  [/\bstreet\b/g, 'st'],
  [/\bavenue\b/g, 'ave'],
  [/\bopposite\b/g, 'opp'],
  [/\bnear\b/g, 'nr'],
];

/**
 * Normalize a free-text physical address.
 *
 * Absent input normalizes to an empty string.
 *
 * @example
 * ```typescript
 * normalizeAddress('3rd Floor, Near City Mall, Moi Avenue');
 * // => ', nr city mall, moi ave'
 * ```
 */
export function normalizeAddress(text: string | null | undefined): string {
  if (text === null || text === undefined) {
    return '';
  }

  let current = text;
  for (;;) {
    const next = normalizePass(current);
    if (next === current) return next;
    current = next;
  }
}

function normalizePass(text: string): string {
  let result = text.toLowerCase();

  for (const pattern of FLOOR_PATTERNS) {
    result = result.replace(pattern, '');
  }

  result = result.replace(ROOM_PATTERN, '');

  for (const pattern of FILLER_PATTERNS) {
    result = result.replace(pattern, '');
  }

  for (const [pattern, replacement] of SUFFIX_COMPRESSIONS) {
    result = result.replace(pattern, replacement);
  }

  return result.replace(/\s+/g, ' ').trim();
}
