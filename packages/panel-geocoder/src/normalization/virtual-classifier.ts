/**
 * Virtual-provider classification.
 *
 * Telehealth providers have no physical premises, so their records skip
 * geocoding entirely.
 */

export const VIRTUAL_KEYWORDS: readonly string[] = [
  'virtual',
  'online',
  'telemedicine',
  'telehealth',
];

/**
 * True iff the address mentions a virtual keyword (case-insensitive).
 * Anything that is not a string is treated as a physical address.
 */
export function isVirtualProvider(address: unknown): boolean {
  if (typeof address !== 'string') {
    return false;
  }

  const lowered = address.toLowerCase();
  return VIRTUAL_KEYWORDS.some((keyword) => lowered.includes(keyword));
}
