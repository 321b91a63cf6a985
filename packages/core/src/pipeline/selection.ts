import type { Claim, ClaimCategory } from '../verification/types.js';

/** Lower ranks are checked first in fast mode. */
export const FAST_MODE_PRIORITY: Record<ClaimCategory, number> = {
  statistical: 0,
  quotation: 1,
  historical: 2,
  scientific: 3,
  other: 4,
};

/**
 * Pick at most `maxClaims` claims by category priority. Ties keep extraction
 * order, and the selection is returned in extraction order.
 */
export function selectClaimsForFastMode(claims: readonly Claim[], maxClaims: number): Claim[] {
  if (claims.length <= maxClaims) return [...claims];

  const chosen = claims
    .map((claim, index) => ({ claim, index }))
    .sort((a, b) =>
      FAST_MODE_PRIORITY[a.claim.category] - FAST_MODE_PRIORITY[b.claim.category] || a.index - b.index)
    .slice(0, Math.max(0, maxClaims))
    .sort((a, b) => a.index - b.index);

  return chosen.map(c => c.claim);
}
