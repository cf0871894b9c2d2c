/**
 * Query simplification applied before lookup
 * @module core/normalizer
 */

/**
 * Floor, shop, basement and podium tokens. The first match and everything
 * after it is removed.
 */
export const FLOOR_SUFFIX_PATTERN =
  /([0-9A-Za-z\s-]+[樓層]|[0-9A-Za-z號\s-]+[舖鋪]|地[下庫]|平台).*/

/**
 * Strips the floor/unit/basement/platform suffix from an address so the
 * lookup service sees only the building-level part.
 *
 * Returns the input unchanged when no such token is present. The original
 * address is still used for scoring and output.
 *
 * @param address - Free-text address
 * @returns The address with its floor suffix removed
 *
 * @example
 * ```typescript
 * stripFloorSuffix('九龍旺角彌敦道594號3樓A室') // '九龍旺角彌敦道594號'
 * stripFloorSuffix('屯門青麟路3號地下') // '屯門青麟路3號'
 * stripFloorSuffix('香港中環皇后大道中99號') // unchanged
 * ```
 */
export function stripFloorSuffix(address: string): string {
  return address.replace(FLOOR_SUFFIX_PATTERN, '')
}
