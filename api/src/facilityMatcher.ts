// api/src/facilityMatcher.ts
import type { Facility } from "./types.js";

export function isEligible(facility: Facility, cohort: number): boolean {
  return facility.lowInclusive <= cohort && cohort < facility.highExclusive;
}

/**
 * Names of every facility whose range contains the cohort, in catalog order.
 * No match (or an empty catalog) yields an empty list, never a placeholder name.
 */
export function matchFacilities(cohort: number, facilities: readonly Facility[]): string[] {
  return facilities.filter((facility) => isEligible(facility, cohort)).map((facility) => facility.name);
}
