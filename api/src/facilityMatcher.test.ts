import { isEligible, matchFacilities } from "./facilityMatcher.js";
import type { Facility } from "./types.js";

const A: Facility = { name: "A", lowInclusive: 10, highExclusive: 30 };
const B: Facility = { name: "B", lowInclusive: 30, highExclusive: 60 };

describe("matchFacilities", () => {
  test.each([-5, 0, 30, 1000])("empty catalog -> [] (cohort %d)", (cohort) => {
    expect(matchFacilities(cohort, [])).toEqual([]);
  });

  it("half-open ranges at both endpoints", () => {
    expect(matchFacilities(25, [A, B])).toEqual(["A"]);
    expect(matchFacilities(30, [A, B])).toEqual(["B"]);
    expect(matchFacilities(10, [A, B])).toEqual(["A"]);
    expect(matchFacilities(29, [A, B])).toEqual(["A"]);
    expect(matchFacilities(59, [A, B])).toEqual(["B"]);
    expect(matchFacilities(60, [A, B])).toEqual([]);
    expect(matchFacilities(9, [A, B])).toEqual([]);
  });

  it("keeps catalog order among matches", () => {
    const catalog: Facility[] = [
      { name: "Zal", lowInclusive: 0, highExclusive: 100 },
      { name: "Arena", lowInclusive: 20, highExclusive: 40 },
      { name: "Miss", lowInclusive: 50, highExclusive: 60 },
      { name: "Basseyn", lowInclusive: 25, highExclusive: 26 },
    ];
    expect(matchFacilities(25, catalog)).toEqual(["Zal", "Arena", "Basseyn"]);
  });

  it("no match returns an empty list", () => {
    expect(matchFacilities(-9, [A, B])).toEqual([]);
  });
});

describe("isEligible", () => {
  it("empty range matches nothing", () => {
    expect(isEligible({ name: "E", lowInclusive: 5, highExclusive: 5 }, 5)).toBe(false);
  });

  it("negative bounds", () => {
    expect(isEligible({ name: "N", lowInclusive: -10, highExclusive: 0 }, -10)).toBe(true);
    expect(isEligible({ name: "N", lowInclusive: -10, highExclusive: 0 }, 0)).toBe(false);
  });
});
