import { determineCohort } from "./cohortScorer.js";
import { makeUser } from "./testFixtures.js";

describe("determineCohort", () => {
  it("base rule only: 10 * fitness + age", () => {
    expect(determineCohort(makeUser())).toBe(11);
  });

  it("stacks every bonus", () => {
    const user = makeUser({
      fitness_level: 3,
      age_category: 4,
      training_goal: 4,
      health_status: 1,
      training_frequency: 5,
      training_type: 1,
    });
    expect(determineCohort(user)).toBe(64);
  });

  it("applies the load-correction penalty", () => {
    const user = makeUser({ health_status: 3, training_type: 4 });
    expect(determineCohort(user)).toBe(1);
  });

  test.each([
    ["goal 4 without fitness 3", { fitness_level: 2, training_goal: 4 }, 21],
    ["frequency exactly 4", { training_frequency: 4 }, 16],
    ["frequency 3", { training_frequency: 3 }, 11],
    ["cardio, no restrictions", { training_type: 2 }, 16],
    ["strength with chronic diseases", { training_type: 1, health_status: 2 }, 11],
    ["strength with load correction", { training_type: 1, health_status: 3 }, 1],
  ])("%s", (_name, overrides, expected) => {
    expect(determineCohort(makeUser(overrides))).toBe(expected);
  });

  it("может быть отрицательной", () => {
    expect(determineCohort(makeUser({ fitness_level: 0, health_status: 3 }))).toBe(-9);
  });

  it("accepts values outside the reference domains", () => {
    expect(determineCohort(makeUser({ fitness_level: 99 }))).toBe(991);
  });

  it("is deterministic", () => {
    const user = makeUser({ fitness_level: 2, age_category: 3, training_type: 1 });
    expect(determineCohort(user)).toBe(determineCohort(user));
  });

  it("ignores every field outside the rule table", () => {
    const base = makeUser({ fitness_level: 2, age_category: 3, training_type: 1, training_frequency: 4 });
    const varied = makeUser({
      fitness_level: 2,
      age_category: 3,
      training_type: 1,
      training_frequency: 4,
      sports_facility: "открытый стадион",
      group_or_individual: 2,
      training_time: 3,
      chronic_diseases: ["астма"],
      weight: 95.5,
      height: 188,
      health_group: 2,
      skill_focus: [1, 2],
      cooperation: false,
      budget: null,
    });
    expect(determineCohort(varied)).toBe(determineCohort(base));
    expect(determineCohort(base)).toBe(33);
  });
});
