// Общая анкета для тестов: без бонусов и штрафов, когорта 11.
import type { UserInput } from "./types.js";

export function makeUser(overrides: Partial<UserInput> = {}): UserInput {
  return {
    fitness_level: 1,
    age_category: 1,
    training_type: 3,
    training_goal: 1,
    sports_facility: "фитнес-центр",
    group_or_individual: 1,
    health_status: 1,
    training_frequency: 0,
    training_time: 1,
    chronic_diseases: [],
    weight: 70,
    height: 170,
    health_group: null,
    skill_focus: [1],
    cooperation: true,
    budget: 5000,
    ...overrides,
  };
}
