// api/src/cohortScorer.ts
import type { UserInput } from "./types.js";

const STRENGTH_OR_CARDIO = new Set([1, 2]);

/**
 * Детерминированный расчёт когорты. Правила применяются строго по порядку,
 * результат может быть отрицательным. Значения вне справочников не отсекаются.
 */
export function determineCohort(user: UserInput): number {
  let cohort = 0;

  // базовые правила
  cohort += user.fitness_level * 10;
  cohort += user.age_category;

  // уточняющие
  if (user.training_goal === 4 && user.fitness_level === 3) {
    cohort += 20; // высокая мотивация + подготовка
  }
  if (user.health_status === 3) {
    cohort -= 10; // коррекция нагрузок
  }

  // дополнительные
  if (user.training_frequency >= 4) {
    cohort += 5;
  }
  if (STRENGTH_OR_CARDIO.has(user.training_type) && user.health_status === 1) {
    cohort += 5;
  }

  return cohort;
}
