// api/src/types.ts

/**
 * Анкета пользователя. Поля в snake_case — это контракт JSON-тела запроса.
 *
 * В расчёт когорты идут только fitness_level, age_category, training_type,
 * training_goal, health_status и training_frequency. Остальное зарезервировано
 * под будущие правила и сейчас ни на что не влияет.
 */
export interface UserInput {
  fitness_level: number; // 1 начинающий, 2 средний, 3 продвинутый
  age_category: number; // 1 детская, 2 юношеская, 3 взрослая, 4 пожилая
  training_type: number; // 1 силовые, 2 кардио, 3 групповые, 4 индивидуальные
  training_goal: number; // 1 здоровье, 2 снижение веса, 3 выносливость, 4 достижения
  sports_facility: string;
  group_or_individual: number; // 1 групповые, 2 индивидуальные
  health_status: number; // 1 без ограничений, 2 хронические заболевания, 3 коррекция нагрузок
  training_frequency: number; // тренировок в неделю
  training_time: number; // 1 утро, 2 день, 3 вечер
  chronic_diseases?: string[] | null;
  weight: number; // кг
  height: number; // см
  health_group?: number | null;
  skill_focus?: number[] | null; // 1 гибкость, 2 координация
  cooperation: boolean;
  budget?: number | null;
}

/** Каноническая площадка: диапазон когорт [lowInclusive, highExclusive). */
export interface Facility {
  name: string;
  lowInclusive: number;
  highExclusive: number;
}

// Сырые формы каталога: строка из БД ("10-30") или явные границы.
export type CatalogEntry =
  | { kind: "text"; name: string; range: string }
  | { kind: "bounds"; name: string; low: number; high: number };

// Строка таблицы facilities
export type FacilityRow = {
  name: string;
  cohort_range: string;
};

export interface Recommendation {
  cohort: number;
  recommended_facilities: string[];
}
