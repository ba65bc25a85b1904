// Валидация с использованием zod
import { z } from "zod";
import type { UserInput } from "./types.js";

// Справочные поля проверяются только на тип: значения вне диапазонов
// допустимы и просто дают нетипичную когорту.
const enumField = z.number().int();

export const UserInputSchema: z.ZodType<UserInput> = z.object({
  fitness_level: enumField,
  age_category: enumField,
  training_type: enumField,
  training_goal: enumField,
  sports_facility: z.string(),
  group_or_individual: enumField,
  health_status: enumField,
  training_frequency: z.number().int().min(0),
  training_time: enumField,
  chronic_diseases: z.array(z.string()).nullish(),
  weight: z.number().positive(),
  height: z.number().positive(),
  health_group: z.number().int().nullish(),
  skill_focus: z.array(z.number().int()).nullish(),
  cooperation: z.boolean(),
  budget: z.number().nullish(),
});

// Функция для валидации
export function validate<T>(
  schema: z.ZodType<T>,
  data: unknown
): { success: true; data: T } | { success: false; error: string } {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    error: result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; "),
  };
}
