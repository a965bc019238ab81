import { z } from "zod";

// === CALENDAR ===

// Processing order matters: earlier days and shifts get first claim on employees
export const DAYS = [
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
  "Sunday",
] as const;

export const SHIFTS = ["Morning", "Afternoon", "Evening"] as const;

export type Day = (typeof DAYS)[number];
export type Shift = (typeof SHIFTS)[number];

// === STAFFING DEFAULTS ===

export const MIN_EMPLOYEES_PER_SHIFT = 2;
export const MAX_DAYS_PER_WEEK = 5;

// === SCHEMAS ===

export const daySchema = z.enum(DAYS, {
  errorMap: (_issue, ctx) => ({ message: `${String(ctx.data)} is not a valid day` }),
});

export const shiftSchema = z.enum(SHIFTS, {
  errorMap: (_issue, ctx) => ({ message: `${String(ctx.data)} is not a valid shift` }),
});

export const employeeNameSchema = z
  .string({ required_error: "Employee name is required" })
  .trim()
  .min(1, "Employee name must not be empty");

export const insertEmployeeSchema = z.object({
  name: employeeNameSchema,
});

export const insertPreferenceSchema = z.object({
  employee: employeeNameSchema,
  day: daySchema,
  shift: shiftSchema,
});

// The seeded generator keeps 32 bits of state
export const MAX_SEED = 0xffffffff;

export const seedSchema = z.number().int().min(0).max(MAX_SEED);

export const schedulerSettingsSchema = z.object({
  minEmployeesPerShift: z.number().int().min(0).default(MIN_EMPLOYEES_PER_SHIFT),
  maxDaysPerWeek: z.number().int().min(0).max(DAYS.length).default(MAX_DAYS_PER_WEEK),
});

// === TYPES ===

export type InsertEmployee = z.infer<typeof insertEmployeeSchema>;
export type Preference = z.infer<typeof insertPreferenceSchema>;
export type SchedulerSettings = z.infer<typeof schedulerSettingsSchema>;

export interface ScheduleCell {
  day: Day;
  shift: Shift;
  employees: string[]; // In assignment order: preferences first, then top-ups
  required: number;
  shortfall: number;
  isUnderstaffed: boolean;
}

export type ScheduleGrid = Record<Day, Record<Shift, ScheduleCell>>;

export interface ScheduleResult {
  grid: ScheduleGrid;
  cells: ScheduleCell[]; // Same cells as grid, Monday Morning first
  understaffed: ScheduleCell[];
  daysWorked: Record<string, number>;
  settings: SchedulerSettings;
}
