import { z } from "zod";
import { MAX_DAYS_PER_WEEK, MAX_SEED, MIN_EMPLOYEES_PER_SHIFT } from "@shared/schema";

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  MIN_EMPLOYEES_PER_SHIFT: z.coerce.number().int().min(0).default(MIN_EMPLOYEES_PER_SHIFT),
  MAX_DAYS_PER_WEEK: z.coerce.number().int().min(0).max(7).default(MAX_DAYS_PER_WEEK),
  SCHEDULE_SEED: z.coerce.number().int().min(0).max(MAX_SEED).optional(),
});

export interface AppConfig {
  port: number;
  minEmployeesPerShift: number;
  maxDaysPerWeek: number;
  seed?: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings count as unset
  const values = Object.fromEntries(
    Object.keys(envSchema.shape).map((key) => [key, env[key] === "" ? undefined : env[key]]),
  );

  const parsed = envSchema.safeParse(values);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    throw new Error(`Invalid configuration: ${issue.path.join(".")} ${issue.message}`);
  }

  return {
    port: parsed.data.PORT,
    minEmployeesPerShift: parsed.data.MIN_EMPLOYEES_PER_SHIFT,
    maxDaysPerWeek: parsed.data.MAX_DAYS_PER_WEEK,
    seed: parsed.data.SCHEDULE_SEED,
  };
}
