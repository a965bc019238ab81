import fs from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";
import type { Preference } from "@shared/schema";
import { insertPreferenceSchema } from "@shared/schema";
import { InvalidInputError } from "./errors";
import type { WeeklyScheduler } from "./schedule-generator";

export const SAMPLE_PREFERENCES_PATH = fileURLToPath(
  new URL("../data/sample-preferences.json", import.meta.url),
);

const preferenceFileSchema = z.array(insertPreferenceSchema);

export function parsePreferences(raw: unknown): Preference[] {
  const parsed = preferenceFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    const [index, field] = issue.path;
    const where = typeof index === "number" ? `Entry ${index}` : "Preference file";
    const detail = field === undefined ? issue.message : `${String(field)}: ${issue.message}`;
    throw new InvalidInputError(`${where}: ${detail}`, "preferences");
  }
  return parsed.data;
}

export function readPreferenceFile(filePath: string = SAMPLE_PREFERENCES_PATH): Preference[] {
  const text = fs.readFileSync(filePath, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidInputError(`${filePath} is not valid JSON: ${reason}`, "preferences");
  }
  return parsePreferences(raw);
}

export function loadPreferences(scheduler: WeeklyScheduler, preferences: readonly Preference[]): number {
  for (const { employee, day, shift } of preferences) {
    scheduler.recordPreference(employee, day, shift);
  }
  return preferences.length;
}
