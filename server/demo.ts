import { parseArgs } from "util";
import { loadConfig } from "./config";
import { createLogger, silentLogger } from "./log";
import { formatSchedule } from "./report";
import { loadPreferences, readPreferenceFile, SAMPLE_PREFERENCES_PATH } from "./sample-data";
import { WeeklyScheduler } from "./schedule-generator";

// Loads a week of preferences, builds the schedule and prints it
function main() {
  const { values } = parseArgs({
    options: {
      seed: { type: "string" },
      file: { type: "string" },
      quiet: { type: "boolean", default: false },
    },
  });

  const config = loadConfig();
  const seed = values.seed === undefined ? config.seed : Number(values.seed);
  if (seed !== undefined && !Number.isInteger(seed)) {
    throw new Error(`--seed must be an integer, got ${values.seed}`);
  }

  const log = createLogger("demo");
  const scheduler = new WeeklyScheduler({
    minEmployeesPerShift: config.minEmployeesPerShift,
    maxDaysPerWeek: config.maxDaysPerWeek,
    seed,
    logger: values.quiet ? silentLogger : createLogger("scheduler"),
  });

  const file = values.file ?? SAMPLE_PREFERENCES_PATH;
  const count = loadPreferences(scheduler, readPreferenceFile(file));
  log(`Loaded ${count} preferences for ${scheduler.listEmployees().length} employees from ${file}`);

  const result = scheduler.buildSchedule();
  console.log(formatSchedule(result));

  if (result.understaffed.length > 0) {
    log(`${result.understaffed.length} shifts are understaffed`);
  }
}

try {
  main();
} catch (err) {
  console.error("[demo]", err instanceof Error ? err.message : err);
  process.exitCode = 1;
}
