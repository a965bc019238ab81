import { loadConfig } from "./config";
import { createApp } from "./app";
import { log } from "./log";
import { WeeklyScheduler } from "./schedule-generator";

async function main() {
  const config = loadConfig();
  const scheduler = new WeeklyScheduler({
    minEmployeesPerShift: config.minEmployeesPerShift,
    maxDaysPerWeek: config.maxDaysPerWeek,
    seed: config.seed,
  });

  const { httpServer } = await createApp(scheduler);

  httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
    log(`serving on port ${config.port}`);
  });
}

main().catch((err) => {
  console.error("[express] Failed to start:", err);
  process.exit(1);
});
