import { describe, it, expect } from "vitest";
import { formatSchedule } from "../server/report";
import { WeeklyScheduler } from "../server/schedule-generator";
import { silentLogger } from "../server/log";

describe("formatSchedule()", () => {
  it("prints each day's shifts and the work summary", () => {
    const scheduler = new WeeklyScheduler({ minEmployeesPerShift: 0, logger: silentLogger });
    scheduler.recordPreference("Bob", "Monday", "Evening");
    scheduler.recordPreference("Alice", "Monday", "Morning");

    const lines = formatSchedule(scheduler.buildSchedule()).split("\n");

    expect(lines.slice(0, 3)).toEqual(["=".repeat(70), "FINAL EMPLOYEE SCHEDULE FOR THE WEEK", "=".repeat(70)]);
    expect(lines.slice(3, 9)).toEqual([
      "",
      "MONDAY",
      "-".repeat(50),
      "  Morning         : Alice",
      "  Afternoon       : No employees assigned",
      "  Evening         : Bob",
    ]);
    expect(lines.slice(-6)).toEqual([
      "=".repeat(70),
      "EMPLOYEE WORK SUMMARY",
      "=".repeat(70),
      "  Alice                : 1 days",
      "  Bob                  : 1 days",
      "=".repeat(70),
    ]);
  });

  it("lists every employee in the summary", () => {
    const scheduler = new WeeklyScheduler({ logger: silentLogger, seed: 1 });
    scheduler.recordPreference("__proto__", "Monday", "Morning");
    scheduler.recordPreference("Ann", "Monday", "Morning");

    const lines = formatSchedule(scheduler.buildSchedule()).split("\n");

    expect(lines).toContain("  __proto__            : 5 days");
    expect(lines).toContain("  Ann                  : 5 days");
  });

  it("marks understaffed shifts", () => {
    const scheduler = new WeeklyScheduler({ logger: silentLogger, seed: 1 });
    scheduler.recordPreference("Alice", "Monday", "Morning");

    const lines = formatSchedule(scheduler.buildSchedule()).split("\n");

    expect(lines).toContain("  Morning         : Alice (understaffed: 1/2)");
    expect(lines).toContain("  Afternoon       : No employees assigned (understaffed: 0/2)");
  });
});
