import { DAYS, SHIFTS, type ScheduleResult } from "@shared/schema";

const RULE = "=".repeat(70);

export function formatSchedule(result: ScheduleResult): string {
  const lines: string[] = [RULE, "FINAL EMPLOYEE SCHEDULE FOR THE WEEK", RULE];

  for (const day of DAYS) {
    lines.push("", day.toUpperCase(), "-".repeat(50));
    for (const shift of SHIFTS) {
      const cell = result.grid[day][shift];
      const names = cell.employees.length > 0 ? cell.employees.join(", ") : "No employees assigned";
      const marker = cell.isUnderstaffed
        ? ` (understaffed: ${cell.employees.length}/${cell.required})`
        : "";
      lines.push(`  ${shift.padEnd(15)} : ${names}${marker}`);
    }
  }

  lines.push("", RULE, "EMPLOYEE WORK SUMMARY", RULE);

  // Sort employees by name
  const summary = Object.entries(result.daysWorked).sort(([a], [b]) => a.localeCompare(b));
  for (const [employee, days] of summary) {
    lines.push(`  ${employee.padEnd(20)} : ${days} days`);
  }

  lines.push(RULE);
  return lines.join("\n");
}
