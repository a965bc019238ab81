import {
  DAYS,
  SHIFTS,
  insertPreferenceSchema,
  employeeNameSchema,
  schedulerSettingsSchema,
  seedSchema,
  MAX_SEED,
  type Day,
  type Shift,
  type Preference,
  type ScheduleCell,
  type ScheduleGrid,
  type ScheduleResult,
  type SchedulerSettings,
} from "@shared/schema";
import { InvalidInputError } from "./errors";
import { createLogger, type Logger } from "./log";
import { createSeededRandom, defaultRandom, pickRandom, type RandomSource } from "./random";

export interface SchedulerOptions {
  minEmployeesPerShift?: number;
  maxDaysPerWeek?: number;
  random?: RandomSource;
  seed?: number; // Reseeded at the start of every build
  logger?: Logger;
}

export interface BuildOptions {
  seed?: number; // Taken modulo 2^32, like the constructor's seed
}

// Per-run state, rebuilt at the start of every build
interface EmployeeState {
  name: string;
  daysWorked: number;
  daysWorkedOn: Set<Day>;
}

export class WeeklyScheduler {
  readonly settings: SchedulerSettings;

  // employee name -> (day -> preferred shift); Map order is registration order
  private readonly preferences = new Map<string, Map<Day, Shift>>();
  private readonly random: RandomSource;
  private readonly seed: number | undefined;
  private readonly logger: Logger;

  constructor(options: SchedulerOptions = {}) {
    const parsed = schedulerSettingsSchema.safeParse({
      minEmployeesPerShift: options.minEmployeesPerShift,
      maxDaysPerWeek: options.maxDaysPerWeek,
    });
    if (!parsed.success) {
      const issue = parsed.error.errors[0];
      throw new InvalidInputError(`${issue.path.join(".")}: ${issue.message}`, "settings");
    }
    if (options.seed !== undefined && !seedSchema.safeParse(options.seed).success) {
      throw new InvalidInputError(`seed: must be an integer from 0 to ${MAX_SEED}`, "settings");
    }

    this.settings = parsed.data;
    this.random = options.random ?? defaultRandom;
    this.seed = options.seed;
    this.logger = options.logger ?? createLogger("scheduler");
  }

  registerEmployee(name: string): string {
    const parsed = employeeNameSchema.safeParse(name);
    if (!parsed.success) {
      throw InvalidInputError.fromZodError(parsed.error, "employee");
    }
    const employee = parsed.data;
    if (!this.preferences.has(employee)) {
      this.preferences.set(employee, new Map());
    }
    return employee;
  }

  recordPreference(employee: string, day: string, shift: string): Preference {
    const parsed = insertPreferenceSchema.safeParse({ employee, day, shift });
    if (!parsed.success) {
      throw InvalidInputError.fromZodError(parsed.error, "employee");
    }
    const preference = parsed.data;
    const name = this.registerEmployee(preference.employee);
    const byDay = this.preferences.get(name) ?? new Map<Day, Shift>();

    // Last preference for a day wins
    const previous = byDay.get(preference.day);
    if (previous !== undefined && previous !== preference.shift) {
      this.logger(`Warning: ${name} already preferred ${previous} on ${preference.day}, replacing with ${preference.shift}`);
    }
    byDay.set(preference.day, preference.shift);
    this.preferences.set(name, byDay);

    return preference;
  }

  listEmployees(): string[] {
    return Array.from(this.preferences.keys());
  }

  listPreferences(): Preference[] {
    const result: Preference[] = [];
    this.preferences.forEach((byDay, employee) => {
      for (const day of DAYS) {
        const shift = byDay.get(day);
        if (shift) result.push({ employee, day, shift });
      }
    });
    return result;
  }

  buildSchedule(options: BuildOptions = {}): ScheduleResult {
    const { minEmployeesPerShift, maxDaysPerWeek } = this.settings;
    const random = this.randomFor(options);
    const employees = this.listEmployees();

    this.logger(`Building schedule for ${employees.length} employees (min ${minEmployeesPerShift}/shift, max ${maxDaysPerWeek} days)`);

    // ========== RESET PER-RUN STATE ==========
    const roster: EmployeeState[] = employees.map((name) => ({
      name,
      daysWorked: 0,
      daysWorkedOn: new Set<Day>(),
    }));
    const grid = createEmptyGrid(minEmployeesPerShift);

    const isAvailable = (employee: EmployeeState, day: Day): boolean =>
      employee.daysWorked < maxDaysPerWeek && !employee.daysWorkedOn.has(day);

    const assign = (employee: EmployeeState, cell: ScheduleCell) => {
      cell.employees.push(employee.name);
      employee.daysWorked++;
      employee.daysWorkedOn.add(cell.day);
    };

    // ========== PASS 1: PREFERENCES ==========
    // Covers the whole week before any top-up
    for (const day of DAYS) {
      for (const shift of SHIFTS) {
        const cell = grid[day][shift];
        for (const employee of roster) {
          if (this.preferences.get(employee.name)?.get(day) !== shift) continue;

          // One preference per employee per day, so only the weekly cap can reject it here
          if (!isAvailable(employee, day)) {
            this.logger(`${employee.name} has already worked ${maxDaysPerWeek} days, dropping ${shift} on ${day}`);
            continue;
          }

          assign(employee, cell);
          this.logger(`Assigned ${employee.name} to ${shift} shift on ${day}`);
        }
      }
    }

    // ========== PASS 2: TOP-UP ==========
    for (const day of DAYS) {
      for (const shift of SHIFTS) {
        const cell = grid[day][shift];
        while (cell.employees.length < minEmployeesPerShift) {
          const eligible = roster.filter(
            (employee) => isAvailable(employee, day) && !cell.employees.includes(employee.name),
          );
          if (eligible.length === 0) {
            this.logger(`Warning: Cannot fill ${shift} shift on ${day} (${cell.employees.length}/${minEmployeesPerShift})`);
            break;
          }

          const selected = pickRandom(eligible, random);
          assign(selected, cell);
          this.logger(`Randomly assigned ${selected.name} to ${shift} shift on ${day}`);
        }
      }
    }

    // ========== RESULT ==========
    const cells: ScheduleCell[] = [];
    for (const day of DAYS) {
      for (const shift of SHIFTS) {
        const cell = grid[day][shift];
        cell.shortfall = Math.max(0, cell.required - cell.employees.length);
        cell.isUnderstaffed = cell.shortfall > 0;
        cells.push(cell);
      }
    }

    // fromEntries defines own properties, so a name like "__proto__" survives
    const daysWorked: Record<string, number> = Object.fromEntries(
      roster.map((employee) => [employee.name, employee.daysWorked]),
    );

    const understaffed = cells.filter((cell) => cell.isUnderstaffed);
    this.logger(`Schedule complete: ${cells.length - understaffed.length}/${cells.length} shifts fully staffed`);

    return {
      grid,
      cells,
      understaffed,
      daysWorked,
      settings: { ...this.settings },
    };
  }

  private randomFor(options: BuildOptions): RandomSource {
    const seed = options.seed ?? this.seed;
    return seed === undefined ? this.random : createSeededRandom(seed);
  }
}

function createEmptyGrid(required: number): ScheduleGrid {
  const makeDay = (day: Day): Record<Shift, ScheduleCell> => ({
    Morning: emptyCell(day, "Morning", required),
    Afternoon: emptyCell(day, "Afternoon", required),
    Evening: emptyCell(day, "Evening", required),
  });

  return {
    Monday: makeDay("Monday"),
    Tuesday: makeDay("Tuesday"),
    Wednesday: makeDay("Wednesday"),
    Thursday: makeDay("Thursday"),
    Friday: makeDay("Friday"),
    Saturday: makeDay("Saturday"),
    Sunday: makeDay("Sunday"),
  };
}

function emptyCell(day: Day, shift: Shift, required: number): ScheduleCell {
  return {
    day,
    shift,
    employees: [],
    required,
    shortfall: required,
    isUnderstaffed: required > 0,
  };
}
