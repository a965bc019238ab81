import { z } from "zod";

export type InvalidField = "employee" | "day" | "shift" | "settings" | "preferences";

// The only error the scheduling domain raises; everything else is reported as data
export class InvalidInputError extends Error {
  readonly field: InvalidField;

  constructor(message: string, field: InvalidField) {
    super(message);
    this.name = "InvalidInputError";
    this.field = field;
  }

  static fromZodError(err: z.ZodError, fallback: InvalidField): InvalidInputError {
    const issue = err.errors[0];
    const path = issue?.path[0];
    const field = isInvalidField(path) ? path : fallback;
    return new InvalidInputError(issue?.message ?? "Invalid input", field);
  }
}

function isInvalidField(value: unknown): value is InvalidField {
  return (
    value === "employee" ||
    value === "day" ||
    value === "shift" ||
    value === "settings" ||
    value === "preferences"
  );
}
