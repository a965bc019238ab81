import type { Express, Response } from "express";
import type { Server } from "http";
import rateLimit from "express-rate-limit";
import { z } from "zod";
import { api } from "@shared/routes";
import { InvalidInputError } from "./errors";
import type { WeeklyScheduler } from "./schedule-generator";

// Shared 400 response for body validation and domain input errors
function sendValidationError(res: Response, err: unknown): boolean {
  if (err instanceof z.ZodError) {
    const issue = err.errors[0];
    res.status(400).json({ message: issue.message, field: issue.path.join(".") || undefined });
    return true;
  }
  if (err instanceof InvalidInputError) {
    res.status(400).json({ message: err.message, field: err.field });
    return true;
  }
  return false;
}

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  scheduler: WeeklyScheduler,
): Promise<Server> {

  const generateRateLimiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: 30, // limit each IP to 30 generations per windowMs
    message: { message: "Too many schedule generations, try again shortly" },
  });

  // === Employees ===
  app.get(api.employees.list.path, (_req, res) => {
    res.json(scheduler.listEmployees());
  });

  app.post(api.employees.create.path, (req, res) => {
    try {
      const input = api.employees.create.input.parse(req.body);
      const name = scheduler.registerEmployee(input.name);
      res.status(201).json({ name });
    } catch (err) {
      if (sendValidationError(res, err)) return;
      throw err;
    }
  });

  // === Preferences ===
  app.get(api.preferences.list.path, (_req, res) => {
    res.json(scheduler.listPreferences());
  });

  app.post(api.preferences.create.path, (req, res) => {
    try {
      const input = api.preferences.create.input.parse(req.body);
      const preference = scheduler.recordPreference(input.employee, input.day, input.shift);
      res.status(201).json(preference);
    } catch (err) {
      if (sendValidationError(res, err)) return;
      throw err;
    }
  });

  // === Schedule ===
  app.post(api.schedule.generate.path, generateRateLimiter, (req, res) => {
    try {
      const { seed } = api.schedule.generate.input.parse(req.body ?? {});
      const result = scheduler.buildSchedule({ seed });
      res.status(201).json(result);
    } catch (err) {
      if (sendValidationError(res, err)) return;
      throw err;
    }
  });

  return httpServer;
}
