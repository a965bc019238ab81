import express, { type NextFunction, type Request, type Response } from "express";
import { createServer, type Server } from "http";
import { log } from "./log";
import { registerRoutes } from "./routes";
import type { WeeklyScheduler } from "./schedule-generator";

function errorStatus(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    if ("status" in err && typeof err.status === "number") return err.status;
    if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  }
  return 500;
}

export async function createApp(scheduler: WeeklyScheduler): Promise<{ app: express.Express; httpServer: Server }> {
  const app = express();
  const httpServer = createServer(app);

  app.use(express.json());

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;

    res.on("finish", () => {
      const duration = Date.now() - start;
      if (path.startsWith("/api")) {
        log(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);
      }
    });

    next();
  });

  await registerRoutes(httpServer, app, scheduler);

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = errorStatus(err);
    const message = status < 500 && err instanceof Error ? err.message : "Internal Server Error";
    if (status >= 500) {
      console.error("[express] Unhandled error:", err);
    }
    res.status(status).json({ message });
  });

  return { app, httpServer };
}
