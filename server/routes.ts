import type { Express } from "express";
import { createCollatzRouter } from "./routes/collatz";
import type { StartupConfig } from "./startup-config";

export function registerRoutes(app: Express, config: Pick<StartupConfig, "collatzMaxSteps">): void {
  app.use("/api/collatz", createCollatzRouter({ maxSteps: config.collatzMaxSteps }));
}
