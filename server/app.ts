import express, { type Express } from "express";
import { registerMetricsEndpoint } from "./metrics";
import { apiErrorHandler } from "./middleware/error-handler";
import { requestLogger } from "./middleware/request-log";
import { registerRoutes } from "./routes";
import type { StartupConfig } from "./startup-config";
import { log } from "./vite";

export type AppOptions = Pick<StartupConfig, "collatzMaxSteps"> & {
  log?: (message: string, source?: string) => void;
};

export const healthPayload = () => ({
  status: "ok" as const,
  ready: true,
  timestamp: new Date().toISOString(),
});

/**
 * API application without the client middlewares; index.ts mounts Vite or the
 * static build after the error handler.
 */
export function createApp(options: AppOptions): Express {
  const app = express();

  app.get("/healthz", (_req, res) => {
    res.set("Cache-Control", "no-store").json(healthPayload());
  });
  app.head("/healthz", (_req, res) => {
    res.set("Cache-Control", "no-store").status(200).end();
  });

  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));
  app.use(requestLogger(options.log ?? log));
  registerMetricsEndpoint(app);

  registerRoutes(app, options);

  app.use("/api", (_req, res) => {
    res.status(404).json({ error: "not found" });
  });
  app.use(apiErrorHandler);

  return app;
}
