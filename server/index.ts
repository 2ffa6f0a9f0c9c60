import { createServer, type Server } from "http";
import type { ListenOptions } from "net";
import { createApp } from "./app";
import { resolveStartupConfig } from "./startup-config";
import { log, serveStatic, setupVite } from "./vite";

const runtimeEnv = process.env.NODE_ENV ?? "development";
const config = resolveStartupConfig(process.env, runtimeEnv);

let serverInstance: Server | null = null;
let shuttingDown = false;

const requestShutdown = (signal: NodeJS.Signals) => {
  console.error(`[process] signal received: ${signal}`);
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;

  const forceExitTimer = setTimeout(() => {
    console.error("[process] forcing exit after graceful shutdown timeout");
    process.exit(1);
  }, 5000);

  const exit = (code: number) => {
    clearTimeout(forceExitTimer);
    process.exit(code);
  };

  if (!serverInstance) {
    exit(0);
    return;
  }

  serverInstance.close((err) => {
    if (err) {
      console.error("[process] error while closing server:", err);
      exit(1);
      return;
    }
    exit(0);
  });
};

// Log unexpected errors instead of exiting; each request is independent.
process.on("uncaughtException", (err) => {
  console.error("[process] uncaughtException:", err?.stack || err);
});
process.on("unhandledRejection", (reason) => {
  console.error("[process] unhandledRejection:", reason);
});
for (const sig of ["SIGINT", "SIGTERM"] as const) {
  process.on(sig, () => requestShutdown(sig));
}

async function main() {
  const app = createApp({ collatzMaxSteps: config.collatzMaxSteps, log });
  app.set("env", runtimeEnv);
  const server = createServer(app);
  serverInstance = server;

  // only setup vite in development and after the API routes
  // so the catch-all route doesn't interfere with them
  if (runtimeEnv === "development" && !config.vite.skipMiddleware) {
    log("dev: Vite middleware enabled (hot reload via Express)");
    await setupVite(app, server, config.vite);
  } else {
    if (config.vite.skipMiddleware) {
      log("dev: skipping Vite middlewares (SKIP_VITE_MIDDLEWARE=1); serving prebuilt client instead");
    }
    serveStatic(app);
  }

  const listenOpts: ListenOptions = { port: config.port, host: config.host };
  if (config.host.includes(":")) {
    listenOpts.ipv6Only = false;
  }
  log(
    `boot env: NODE_ENV=${runtimeEnv} PORT=${config.sourcePort ?? "unset"} HOST=${config.host} ` +
      `COLLATZ_MAX_STEPS=${config.collatzMaxSteps}`,
  );

  server.on("error", (err: NodeJS.ErrnoException) => {
    if (err.code === "EADDRINUSE") {
      console.error(`[server] port ${config.port} is already in use.`);
      console.error("[server] stop the other process or set PORT to an open value before retrying.");
    } else {
      console.error("[server] unexpected listen error:", err);
    }
    process.exit(1);
  });

  server.listen(listenOpts, () => {
    const address = server.address();
    const addressLabel =
      typeof address === "string"
        ? address
        : address
          ? `${address.address}:${address.port}`
          : `${config.host}:${config.port}`;
    log(`serving on ${addressLabel}`);
  });
}

main().catch((err) => {
  console.error("[server] bootstrap failed:", err);
  process.exit(1);
});
