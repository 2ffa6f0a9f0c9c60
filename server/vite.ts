import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import type { Server } from "http";
import express, { type Express } from "express";
import { nanoid } from "nanoid";
import type { ViteDevConfig } from "./startup-config";

const projectRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
const clientTemplatePath = path.join(projectRoot, "client", "index.html");

// Matches build.outDir in vite.config.ts.
export const CLIENT_DIST_PATH = path.join(projectRoot, "dist", "public");

export function log(message: string, source = "express") {
  const time = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
  console.log(`${time} [${source}] ${message}`);
}

export async function setupVite(
  app: Express,
  server: Server,
  { hmrDisabled, hmrPort, hmrHost }: ViteDevConfig,
) {
  const { createServer } = await import("vite");
  const { default: viteConfig } = await import("../vite.config");

  const hmr = hmrDisabled
    ? false
    : {
        server,
        ...(hmrHost ? { host: hmrHost } : {}),
        ...(hmrPort ? { port: hmrPort, clientPort: hmrPort } : {}),
      };

  const vite = await createServer({
    ...viteConfig,
    configFile: false,
    appType: "custom",
    server: { ...viteConfig.server, middlewareMode: true, hmr, allowedHosts: true },
  });

  app.use(vite.middlewares);
  app.use("*", async (req, res, next) => {
    try {
      // Re-read on every request so edits to index.html show up without a restart.
      const template = await fs.promises.readFile(clientTemplatePath, "utf-8");
      const html = await vite.transformIndexHtml(
        req.originalUrl,
        template.replace(`src="/src/main.tsx"`, `src="/src/main.tsx?v=${nanoid()}"`),
      );
      res.status(200).type("html").end(html);
    } catch (err) {
      if (err instanceof Error) {
        vite.ssrFixStacktrace(err);
      }
      next(err);
    }
  });
}

/** Serves the built client, answering unknown paths with index.html for client-side routing. */
export function serveStatic(app: Express, distPath = CLIENT_DIST_PATH) {
  const indexPath = path.join(distPath, "index.html");
  if (!fs.existsSync(indexPath)) {
    throw new Error(`client build not found at ${distPath}; run "npm run build" first`);
  }

  app.use(express.static(distPath));
  app.use("*", (_req, res) => {
    res.sendFile(indexPath);
  });
}
