import type { Request, RequestHandler } from "express";
import { metrics } from "../metrics";

type LogFn = (message: string, source?: string) => void;

const MAX_LINE_LENGTH = 80;

export const previewResponseBody = (body: unknown, maxLength = 200): string | undefined => {
  if (body === undefined || body === null) return undefined;

  if (Array.isArray(body)) {
    if (body.length === 0) return "[]";
    if (body.length > 16) return `Array(${body.length})`;
  }

  if (typeof body === "object") {
    const keys = Object.keys(body);
    if (keys.length > 16) {
      return `Object keys: ${keys.slice(0, 16).join(", ")}, ...`;
    }
    try {
      const json = JSON.stringify(body);
      if (!json) return undefined;
      return json.length > maxLength ? `${json.slice(0, maxLength - 3)}...` : json;
    } catch (err) {
      const message = err instanceof Error ? err.message : "serialization error";
      return `[unserializable: ${message}]`;
    }
  }

  const str = String(body);
  return str.length > maxLength ? `${str.slice(0, maxLength - 3)}...` : str;
};

export const resolveRouteLabel = (req: Request): string => {
  const routePath: unknown = req.route?.path;
  if (typeof routePath === "string") {
    return req.baseUrl ? `${req.baseUrl}${routePath === "/" ? "" : routePath}` : routePath;
  }
  if (req.baseUrl) {
    return req.baseUrl;
  }
  const url = typeof req.path === "string" && req.path ? req.path : req.originalUrl || "/";
  return url || "/";
};

export const formatRequestLine = (
  method: string,
  path: string,
  statusCode: number,
  durationMs: number,
  preview?: string,
): string => {
  let line = `${method} ${path} ${statusCode} in ${durationMs}ms`;
  if (preview) {
    line += ` :: ${preview}`;
  }
  if (line.length > MAX_LINE_LENGTH) {
    line = line.slice(0, MAX_LINE_LENGTH - 1) + "...";
  }
  return line;
};

// Records every request in the HTTP metrics and logs one line per /api call.
export const requestLogger = (log: LogFn): RequestHandler => (req, res, next) => {
  const start = Date.now();
  const path = req.path;
  let capturedJsonPreview: string | undefined;

  const originalResJson = res.json;
  res.json = function (bodyJson) {
    capturedJsonPreview = previewResponseBody(bodyJson);
    return Reflect.apply(originalResJson, this, [bodyJson]);
  };

  res.on("finish", () => {
    const duration = Date.now() - start;
    metrics.observeHttpRequest(req.method, resolveRouteLabel(req), res.statusCode, duration);
    if (path.startsWith("/api")) {
      log(formatRequestLine(req.method, path, res.statusCode, duration, capturedJsonPreview));
    }
  });

  next();
};
