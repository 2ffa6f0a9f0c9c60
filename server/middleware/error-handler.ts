import type { ErrorRequestHandler } from "express";

type HttpErrorLike = {
  status?: unknown;
  statusCode?: unknown;
  type?: unknown;
  message?: unknown;
  stack?: unknown;
};

const isHttpErrorLike = (value: unknown): value is HttpErrorLike =>
  typeof value === "object" && value !== null;

const resolveStatus = (err: HttpErrorLike): number => {
  const candidate = err.status ?? err.statusCode;
  return typeof candidate === "number" && candidate >= 400 && candidate < 600 ? candidate : 500;
};

/**
 * Last-resort handler: answers `{ error }` and keeps the process alive.
 * body-parser failures carry `type: "entity.parse.failed"` and a 400 status.
 */
export const apiErrorHandler: ErrorRequestHandler = (err, _req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const details: HttpErrorLike = isHttpErrorLike(err) ? err : { message: String(err) };
  const status = resolveStatus(details);
  const message =
    details.type === "entity.parse.failed"
      ? "request body must be valid JSON"
      : status >= 500
        ? "Internal Server Error"
        : typeof details.message === "string" && details.message
          ? details.message
          : "Request failed";

  console.error("[express] error handler:", status, details.message ?? message);
  if (status >= 500 && process.env.NODE_ENV !== "production") {
    console.error(details.stack ?? err);
  }
  res.status(status).json({ error: message });
};
