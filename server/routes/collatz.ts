import { Router } from "express";
import {
  CollatzInvalidArgumentError,
  CollatzOverflowError,
  computeCollatz,
  describeCollatzSteps,
} from "@shared/collatz";
import { CollatzRequest, type CollatzConfig, type CollatzResponse } from "@shared/collatz-schema";
import { metrics } from "../metrics";

export type CollatzRouterOptions = {
  maxSteps: number;
};

/**
 * POST /api/collatz
 * Body `{ number, maxSteps? }`; the cap is the smaller of the request's and the configured one.
 *
 * GET /api/collatz/config
 * The configured cap, for the client's hint and truncation warning.
 */
export function createCollatzRouter({ maxSteps }: CollatzRouterOptions) {
  const router = Router();

  router.get("/config", (_req, res) => {
    const body: CollatzConfig = { maxSteps };
    res.json(body);
  });

  router.post("/", (req, res) => {
    const parsed = CollatzRequest.safeParse(req.body ?? {});
    if (!parsed.success) {
      metrics.recordCollatz("invalid");
      const message = parsed.error.issues[0]?.message ?? "invalid request";
      return res.status(400).json({ error: message });
    }

    const cap = Math.min(parsed.data.maxSteps ?? maxSteps, maxSteps);
    try {
      const { values, truncated } = computeCollatz(parsed.data.number, cap);
      metrics.recordCollatz(truncated ? "truncated" : "ok", values.length);
      const body: CollatzResponse = {
        steps: describeCollatzSteps(values),
        truncated,
        maxSteps: cap,
      };
      return res.json(body);
    } catch (error) {
      if (error instanceof CollatzOverflowError) {
        metrics.recordCollatz("overflow");
        return res.status(error.status).json({ error: error.message });
      }
      if (error instanceof CollatzInvalidArgumentError) {
        metrics.recordCollatz("invalid");
        return res.status(error.status).json({ error: error.message });
      }
      metrics.recordCollatz("error");
      console.error("[collatz] computation failed:", error);
      return res.status(500).json({ error: "collatz computation failed" });
    }
  });

  return router;
}
