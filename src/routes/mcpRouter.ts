// src/routes/mcpRouter.ts
import express, { Router, type Response } from "express";
import type { Dispatcher } from "../dispatch/dispatcher";
import { parseRunRequest, toWire } from "../dispatch/envelope";
import type { ServiceHealthAggregator } from "../health/serviceHealth";
import type { PartialResponse } from "../types/mcp";
import { statusForCode } from "../utils/errors";
import type { Logger } from "../utils/logger";
import { methodNotAllowed } from "./methodNotAllowed";

export type McpRouterDeps = {
  dispatcher: Dispatcher;
  health: ServiceHealthAggregator;
  logger: Logger;
};

// one JSON frame per line, flushed as produced
async function writeFrames(
  res: Response,
  frames: AsyncGenerator<PartialResponse, void, undefined>
): Promise<void> {
  res.status(200);
  res.setHeader("Content-Type", "application/json");
  res.flushHeaders();

  try {
    for await (const frame of frames) {
      if (res.destroyed) break;
      res.write(`${JSON.stringify(toWire(frame))}\n`);
    }
  } finally {
    if (!res.destroyed) res.end();
  }
}

export function createMcpRouter({ dispatcher, health, logger }: McpRouterDeps): Router {
  const router = Router();
  const log = logger.child("McpRouter");

  router
    .route("/tools")
    .get((_req, res) => {
      const tools = dispatcher.registry.listAll();
      log.debug(`Returning list of ${tools.length} tools`);
      res.json({ tools });
    })
    .all(methodNotAllowed("GET"));

  // the body is JSON whatever Content-Type the caller sent
  const runBody = express.json({ limit: "1mb", type: () => true });

  router
    .route("/run")
    .post(runBody, async (req, res, next) => {
      try {
        const request = parseRunRequest(req.body);

        // aborts the dispatch if the client hangs up before we answer
        const controller = new AbortController();
        res.on("close", () => {
          if (!res.writableFinished) controller.abort();
        });

        const outcome = await dispatcher.run(request, { signal: controller.signal, streaming: true });

        if (outcome.kind === "stream") {
          await writeFrames(res, outcome.frames);
          return;
        }
        if (res.destroyed) return;

        const status = outcome.kind === "final" ? 200 : statusForCode(outcome.code);
        res.status(status).json(toWire(outcome));
      } catch (err) {
        next(err);
      }
    })
    .all(methodNotAllowed("POST"));

  router
    .route("/service-health")
    .get(async (_req, res, next) => {
      try {
        const report = await health.checkAll();
        res.status(report.status === "ok" ? 200 : 503).json(report);
      } catch (err) {
        next(err);
      }
    })
    .all(methodNotAllowed("GET"));

  return router;
}
