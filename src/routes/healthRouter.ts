// src/routes/healthRouter.ts
import { Router } from "express";
import { methodNotAllowed } from "./methodNotAllowed";

export function createHealthRouter(): Router {
  const router = Router();

  // process liveness only; dependency health lives under /v1/service-health
  router
    .route("/health")
    .get((_req, res) => {
      res.status(200).json({ status: "ok" });
    })
    .all(methodNotAllowed("GET"));

  return router;
}
