// src/app.ts
import express from "express";
import cors from "cors";
import type { Dispatcher } from "./dispatch/dispatcher";
import { errorEnvelope } from "./dispatch/envelope";
import type { ServiceHealthAggregator } from "./health/serviceHealth";
import { createHealthRouter } from "./routes/healthRouter";
import { createMcpRouter } from "./routes/mcpRouter";
import { GatewayError, MalformedRequestError, NotFoundError } from "./utils/errors";
import type { Logger } from "./utils/logger";

export type AppDeps = {
  dispatcher: Dispatcher;
  health: ServiceHealthAggregator;
  logger: Logger;
};

// body-parser tags its failures with a `type` string
function bodyParserFailure(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "type" in err && typeof err.type === "string") {
    return err.type;
  }
  return undefined;
}

function toGatewayError(err: unknown): GatewayError {
  if (err instanceof GatewayError) return err;

  switch (bodyParserFailure(err)) {
    case "entity.parse.failed":
      return new MalformedRequestError();
    case "entity.too.large":
      return new GatewayError("payload_too_large", "Request body too large");
    default:
      return new GatewayError("internal_error", "Internal server error");
  }
}

export function createApp({ dispatcher, health, logger }: AppDeps): express.Express {
  const app = express();
  const log = logger.child("Http");

  app.disable("x-powered-by");
  app.use(cors());

  app.use(createHealthRouter());
  app.use("/v1", createMcpRouter({ dispatcher, health, logger }));

  app.use((_req, _res, next) => next(new NotFoundError()));

  app.use(
    (err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
      if (res.headersSent) return next(err);

      const failure = toGatewayError(err);
      if (failure.statusCode >= 500) log.error({ err }, "Unhandled error");
      else log.warn(`${failure.statusCode} ${failure.message}`);

      res.status(failure.statusCode).json(errorEnvelope(failure.message, failure.code));
    }
  );

  return app;
}
