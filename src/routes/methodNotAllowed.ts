// src/routes/methodNotAllowed.ts
import type { RequestHandler } from "express";
import { MethodNotAllowedError } from "../utils/errors";

/** Terminal handler for a route: anything that reaches it used the wrong verb. */
export function methodNotAllowed(...allowed: string[]): RequestHandler {
  return (_req, res, next) => {
    res.setHeader("Allow", allowed.join(", "));
    next(new MethodNotAllowedError());
  };
}
