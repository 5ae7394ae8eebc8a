// src/utils/errors.ts
import type { ErrorCode } from "../types/mcp";

const statusByCode: Record<ErrorCode, number> = {
  malformed_request: 400,
  missing_tool_name: 400,
  unknown_tool: 400,
  invalid_parameter: 400,
  handler_failure: 500,
  timeout: 500,
  streaming_unsupported: 500,
  // the client is gone by the time this is produced; nothing is written
  cancelled: 499,
  method_not_allowed: 405,
  not_found: 404,
  payload_too_large: 413,
  internal_error: 500,
};

export function statusForCode(code: ErrorCode | undefined): number {
  return code ? statusByCode[code] : 500;
}

export class GatewayError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }

  get statusCode(): number {
    return statusForCode(this.code);
  }
}

export class MalformedRequestError extends GatewayError {
  constructor(message = "Invalid request format") {
    super("malformed_request", message);
  }
}

export class MissingToolNameError extends GatewayError {
  constructor() {
    super("missing_tool_name", "Missing tool_name in request");
  }
}

export class UnknownToolError extends GatewayError {
  constructor(readonly toolName: string) {
    super("unknown_tool", `Unknown tool: ${toolName}`);
  }
}

export class InvalidParameterError extends GatewayError {
  constructor(readonly param: string, readonly reason: string, message: string) {
    super("invalid_parameter", message);
  }
}

export class HandlerFailureError extends GatewayError {
  constructor(message: string) {
    super("handler_failure", message);
  }
}

export class ToolTimeoutError extends GatewayError {
  constructor(toolName: string, readonly timeoutMs: number) {
    super("timeout", `Tool ${toolName} timed out after ${timeoutMs}ms`);
  }
}

export class StreamingUnsupportedError extends GatewayError {
  constructor() {
    super("streaming_unsupported", "Streaming not supported");
  }
}

export class CancelledError extends GatewayError {
  constructor() {
    super("cancelled", "Request cancelled by caller");
  }
}

export class MethodNotAllowedError extends GatewayError {
  constructor() {
    super("method_not_allowed", "Method not allowed");
  }
}

export class NotFoundError extends GatewayError {
  constructor() {
    super("not_found", "Not found");
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
