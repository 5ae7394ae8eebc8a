export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type ToolInput = JsonObject;

export type ParamType = "string" | "number" | "integer" | "boolean" | "array" | "object";

export type ParamSpec = {
  type: ParamType;
  required: boolean;
  description: string;
  // element spec for arrays; declared only, the validator does not descend into it
  items?: ParamSpec;
};

export type ParamSchema = Record<string, ParamSpec>;

export type ToolDefinition = {
  name: string;
  description: string;
  parameters: ParamSchema;
};

export type ToolRequest = {
  toolName: string;
  input: ToolInput;
  requestId?: string;
  timeoutMs?: number;
  accessToken?: string;
};

export type ErrorCode =
  | "malformed_request"
  | "missing_tool_name"
  | "unknown_tool"
  | "invalid_parameter"
  | "handler_failure"
  | "timeout"
  | "streaming_unsupported"
  | "cancelled"
  | "method_not_allowed"
  | "not_found"
  | "payload_too_large"
  | "internal_error";

export type FinalResponse = { kind: "final"; result: JsonValue };
export type PartialResponse = { kind: "partial"; content: JsonValue; done: boolean };
export type ErrorResponse = { kind: "error"; message: string; code?: ErrorCode };

export type ToolResponse = FinalResponse | PartialResponse | ErrorResponse;

/**
 * Executes one tool. A rejected promise is a handler failure; its message is
 * passed to the caller verbatim.
 *
 * The signal aborts when the request deadline passes or the caller goes away.
 * Handlers doing I/O should hand it to their client.
 */
export interface ToolHandler {
  handle(request: ToolRequest, signal: AbortSignal): Promise<JsonValue>;
}

/** A handler that can emit its output progressively. */
export interface StreamingToolHandler extends ToolHandler {
  stream(request: ToolRequest, signal: AbortSignal): AsyncIterable<JsonValue>;
}

export function supportsStreaming(handler: ToolHandler): handler is StreamingToolHandler {
  return "stream" in handler && typeof handler.stream === "function";
}

export interface ServiceChecker {
  name(): string;
  // resolves when healthy, rejects with the reason otherwise
  check(signal: AbortSignal): Promise<void>;
}

export type ServiceStatus = "healthy" | `unhealthy: ${string}`;

export type ServiceHealthReport = {
  status: "ok" | "degraded";
  services: Record<string, ServiceStatus>;
};
