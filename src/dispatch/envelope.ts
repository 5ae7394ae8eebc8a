// src/dispatch/envelope.ts
import { z } from "zod";
import type { ErrorCode, JsonValue, ToolRequest, ToolResponse } from "../types/mcp";
import { MalformedRequestError } from "../utils/errors";
import { MAX_TIMER_DELAY_MS } from "../utils/timers";

export type WireResponse =
  | { type: "final"; result: JsonValue }
  | { type: "partial"; content: JsonValue; done: boolean }
  | { type: "error"; error: { message: string; code?: ErrorCode } };

export function toWire(response: ToolResponse): WireResponse {
  switch (response.kind) {
    case "final":
      return { type: "final", result: response.result };
    case "partial":
      return { type: "partial", content: response.content, done: response.done };
    case "error":
      return {
        type: "error",
        error: response.code
          ? { message: response.message, code: response.code }
          : { message: response.message },
      };
  }
}

export function errorEnvelope(message: string, code?: ErrorCode): WireResponse {
  return toWire({ kind: "error", message, code });
}

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

// null is accepted wherever a field is optional
const RunRequestSchema = z.object({
  tool_name: z.string().nullish(),
  input: z
    .record(JsonValueSchema)
    .nullish()
    .transform((v) => v ?? {}),
  request_id: z.string().nullish(),
  timeout: z.number().int().nonnegative().max(MAX_TIMER_DELAY_MS).nullish(),
  access_token: z.string().nullish(),
});

/**
 * Body of POST /v1/run → ToolRequest. An empty or absent tool_name is left
 * for the dispatcher to reject.
 */
export function parseRunRequest(body: unknown): ToolRequest {
  const parsed = RunRequestSchema.safeParse(body);
  if (!parsed.success) throw new MalformedRequestError();

  const b = parsed.data;
  return {
    toolName: b.tool_name ?? "",
    input: b.input,
    requestId: b.request_id ?? undefined,
    timeoutMs: b.timeout ?? undefined,
    accessToken: b.access_token ?? undefined,
  };
}
