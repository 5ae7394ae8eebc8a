// src/clients/mediaPayload.ts
import type { JsonObject } from "../types/mcp";

export function requireFields(data: JsonObject, fields: string[], kind: string): void {
  for (const field of fields) {
    if (!Object.prototype.hasOwnProperty.call(data, field)) {
      throw new Error(`missing required field for adding ${kind}: ${field}`);
    }
  }
}
