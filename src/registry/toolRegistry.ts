// src/registry/toolRegistry.ts
import type { ToolDefinition } from "../types/mcp";
import type { Logger } from "../utils/logger";

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/**
 * In-memory tool metadata keyed by name.
 *
 * Every method is synchronous, so a registration runs to completion before
 * any other request's lookup gets the event loop: writers are exclusive and
 * readers never see a half-applied write. `listAll` hands out a snapshot so
 * iteration is unaffected by later registrations.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();

  constructor(private readonly log?: Logger) {}

  /** Stores `definition`, replacing any tool already registered under its name. */
  register(definition: ToolDefinition): void {
    if (this.tools.has(definition.name)) {
      this.log?.warn(`Replacing previously registered tool: ${definition.name}`);
    }
    this.tools.set(definition.name, deepFreeze(structuredClone(definition)));
    this.log?.info(`Registered tool: ${definition.name}`);
  }

  lookup(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  listAll(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  get size(): number {
    return this.tools.size;
  }
}
