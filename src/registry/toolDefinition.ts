// src/registry/toolDefinition.ts
import { z } from "zod";
import type { ParamSpec, ToolDefinition } from "../types/mcp";

const ParamTypeSchema = z.enum(["string", "number", "integer", "boolean", "array", "object"]);

const ParamSpecSchema: z.ZodType<ParamSpec, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    type: ParamTypeSchema,
    required: z.boolean().default(false),
    description: z.string().default(""),
    items: ParamSpecSchema.optional(),
  })
);

const ToolDefinitionSchema = z.object({
  name: z.string().trim().min(1, "tool name cannot be empty"),
  description: z.string().default(""),
  parameters: z.record(ParamSpecSchema).default({}),
});

const ToolCatalogSchema = z.record(z.array(ToolDefinitionSchema));

export type ToolCatalog = Record<string, ToolDefinition[]>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Turns a loosely-typed definition (as found in JSON) into a ToolDefinition.
 * Parameter types outside the known set are rejected here.
 */
export function parseToolDefinition(raw: unknown): ToolDefinition {
  const parsed = ToolDefinitionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid tool definition: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function parseToolCatalog(raw: unknown): ToolCatalog {
  const parsed = ToolCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid tool catalog: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}
