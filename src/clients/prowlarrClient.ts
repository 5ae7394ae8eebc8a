// src/clients/prowlarrClient.ts
import type { JsonObject } from "../types/mcp";
import { ArrClient, type ArrClientOptions } from "./arrClient";

export class ProwlarrClient extends ArrClient {
  constructor(options: ArrClientOptions) {
    super("Prowlarr", "v1", options);
  }

  getIndexers(signal?: AbortSignal): Promise<JsonObject[]> {
    return this.get<JsonObject[]>("/indexer", signal);
  }

  getCategories(signal?: AbortSignal): Promise<JsonObject[]> {
    return this.get<JsonObject[]>("/indexer/category", signal);
  }

  // searches every enabled indexer; categories narrow by newznab id
  search(query: string, categories: number[] = [], signal?: AbortSignal): Promise<JsonObject[]> {
    const params: Record<string, string> = { query };
    if (categories.length > 0) params.categories = categories.join(",");
    return this.get<JsonObject[]>("/search", signal, params);
  }
}
