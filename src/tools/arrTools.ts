// src/tools/arrTools.ts
import catalogJson from "./catalog.json";
import type { SonarrClient } from "../clients/sonarrClient";
import type { RadarrClient } from "../clients/radarrClient";
import type { ProwlarrClient } from "../clients/prowlarrClient";
import type { Dispatcher } from "../dispatch/dispatcher";
import type { ServiceHealthAggregator } from "../health/serviceHealth";
import { parseToolCatalog, type ToolCatalog } from "../registry/toolDefinition";
import type { JsonObject, JsonValue, ToolHandler, ToolInput } from "../types/mcp";
import { errorMessage } from "../utils/errors";

export type ArrClients = {
  sonarr?: SonarrClient;
  radarr?: RadarrClient;
  prowlarr?: ProwlarrClient;
};

type HandlerFactory<C> = (client: C) => ToolHandler;

function tool(run: (input: ToolInput, signal: AbortSignal) => Promise<JsonValue>): ToolHandler {
  return { handle: (request, signal) => run(request.input, signal) };
}

async function withContext<T>(context: string, work: Promise<T>): Promise<T> {
  try {
    return await work;
  } catch (err) {
    throw new Error(`${context}: ${errorMessage(err)}`);
  }
}

function queryParam(input: ToolInput): string {
  const query = input.query;
  if (typeof query !== "string" || query === "") {
    throw new Error("missing or invalid 'query' parameter");
  }
  return query;
}

function objectParam(input: ToolInput, key: string): JsonObject {
  const value = input[key];
  if (typeof value !== "object" || value === null || Array.isArray(value) || Object.keys(value).length === 0) {
    throw new Error(`missing or invalid '${key}' parameter`);
  }
  return value;
}

// non-numeric entries are dropped rather than rejected
function categoriesParam(input: ToolInput): number[] {
  const raw = input.categories;
  if (!Array.isArray(raw)) return [];
  return raw.filter((c): c is number => typeof c === "number").map((c) => Math.trunc(c));
}

const sonarrHandlers: Record<string, HandlerFactory<SonarrClient>> = {
  SonarrSearch: (client) =>
    tool(async (input, signal) => ({
      results: await withContext("sonarr search failed", client.searchSeries(queryParam(input), signal)),
    })),
  SonarrList: (client) =>
    tool(async (_input, signal) => ({
      series: await withContext("failed to get series from Sonarr", client.getSeries(signal)),
    })),
  SonarrAddSeries: (client) =>
    tool(async (input, signal) => {
      const seriesData = objectParam(input, "seriesData");
      return {
        series: await withContext("failed to add series to Sonarr", client.addSeries(seriesData, signal)),
      };
    }),
  SonarrGetProfiles: (client) =>
    tool(async (_input, signal) => ({
      profiles: await withContext(
        "failed to get quality profiles from Sonarr",
        client.getQualityProfiles(signal)
      ),
    })),
  SonarrGetRootFolders: (client) =>
    tool(async (_input, signal) => ({
      folders: await withContext("failed to get root folders from Sonarr", client.getRootFolders(signal)),
    })),
};

const radarrHandlers: Record<string, HandlerFactory<RadarrClient>> = {
  RadarrSearch: (client) =>
    tool(async (input, signal) => ({
      results: await withContext("radarr search failed", client.searchMovies(queryParam(input), signal)),
    })),
  RadarrList: (client) =>
    tool(async (_input, signal) => ({
      movies: await withContext("failed to get movies from Radarr", client.getMovies(signal)),
    })),
  RadarrAddMovie: (client) =>
    tool(async (input, signal) => {
      const movieData = objectParam(input, "movieData");
      return {
        movie: await withContext("failed to add movie to Radarr", client.addMovie(movieData, signal)),
      };
    }),
  RadarrGetProfiles: (client) =>
    tool(async (_input, signal) => ({
      profiles: await withContext(
        "failed to get quality profiles from Radarr",
        client.getQualityProfiles(signal)
      ),
    })),
  RadarrGetRootFolders: (client) =>
    tool(async (_input, signal) => ({
      folders: await withContext("failed to get root folders from Radarr", client.getRootFolders(signal)),
    })),
};

const prowlarrHandlers: Record<string, HandlerFactory<ProwlarrClient>> = {
  ProwlarrSearch: (client) =>
    tool(async (input, signal) => ({
      results: await withContext(
        "prowlarr search failed",
        client.search(queryParam(input), categoriesParam(input), signal)
      ),
    })),
  ProwlarrIndexers: (client) =>
    tool(async (_input, signal) => ({
      indexers: await withContext("failed to get indexers from Prowlarr", client.getIndexers(signal)),
    })),
};

export const defaultCatalog: ToolCatalog = parseToolCatalog(catalogJson);

function registerGroup<C>(
  dispatcher: Dispatcher,
  catalog: ToolCatalog,
  group: string,
  client: C,
  factories: Record<string, HandlerFactory<C>>
): void {
  for (const definition of catalog[group] ?? []) {
    const factory = factories[definition.name];
    if (!factory) throw new Error(`No handler implemented for tool: ${definition.name}`);
    dispatcher.registerTool(definition, factory(client));
  }
}

/**
 * Registers the tools and health checker of every configured service.
 * Services without a client are skipped entirely.
 */
export function registerArrTools(
  dispatcher: Dispatcher,
  health: ServiceHealthAggregator,
  clients: ArrClients,
  catalog: ToolCatalog = defaultCatalog
): void {
  if (clients.sonarr) {
    health.register(clients.sonarr);
    registerGroup(dispatcher, catalog, "sonarr", clients.sonarr, sonarrHandlers);
  }
  if (clients.radarr) {
    health.register(clients.radarr);
    registerGroup(dispatcher, catalog, "radarr", clients.radarr, radarrHandlers);
  }
  if (clients.prowlarr) {
    health.register(clients.prowlarr);
    registerGroup(dispatcher, catalog, "prowlarr", clients.prowlarr, prowlarrHandlers);
  }
}
