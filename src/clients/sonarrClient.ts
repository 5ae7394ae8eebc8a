// src/clients/sonarrClient.ts
import type { JsonObject } from "../types/mcp";
import { ArrClient, type ArrClientOptions } from "./arrClient";
import { requireFields } from "./mediaPayload";

// lookups longer than this go in a POST body instead of the query string
const MAX_QUERY_TERM_LENGTH = 100;

export class SonarrClient extends ArrClient {
  constructor(options: ArrClientOptions) {
    super("Sonarr", "v3", options);
  }

  getSeries(signal?: AbortSignal): Promise<JsonObject[]> {
    return this.get<JsonObject[]>("/series", signal);
  }

  getSeriesById(seriesId: number, signal?: AbortSignal): Promise<JsonObject> {
    return this.get<JsonObject>(`/series/${seriesId}`, signal);
  }

  searchSeries(term: string, signal?: AbortSignal): Promise<JsonObject[]> {
    if (term.length < MAX_QUERY_TERM_LENGTH) {
      return this.get<JsonObject[]>("/series/lookup", signal, { term });
    }
    return this.post<JsonObject[]>("/series/lookup", { term }, signal);
  }

  /**
   * Requires tvdbId, title, qualityProfileId and rootFolderPath. Monitoring,
   * season folders and a missing-episode search are on unless the caller says
   * otherwise.
   */
  async addSeries(seriesData: JsonObject, signal?: AbortSignal): Promise<JsonObject> {
    requireFields(seriesData, ["tvdbId", "title", "qualityProfileId", "rootFolderPath"], "series");

    const body: JsonObject = {
      monitored: true,
      seasonFolder: true,
      addOptions: { searchForMissingEpisodes: true },
      ...seriesData,
    };
    return this.post<JsonObject>("/series", body, signal);
  }

  getRootFolders(signal?: AbortSignal): Promise<JsonObject[]> {
    return this.get<JsonObject[]>("/rootfolder", signal);
  }

  getQualityProfiles(signal?: AbortSignal): Promise<JsonObject[]> {
    return this.get<JsonObject[]>("/qualityprofile", signal);
  }
}
