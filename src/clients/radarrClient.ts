// src/clients/radarrClient.ts
import type { JsonObject } from "../types/mcp";
import { ArrClient, type ArrClientOptions } from "./arrClient";
import { requireFields } from "./mediaPayload";

const MAX_QUERY_TERM_LENGTH = 100;

export class RadarrClient extends ArrClient {
  constructor(options: ArrClientOptions) {
    super("Radarr", "v3", options);
  }

  getMovies(signal?: AbortSignal): Promise<JsonObject[]> {
    return this.get<JsonObject[]>("/movie", signal);
  }

  getMovieById(movieId: number, signal?: AbortSignal): Promise<JsonObject> {
    return this.get<JsonObject>(`/movie/${movieId}`, signal);
  }

  searchMovies(term: string, signal?: AbortSignal): Promise<JsonObject[]> {
    if (term.length < MAX_QUERY_TERM_LENGTH) {
      return this.get<JsonObject[]>("/movie/lookup", signal, { term });
    }
    return this.post<JsonObject[]>("/movie/lookup", { term }, signal);
  }

  async addMovie(movieData: JsonObject, signal?: AbortSignal): Promise<JsonObject> {
    requireFields(movieData, ["tmdbId", "title", "qualityProfileId", "rootFolderPath"], "movie");

    const body: JsonObject = {
      monitored: true,
      minimumAvailability: "released",
      addOptions: { searchForMovie: true },
      ...movieData,
    };
    return this.post<JsonObject>("/movie", body, signal);
  }

  getRootFolders(signal?: AbortSignal): Promise<JsonObject[]> {
    return this.get<JsonObject[]>("/rootfolder", signal);
  }

  getQualityProfiles(signal?: AbortSignal): Promise<JsonObject[]> {
    return this.get<JsonObject[]>("/qualityprofile", signal);
  }
}
