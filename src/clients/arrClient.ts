// src/clients/arrClient.ts
import axios, { type AxiosInstance, type AxiosRequestConfig } from "axios";
import type { ServiceChecker } from "../types/mcp";
import { errorMessage } from "../utils/errors";

export type ArrClientOptions = {
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
};

const DEFAULT_TIMEOUT_MS = 30_000;
const HEALTH_CHECK_TIMEOUT_MS = 5_000;

export class ArrApiError extends Error {
  constructor(readonly status: number, details: string) {
    super(`API returned error status: ${status}, details: ${details}`);
    this.name = "ArrApiError";
  }
}

function toArrError(err: unknown): Error {
  if (axios.isAxiosError(err)) {
    if (err.response) {
      const data: unknown = err.response.data;
      const details = typeof data === "string" ? data : JSON.stringify(data ?? "");
      return new ArrApiError(err.response.status, details);
    }
    return new Error(`error making request: ${err.message}`);
  }
  return err instanceof Error ? err : new Error(errorMessage(err));
}

/**
 * Shared plumbing for the *arr family of APIs: key header, versioned paths,
 * error shaping. Every client doubles as its service's health checker.
 */
export class ArrClient implements ServiceChecker {
  protected readonly http: AxiosInstance;

  constructor(
    readonly serviceName: string,
    private readonly apiVersion: "v1" | "v3",
    options: ArrClientOptions
  ) {
    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      headers: {
        "X-Api-Key": options.apiKey,
        "Content-Type": "application/json",
      },
    });
  }

  name(): string {
    return this.serviceName;
  }

  async check(signal?: AbortSignal): Promise<void> {
    try {
      await this.http.get(this.apiPath("/system/status"), {
        timeout: HEALTH_CHECK_TIMEOUT_MS,
        signal,
      });
    } catch (err) {
      if (axios.isAxiosError(err) && err.response) {
        throw new Error(`health check failed with status: ${err.response.status}`);
      }
      throw new Error(`health check failed: ${errorMessage(err)}`);
    }
  }

  protected apiPath(path: string): string {
    return `/api/${this.apiVersion}${path.startsWith("/") ? path : `/${path}`}`;
  }

  protected async request<T>(config: AxiosRequestConfig): Promise<T> {
    try {
      const res = await this.http.request<T>(config);
      return res.data;
    } catch (err) {
      throw toArrError(err);
    }
  }

  protected get<T>(path: string, signal?: AbortSignal, params?: Record<string, string>): Promise<T> {
    return this.request<T>({ method: "GET", url: this.apiPath(path), params, signal });
  }

  protected post<T>(path: string, data: unknown, signal?: AbortSignal): Promise<T> {
    return this.request<T>({ method: "POST", url: this.apiPath(path), data, signal });
  }
}
