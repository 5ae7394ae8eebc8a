// src/config/env.ts
import { parseArgs } from "node:util";
import * as dotenv from "dotenv";
import { z } from "zod";
import { errorMessage } from "../utils/errors";
import { MAX_TIMER_DELAY_MS } from "../utils/timers";

dotenv.config(); // load .env into process.env

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const intFromEnv = (fallback: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((v) => (v ? Number(v) : fallback))
    .pipe(z.number().int());

const timerDelay = z
  .number()
  .positive()
  .max(MAX_TIMER_DELAY_MS, `timeout must not exceed ${MAX_TIMER_DELAY_MS}ms`);

const EnvSchema = z.object({
  PORT: intFromEnv(8080).pipe(
    z
      .number()
      .min(1, "port must be between 1 and 65535")
      .max(65535, "port must be between 1 and 65535")
  ),
  HOST: z.string().trim().min(1, "host cannot be empty").default("localhost"),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .default("info")
    .pipe(z.enum(["debug", "info", "warn", "error"], {
      errorMap: () => ({ message: "log level must be one of: debug, info, warn, error" }),
    })),

  SONARR_URL: optionalString,
  SONARR_API_KEY: optionalString,
  RADARR_URL: optionalString,
  RADARR_API_KEY: optionalString,
  PROWLARR_URL: optionalString,
  PROWLARR_API_KEY: optionalString,

  HEALTH_CHECK_TIMEOUT_MS: intFromEnv(5000).pipe(timerDelay),
  SHUTDOWN_TIMEOUT_MS: intFromEnv(15000).pipe(timerDelay),
});

export type ServiceConfig = {
  baseUrl: string;
  apiKey: string;
};

export type AppConfig = {
  port: number;
  host: string;
  logLevel: "debug" | "info" | "warn" | "error";
  healthCheckTimeoutMs: number;
  shutdownTimeoutMs: number;

  // only present when both url and key are set
  sonarr?: ServiceConfig;
  radarr?: ServiceConfig;
  prowlarr?: ServiceConfig;
};

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Configuration error: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

// command-line flags and the variables they override
const FLAG_ENV = {
  port: "PORT",
  host: "HOST",
  "log-level": "LOG_LEVEL",
  "sonarr-url": "SONARR_URL",
  "sonarr-api-key": "SONARR_API_KEY",
  "radarr-url": "RADARR_URL",
  "radarr-api-key": "RADARR_API_KEY",
  "prowlarr-url": "PROWLARR_URL",
  "prowlarr-api-key": "PROWLARR_API_KEY",
} as const;

function flagOverrides(argv: string[]): Record<string, string> {
  const options: Record<string, { type: "string" }> = {};
  for (const flag of Object.keys(FLAG_ENV)) options[flag] = { type: "string" };

  let values: Record<string, unknown>;
  try {
    ({ values } = parseArgs({ args: argv, options, strict: true, allowPositionals: false }));
  } catch (err) {
    throw new ConfigError([`command line: ${errorMessage(err)}`]);
  }

  const overrides: Record<string, string> = {};
  for (const [flag, key] of Object.entries(FLAG_ENV)) {
    const value = values[flag];
    if (typeof value === "string") overrides[key] = value;
  }
  return overrides;
}

function service(url: string | undefined, apiKey: string | undefined): ServiceConfig | undefined {
  return url && apiKey ? { baseUrl: url, apiKey } : undefined;
}

/** Flags in `argv` (`--port 9090`, `--sonarr-url …`) win over `env`. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, argv: string[] = []): AppConfig {
  const parsed = EnvSchema.safeParse({ ...env, ...flagOverrides(argv) });
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  const config: AppConfig = {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    healthCheckTimeoutMs: e.HEALTH_CHECK_TIMEOUT_MS,
    shutdownTimeoutMs: e.SHUTDOWN_TIMEOUT_MS,
    sonarr: service(e.SONARR_URL, e.SONARR_API_KEY),
    radarr: service(e.RADARR_URL, e.RADARR_API_KEY),
    prowlarr: service(e.PROWLARR_URL, e.PROWLARR_API_KEY),
  };

  if (!config.sonarr && !config.radarr && !config.prowlarr) {
    throw new ConfigError([
      "at least one service (Sonarr, Radarr, or Prowlarr) must be configured",
    ]);
  }

  return config;
}
