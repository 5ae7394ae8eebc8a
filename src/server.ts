import type { Server } from "node:http";
import { createApp } from "./app";
import { loadConfig, type AppConfig } from "./config/env";
import { ProwlarrClient } from "./clients/prowlarrClient";
import { RadarrClient } from "./clients/radarrClient";
import { SonarrClient } from "./clients/sonarrClient";
import { Dispatcher } from "./dispatch/dispatcher";
import { ServiceHealthAggregator } from "./health/serviceHealth";
import { ToolRegistry } from "./registry/toolRegistry";
import { registerArrTools, type ArrClients } from "./tools/arrTools";
import { createLogger, type Logger } from "./utils/logger";

function createClients(config: AppConfig): ArrClients {
  return {
    sonarr: config.sonarr && new SonarrClient(config.sonarr),
    radarr: config.radarr && new RadarrClient(config.radarr),
    prowlarr: config.prowlarr && new ProwlarrClient(config.prowlarr),
  };
}

function describeServices(clients: ArrClients): string {
  const state = (configured: boolean) => (configured ? "Connected" : "Not configured");
  return [
    `Sonarr: ${state(Boolean(clients.sonarr))}`,
    `Radarr: ${state(Boolean(clients.radarr))}`,
    `Prowlarr: ${state(Boolean(clients.prowlarr))}`,
  ].join(", ");
}

function shutdown(server: Server, log: Logger, timeoutMs: number): Promise<void> {
  return new Promise((resolve) => {
    const deadline = setTimeout(() => {
      log.warn(`Graceful shutdown exceeded ${timeoutMs}ms; closing open connections`);
      server.closeAllConnections();
    }, timeoutMs);

    server.close((err) => {
      clearTimeout(deadline);
      if (err) log.error({ err }, "Server shutdown error");
      resolve();
    });
    server.closeIdleConnections();
  });
}

function main(): void {
  const config = loadConfig(process.env, process.argv.slice(2));
  const logger = createLogger({ level: config.logLevel, prefix: "arr-tool-gateway" });
  const log = logger.child("Main");

  log.info("Initializing media service clients...");
  const clients = createClients(config);

  const registry = new ToolRegistry(logger.child("ToolRegistry"));
  const dispatcher = new Dispatcher(registry, logger);
  const health = new ServiceHealthAggregator(logger, config.healthCheckTimeoutMs);
  registerArrTools(dispatcher, health, clients);

  log.info(`Services: ${describeServices(clients)}`);
  log.info(`Registered ${registry.size} tools`);

  const app = createApp({ dispatcher, health, logger });
  const server = app.listen(config.port, config.host, () => {
    log.info(`Tool gateway listening on http://${config.host}:${config.port}`);
  });

  server.on("error", (err) => {
    log.error({ err }, "Server error");
    process.exitCode = 1;
  });

  let stopping = false;
  const stop = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    log.info(`${signal} received, shutting down...`);
    shutdown(server, log, config.shutdownTimeoutMs).then(
      () => log.info("Server shutdown complete"),
      (err: unknown) => log.error({ err }, "Server shutdown error")
    );
  };

  process.on("SIGINT", stop);
  process.on("SIGTERM", stop);
}

try {
  main();
} catch (err) {
  console.error("[ERROR]", err instanceof Error ? err.message : err);
  process.exit(1);
}
