import type { Express } from "express";
import { Dispatcher } from "../dispatch/dispatcher";
import { ServiceHealthAggregator } from "../health/serviceHealth";
import { ToolRegistry } from "../registry/toolRegistry";
import type { ToolDefinition } from "../types/mcp";
import { createLogger } from "../utils/logger";

export const silentLogger = createLogger({ level: "silent" });

export const echoDefinition: ToolDefinition = {
  name: "Echo",
  description: "Echoes its message",
  parameters: {
    msg: { type: "string", required: true, description: "Message to echo" },
  },
};

export function createCore(healthTimeoutMs?: number) {
  const registry = new ToolRegistry(silentLogger);
  const dispatcher = new Dispatcher(registry, silentLogger);
  const health = new ServiceHealthAggregator(silentLogger, healthTimeoutMs);
  return { registry, dispatcher, health };
}

export type RunningServer = {
  baseUrl: string;
  close: () => Promise<void>;
};

export function listen(app: Express): Promise<RunningServer> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error("server did not bind to a TCP port"));
        return;
      }
      resolve({
        baseUrl: `http://127.0.0.1:${address.port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.closeAllConnections();
            server.close((err) => (err ? fail(err) : done()));
          }),
      });
    });
    server.on("error", reject);
  });
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
