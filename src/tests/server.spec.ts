import axios, { type AxiosRequestConfig } from "axios";
import { afterEach, describe, expect, it } from "vitest";
import { createApp } from "../app";
import type { JsonValue, ServiceChecker, StreamingToolHandler } from "../types/mcp";
import { createCore, echoDefinition, listen, silentLogger, type RunningServer } from "./helpers";

const open: RunningServer[] = [];

afterEach(async () => {
  await Promise.all(open.splice(0).map((s) => s.close()));
});

async function start(setup: (core: ReturnType<typeof createCore>) => void = () => undefined) {
  const core = createCore(50);
  setup(core);
  const server = await listen(createApp({ ...core, logger: silentLogger }));
  open.push(server);

  const call = (config: AxiosRequestConfig) =>
    axios.request({ baseURL: server.baseUrl, validateStatus: () => true, ...config });
  return { ...core, call };
}

function withEcho(core: ReturnType<typeof createCore>) {
  core.dispatcher.registerTool(echoDefinition, {
    handle: async (req) => ({ echoed: req.input.msg }),
  });
}

const checker = (name: string, fail?: string): ServiceChecker => ({
  name: () => name,
  check: async () => {
    if (fail) throw new Error(fail);
  },
});

describe("HTTP front-end", () => {
  it("reports liveness", async () => {
    const { call } = await start();
    const res = await call({ method: "GET", url: "/health" });
    expect(res.status).toBe(200);
    expect(res.data).toEqual({ status: "ok" });
  });

  it("lists no tools on an empty registry", async () => {
    const { call } = await start();
    const res = await call({ method: "GET", url: "/v1/tools" });
    expect(res.status).toBe(200);
    expect(res.data).toEqual({ tools: [] });
  });

  it("lists registered tools", async () => {
    const { call } = await start(withEcho);
    const res = await call({ method: "GET", url: "/v1/tools" });
    expect(res.data).toEqual({ tools: [echoDefinition] });
  });

  it("runs a tool to a final response", async () => {
    const { call } = await start(withEcho);
    const res = await call({ method: "POST", url: "/v1/run", data: { tool_name: "Echo", input: { msg: "hi" } } });
    expect(res.status).toBe(200);
    expect(res.data).toEqual({ type: "final", result: { echoed: "hi" } });
  });

  it("rejects a run that is missing a required parameter", async () => {
    const { call } = await start(withEcho);
    const res = await call({ method: "POST", url: "/v1/run", data: { tool_name: "Echo", input: {} } });
    expect(res.status).toBe(400);
    expect(res.data).toEqual({
      type: "error",
      error: {
        message: "Parameter validation failed: required parameter missing: msg",
        code: "invalid_parameter",
      },
    });
  });

  it("rejects a run without a tool name", async () => {
    const { call } = await start(withEcho);
    const res = await call({ method: "POST", url: "/v1/run", data: { input: {} } });
    expect(res.status).toBe(400);
    expect(res.data).toEqual({
      type: "error",
      error: { message: "Missing tool_name in request", code: "missing_tool_name" },
    });
  });

  it("rejects an unknown tool", async () => {
    const { call } = await start(withEcho);
    const res = await call({ method: "POST", url: "/v1/run", data: { tool_name: "Ghost" } });
    expect(res.status).toBe(400);
    expect(res.data).toEqual({ type: "error", error: { message: "Unknown tool: Ghost", code: "unknown_tool" } });
  });

  it("returns a handler's failure as a 500 with its message", async () => {
    const { call } = await start((core) =>
      core.dispatcher.registerTool(
        { name: "Broken", description: "", parameters: {} },
        {
          handle: async () => {
            throw new Error("radarr search failed: connection refused");
          },
        }
      )
    );
    const res = await call({ method: "POST", url: "/v1/run", data: { tool_name: "Broken" } });
    expect(res.status).toBe(500);
    expect(res.data).toEqual({
      type: "error",
      error: { message: "radarr search failed: connection refused", code: "handler_failure" },
    });
  });

  it("returns a timeout as a 500", async () => {
    const { call } = await start((core) =>
      core.dispatcher.registerTool(
        { name: "Stuck", description: "", parameters: {} },
        { handle: () => new Promise<JsonValue>(() => undefined) }
      )
    );
    const res = await call({ method: "POST", url: "/v1/run", data: { tool_name: "Stuck", timeout: 20 } });
    expect(res.status).toBe(500);
    expect(res.data).toEqual({
      type: "error",
      error: { message: "Tool Stuck timed out after 20ms", code: "timeout" },
    });
  });

  it("passes the access token through to the handler", async () => {
    const { call } = await start((core) =>
      core.dispatcher.registerTool(
        { name: "Whoami", description: "", parameters: {} },
        { handle: async (req) => req.accessToken ?? null }
      )
    );
    const res = await call({
      method: "POST",
      url: "/v1/run",
      data: { tool_name: "Whoami", access_token: "test-token" },
    });
    expect(res.data).toEqual({ type: "final", result: "test-token" });
  });

  it("rejects an unparseable body", async () => {
    const { call } = await start(withEcho);
    const res = await call({
      method: "POST",
      url: "/v1/run",
      data: "{not json",
      headers: { "Content-Type": "application/json" },
      transformRequest: [(data: unknown) => data],
    });
    expect(res.status).toBe(400);
    expect(res.data).toEqual({
      type: "error",
      error: { message: "Invalid request format", code: "malformed_request" },
    });
  });

  it.each(["application/x-www-form-urlencoded", "text/plain"])(
    "reads a JSON body sent as %s",
    async (contentType) => {
      const { call } = await start(withEcho);
      const res = await call({
        method: "POST",
        url: "/v1/run",
        data: '{"tool_name":"Echo","input":{"msg":"hi"}}',
        headers: { "Content-Type": contentType },
        transformRequest: [(data: unknown) => data],
      });
      expect(res.status).toBe(200);
      expect(res.data).toEqual({ type: "final", result: { echoed: "hi" } });
    }
  );

  it("rejects a timeout longer than a timer can hold", async () => {
    const { call } = await start(withEcho);
    const res = await call({
      method: "POST",
      url: "/v1/run",
      data: { tool_name: "Echo", input: { msg: "hi" }, timeout: 3_000_000_000 },
    });
    expect(res.status).toBe(400);
    expect(res.data).toEqual({
      type: "error",
      error: { message: "Invalid request format", code: "malformed_request" },
    });
  });

  it("rejects a body of the wrong shape", async () => {
    const { call } = await start(withEcho);
    const res = await call({ method: "POST", url: "/v1/run", data: { tool_name: 42 } });
    expect(res.status).toBe(400);
    expect(res.data).toEqual({
      type: "error",
      error: { message: "Invalid request format", code: "malformed_request" },
    });
  });

  it("streams partial frames for a progressive handler", async () => {
    const progress: StreamingToolHandler = {
      handle: async () => null,
      stream: async function* () {
        yield { pct: 50 };
        yield { pct: 100 };
      },
    };
    const { call } = await start((core) =>
      core.dispatcher.registerTool({ name: "Progress", description: "", parameters: {} }, progress)
    );
    const res = await call({
      method: "POST",
      url: "/v1/run",
      data: { tool_name: "Progress" },
      responseType: "text",
    });

    expect(res.status).toBe(200);
    const frames: unknown[] = String(res.data)
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line));
    expect(frames).toEqual([
      { type: "partial", content: { pct: 50 }, done: false },
      { type: "partial", content: { pct: 100 }, done: true },
    ]);
  });

  it.each([
    ["POST", "/health", "GET"],
    ["DELETE", "/v1/tools", "GET"],
    ["GET", "/v1/run", "POST"],
    ["PUT", "/v1/service-health", "GET"],
  ])("answers %s %s with 405", async (method, url, allow) => {
    const { call } = await start(withEcho);
    const res = await call({ method, url });
    expect(res.status).toBe(405);
    expect(res.headers["allow"]).toBe(allow);
    expect(res.data).toEqual({
      type: "error",
      error: { message: "Method not allowed", code: "method_not_allowed" },
    });
  });

  it("answers unknown paths with 404", async () => {
    const { call } = await start();
    const res = await call({ method: "GET", url: "/v2/nothing" });
    expect(res.status).toBe(404);
    expect(res.data).toEqual({ type: "error", error: { message: "Not found", code: "not_found" } });
  });

  it("allows cross-origin callers", async () => {
    const { call } = await start();
    const res = await call({ method: "GET", url: "/health", headers: { Origin: "http://example.test" } });
    expect(res.headers["access-control-allow-origin"]).toBe("*");
  });

  describe("service health", () => {
    it("is 200 when every service is healthy", async () => {
      const { call } = await start((core) => core.health.register(checker("Sonarr")));
      const res = await call({ method: "GET", url: "/v1/service-health" });
      expect(res.status).toBe(200);
      expect(res.data).toEqual({ status: "ok", services: { Sonarr: "healthy" } });
    });

    it("is 503 when any service is unhealthy", async () => {
      const { call } = await start((core) => {
        core.health.register(checker("A"));
        core.health.register(checker("B", "x down"));
      });
      const res = await call({ method: "GET", url: "/v1/service-health" });
      expect(res.status).toBe(503);
      expect(res.data).toEqual({ status: "degraded", services: { A: "healthy", B: "unhealthy: x down" } });
    });
  });
});
