// src/dispatch/dispatcher.ts
import {
  supportsStreaming,
  type ErrorResponse,
  type FinalResponse,
  type JsonValue,
  type PartialResponse,
  type StreamingToolHandler,
  type ToolDefinition,
  type ToolHandler,
  type ToolRequest,
} from "../types/mcp";
import { ToolRegistry } from "../registry/toolRegistry";
import {
  CancelledError,
  GatewayError,
  HandlerFailureError,
  InvalidParameterError,
  MissingToolNameError,
  StreamingUnsupportedError,
  ToolTimeoutError,
  UnknownToolError,
  errorMessage,
} from "../utils/errors";
import type { Logger } from "../utils/logger";
import { MAX_TIMER_DELAY_MS } from "../utils/timers";
import { formatValidationFailure, validateParameters } from "./validator";

export type DispatchOptions = {
  // aborts when the caller is no longer waiting for the response
  signal?: AbortSignal;
  // whether the caller can take progressive output
  streaming?: boolean;
};

export type StreamOutcome = {
  kind: "stream";
  frames: AsyncGenerator<PartialResponse, void, undefined>;
};

export type DispatchOutcome = FinalResponse | ErrorResponse | StreamOutcome;

type ExecutionScope = {
  signal: AbortSignal;
  dispose: () => void;
};

/**
 * Bounds one execution: aborts on the caller's signal or when the request
 * deadline passes, whichever comes first. Disposing aborts anything the
 * handler left running.
 */
function openScope(request: ToolRequest, callerSignal: AbortSignal | undefined): ExecutionScope {
  const controller = new AbortController();
  const timeoutMs = request.timeoutMs ?? 0;

  // a deadline beyond the timer range is treated as none
  const timer =
    timeoutMs > 0 && timeoutMs <= MAX_TIMER_DELAY_MS
      ? setTimeout(() => controller.abort(new ToolTimeoutError(request.toolName, timeoutMs)), timeoutMs)
      : undefined;

  const onCallerAbort = () => controller.abort(new CancelledError());
  if (callerSignal?.aborted) onCallerAbort();
  else callerSignal?.addEventListener("abort", onCallerAbort, { once: true });

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer) clearTimeout(timer);
      callerSignal?.removeEventListener("abort", onCallerAbort);
      if (!controller.signal.aborted) controller.abort(new CancelledError());
    },
  };
}

// settles with `work`, or rejects with the abort reason as soon as `signal` fires
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
    if (signal.aborted) onAbort();
    else signal.addEventListener("abort", onAbort, { once: true });
  });
}

export class Dispatcher {
  private readonly handlers = new Map<string, ToolHandler>();
  private readonly log: Logger;

  constructor(readonly registry: ToolRegistry, log: Logger) {
    this.log = log.child("Dispatcher");
  }

  registerTool(definition: ToolDefinition, handler: ToolHandler): void {
    this.registry.register(definition);
    this.handlers.set(definition.name, handler);
  }

  /** Runs one request to its terminal outcome. Never rejects. */
  async run(request: ToolRequest, options: DispatchOptions = {}): Promise<DispatchOutcome> {
    try {
      const { definition, handler } = this.resolve(request.toolName);

      const check = validateParameters(request.input, definition.parameters);
      if (!check.ok) {
        throw new InvalidParameterError(
          check.param,
          check.reason,
          formatValidationFailure(check.param, check.reason)
        );
      }

      if (supportsStreaming(handler)) {
        if (!options.streaming) throw new StreamingUnsupportedError();
        return { kind: "stream", frames: this.streamFrames(request, handler, options.signal) };
      }

      const result = await this.execute(request, handler, options.signal);
      this.log.debug(`Successfully processed request for tool: ${request.toolName}`);
      return { kind: "final", result };
    } catch (err) {
      return this.fail(request, err);
    }
  }

  private resolve(toolName: string): { definition: ToolDefinition; handler: ToolHandler } {
    if (!toolName) throw new MissingToolNameError();

    this.log.debug(`Received request for tool: ${toolName}`);

    const definition = this.registry.lookup(toolName);
    const handler = this.handlers.get(toolName);
    if (!definition || !handler) throw new UnknownToolError(toolName);

    return { definition, handler };
  }

  private async execute(
    request: ToolRequest,
    handler: ToolHandler,
    callerSignal: AbortSignal | undefined
  ): Promise<JsonValue> {
    const scope = openScope(request, callerSignal);
    const work = Promise.resolve().then(() => handler.handle(request, scope.signal));

    try {
      return await raceAbort(work, scope.signal);
    } catch (err) {
      if (scope.signal.aborted && err === scope.signal.reason) {
        work.then(
          () => this.log.debug(`Discarded late result for tool: ${request.toolName}`),
          (lateErr: unknown) =>
            this.log.debug({ err: lateErr }, `Discarded late failure for tool: ${request.toolName}`)
        );
        throw err;
      }
      throw new HandlerFailureError(errorMessage(err));
    } finally {
      scope.dispose();
    }
  }

  /**
   * Every value but the last goes out as done:false and the last as
   * done:true, so one value is always held back. A failure once streaming has
   * begun can only be reported in-band, as the terminal frame.
   */
  private async *streamFrames(
    request: ToolRequest,
    handler: StreamingToolHandler,
    callerSignal: AbortSignal | undefined
  ): AsyncGenerator<PartialResponse, void, undefined> {
    const scope = openScope(request, callerSignal);
    let iterator: AsyncIterator<JsonValue> | undefined;
    let held: { value: JsonValue } | undefined;
    let finished = false;

    try {
      const source = handler.stream(request, scope.signal);
      iterator = source[Symbol.asyncIterator]();
      const it = iterator;

      for (;;) {
        const step = await raceAbort(
          Promise.resolve().then(() => it.next()),
          scope.signal
        );
        if (step.done) break;
        if (held) yield { kind: "partial", content: held.value, done: false };
        held = { value: step.value };
      }

      finished = true;
      this.log.debug(`Successfully streamed request for tool: ${request.toolName}`);
      yield { kind: "partial", content: held ? held.value : null, done: true };
    } catch (err) {
      finished = true;
      const message = errorMessage(err);
      this.log.error({ err }, `Streaming error for tool ${request.toolName}: ${message}`);
      this.closeSource(request, iterator);
      if (held) yield { kind: "partial", content: held.value, done: false };
      yield { kind: "partial", content: { error: message }, done: true };
    } finally {
      // consumer stopped early
      if (!finished) this.closeSource(request, iterator);
      scope.dispose();
    }
  }

  private closeSource(request: ToolRequest, iterator: AsyncIterator<JsonValue> | undefined): void {
    const closing = iterator?.return?.();
    if (!closing) return;
    closing.then(
      () => undefined,
      (err: unknown) => this.log.debug({ err }, `Error closing stream for tool: ${request.toolName}`)
    );
  }

  private fail(request: ToolRequest, err: unknown): ErrorResponse {
    const failure = err instanceof GatewayError ? err : new HandlerFailureError(errorMessage(err));

    switch (failure.code) {
      case "missing_tool_name":
        this.log.warn(failure.message);
        break;
      case "unknown_tool":
        this.log.warn(`Unknown tool requested: ${request.toolName}`);
        break;
      case "invalid_parameter":
        this.log.warn(`Parameter validation failed for tool ${request.toolName}: ${failure.message}`);
        break;
      case "cancelled":
        this.log.info(`Request for tool ${request.toolName} cancelled by caller`);
        break;
      default:
        this.log.error({ err: failure }, `Handler error for tool ${request.toolName}: ${failure.message}`);
    }

    return { kind: "error", message: failure.message, code: failure.code };
  }
}
