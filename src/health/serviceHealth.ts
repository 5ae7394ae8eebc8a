// src/health/serviceHealth.ts
import type { ServiceChecker, ServiceHealthReport, ServiceStatus } from "../types/mcp";
import { errorMessage } from "../utils/errors";
import type { Logger } from "../utils/logger";

export const DEFAULT_HEALTH_CHECK_TIMEOUT_MS = 5000;

class HealthCheckTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`health check timed out after ${timeoutMs}ms`);
    this.name = "HealthCheckTimeoutError";
  }
}

export class ServiceHealthAggregator {
  private readonly checkers: ServiceChecker[] = [];
  private readonly log: Logger;

  constructor(log: Logger, private readonly timeoutMs = DEFAULT_HEALTH_CHECK_TIMEOUT_MS) {
    this.log = log.child("ServiceHealth");
  }

  register(checker: ServiceChecker): void {
    this.checkers.push(checker);
    this.log.info(`Registered health checker for service: ${checker.name()}`);
  }

  get count(): number {
    return this.checkers.length;
  }

  /**
   * Runs every checker concurrently. Each one is bounded by the timeout and
   * only ever marks itself unhealthy. Nothing is cached between calls.
   */
  async checkAll(): Promise<ServiceHealthReport> {
    const names = this.checkers.map((c) => c.name());
    const outcomes = await Promise.allSettled(this.checkers.map((c) => this.runCheck(c)));

    const services: Record<string, ServiceStatus> = {};
    let healthy = true;

    outcomes.forEach((outcome, i) => {
      const name = names[i];
      if (outcome.status === "fulfilled") {
        services[name] = "healthy";
        return;
      }
      healthy = false;
      const detail = errorMessage(outcome.reason);
      services[name] = `unhealthy: ${detail}`;
      this.log.warn(`Service ${name} is unhealthy: ${detail}`);
    });

    return { status: healthy ? "ok" : "degraded", services };
  }

  private runCheck(checker: ServiceChecker): Promise<void> {
    const controller = new AbortController();

    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        const err = new HealthCheckTimeoutError(this.timeoutMs);
        controller.abort(err);
        reject(err);
      }, this.timeoutMs);

      Promise.resolve()
        .then(() => checker.check(controller.signal))
        .then(resolve, reject)
        .finally(() => clearTimeout(timer));
    });
  }
}
