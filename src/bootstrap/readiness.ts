/**
 * Wait for a freshly started database to accept connections.
 */

import type { ResolvedConfig } from "../config/index.js";
import { checkConnection } from "../sql/kysely-adapter.js";
import { redactUrl, type ConnectionDescriptor } from "./backends.js";
import { BootstrapError, errorMessage } from "./errors.js";

export type ReadinessOptions = ResolvedConfig["readiness"];

/** Resolves once the database answers; rejects otherwise */
export type ConnectionProbe = (descriptor: ConnectionDescriptor) => Promise<void>;

export interface ReadinessDependencies {
  probe: ConnectionProbe;
  sleep: (ms: number) => Promise<void>;
  now: () => number;
  /** Called after each failed attempt */
  onRetry?: (attempt: number, delayMs: number, error: string) => void;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function createConnectionProbe(cwd: string): ConnectionProbe {
  return (descriptor) =>
    checkConnection({ dialect: descriptor.dialect, connectionUrl: descriptor.url, cwd });
}

/**
 * Probe until the database answers, backing off exponentially between attempts.
 *
 * @returns the number of attempts made
 * @throws BootstrapError with code DatabaseNotReady once `timeoutMs` has elapsed
 */
export async function waitForDatabase(
  descriptor: ConnectionDescriptor,
  options: ReadinessOptions,
  deps: ReadinessDependencies,
): Promise<number> {
  const start = deps.now();
  let delay = options.initialDelayMs;
  let attempt = 0;
  let lastError = "no attempt made";

  for (;;) {
    attempt++;
    try {
      await deps.probe(descriptor);
      return attempt;
    } catch (err) {
      lastError = errorMessage(err);
    }

    const elapsed = deps.now() - start;
    if (elapsed >= options.timeoutMs) {
      break;
    }

    const wait = Math.min(delay, options.maxDelayMs, options.timeoutMs - elapsed);
    deps.onRetry?.(attempt, wait, lastError);
    await deps.sleep(wait);
    delay = Math.min(delay * options.backoffMultiplier, options.maxDelayMs);
  }

  throw new BootstrapError(
    "DatabaseNotReady",
    `Database at ${redactUrl(descriptor.url)} did not accept connections within ${options.timeoutMs}ms ` +
      `(${attempt} attempts): ${lastError}`,
  );
}
