import { setTimeout as sleep } from "node:timers/promises";
import { logger } from "./logger";
import { describeError, ExitCode, ReadinessTimeoutError } from "./errors";

export interface ReadinessCheck {
  readonly name: string;
  /**
   * Resolves true once the subject is ready. A rejection counts as "not ready
   * yet" and is retried like a false result.
   */
  check(): Promise<boolean>;
}

export interface WaitOptions {
  readonly attempts: number;
  readonly intervalMs: number;
  // Exit code carried by the timeout error
  readonly exitCode?: ExitCode;
  readonly sleep?: (ms: number) => Promise<unknown>;
}

/**
 * Polls a readiness check until it reports ready, at most `attempts` times.
 * @returns The attempt on which the check succeeded
 * @throws ReadinessTimeoutError once every attempt has failed
 */
export async function waitUntilReady(
  target: ReadinessCheck,
  options: WaitOptions,
): Promise<number> {
  const pause = options.sleep ?? sleep;
  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    let ready = false;
    try {
      ready = await target.check();
    } catch (error) {
      logger.debug(
        { check: target.name, attempt, ...describeError(error) },
        "Readiness check errored",
      );
    }
    if (ready) {
      logger.info({ check: target.name, attempt }, "Ready");
      return attempt;
    }
    logger.warn(
      { check: target.name, attempt, attempts: options.attempts },
      "Not ready yet",
    );
    if (attempt < options.attempts) {
      await pause(options.intervalMs);
    }
  }
  throw new ReadinessTimeoutError(
    target.name,
    options.attempts,
    options.exitCode ?? ExitCode.Failure,
  );
}
