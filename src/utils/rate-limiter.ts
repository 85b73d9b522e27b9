import { performance } from "node:perf_hooks";
import { DEFAULT_MIN_INTERVAL_MS } from "../config/constants.js";
import { createLogger } from "./logger.js";

const log = createLogger("rate-limiter");

export interface RateLimiterOptions {
  minIntervalMs?: number;
  /** Monotonic clock in milliseconds. */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Spaces the start of gated calls at least `minIntervalMs` apart, across every
 * caller sharing the instance. The start time is recorded before the call runs,
 * so a failing call still uses up its slot.
 */
export class RateLimiter {
  readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private lastStartedAt: number | undefined;
  // Tail of the admission chain; each caller waits for the one before it.
  private tail: Promise<void> = Promise.resolve();

  constructor(opts: RateLimiterOptions = {}) {
    const minIntervalMs = opts.minIntervalMs ?? DEFAULT_MIN_INTERVAL_MS;
    if (!Number.isFinite(minIntervalMs) || minIntervalMs < 0) {
      throw new RangeError(`minIntervalMs must be a non-negative number (got ${minIntervalMs})`);
    }
    this.minIntervalMs = minIntervalMs;
    this.now = opts.now ?? (() => performance.now());
    this.sleep = opts.sleep ?? defaultSleep;
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.admit();
    return fn();
  }

  wrap<A extends unknown[], T>(fn: (...args: A) => Promise<T>): (...args: A) => Promise<T> {
    return (...args: A) => this.run(() => fn(...args));
  }

  private admit(): Promise<void> {
    const turn = this.tail.then(() => this.waitForSlot());
    // The caller observes a rejection through `turn`; the chain itself must keep going.
    this.tail = turn.then(
      () => undefined,
      () => undefined,
    );
    return turn;
  }

  private async waitForSlot(): Promise<void> {
    if (this.lastStartedAt !== undefined) {
      let waitMs = this.lastStartedAt + this.minIntervalMs - this.now();
      while (waitMs > 0) {
        log.debug("Waiting for rate limit slot", { waitMs: Math.ceil(waitMs) });
        await this.sleep(waitMs);
        waitMs = this.lastStartedAt + this.minIntervalMs - this.now();
      }
    }
    this.lastStartedAt = this.now();
  }
}

let shared: RateLimiter | undefined;

/** Process-wide limiter used by API clients that are not given their own. */
export function getSharedRateLimiter(): RateLimiter {
  shared ??= new RateLimiter();
  return shared;
}
