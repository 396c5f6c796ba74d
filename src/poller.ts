import { ConfigurationError, PollTimeoutError, TransportError } from "./errors";
import { silentLogger } from "./logger";
import type { Logger } from "./logger";
import { isTerminal } from "./status";
import type { JobStatus, PredictionLog } from "./types";

export const DEFAULT_POLL_INTERVAL_MS = 2000;
export const DEFAULT_MAX_TRANSPORT_RETRIES = 3;

/** The part of a {@link Session} the poller drives. */
export interface PollTarget {
  readonly name: string;
  status(): Promise<JobStatus>;
  getLog(): Promise<PredictionLog>;
}

export interface PollerOptions {
  pollIntervalMs?: number;
  /** Consecutive transport failures absorbed before the error is rethrown. */
  maxTransportRetries?: number;
  sleep?: (ms: number) => Promise<void>;
  /** Monotonic clock in milliseconds. */
  now?: () => number;
  logger?: Logger;
}

export interface WaitOptions {
  pollIntervalMs?: number;
  timeoutMs?: number;
  /** Receives log lines not seen before, once per poll cycle. */
  onLogLines?: (lines: string[]) => void;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class CompletionPoller {
  private readonly pollIntervalMs: number;
  private readonly maxTransportRetries: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: PollerOptions = {}) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.maxTransportRetries = options.maxTransportRetries ?? DEFAULT_MAX_TRANSPORT_RETRIES;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? (() => performance.now());
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Polls until the job reaches a terminal state. Resolves `true` on SUCCESS
   * and `false` on FAILED; rejects with {@link PollTimeoutError} once
   * `timeoutMs` has elapsed with the job still pending.
   */
  async wait(session: PollTarget, options: WaitOptions = {}): Promise<boolean> {
    const interval = options.pollIntervalMs ?? this.pollIntervalMs;
    const { timeoutMs, onLogLines } = options;
    if (timeoutMs !== undefined && !(timeoutMs > 0)) {
      throw new ConfigurationError(`timeoutMs must be positive, got ${timeoutMs}`);
    }
    if (!(interval > 0)) {
      throw new ConfigurationError(`pollIntervalMs must be positive, got ${interval}`);
    }

    const start = this.now();
    let failures = 0;
    let seenLines = 0;

    const streamLog = async () => {
      if (!onLogLines) return;
      const log = await session.getLog();
      if (log.lines.length > seenLines) onLogLines(log.lines.slice(seenLines));
      seenLines = log.lines.length;
    };

    // A request in flight is abandoned once the deadline, plus `graceMs`, has passed.
    const untilDeadline = <T>(op: () => Promise<T>, graceMs = 0): Promise<T> =>
      timeoutMs === undefined
        ? op()
        : this.raceTimer(op, timeoutMs + graceMs - (this.now() - start), () =>
            new PollTimeoutError(session.name, timeoutMs)
          );

    this.logger.info(`Waiting for prediction on session '${session.name}' to complete...`);
    for (;;) {
      let status: JobStatus | undefined;
      try {
        status = await untilDeadline(async () => {
          await streamLog();
          return session.status();
        });
        failures = 0;
      } catch (err: unknown) {
        if (!(err instanceof TransportError) || failures >= this.maxTransportRetries) throw err;
        failures++;
        this.logger.warn(
          `Polling session '${session.name}' failed (${failures}/${this.maxTransportRetries}), retrying: ${err.message}`
        );
      }

      if (status !== undefined) {
        this.logger.debug(`Session '${session.name}' status: ${status}`);
        if (isTerminal(status)) {
          await this.finalLog(session, () => untilDeadline(streamLog, interval));
          return status === "SUCCESS";
        }
      }

      const elapsed = this.now() - start;
      if (timeoutMs === undefined) {
        await this.sleep(interval);
      } else if (elapsed >= timeoutMs) {
        throw new PollTimeoutError(session.name, timeoutMs);
      } else {
        await this.sleep(Math.min(interval, timeoutMs - elapsed));
      }
    }
  }

  /**
   * Settles with `op`, or rejects with `onExpired()` once `remainingMs` of
   * wall-clock time has passed while `op` is still in flight.
   */
  private async raceTimer<T>(op: () => Promise<T>, remainingMs: number, onExpired: () => Error): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => reject(onExpired()), Math.max(remainingMs, 0));
    });
    try {
      return await Promise.race([op(), expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  // Lines written between the last log read and the terminal status.
  private async finalLog(session: PollTarget, drain: () => Promise<void>): Promise<void> {
    try {
      await drain();
    } catch (err: unknown) {
      if (!(err instanceof TransportError) && !(err instanceof PollTimeoutError)) throw err;
      this.logger.warn(`Could not read the final log lines of session '${session.name}': ${err.message}`);
    }
  }
}
