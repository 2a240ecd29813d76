import { setTimeout as delay } from "node:timers/promises";

/**
 * `"idle"` is the constructed, not-yet-started state. run() moves it to
 * `"running"`, and every exit from the loop ends in the terminal `"stopped"`.
 * Calling stop() while idle goes straight to `"stopped"`.
 */
export type SchedulerState = "idle" | "running" | "stopped";

/**
 * Waits `ms` milliseconds. Must resolve early, without throwing, once
 * `signal` aborts.
 */
export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export type CycleHandler = (cycle: number) => Promise<void> | void;

export interface SchedulerOptions {
  /**
   * Pause between the end of one cycle and the start of the next, in milliseconds.
   */
  intervalMs: number;
  /**
   * Sleep implementation. Tests inject one that returns immediately.
   */
  sleep?: SleepFn;
  /**
   * Stop after this many cycles. Unbounded when omitted.
   */
  maxCycles?: number;
  /**
   * Stops the scheduler when aborted, as if stop() was called.
   */
  signal?: AbortSignal;
}

export const sleepWithSignal: SleepFn = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal.aborted) {
      return;
    }

    throw error;
  }
};

/**
 * Runs a cycle handler forever with a fixed pause between cycles. Cycles never
 * overlap: the pause starts only after the handler settles, so a slow cycle
 * pushes the next one back instead of being skipped or caught up.
 */
export class Scheduler {
  private readonly intervalMs: number;
  private readonly sleep: SleepFn;
  private readonly maxCycles?: number;
  private readonly externalSignal?: AbortSignal;
  private readonly controller = new AbortController();

  private currentState: SchedulerState = "idle";

  constructor(options: SchedulerOptions) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs < 0) {
      throw new TypeError("intervalMs must be a non-negative number");
    }

    if (
      options.maxCycles !== undefined &&
      (!Number.isInteger(options.maxCycles) || options.maxCycles <= 0)
    ) {
      throw new TypeError("maxCycles must be a positive integer");
    }

    this.intervalMs = options.intervalMs;
    this.sleep = options.sleep ?? sleepWithSignal;
    this.maxCycles = options.maxCycles;
    this.externalSignal = options.signal;
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  isRunning(): boolean {
    return this.currentState === "running";
  }

  /**
   * Runs until stop() is called, the signal aborts, `maxCycles` is reached or
   * the handler throws. Resolves with the number of completed cycles.
   * A stopped scheduler cannot be restarted.
   */
  async run(handler: CycleHandler): Promise<number> {
    if (this.currentState === "running") {
      throw new TypeError("Scheduler is already running");
    }

    if (this.currentState === "stopped") {
      return 0;
    }

    this.currentState = "running";

    const onAbort = () => {
      this.stop();
    };

    if (this.externalSignal?.aborted) {
      this.stop();
    } else {
      this.externalSignal?.addEventListener("abort", onAbort, { once: true });
    }

    let completed = 0;

    try {
      while (this.isRunning()) {
        await handler(completed + 1);
        completed += 1;

        if (this.maxCycles !== undefined && completed >= this.maxCycles) {
          break;
        }

        if (!this.isRunning()) {
          break;
        }

        await this.sleep(this.intervalMs, this.controller.signal);
      }
    } finally {
      this.externalSignal?.removeEventListener("abort", onAbort);
      this.currentState = "stopped";
    }

    return completed;
  }

  /** Stops the loop and interrupts a pending pause. Terminal. */
  stop(): void {
    if (this.currentState === "stopped") {
      return;
    }

    this.currentState = "stopped";

    if (!this.controller.signal.aborted) {
      this.controller.abort();
    }
  }
}
