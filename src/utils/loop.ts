// =========================================================
// POLLING LOOP — SCHEDULED, NON-OVERLAPPING TASKS
// =========================================================

import { Logger, logger as rootLogger } from './logger';
import { errorMessage } from './errors';

export interface PollingLoopOptions {
  name: string;
  intervalMs: number;
  errorBackoffMs: number;
  task: () => Promise<void>;
  runImmediately?: boolean;
  logger?: Logger;
}

/**
 * Runs a task on a fixed cadence with a timer chain, so an iteration never
 * overlaps the previous one. A failed iteration is logged and the next one
 * waits for the backoff delay instead of the interval.
 */
export class PollingLoop {
  private readonly options: PollingLoopOptions;
  private readonly log: Logger;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private running: boolean = false;
  private _iterations: number = 0;
  private _failures: number = 0;

  constructor(options: PollingLoopOptions) {
    this.options = options;
    this.log = options.logger ?? rootLogger.child(options.name);
  }

  /**
   * Start scheduling iterations
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.schedule(this.options.runImmediately ? 0 : this.options.intervalMs);
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.iterate();
    }, delayMs);
  }

  private async iterate(): Promise<void> {
    if (!this.running) return;

    let nextDelay = this.options.intervalMs;
    try {
      await this.options.task();
      this._iterations++;
    } catch (error) {
      this._failures++;
      nextDelay = this.options.errorBackoffMs;
      this.log.error(`${this.options.name} iteration failed, backing off`, {
        error: errorMessage(error),
        backoffMs: nextDelay,
      });
    }

    this.inFlight = null;
    if (this.running) {
      this.schedule(nextDelay);
    }
  }

  /**
   * Stop scheduling. Resolves once the in-flight iteration, if any, has finished.
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  get isRunning(): boolean {
    return this.running;
  }

  get iterations(): number {
    return this._iterations;
  }

  get failures(): number {
    return this._failures;
  }
}
