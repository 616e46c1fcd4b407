import { noopLogger, sleep, toError } from '@agentwire/core';
import type { Logger } from '@agentwire/core';

export interface PeriodicTaskOptions {
  /** Used in log lines. */
  name: string;
  intervalMs: number;
  run: (signal: AbortSignal) => Promise<void>;
  /** Run once right away instead of waiting a full interval first. */
  runImmediately?: boolean;
  /**
   * Decide what follows a failed run: a delay in ms before the next attempt,
   * or `false` to stop the task. Default: log and keep the interval.
   */
  onError?: (err: Error) => number | false;
  logger?: Logger;
}

/** Runs `run` every `intervalMs` until stopped; runs never overlap. */
export class PeriodicTask {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private active = false;
  private readonly logger: Logger;

  constructor(private readonly options: PeriodicTaskOptions) {
    this.logger = options.logger ?? noopLogger;
  }

  get running(): boolean {
    return this.active;
  }

  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.active = true;
    this.loop = this.runLoop(controller.signal).finally(() => {
      this.active = false;
    });
  }

  /** Abort the loop and wait for an in-flight run to settle. */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.controller?.abort(new Error(`${this.options.name} stopped`));
    this.controller = null;
    this.loop = null;
    await loop;
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    const { name, intervalMs, run, onError } = this.options;
    let delay = this.options.runImmediately ? 0 : intervalMs;

    while (!signal.aborted) {
      if (delay > 0) {
        try {
          await sleep(delay, signal);
        } catch {
          break;
        }
      }

      try {
        await run(signal);
        delay = intervalMs;
      } catch (err) {
        if (signal.aborted) break;
        const error = toError(err);
        if (!onError) {
          this.logger.error(`${name} failed: ${error.message}`);
          delay = intervalMs;
          continue;
        }
        const next = onError(error);
        if (next === false) break;
        delay = next;
      }
    }
  }
}
