/**
 * @file src/server/sweeper.ts
 *
 * PeriodicSweeper: the server's single supervised background task.
 *
 * CRASH ISOLATION: each pass is wrapped in try/catch. A throwing task is
 * logged and the loop carries on with the next interval.
 *
 * STOPPING: stop() aborts the interval wait and gives the in-flight pass
 * `stopTimeoutMs` to finish. If it does not, the loop is abandoned so shutdown
 * never hangs on it.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from '../logger/logger.js';

export type SweepTask = (now: number) => void | Promise<void>;

export interface SweeperOptions {
  intervalMs: number;
  stopTimeoutMs?: number;
}

export class PeriodicSweeper {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private passes = 0;
  private readonly stopTimeoutMs: number;

  constructor(
    private readonly task: SweepTask,
    private readonly options: SweeperOptions,
    private readonly logger: Logger,
  ) {
    this.stopTimeoutMs = options.stopTimeoutMs ?? 2_000;
  }

  get running(): boolean {
    return this.loop !== null;
  }

  get passCount(): number {
    return this.passes;
  }

  start(): void {
    if (this.loop) {
      this.logger.warn('PeriodicSweeper.start() called on a running sweeper');
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
  }

  /** Resolves once the loop has exited or has been abandoned. Safe to call twice. */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop || !this.controller) return;
    this.controller.abort();
    this.controller = null;
    this.loop = null;

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.stopTimeoutMs);
      timer.unref();
    });
    const outcome = await Promise.race([loop.then(() => 'stopped' as const), timedOut]);
    clearTimeout(timer);
    if (outcome === 'timeout') {
      this.logger.warn({ stopTimeoutMs: this.stopTimeoutMs }, 'Sweeper did not stop in time; abandoning it');
    }
  }

  /** Runs one pass immediately, outside the schedule. */
  async runOnce(now: number = Date.now()): Promise<void> {
    this.passes++;
    try {
      await this.task(now);
    } catch (err) {
      this.logger.error({ err, pass: this.passes }, 'Sweep pass failed');
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    this.logger.debug({ intervalMs: this.options.intervalMs }, 'Sweeper started');
    while (!signal.aborted) {
      try {
        await sleep(this.options.intervalMs, undefined, { signal, ref: false });
      } catch {
        // Aborted while waiting.
        break;
      }
      await this.runOnce();
    }
    this.logger.debug({ passes: this.passes }, 'Sweeper stopped');
  }
}
