/**
 * Stage Scheduler
 *
 * In-process delayed job queue. A job is one stage handler run for one
 * migration. Due jobs wait in a ready queue and at most `concurrency` run
 * at once; delayed jobs sit on a timer until due. Scheduling the same
 * (migration, stage) twice while the first is still waiting is a no-op.
 */

import type { Logger } from "../types.js";
import { errorMessage } from "../types.js";
import type { MigrationStatus } from "../migration/types.js";

export interface StageJob {
  migrationId: string;
  stage: MigrationStatus;
  /** 1-based stage attempt. */
  attempt: number;
}

export type StageJobRunner = (job: StageJob) => Promise<void>;

export interface StageSchedulerDeps {
  run: StageJobRunner;
  concurrency: number;
  logger: Logger;
}

function jobKey(job: StageJob): string {
  return `${job.migrationId}:${job.stage}`;
}

export class StageScheduler {
  private readonly deps: StageSchedulerDeps;
  private readonly delayed = new Map<string, { job: StageJob; timer: ReturnType<typeof setTimeout> }>();
  private readonly ready: StageJob[] = [];
  private readonly readyKeys = new Set<string>();
  private running = 0;
  private stopped = false;
  private idleWaiters: Array<() => void> = [];

  constructor(deps: StageSchedulerDeps) {
    this.deps = deps;
  }

  /** Queue `job` to run after `delayMs`. Returns false when an identical job is already waiting. */
  enqueue(job: StageJob, delayMs = 0): boolean {
    if (this.stopped) {
      this.deps.logger.warn(`[mover:scheduler] stopped; dropping ${job.stage} for ${job.migrationId}`);
      return false;
    }
    const key = jobKey(job);
    if (this.delayed.has(key) || this.readyKeys.has(key)) {
      this.deps.logger.debug?.(`[mover:scheduler] ${job.stage} for ${job.migrationId} already queued`);
      return false;
    }

    if (delayMs <= 0) {
      this.pushReady(job);
    } else {
      const timer = setTimeout(() => {
        this.delayed.delete(key);
        this.pushReady(job);
      }, delayMs);
      this.delayed.set(key, { job, timer });
      this.deps.logger.debug?.(
        `[mover:scheduler] ${job.stage} for ${job.migrationId} (attempt ${job.attempt}) in ${Math.round(delayMs)}ms`,
      );
    }
    return true;
  }

  /** Jobs waiting on a timer or in the ready queue. */
  get pendingCount(): number {
    return this.delayed.size + this.ready.length;
  }

  get runningCount(): number {
    return this.running;
  }

  /** Resolves once nothing is ready or running. Delayed jobs do not count. */
  idle(): Promise<void> {
    if (this.ready.length === 0 && this.running === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Drop every waiting job. Running jobs finish; their follow-ups are discarded. */
  stop(): void {
    this.stopped = true;
    for (const { timer } of this.delayed.values()) clearTimeout(timer);
    this.delayed.clear();
    this.ready.length = 0;
    this.readyKeys.clear();
    this.deps.logger.info(`[mover:scheduler] stopped (${this.running} job(s) still finishing)`);
    this.checkIdle();
  }

  private pushReady(job: StageJob): void {
    this.ready.push(job);
    this.readyKeys.add(jobKey(job));
    this.pump();
  }

  private pump(): void {
    while (this.ready.length > 0 && this.running < this.deps.concurrency) {
      const job = this.ready.shift();
      if (!job) break;
      this.readyKeys.delete(jobKey(job));
      this.running++;
      void this.execute(job);
    }
  }

  private async execute(job: StageJob): Promise<void> {
    try {
      await this.deps.run(job);
    } catch (err) {
      this.deps.logger.error(
        `[mover:scheduler] ${job.stage} for ${job.migrationId} threw: ${errorMessage(err)}`,
      );
    } finally {
      this.running--;
      this.pump();
      this.checkIdle();
    }
  }

  private checkIdle(): void {
    if (this.ready.length > 0 || this.running > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
