/**
 * Periodic pipeline scheduler.
 *
 * Fires a pipeline run on a cron expression (default every 2 hours), hands
 * the confirmed courses to the delivery channel and keeps running totals.
 * Runs never overlap: a tick or manual trigger that arrives while a run is
 * in flight is skipped.
 */

import cron from 'node-cron';
import { getLogger } from '../shared/logger.js';
import { DEFAULT_LIMITS } from '../shared/constants.js';
import { eventBus, type TypedEventEmitter } from '../shared/events.js';
import { errorMessage } from '../shared/errors.js';
import type { DeliveryChannel } from '../delivery/types.js';
import type { PipelineRunResult, PipelineRunner, RunTrigger } from '../pipeline/types.js';

const log = getLogger('scheduler', { component: 'run-scheduler' });

type CronTask = ReturnType<typeof cron.schedule>;

export interface RunSchedulerOptions {
  /** Default: `0 *\/2 * * *` */
  cronExpression?: string;
  delivery?: DeliveryChannel;
  events?: TypedEventEmitter;
}

export interface SchedulerStatus {
  running: boolean;
  paused: boolean;
  inFlight: boolean;
  cronExpression: string;
  totalRuns: number;
  failedRuns: number;
  totalCandidates: number;
  totalConfirmed: number;
  totalDelivered: number;
  lastRunAt: string | null;
  lastRunConfirmed: number;
  historySize: number;
}

export class RunScheduler {
  private readonly cronExpression: string;
  private readonly delivery: DeliveryChannel | null;
  private readonly events: TypedEventEmitter;
  private task: CronTask | null = null;
  private paused = false;
  private inFlight: Promise<PipelineRunResult> | null = null;

  private totalRuns = 0;
  private failedRuns = 0;
  private totalCandidates = 0;
  private totalConfirmed = 0;
  private totalDelivered = 0;
  private lastRunAt: string | null = null;
  private lastRunConfirmed = 0;

  constructor(
    private readonly pipeline: PipelineRunner,
    options: RunSchedulerOptions = {},
  ) {
    this.cronExpression = options.cronExpression ?? DEFAULT_LIMITS.RUN_SCHEDULE;
    this.delivery = options.delivery ?? null;
    this.events = options.events ?? eventBus;
  }

  start(): void {
    if (this.task) {
      log.warn('RunScheduler already running');
      return;
    }

    this.task = cron.schedule(this.cronExpression, () => {
      this.tick().catch((err) => {
        log.error({ err }, 'Scheduled pipeline run failed');
      });
    });

    log.info({ cron: this.cronExpression }, 'RunScheduler started');
  }

  stop(): void {
    if (!this.task) return;
    this.task.stop();
    this.task = null;
    log.info('RunScheduler stopped');
  }

  /** Scheduled ticks are ignored until `resume()`. */
  pause(): void {
    this.paused = true;
    log.info('RunScheduler paused');
  }

  resume(): void {
    this.paused = false;
    log.info('RunScheduler resumed');
  }

  get isPaused(): boolean {
    return this.paused;
  }

  /**
   * Runs the pipeline immediately, even while paused. Resolves `null` when
   * another run is already in flight; rejects when the run fails.
   */
  async triggerNow(): Promise<PipelineRunResult | null> {
    log.info('Triggering immediate pipeline run');
    return this.execute('manual');
  }

  /** Forgets previously emitted URLs so the next run can emit them again. */
  clearHistory(): number {
    const cleared = this.pipeline.clearHistory();
    log.info({ cleared }, 'Run history cleared');
    return cleared;
  }

  getStatus(): SchedulerStatus {
    return {
      running: this.task !== null,
      paused: this.paused,
      inFlight: this.inFlight !== null,
      cronExpression: this.cronExpression,
      totalRuns: this.totalRuns,
      failedRuns: this.failedRuns,
      totalCandidates: this.totalCandidates,
      totalConfirmed: this.totalConfirmed,
      totalDelivered: this.totalDelivered,
      lastRunAt: this.lastRunAt,
      lastRunConfirmed: this.lastRunConfirmed,
      historySize: this.pipeline.historySize,
    };
  }

  // -------------------------------------------------------------------------
  // Internal logic
  // -------------------------------------------------------------------------

  private async tick(): Promise<void> {
    if (this.paused) {
      log.debug('Scheduler paused, skipping tick');
      return;
    }
    await this.execute('scheduled');
  }

  private async execute(trigger: RunTrigger): Promise<PipelineRunResult | null> {
    if (this.inFlight) {
      log.warn({ trigger }, 'Pipeline run already in progress, skipping');
      return null;
    }

    const run = this.pipeline.run(trigger);
    this.inFlight = run;

    try {
      const result = await run;
      this.record(result);
      await this.deliver(result);
      return result;
    } catch (error) {
      this.failedRuns++;
      this.lastRunAt = new Date().toISOString();
      this.lastRunConfirmed = 0;
      throw error;
    } finally {
      this.inFlight = null;
    }
  }

  private record(result: PipelineRunResult): void {
    this.totalRuns++;
    this.totalCandidates += result.stats.candidates;
    this.totalConfirmed += result.courses.length;
    this.lastRunAt = result.startedAt;
    this.lastRunConfirmed = result.courses.length;
  }

  /** Delivery problems are logged; they never fail the run. */
  private async deliver(result: PipelineRunResult): Promise<void> {
    if (!this.delivery || result.courses.length === 0) {
      return;
    }

    try {
      const report = await this.delivery.deliver(result.courses);
      this.totalDelivered += report.delivered;
      this.events.emit('delivery:completed', {
        channel: report.channel,
        delivered: report.delivered,
        failed: report.failed.length,
      });
    } catch (error) {
      log.error(
        { runId: result.runId, channel: this.delivery.name, error: errorMessage(error) },
        'Delivery failed',
      );
    }
  }
}
