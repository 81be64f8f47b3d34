/**
 * Application entry point for the free course scout.
 *
 * Initializes all subsystems in order:
 * 1. Environment validation
 * 2. HTTP client, pipeline and delivery channel
 * 3. Scheduler (plus an optional run at start-up)
 *
 * Handles shutdown signals, uncaught exceptions and unhandled rejections.
 */

// Must come first so LOG_LEVEL from .env reaches the logger
import 'dotenv/config';
import { getLogger } from './shared/logger.js';
import { eventBus } from './shared/events.js';
import { isOperationalError } from './shared/errors.js';
import { loadEnv, type Env } from './env.js';
import { GotHttpClient } from './discovery/index.js';
import { createPipeline } from './pipeline/index.js';
import { createDeliveryChannel } from './delivery/index.js';
import { RunScheduler } from './scheduler/run-scheduler.js';

const logger = getLogger('server');

let scheduler: RunScheduler | undefined;

async function main(): Promise<void> {
  logger.info('Starting free course scout...');

  // ---------------------------------------------------------------------------
  // 1. Validate environment
  // ---------------------------------------------------------------------------
  let env: Env;
  try {
    env = loadEnv();
    logger.info({ nodeEnv: env.NODE_ENV }, 'Environment validated');
  } catch (error) {
    logger.fatal({ err: error }, 'Environment validation failed');
    process.exit(1);
  }

  // ---------------------------------------------------------------------------
  // 2. Pipeline and delivery
  // ---------------------------------------------------------------------------
  const http = new GotHttpClient({ timeoutMs: env.REQUEST_TIMEOUT_MS });
  const pipeline = createPipeline(env, { http, events: eventBus });
  const delivery = createDeliveryChannel(env, http);

  eventBus.on('source:completed', ({ runId, source, candidates, errors }) => {
    logger.debug({ runId, source, candidates, errors }, 'Source finished');
  });

  // ---------------------------------------------------------------------------
  // 3. Scheduler
  // ---------------------------------------------------------------------------
  scheduler = new RunScheduler(pipeline, {
    cronExpression: env.SCHEDULE_CRON,
    delivery,
    events: eventBus,
  });
  scheduler.start();

  logger.info(
    {
      schedule: env.SCHEDULE_CRON,
      delivery: delivery.name,
      validateCoupons: env.VALIDATE_COUPONS,
      apiPageCount: env.API_PAGE_COUNT,
      historyCapacity: env.HISTORY_CAPACITY,
    },
    'Free course scout started',
  );

  if (env.RUN_ON_START) {
    try {
      const result = await scheduler.triggerNow();
      if (result) {
        logger.info(
          { runId: result.runId, confirmed: result.courses.length, notes: result.notes.length },
          'Start-up run finished',
        );
      }
    } catch (error) {
      // Not fatal; the schedule keeps going
      logger.error({ err: error }, 'Start-up run failed');
    }
  }
}

// ---------------------------------------------------------------------------
// Shutdown and global error handlers
// ---------------------------------------------------------------------------

function shutdown(reason: string, exitCode: number): void {
  logger.info({ reason }, 'Shutting down');
  scheduler?.stop();
  process.exit(exitCode);
}

process.on('SIGINT', () => shutdown('SIGINT', 0));
process.on('SIGTERM', () => shutdown('SIGTERM', 0));

process.on('uncaughtException', (error: Error) => {
  logger.fatal({ err: error }, 'Uncaught exception - shutting down');
  shutdown('uncaughtException', 1);
});

process.on('unhandledRejection', (reason: unknown) => {
  // Expected failures (a source or delivery hiccup) are not worth a restart
  if (isOperationalError(reason)) {
    logger.error({ err: reason }, 'Unhandled operational rejection');
    return;
  }
  logger.fatal({ err: reason }, 'Unhandled rejection - shutting down');
  shutdown('unhandledRejection', 1);
});

// ---------------------------------------------------------------------------
// Start
// ---------------------------------------------------------------------------
main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start');
  process.exit(1);
});
