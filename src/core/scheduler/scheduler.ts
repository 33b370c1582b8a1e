import { Cron } from 'croner';
import * as logger from '../../utils/logger';
import { errorMessage } from '../../utils/errors';
import type { BackupKind } from '../../interfaces/backup';

type SignalName = 'SIGINT' | 'SIGTERM';
type IntervalHandle = ReturnType<typeof setInterval>;

interface CronJob {
  stop: () => void;
  nextRun: () => Date | null;
  previousRun: () => Date | null;
  isRunning: () => boolean;
}

type CronConstructor = new (
  expression: string,
  options?: Record<string, unknown>,
  callback?: () => void | Promise<void>,
) => CronJob;

export type Schedules = Readonly<Partial<Record<BackupKind, string>>>;

/**
 * One full run for a kind; resolves to whether it succeeded.
 */
export type RunKindFn = (kind: BackupKind) => Promise<boolean>;

export interface SchedulerOptions {
  verbosity?: number;
  cronConstructor?: CronConstructor;
  nowFn?: () => number;
  nowDateFn?: () => Date;
  registerSignalHandler?: (
    signal: SignalName,
    handler: () => void,
  ) => () => void;
  setIntervalFn?: (handler: () => void, ms: number) => IntervalHandle;
  clearIntervalFn?: (handle: IntervalHandle) => void;
  exitFn?: (code: number) => void;
}

/**
 * Cron daemon running the full pipeline for every kind that has a schedule.
 * Jobs are protected, so a run still in progress when its next tick fires
 * makes that tick a no-op.
 */
export function createScheduler(
  runKind: RunKindFn,
  options: SchedulerOptions = {},
) {
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;
  const CronImpl =
    options.cronConstructor ?? (Cron as unknown as CronConstructor);
  const now = options.nowFn ?? (() => Date.now());
  const nowDate = options.nowDateFn ?? (() => new Date());
  const registerSignalHandler =
    options.registerSignalHandler ??
    ((signal: SignalName, handler: () => void) => {
      process.on(signal, handler);
      return () => {
        process.off(signal, handler);
      };
    });
  const setIntervalFn =
    options.setIntervalFn ??
    ((handler: () => void, ms: number) => setInterval(handler, ms));
  const clearIntervalFn =
    options.clearIntervalFn ?? ((handle: IntervalHandle) => clearInterval(handle));
  const exitFn = options.exitFn ?? ((code: number) => process.exit(code));

  const jobs = new Map<BackupKind, CronJob>();

  const validateCronExpression = (expression: string): boolean => {
    try {
      new CronImpl(expression, { maxRuns: 1, paused: true }).stop();
      return true;
    } catch {
      return false;
    }
  };

  const runOnce = async (kind: BackupKind): Promise<boolean> => {
    const startTime = now();
    logger.info(`Starting ${kind} run`, verbosity);
    try {
      const ok = await runKind(kind);
      const duration = ((now() - startTime) / 1000).toFixed(1);
      if (ok) {
        logger.success(`${kind} run completed in ${duration}s`, verbosity);
      } else {
        logger.warning(
          `${kind} run finished with failures after ${duration}s`,
          verbosity,
        );
      }
      return ok;
    } catch (error) {
      logger.error(`${kind} run failed: ${errorMessage(error)}`);
      return false;
    }
  };

  const stopAll = (): void => {
    jobs.forEach((job, kind) => {
      job.stop();
      logger.verbose(`Stopped ${kind} schedule`, verbosity);
    });
    jobs.clear();
  };

  const keepAlive = async (): Promise<void> => {
    return new Promise((resolve) => {
      let stopped = false;
      let stopSigint: () => void = () => {};
      let stopSigterm: () => void = () => {};

      const heartbeat = setIntervalFn(() => {}, 60000);
      const shutdown = () => {
        if (stopped) {
          return;
        }
        stopped = true;
        logger.info('Shutting down daemon...', verbosity);
        stopAll();
        stopSigint();
        stopSigterm();
        clearIntervalFn(heartbeat);
        resolve();
        exitFn(0);
      };

      stopSigint = registerSignalHandler('SIGINT', shutdown);
      stopSigterm = registerSignalHandler('SIGTERM', shutdown);
    });
  };

  const getJobInfo = (): Array<{
    kind: BackupKind;
    nextRun: Date | null;
    previousRun: Date | null;
    running: boolean;
  }> =>
    Array.from(jobs.entries()).map(([kind, job]) => ({
      kind,
      nextRun: job.nextRun(),
      previousRun: job.previousRun(),
      running: job.isRunning(),
    }));

  /**
   * Registers one protected cron job per scheduled kind.
   */
  const schedule = (schedules: Schedules): void => {
    const entries = Object.entries(schedules).filter(
      (entry): entry is [BackupKind, string] => entry[1] !== undefined,
    );
    if (entries.length === 0) {
      throw new Error('No schedules configured (retention.schedules)');
    }
    for (const [, expression] of entries) {
      if (!validateCronExpression(expression)) {
        throw new Error(`Invalid cron expression: ${expression}`);
      }
    }

    for (const [kind, expression] of entries) {
      const job = new CronImpl(
        expression,
        { name: `dropshelf-${kind}`, protect: true },
        async () => {
          logger.info(
            `Scheduled ${kind} run triggered at ${nowDate().toISOString()}`,
            verbosity,
          );
          await runOnce(kind);
        },
      );
      jobs.set(kind, job);
    }

    for (const info of getJobInfo()) {
      logger.info(
        `${info.kind}: "${schedules[info.kind]}", next run ${info.nextRun?.toISOString() ?? 'unknown'}`,
        verbosity,
      );
    }
  };

  const startDaemon = async (schedules: Schedules): Promise<void> => {
    schedule(schedules);
    logger.success(`Daemon started with ${jobs.size} schedules`, verbosity);
    await keepAlive();
  };

  return { startDaemon, schedule, runOnce, stopAll, getJobInfo };
}

export type Scheduler = ReturnType<typeof createScheduler>;
