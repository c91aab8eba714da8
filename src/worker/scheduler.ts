import { toError, type Logger } from "@/lib/logger";

export interface ScheduledTask {
  id: string;
  fn: () => Promise<void>;
  intervalMs: number;
  enabled: boolean;
  /** Overrides the scheduler's retry policy; `false` runs once per tick */
  retry?: Partial<RetryConfig> | false;
}

export interface TaskHandle {
  cancel: () => void;
  isRunning: () => boolean;
}

export interface RetryConfig {
  maxRetries: number;
  retryDelayMs: number;
  backoffMultiplier: number;
}

export interface SchedulerConfig {
  logger: Logger;
  retry?: Partial<RetryConfig>;
}

export interface Scheduler {
  schedule: (task: ScheduledTask) => TaskHandle;
  cancelAll: () => void;
  waitForRunning: (timeoutMs?: number) => Promise<void>;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  retryDelayMs: 1000,
  backoffMultiplier: 2,
};

const NO_RETRY: RetryConfig = { maxRetries: 0, retryDelayMs: 0, backoffMultiplier: 1 };

const delay = (ms: number): Promise<void> =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

export const createScheduler = (config: SchedulerConfig): Scheduler => {
  const { logger } = config;
  const baseRetry: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config.retry };
  /** Stop functions of scheduled tasks by id */
  const tasks = new Map<string, () => void>();
  const runningTasks = new Set<string>();

  const executeWithRetry = async (
    task: ScheduledTask,
    retry: RetryConfig,
    isCancelled: () => boolean,
  ): Promise<void> => {
    for (let attempt = 0; ; attempt++) {
      try {
        await task.fn();
        return;
      } catch (error) {
        if (attempt >= retry.maxRetries || isCancelled()) {
          throw error;
        }
        const retryInMs = retry.retryDelayMs * retry.backoffMultiplier ** attempt;
        logger.warn(
          `Task ${task.id} failed (attempt ${attempt + 1}/${retry.maxRetries + 1}), retrying in ${retryInMs}ms`,
          { message: toError(error).message },
        );
        await delay(retryInMs);
        if (isCancelled()) return;
      }
    }
  };

  const schedule = (task: ScheduledTask): TaskHandle => {
    if (!task.enabled) {
      return {
        cancel: (): void => {},
        isRunning: (): boolean => false,
      };
    }

    const retry = task.retry === false ? NO_RETRY : { ...baseRetry, ...task.retry };
    let cancelled = false;

    const execute = async (): Promise<void> => {
      if (runningTasks.has(task.id)) {
        return; // Skip if already running
      }

      runningTasks.add(task.id);
      try {
        await executeWithRetry(task, retry, () => cancelled);
      } catch (error) {
        logger.error(`Task ${task.id} failed after retries`, toError(error));
      } finally {
        runningTasks.delete(task.id);
      }
    };

    // Execute immediately, then schedule interval
    void execute();
    const intervalId = setInterval(() => {
      void execute();
    }, task.intervalMs);
    const stop = (): void => {
      cancelled = true;
      clearInterval(intervalId);
    };
    tasks.set(task.id, stop);

    return {
      cancel: (): void => {
        stop();
        if (tasks.get(task.id) === stop) {
          tasks.delete(task.id);
        }
      },
      isRunning: (): boolean => runningTasks.has(task.id),
    };
  };

  const cancelAll = (): void => {
    for (const stop of tasks.values()) {
      stop();
    }
    tasks.clear();
  };

  const waitForRunning = async (timeoutMs = 5000): Promise<void> => {
    const start = Date.now();
    while (runningTasks.size > 0 && Date.now() - start < timeoutMs) {
      await delay(100);
    }
    if (runningTasks.size > 0) {
      logger.warn(
        `Some tasks did not complete within timeout: ${Array.from(runningTasks).join(", ")}`,
      );
    }
  };

  return { schedule, cancelAll, waitForRunning };
};
