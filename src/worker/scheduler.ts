import { type Logger, toError } from "@/lib/logger";

export type TaskState = "stopped" | "running";

export interface ScheduledTask {
  id: string;
  fn: (signal: AbortSignal) => Promise<void>;
  /** Read before every sleep, so interval changes apply on the next cycle */
  getIntervalMs: () => number;
  /** Run once before the first sleep (default true) */
  runImmediately?: boolean;
}

export interface TaskHandle {
  id: string;
  getState: () => TaskState;
  isExecuting: () => boolean;
  cancel: () => void;
  /** Settles when the loop has exited */
  done: Promise<void>;
}

export interface Scheduler {
  schedule: (task: ScheduledTask) => TaskHandle;
  cancelAll: () => void;
  waitForRunning: (timeoutMs?: number) => Promise<void>;
}

export interface SchedulerDeps {
  logger: Logger;
}

const sleep = (ms: number, signal: AbortSignal): Promise<void> =>
  new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Runs each task in its own loop: execute, then sleep for the task's current
 * interval. A failing run is logged and the loop carries on.
 */
export const createScheduler = ({ logger }: SchedulerDeps): Scheduler => {
  const tasks = new Map<string, TaskHandle>();

  const schedule = (task: ScheduledTask): TaskHandle => {
    tasks.get(task.id)?.cancel();

    const controller = new AbortController();
    const { signal } = controller;
    let state: TaskState = "running";
    let executing = false;

    const execute = async (): Promise<void> => {
      executing = true;
      try {
        await task.fn(signal);
      } catch (error) {
        if (!signal.aborted) {
          logger.error(`Task ${task.id} failed`, toError(error));
        }
      } finally {
        executing = false;
      }
    };

    const loop = async (): Promise<void> => {
      if (task.runImmediately ?? true) {
        await execute();
      }
      while (!signal.aborted) {
        await sleep(task.getIntervalMs(), signal);
        if (signal.aborted) {
          break;
        }
        await execute();
      }
    };

    const done = loop().finally(() => {
      state = "stopped";
      if (tasks.get(task.id) === handle) {
        tasks.delete(task.id);
      }
    });

    const handle: TaskHandle = {
      id: task.id,
      getState: () => state,
      isExecuting: () => executing,
      cancel: (): void => {
        controller.abort();
      },
      done,
    };
    tasks.set(task.id, handle);
    return handle;
  };

  const cancelAll = (): void => {
    for (const handle of tasks.values()) {
      handle.cancel();
    }
  };

  const executingIds = (): string[] =>
    Array.from(tasks.values())
      .filter((handle) => handle.isExecuting())
      .map((handle) => handle.id);

  const waitForRunning = async (timeoutMs = 5000): Promise<void> => {
    const start = Date.now();
    while (executingIds().length > 0 && Date.now() - start < timeoutMs) {
      await new Promise<void>((resolve) =>
        setTimeout(() => {
          resolve();
        }, 100),
      );
    }
    const stillRunning = executingIds();
    if (stillRunning.length > 0) {
      logger.warn(`Some tasks did not complete within timeout: ${stillRunning.join(", ")}`);
    }
  };

  return { schedule, cancelAll, waitForRunning };
};
