/**
 * Serial job queue (p-queue, concurrency 1). Used as the global
 * reconciliation lock: at most one pass runs at a time, in FIFO order.
 *
 * Cancellation is cooperative. A pending job is dropped when it reaches the
 * front; a running job only sees its signal abort and keeps the slot until
 * its function returns.
 *
 * Jobs enqueued under a key that already has a job waiting to start share
 * that job instead of adding a duplicate.
 */

import { LRUCache } from "lru-cache";
import PQueue from "p-queue";

export type JobStatus = "pending" | "running" | "completed" | "failed" | "cancelled";

export interface JobHandle<T> {
  id: string;
  key: string | null;
  promise: Promise<T>;
  cancel: () => void;
  getStatus: () => JobStatus;
  /** True when this handle was returned for an already-pending job */
  coalesced: boolean;
}

export interface SerialQueue<T = unknown> {
  enqueue: (fn: (signal: AbortSignal) => Promise<T>, key?: string) => JobHandle<T>;
  /** Recent jobs only; older statuses are evicted */
  getStatus: (id: string) => JobStatus | null;
  getPendingCount: () => number;
  isBusy: () => boolean;
  cancelAll: () => void;
  waitForIdle: () => Promise<void>;
}

export interface SerialQueueOptions {
  /** Settled job statuses kept for lookup by id */
  statusHistory?: number;
}

export class JobCancelledError extends Error {
  public override readonly name = "JobCancelledError";

  constructor(
    public readonly jobId: string,
    options?: ErrorOptions,
  ) {
    super(`Job ${jobId} was cancelled`, options);
  }
}

export const createSerialQueue = <T = unknown>(options: SerialQueueOptions = {}): SerialQueue<T> => {
  const queue = new PQueue({ concurrency: 1 });
  const history = new LRUCache<string, JobStatus>({ max: options.statusHistory ?? 100 });
  const live = new Map<string, { controller: AbortController; getStatus: () => JobStatus }>();
  const waiting = new Map<string, JobHandle<T>>();
  let counter = 0;

  const enqueue = (fn: (signal: AbortSignal) => Promise<T>, key?: string): JobHandle<T> => {
    const existing = key === undefined ? undefined : waiting.get(key);
    if (existing && existing.getStatus() === "pending") {
      return { ...existing, coalesced: true };
    }

    const jobId = `${key ?? "job"}#${++counter}`;
    const controller = new AbortController();
    let status: JobStatus = "pending";
    const setStatus = (next: JobStatus): void => {
      status = next;
      history.set(jobId, next);
    };
    const release = (): void => {
      if (key !== undefined && waiting.get(key)?.id === jobId) {
        waiting.delete(key);
      }
    };

    setStatus("pending");
    live.set(jobId, { controller, getStatus: () => status });

    const promise = queue.add(
      async (): Promise<T> => {
        release();
        try {
          if (controller.signal.aborted) {
            setStatus("cancelled");
            throw new JobCancelledError(jobId);
          }

          setStatus("running");
          try {
            const result = await fn(controller.signal);
            setStatus("completed");
            return result;
          } catch (error) {
            if (controller.signal.aborted) {
              setStatus("cancelled");
              throw new JobCancelledError(jobId, { cause: error });
            }
            setStatus("failed");
            throw error;
          }
        } finally {
          live.delete(jobId);
        }
      },
      { throwOnTimeout: true },
    );

    const cancel = (): void => {
      if (status === "pending" || status === "running") {
        controller.abort();
        release();
      }
    };

    const handle: JobHandle<T> = {
      id: jobId,
      key: key ?? null,
      promise,
      cancel,
      getStatus: () => status,
      coalesced: false,
    };
    if (key !== undefined) {
      waiting.set(key, handle);
    }
    return handle;
  };

  const getStatus = (id: string): JobStatus | null => live.get(id)?.getStatus() ?? history.get(id) ?? null;

  const getPendingCount = (): number => queue.size + queue.pending;

  const isBusy = (): boolean => queue.pending > 0;

  const cancelAll = (): void => {
    for (const { controller, getStatus: statusOf } of live.values()) {
      const status = statusOf();
      if (status === "pending" || status === "running") {
        controller.abort();
      }
    }
    waiting.clear();
  };

  const waitForIdle = async (): Promise<void> => {
    await queue.onIdle();
  };

  return {
    enqueue,
    getStatus,
    getPendingCount,
    isBusy,
    cancelAll,
    waitForIdle,
  };
};
