/**
 * Print Job Queue
 *
 * Serializes every fiscal operation into one ordered stream. Jobs are kept in
 * a lookup table by task id and their ids in a FIFO; a single lazily started
 * worker drains the FIFO, running one job at a time to completion, so there is
 * never more than one device operation in flight across all printers.
 *
 * Synchronous callers wait on the job-finished event with a timeout. A timed out
 * wait does not cancel the job; the caller keeps the task id and polls.
 *
 * @module fiscal/services/PrintJobQueue
 */

import { EventEmitter } from 'events';
import { PrintJob, DEFAULT_JOB_TIMEOUT, TaskStatus } from './PrintJob';
import type { DeviceStatus } from '../status/DeviceStatus';
import { generateUrlSafeId } from '../../../shared/utils/id-generator';
import { debugLogger } from '../../../shared/utils/debug-logger';

export interface TaskInfoResult {
  taskStatus: TaskStatus;
  result?: DeviceStatus;
}

export type RunSyncResult =
  | { finished: true; taskId: string; result: DeviceStatus }
  | { finished: false; taskId: string };

export interface PrintJobQueueOptions {
  /** Finished tasks older than this are forgotten on the next enqueue (ms) */
  taskRetention?: number;
  /** Wait applied when runSync is given a negative timeout (ms) */
  defaultTimeout?: number;
}

export enum PrintJobQueueEvent {
  JOB_STARTED = 'job-started',
  JOB_FINISHED = 'job-finished',
}

const DEFAULT_TASK_RETENTION = 24 * 60 * 60 * 1000;

export class PrintJobQueue extends EventEmitter {
  private tasks: Map<string, PrintJob> = new Map();
  private queue: string[] = [];
  private worker: Promise<void> | null = null;
  private readonly taskRetention: number;
  private readonly defaultTimeout: number;

  constructor(options: PrintJobQueueOptions = {}) {
    super();
    this.taskRetention = options.taskRetention ?? DEFAULT_TASK_RETENTION;
    this.defaultTimeout = options.defaultTimeout ?? DEFAULT_JOB_TIMEOUT;
  }

  /**
   * Record the job, append it to the FIFO and make sure a worker runs.
   * Returns without waiting for the job.
   */
  enqueue(job: PrintJob): string {
    this.clearExpiredTasks();

    let taskId = generateUrlSafeId();
    while (this.tasks.has(taskId)) {
      taskId = generateUrlSafeId();
    }

    this.tasks.set(taskId, job);
    this.queue.push(taskId);
    debugLogger.jobOperation(`enqueued ${job.action}`, taskId, job.printerId);
    this.ensureWorker();
    return taskId;
  }

  /**
   * Enqueue and wait up to `timeoutMs` for the result.
   * 0 returns the task id at once, a negative timeout uses the default.
   */
  async runSync(job: PrintJob, timeoutMs: number): Promise<RunSyncResult> {
    const taskId = this.enqueue(job);
    if (timeoutMs === 0) {
      return { finished: false, taskId };
    }

    const finished = await this.waitForJob(taskId, timeoutMs < 0 ? this.defaultTimeout : timeoutMs);
    if (finished && job.result) {
      return { finished: true, taskId, result: job.result };
    }
    return { finished: false, taskId };
  }

  /**
   * Resolves true once the task has finished, false on timeout or for an
   * unknown task id
   */
  waitForJob(taskId: string, timeoutMs: number): Promise<boolean> {
    const job = this.tasks.get(taskId);
    if (!job) return Promise.resolve(false);
    if (job.finished) return Promise.resolve(true);

    return new Promise<boolean>((resolve) => {
      const onFinished = (finishedTaskId: string): void => {
        if (finishedTaskId !== taskId) return;
        clearTimeout(timer);
        this.off(PrintJobQueueEvent.JOB_FINISHED, onFinished);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.off(PrintJobQueueEvent.JOB_FINISHED, onFinished);
        resolve(false);
      }, timeoutMs);
      this.on(PrintJobQueueEvent.JOB_FINISHED, onFinished);
    });
  }

  /**
   * Status and, when finished, result of a task. Unknown ids report
   * TaskStatus.UNKNOWN.
   */
  getTaskInfo(taskId: string): TaskInfoResult {
    const job = this.tasks.get(taskId);
    if (!job) {
      return { taskStatus: TaskStatus.UNKNOWN };
    }
    return job.result ? { taskStatus: job.status, result: job.result } : { taskStatus: job.status };
  }

  hasPendingJobs(): boolean {
    return this.queue.length > 0;
  }

  /**
   * Resolves once the FIFO is drained
   */
  async drain(): Promise<void> {
    while (this.worker) {
      await this.worker;
    }
  }

  /**
   * Forget finished tasks older than the retention period
   * @returns the number of tasks removed
   */
  clearExpiredTasks(now: number = Date.now()): number {
    let removed = 0;
    for (const [taskId, job] of this.tasks) {
      if (job.finishedAt && now - job.finishedAt.getTime() > this.taskRetention) {
        this.tasks.delete(taskId);
        removed++;
      }
    }
    if (removed > 0) {
      debugLogger.debug(`Cleared ${removed} expired task(s)`, undefined, 'PrintJobQueue');
    }
    return removed;
  }

  private ensureWorker(): void {
    if (this.worker) return;

    this.worker = this.consume()
      .catch((error: unknown) => {
        debugLogger.error('Print job worker stopped unexpectedly', error, 'PrintJobQueue');
      })
      .finally(() => {
        this.worker = null;
        // Jobs enqueued while the worker was winding down
        if (this.queue.length > 0) {
          this.ensureWorker();
        }
      });
  }

  private async consume(): Promise<void> {
    // Let enqueue() return before the first job starts
    await Promise.resolve();

    for (let taskId = this.queue.shift(); taskId !== undefined; taskId = this.queue.shift()) {
      const job = this.tasks.get(taskId);
      if (!job) continue;

      debugLogger.jobOperation(`started ${job.action}`, taskId, job.printerId);
      this.emit(PrintJobQueueEvent.JOB_STARTED, taskId);

      const result = await job.run();

      debugLogger.jobOperation(`finished ${job.action}`, taskId, job.printerId, { ok: result.ok });
      this.emit(PrintJobQueueEvent.JOB_FINISHED, taskId);
    }
  }
}
