import { EventEmitter } from "events";
import { v4 as uuidv4 } from "uuid";
import {
  TERMINAL_STATES,
  type ExtractionParams,
  type ExtractionQueue,
  type ExtractionResult,
  type ExtractionTask,
  type ProgressStep,
  type QueueEvents,
  type TaskError,
  type TaskState,
} from "../types";
import { LoggingService, LogLevel } from "../services/logging/LoggingService";
import { ErrorCodes, ErrorSeverity, IntakeError, toErrorMessage } from "../utils/error";

export interface QueuedJob {
  taskId: string;
  imagePath: string;
  params: ExtractionParams;
}

export interface TaskContext {
  taskId: string;
  /**
   * Reports progress. Throws once the task has been revoked, so a worker stops
   * at its next step boundary.
   */
  progress(step: ProgressStep, percent: number): void;
  isRevoked(): boolean;
}

export interface TaskProcessor<TResult> {
  (job: QueuedJob, context: TaskContext): Promise<TResult>;
  /** Releases a job's resources when it is cancelled before it ever runs. */
  discard?(job: QueuedJob): Promise<void>;
}

export interface TaskQueueOptions {
  concurrency: number;
  resultTtlMs: number;
  now?: () => number;
  logger?: LoggingService;
}

interface TaskEntry<TResult> {
  task: ExtractionTask<TResult>;
  job: QueuedJob;
  settledAt?: number;
}

class TaskRevokedSignal extends Error {
  constructor(taskId: string) {
    super(`Task ${taskId} was revoked`);
    this.name = "TaskRevokedSignal";
  }
}

/**
 * In-process worker pool for extraction jobs. `submit` only enqueues; jobs
 * start on a later tick, at most `concurrency` at a time, with no ordering
 * guarantee between their completions.
 */
export class TaskQueue<TResult = ExtractionResult>
  extends EventEmitter
  implements ExtractionQueue<TResult>
{
  private entries = new Map<string, TaskEntry<TResult>>();
  private pending: QueuedJob[] = [];
  private running = 0;
  private discarding = 0;
  private closed = false;
  private idleWaiters: Array<() => void> = [];
  private readonly now: () => number;
  private readonly logger: LoggingService;

  constructor(
    private readonly processor: TaskProcessor<TResult>,
    private readonly options: TaskQueueOptions
  ) {
    super();
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? LoggingService.getInstance();
  }

  submit(imagePath: string, params: ExtractionParams, taskId?: string): string {
    if (this.closed) {
      throw new IntakeError("Task queue is closed", ErrorCodes.QUEUE_CLOSED, ErrorSeverity.MEDIUM, {
        component: "TaskQueue.submit",
        imagePath,
      });
    }

    this.pruneSettled();

    const id = taskId ?? uuidv4();
    if (this.entries.has(id)) {
      throw new IntakeError(`Task ${id} already exists`, ErrorCodes.DUPLICATE_TASK, ErrorSeverity.LOW, {
        component: "TaskQueue.submit",
        taskId: id,
      });
    }

    const timestamp = new Date(this.now()).toISOString();
    const job: QueuedJob = { taskId: id, imagePath, params };
    const entry: TaskEntry<TResult> = {
      job,
      task: {
        id,
        state: "PENDING",
        progressStep: "queued",
        progressPercent: 0,
        createdAt: timestamp,
        updatedAt: timestamp,
      },
    };

    this.entries.set(id, entry);
    this.pending.push(job);

    this.logger.log(LogLevel.INFO, "Task submitted", "TaskQueue", { taskId: id });
    this.emit("taskSubmitted", this.snapshot(entry));

    setImmediate(() => this.pump());
    return id;
  }

  status(taskId: string): ExtractionTask<TResult> | undefined {
    this.pruneSettled();
    const entry = this.entries.get(taskId);
    return entry ? this.snapshot(entry) : undefined;
  }

  /**
   * Queued tasks are dropped before they start and handed to the processor's
   * `discard` hook, if it has one. A running task is marked
   * REVOKED at once and its worker stops at the next step boundary. Terminal
   * tasks are left alone and report false.
   */
  cancel(taskId: string): boolean {
    const entry = this.entries.get(taskId);
    if (!entry || TERMINAL_STATES.has(entry.task.state)) {
      return false;
    }

    const wasQueued = entry.task.state === "PENDING";
    if (wasQueued) {
      this.pending = this.pending.filter((job) => job.taskId !== taskId);
    }

    this.settle(entry, "REVOKED", {
      error: { code: "TASK_REVOKED", message: "Task was cancelled" },
    });
    this.logger.log(LogLevel.INFO, "Task revoked", "TaskQueue", { taskId, wasQueued });

    if (wasQueued) this.discard(entry.job);
    return true;
  }

  list(): ExtractionTask<TResult>[] {
    return Array.from(this.entries.values(), (entry) => this.snapshot(entry));
  }

  /** Resolves once no task is queued, running or being discarded. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Stops accepting work and waits for queued and running tasks to finish. */
  async close(): Promise<void> {
    this.closed = true;
    await this.onIdle();
  }

  on<K extends keyof QueueEvents<TResult>>(event: K, listener: QueueEvents<TResult>[K]): this {
    return super.on(event, listener);
  }

  emit<K extends keyof QueueEvents<TResult>>(
    event: K,
    ...args: Parameters<QueueEvents<TResult>[K]>
  ): boolean {
    return super.emit(event, ...args);
  }

  private pump(): void {
    while (this.running < this.options.concurrency && this.pending.length > 0) {
      const job = this.pending.shift();
      if (!job) break;

      const entry = this.entries.get(job.taskId);
      if (!entry || entry.task.state !== "PENDING") continue;

      this.running++;
      void this.execute(entry).finally(() => {
        this.running--;
        this.pump();
        this.notifyIfIdle();
      });
    }
    this.notifyIfIdle();
  }

  private discard(job: QueuedJob): void {
    const hook = this.processor.discard;
    if (!hook) {
      this.notifyIfIdle();
      return;
    }

    this.discarding++;
    void hook
      .call(this.processor, job)
      .catch((error: unknown) => {
        this.logger.log(LogLevel.WARN, "Failed to discard cancelled job", "TaskQueue", {
          taskId: job.taskId,
          originalError: toErrorMessage(error),
        });
      })
      .finally(() => {
        this.discarding--;
        this.notifyIfIdle();
      });
  }

  private async execute(entry: TaskEntry<TResult>): Promise<void> {
    const { job } = entry;
    const context: TaskContext = {
      taskId: job.taskId,
      isRevoked: () => entry.task.state === "REVOKED",
      progress: (step, percent) => {
        if (entry.task.state === "REVOKED") {
          throw new TaskRevokedSignal(job.taskId);
        }
        this.updateProgress(entry, step, percent);
      },
    };

    try {
      const result = await this.processor(job, context);
      if (entry.task.state === "REVOKED") return;

      this.settle(entry, "SUCCESS", { result });
      this.logger.log(LogLevel.INFO, "Task completed", "TaskQueue", { taskId: job.taskId });
    } catch (error) {
      if (entry.task.state === "REVOKED") return;

      const taskError = this.toTaskError(error);
      this.settle(entry, "FAILURE", { error: taskError });
      this.logger.log(LogLevel.ERROR, "Task failed", "TaskQueue", {
        taskId: job.taskId,
        ...taskError,
      });
    }
  }

  private updateProgress(entry: TaskEntry<TResult>, step: ProgressStep, percent: number): void {
    if (TERMINAL_STATES.has(entry.task.state)) return;
    // Progress never moves backwards
    if (percent < entry.task.progressPercent) return;

    entry.task = {
      ...entry.task,
      state: "PROGRESS",
      progressStep: step,
      progressPercent: percent,
      updatedAt: new Date(this.now()).toISOString(),
    };
    this.emit("taskUpdated", this.snapshot(entry));
  }

  private settle(
    entry: TaskEntry<TResult>,
    state: TaskState,
    outcome: { result?: TResult; error?: TaskError }
  ): void {
    entry.settledAt = this.now();
    entry.task = {
      ...entry.task,
      ...outcome,
      state,
      ...(state === "SUCCESS" ? { progressStep: "done" as const, progressPercent: 100 } : {}),
      updatedAt: new Date(entry.settledAt).toISOString(),
    };

    const snapshot = this.snapshot(entry);
    this.emit("taskUpdated", snapshot);
    this.emit("taskSettled", snapshot);
  }

  private toTaskError(error: unknown): TaskError {
    if (error instanceof IntakeError) {
      return { code: error.code, message: error.message };
    }
    return { code: ErrorCodes.TASK_FAILED, message: toErrorMessage(error) };
  }

  private snapshot(entry: TaskEntry<TResult>): ExtractionTask<TResult> {
    return { ...entry.task };
  }

  private pruneSettled(): void {
    const cutoff = this.now() - this.options.resultTtlMs;
    for (const [id, entry] of this.entries) {
      if (entry.settledAt !== undefined && entry.settledAt < cutoff) {
        this.entries.delete(id);
      }
    }
  }

  private isIdle(): boolean {
    return this.running === 0 && this.discarding === 0 && this.pending.length === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}
