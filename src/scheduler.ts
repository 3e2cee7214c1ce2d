import { BusyError, messageFromCause } from './errors.js';
import { isTerminal } from './state-machine.js';
import type { GenerationWorker } from './generation-worker.js';
import type { RetentionSweeper } from './retention.js';
import type { TaskStore } from './task-store.js';
import type { RequestValidator } from './validation.js';

export type CancelOutcome = 'cancelled' | 'signalled' | 'not_found' | 'already_terminal';
export type RemoveOutcome = 'removed' | 'not_found' | 'active';

export interface SchedulerStats {
  queued: number;
  running: number;
  stored: number;
}

export interface TaskSchedulerDeps {
  store: TaskStore;
  worker: Pick<GenerationWorker, 'run'>;
  validate: RequestValidator;
  retention?: Pick<RetentionSweeper, 'evictRecords'>;
}

export interface TaskSchedulerOptions {
  /** Tasks run at the same time. */
  workers: number;
  /** Ceiling on queued + running tasks; submissions past it are rejected. */
  maxPendingTasks: number;
  /** Store size that triggers an eviction pass after a submission. */
  maxStoredTasks?: number;
}

interface RunningTask {
  controller: AbortController;
  done: Promise<void>;
}

/**
 * Accepts generation requests and runs them off the request path, FIFO, with
 * at most `workers` in flight. Submission returns as soon as the task exists.
 */
export class TaskScheduler {
  private readonly queue: string[] = [];
  private readonly running = new Map<string, RunningTask>();
  private dispatchScheduled = false;
  private closed = false;

  constructor(
    private readonly deps: TaskSchedulerDeps,
    private readonly options: TaskSchedulerOptions,
  ) {
    if (options.workers < 1) throw new Error(`workers must be at least 1, got ${options.workers}`);
  }

  /** Validates, admits and queues a request; returns the new task id. */
  submit(input: unknown): string {
    if (this.closed) throw new Error('Scheduler is shut down');
    const request = this.deps.validate(input);

    const outstanding = this.queue.length + this.running.size;
    if (outstanding >= this.options.maxPendingTasks) {
      console.warn(`[scheduler] Rejected submission: ${outstanding}/${this.options.maxPendingTasks} tasks outstanding`);
      throw new BusyError(outstanding, this.options.maxPendingTasks);
    }

    const task = this.deps.store.create(request);
    this.queue.push(task.id);
    console.log(
      `[scheduler] Queued task ${task.id} (speaker ${request.speakerId}, ` +
      `${outstanding + 1}/${this.options.maxPendingTasks} outstanding)`,
    );
    this.enforceStoreLimit();
    this.scheduleDispatch();
    return task.id;
  }

  cancel(taskId: string): CancelOutcome {
    const { store } = this.deps;
    const record = store.get(taskId);
    if (!record) return 'not_found';
    if (isTerminal(record)) return 'already_terminal';

    const running = this.running.get(taskId);
    if (running) {
      running.controller.abort();
      console.log(`[scheduler] Cancellation requested for running task ${taskId}`);
      return 'signalled';
    }

    const index = this.queue.indexOf(taskId);
    if (index >= 0) this.queue.splice(index, 1);
    store.fail(taskId, { message: 'Cancelled by request', stage: 'cancelled' });
    console.log(`[scheduler] Cancelled queued task ${taskId}`);
    return 'cancelled';
  }

  /** Drops a finished task's record. Its audio file is left to the retention sweep. */
  remove(taskId: string): RemoveOutcome {
    const { store } = this.deps;
    const record = store.get(taskId);
    if (!record) return 'not_found';
    if (!isTerminal(record)) return 'active';
    store.evict([taskId]);
    console.log(`[scheduler] Removed task ${taskId}`);
    return 'removed';
  }

  stats(): SchedulerStats {
    return { queued: this.queue.length, running: this.running.size, stored: this.deps.store.size };
  }

  /** Resolves once no task is running. */
  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running.values()].map(r => r.done));
    }
  }

  /** Stops dispatching, fails queued tasks, aborts running ones and waits for them. */
  async close(): Promise<void> {
    if (this.closed) return this.drain();
    this.closed = true;

    for (const taskId of this.queue.splice(0)) {
      this.deps.store.fail(taskId, { message: 'Cancelled: service shutting down', stage: 'cancelled' });
    }
    for (const running of this.running.values()) running.controller.abort();
    await this.drain();
  }

  private scheduleDispatch(): void {
    if (this.dispatchScheduled || this.closed || this.queue.length === 0) return;
    this.dispatchScheduled = true;
    setImmediate(() => this.dispatch());
  }

  private dispatch(): void {
    this.dispatchScheduled = false;
    while (!this.closed && this.running.size < this.options.workers) {
      const taskId = this.queue.shift();
      if (taskId === undefined) return;
      this.start(taskId);
    }
  }

  private start(taskId: string): void {
    const controller = new AbortController();
    const done = this.deps.worker
      .run(taskId, controller.signal)
      .catch(err => this.recoverCrashedRun(taskId, err))
      .finally(() => {
        this.running.delete(taskId);
        this.scheduleDispatch();
      });
    this.running.set(taskId, { controller, done });
  }

  // The worker records its own failures; reaching this means it broke its contract.
  private recoverCrashedRun(taskId: string, err: unknown): void {
    const message = messageFromCause(err);
    console.error(`[scheduler] Worker crashed on task ${taskId}: ${message}`);
    const record = this.deps.store.get(taskId);
    if (record && !isTerminal(record)) {
      this.deps.store.fail(taskId, { message: `Worker crashed: ${message}`, stage: 'worker' });
    }
  }

  private enforceStoreLimit(): void {
    const { maxStoredTasks } = this.options;
    const { retention, store } = this.deps;
    if (!retention || maxStoredTasks === undefined || store.size <= maxStoredTasks) return;
    const report = retention.evictRecords();
    console.log(`[scheduler] Store over ${maxStoredTasks} tasks, evicted ${report.evicted}`);
  }
}
