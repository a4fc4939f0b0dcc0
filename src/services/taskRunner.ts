import { v4 as uuid } from 'uuid';
import type { TaskRepository } from '../repositories/types';
import type { TaskRecord } from '../types/task';
import { ForbiddenError, NotFoundError, errorMessage } from '../utils/errors';
import { Logger } from '../utils/Logger';
import { addDays, systemClock, type Clock } from '../utils/time';

export type ProgressReporter = (progress: number) => Promise<void>;

export type TaskWork<T> = (reportProgress: ProgressReporter) => Promise<T>;

/**
 * Runs work in the background and mirrors its state into task_status so clients can poll.
 */
export class TaskRunner {
  private readonly inflight = new Map<string, Promise<void>>();

  constructor(
    private readonly tasks: TaskRepository,
    private readonly clock: Clock = systemClock
  ) {}

  async start<T>(kind: string, userId: string | null, work: TaskWork<T>): Promise<TaskRecord> {
    const now = this.clock().toISOString();
    const task = await this.tasks.insert({
      id: `task_${uuid()}`,
      user_id: userId,
      kind,
      status: 'pending',
      progress: 0,
      result: null,
      error: null,
      created_at: now,
      updated_at: now,
    });

    this.inflight.set(task.id, this.run(task, work));
    return task;
  }

  private async run<T>(task: TaskRecord, work: TaskWork<T>): Promise<void> {
    const touch = () => this.clock().toISOString();
    try {
      await this.tasks.update(task.id, { status: 'running', updated_at: touch() });
      const result = await work(async (progress) => {
        const clamped = Math.max(0, Math.min(100, Math.round(progress)));
        await this.tasks.update(task.id, { progress: clamped, updated_at: touch() });
      });
      await this.tasks.update(task.id, { status: 'completed', progress: 100, result, updated_at: touch() });
    } catch (err) {
      await Logger.logBackendError('TaskRunner', err, {
        TransactionID: task.id,
        UserID: task.user_id ?? undefined,
        Endpoint: task.kind,
        Status: 'TASK_FAILED',
      });
      try {
        await this.tasks.update(task.id, { status: 'failed', error: errorMessage(err), updated_at: touch() });
      } catch (updateErr) {
        await Logger.logError('TaskRunner', updateErr, { TransactionID: task.id, Status: 'TASK_STATE_LOST' });
      }
    } finally {
      this.inflight.delete(task.id);
    }
  }

  async get(id: string, userId?: string | null): Promise<TaskRecord> {
    const task = await this.tasks.findById(id);
    if (!task) throw new NotFoundError('Task');
    if (userId !== undefined && task.user_id !== null && task.user_id !== userId) {
      throw new ForbiddenError('Task belongs to another account');
    }
    return task;
  }

  async waitFor(id: string): Promise<TaskRecord> {
    await this.inflight.get(id);
    return this.get(id);
  }

  purgeFinished(retentionDays: number): Promise<number> {
    return this.tasks.deleteFinishedOlderThan(addDays(this.clock(), -retentionDays).toISOString());
  }

  async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight.values()]);
    }
  }
}
