import type { Task } from '@agent-mesh/core';
import { isTerminalState } from '@agent-mesh/core';
import { TaskNotFoundError } from './errors.js';

export interface TaskStoreOptions {
  /** Terminal tasks older than this are evicted. Default: 1 hour. */
  ttlMs?: number;
  /** Soft cap on retained tasks; only terminal tasks are evicted. Default: 10 000. */
  maxTasks?: number;
  /** Injectable clock (ms since epoch). */
  clock?: () => number;
}

const DEFAULT_TTL_MS = 60 * 60 * 1000;
const DEFAULT_MAX_TASKS = 10_000;

/**
 * In-memory task table shared by every request one agent handles.
 *
 * Every method is synchronous, so each call runs to completion on the event
 * loop before another request can touch the map. Tasks are cloned on the
 * way in and out; callers never hold a reference into the table.
 */
export class TaskStore {
  private readonly tasks = new Map<string, Task>();
  /** Terminal task ids to their last-touched time, oldest first. */
  private readonly terminal = new Map<string, number>();
  private readonly ttlMs: number;
  private readonly maxTasks: number;
  private readonly clock: () => number;

  constructor(options: TaskStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.maxTasks = options.maxTasks ?? DEFAULT_MAX_TASKS;
    this.clock = options.clock ?? Date.now;
  }

  insert(task: Task): Task {
    if (this.tasks.has(task.id)) {
      throw new Error(`Task with id ${task.id} already exists`);
    }
    const now = this.clock();
    this.sweep(now);
    this.tasks.set(task.id, structuredClone(task));
    this.touch(task, now);
    return structuredClone(task);
  }

  get(taskId: string): Task | undefined {
    const task = this.tasks.get(taskId);
    return task ? structuredClone(task) : undefined;
  }

  has(taskId: string): boolean {
    return this.tasks.has(taskId);
  }

  /**
   * Apply `mutate` to a working copy and commit it. If `mutate` throws,
   * the stored task is left untouched.
   */
  update(taskId: string, mutate: (task: Task) => void): Task {
    const stored = this.tasks.get(taskId);
    if (!stored) throw new TaskNotFoundError(taskId);

    const draft = structuredClone(stored);
    mutate(draft);
    this.tasks.set(taskId, draft);
    this.touch(draft, this.clock());
    return structuredClone(draft);
  }

  list(): Task[] {
    return [...this.tasks.values()].map((task) => structuredClone(task));
  }

  get size(): number {
    return this.tasks.size;
  }

  /**
   * Evict terminal tasks, oldest first, while they are past their TTL or
   * the table is at capacity. Returns the number evicted.
   */
  sweep(now: number = this.clock()): number {
    let evicted = 0;
    const cutoff = now - this.ttlMs;

    for (const [id, touchedAt] of this.terminal) {
      if (touchedAt > cutoff && this.tasks.size < this.maxTasks) break;
      this.terminal.delete(id);
      this.tasks.delete(id);
      evicted++;
    }

    return evicted;
  }

  /** Move a task to the young end of the terminal order, or drop it from it. */
  private touch(task: Task, now: number): void {
    this.terminal.delete(task.id);
    if (isTerminalState(task.status.state)) this.terminal.set(task.id, now);
  }
}
