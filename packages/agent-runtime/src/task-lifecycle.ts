import type { Artifact, Message, Part, Task } from '@agent-mesh/core';
import { TaskState, createMessage, generateId, now, textPart } from '@agent-mesh/core';
import { InvalidTaskTransitionError } from './errors.js';
import type { TaskStore } from './task-store.js';

const VALID_TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
  [TaskState.SUBMITTED]: [
    TaskState.WORKING,
    TaskState.COMPLETED,
    TaskState.FAILED,
    TaskState.CANCELED,
    TaskState.REJECTED,
  ],
  [TaskState.WORKING]: [
    TaskState.WORKING,
    TaskState.INPUT_REQUIRED,
    TaskState.COMPLETED,
    TaskState.FAILED,
    TaskState.CANCELED,
  ],
  [TaskState.INPUT_REQUIRED]: [TaskState.WORKING, TaskState.FAILED, TaskState.CANCELED],
  [TaskState.AUTH_REQUIRED]: [TaskState.WORKING, TaskState.FAILED, TaskState.CANCELED],
  [TaskState.UNKNOWN]: [],
  [TaskState.COMPLETED]: [],
  [TaskState.CANCELED]: [],
  [TaskState.FAILED]: [],
  [TaskState.REJECTED]: [],
};

export function canTransition(from: TaskState, to: TaskState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Applies the task state machine on top of a `TaskStore`. History is only
 * ever appended to, and any message set as `status.message` is appended in
 * the same write.
 */
export class TaskLifecycle {
  constructor(private readonly store: TaskStore) {}

  /**
   * Register a task for an inbound message. Reuses the message's
   * `contextId` so follow-up requests stay correlated.
   */
  createTask(inbound: Message): Task {
    const id = generateId();
    const contextId = inbound.contextId ?? generateId();
    const task: Task = {
      kind: 'task',
      id,
      contextId,
      status: { state: TaskState.SUBMITTED, timestamp: now() },
      history: [{ ...inbound, taskId: id, contextId }],
    };
    return this.store.insert(task);
  }

  peek(taskId: string): Task | undefined {
    return this.store.get(taskId);
  }

  /** Streaming path: move to `working`, optionally with a progress message. */
  reportProgress(taskId: string, text?: string): Task {
    return this.transition(taskId, TaskState.WORKING, (task) =>
      text === undefined ? undefined : this.agentMessage(task, [textPart(text)]),
    );
  }

  completeTask(taskId: string, reply: Part[] | Message, artifacts?: Artifact[]): Task {
    return this.transition(
      taskId,
      TaskState.COMPLETED,
      (task) => (Array.isArray(reply) ? this.agentMessage(task, reply) : this.stamp(task, reply)),
      artifacts,
    );
  }

  /** Fail with a reply whose first part is the error description. */
  failTask(taskId: string, description: string, extraParts: Part[] = []): Task {
    return this.transition(taskId, TaskState.FAILED, (task) =>
      this.agentMessage(task, [textPart(description), ...extraParts]),
    );
  }

  cancelTask(taskId: string, reason: string): Task {
    return this.transition(taskId, TaskState.CANCELED, (task) =>
      this.agentMessage(task, [textPart(reason)]),
    );
  }

  private transition(
    taskId: string,
    to: TaskState,
    buildMessage: (task: Task) => Message | undefined,
    artifacts?: Artifact[],
  ): Task {
    return this.store.update(taskId, (task) => {
      const from = task.status.state;
      if (!canTransition(from, to)) {
        throw new InvalidTaskTransitionError(taskId, from, to);
      }

      const message = buildMessage(task);
      if (message) task.history.push(message);
      task.status = {
        state: to,
        ...(message ? { message } : {}),
        timestamp: now(),
      };
      if (artifacts && artifacts.length > 0) {
        task.artifacts = [...(task.artifacts ?? []), ...artifacts];
      }
    });
  }

  private agentMessage(task: Task, parts: Part[]): Message {
    return createMessage('agent', parts, { taskId: task.id, contextId: task.contextId });
  }

  private stamp(task: Task, message: Message): Message {
    return { ...message, taskId: task.id, contextId: task.contextId };
  }
}
