import type {
  JsonRpcSuccessResponse,
  Logger,
  Message,
  Task,
  TaskStatusUpdateEvent,
} from '@agent-mesh/core';
import { describeError, isTerminalState } from '@agent-mesh/core';
import { AsyncEventQueue } from './async-event-queue.js';
import { successResponse } from './envelope-codec.js';
import { HandlerError } from './errors.js';
import type { CapabilityHandler, HandlerContext, HandlerResult } from './handler.js';
import type { TaskLifecycle } from './task-lifecycle.js';

const STREAM_CLOSED = 'Stream closed before completion';

export type StreamEvent = JsonRpcSuccessResponse<TaskStatusUpdateEvent>;

export interface StreamTaskOptions {
  lifecycle: TaskLifecycle;
  handler: CapabilityHandler;
  message: Message;
  requestId: string | number;
  logger: Logger;
  /** Connection-level signal; aborting it cancels the task. */
  signal?: AbortSignal;
}

interface ProgressReport {
  text: string;
  /** Resolves the handler's `progress()` call. */
  ack: () => void;
}

type Settled =
  | { ok: true; value: HandlerResult }
  | { ok: false; error: unknown };

function settle(run: () => Promise<HandlerResult>): Promise<Settled> {
  return Promise.resolve()
    .then(run)
    .then(
      (value): Settled => ({ ok: true, value }),
      (error: unknown): Settled => ({ ok: false, error }),
    );
}

function statusEvent(requestId: string | number, task: Task, final: boolean): StreamEvent {
  return successResponse(requestId, {
    kind: 'status-update',
    taskId: task.id,
    contextId: task.contextId,
    status: task.status,
    final,
  });
}

/**
 * Run one `message/stream` request: an acceptance `working` event, one
 * `working` event per handler progress report, then exactly one terminal
 * event with `final: true`.
 *
 * The generator is pull-driven. A progress report is only acknowledged
 * after the consumer asks for the next event, so the handler never runs
 * ahead of the transport. If the consumer stops early the handler's
 * signal is aborted and the task is canceled.
 */
export async function* streamTask(options: StreamTaskOptions): AsyncGenerator<StreamEvent, void, undefined> {
  const { lifecycle, handler, message, requestId, logger, signal } = options;

  const task = lifecycle.createTask(message);
  const controller = new AbortController();
  const onDisconnect = (): void => controller.abort();
  if (signal?.aborted) controller.abort();
  signal?.addEventListener('abort', onDisconnect, { once: true });
  const queue = new AsyncEventQueue<ProgressReport>();
  let inFlight: ProgressReport | null = null;
  let finished = false;

  const ctx: HandlerContext = {
    logger,
    signal: controller.signal,
    progress: (text) =>
      new Promise<void>((resolve, reject) => {
        if (!queue.push({ text, ack: resolve })) {
          reject(new Error('Stream closed'));
        }
      }),
  };

  try {
    yield statusEvent(requestId, lifecycle.reportProgress(task.id), false);

    const stamped: Message = { ...message, taskId: task.id, contextId: task.contextId };
    const outcome = settle(() => handler.handle(stamped, task, ctx)).finally(() => queue.complete());

    for await (const report of queue) {
      inFlight = report;
      yield statusEvent(requestId, lifecycle.reportProgress(task.id, report.text), false);
      inFlight = null;
      report.ack();
    }

    const result = await outcome;
    let terminal: Task;
    if (controller.signal.aborted) {
      terminal = lifecycle.cancelTask(task.id, STREAM_CLOSED);
      logger.debug(`Streamed task ${task.id} canceled: connection closed`);
    } else if (result.ok) {
      terminal = lifecycle.completeTask(task.id, result.value.parts, result.value.artifacts);
    } else {
      logger.warn(`Streamed task ${task.id} failed: ${describeError(result.error)}`);
      terminal = lifecycle.failTask(
        task.id,
        describeError(result.error),
        result.error instanceof HandlerError ? result.error.parts : [],
      );
    }

    finished = true;
    yield statusEvent(requestId, terminal, true);
  } finally {
    signal?.removeEventListener('abort', onDisconnect);
    if (!finished) {
      controller.abort();
      queue.complete();
      inFlight?.ack();
      const current = lifecycle.peek(task.id);
      if (current && !isTerminalState(current.status.state)) {
        lifecycle.cancelTask(task.id, STREAM_CLOSED);
        logger.debug(`Streamed task ${task.id} canceled: consumer stopped early`);
      }
    }
  }
}
