import type { JsonRpcResponse, Logger, Message, Part } from '@agent-mesh/core';
import {
  TaskState,
  createMessage,
  dataPart,
  describeError,
  extractData,
  extractText,
  isErrorResponse,
  isRecord,
  noopLogger,
  textPart,
} from '@agent-mesh/core';
import type { CapabilityHandler } from '@agent-mesh/agent-runtime';
import { HandlerError, ProtocolError, parseMessage } from '@agent-mesh/agent-runtime';
import { AgentTimeoutError } from './errors.js';

/** One downstream call in a coordinator workflow. */
export interface CoordinatorStep {
  id: string;
  description: string;
  /** Agent id or base URL, resolved by the invoker. */
  agent: string;
  /** `{input}` is replaced with the inbound request text. */
  prompt: string;
  timeoutMs?: number;
  /** Attach earlier step results as a `priorResults` data part. */
  includePriorResults?: boolean;
}

export interface InvokeOptions {
  timeoutMs: number;
  signal: AbortSignal;
}

/** Sends one message to a downstream agent and returns its response envelope. */
export interface DownstreamInvoker {
  invoke(agent: string, message: Message, options: InvokeOptions): Promise<JsonRpcResponse>;
}

/** What a downstream agent answered for one step. */
export interface StepReply {
  taskId?: string;
  state: TaskState;
  text: string;
  data: Record<string, unknown>[];
}

export interface StepResult {
  id: string;
  description: string;
  agent: string;
  result: StepReply;
}

export interface CoordinatorOptions {
  steps: readonly CoordinatorStep[];
  invoker: DownstreamInvoker;
  /** Per-step budget when a step sets none. Default: 30s. */
  defaultTimeoutMs?: number;
  logger?: Logger;
}

const DEFAULT_STEP_TIMEOUT_MS = 30_000;

const FAILED_STATES: ReadonlySet<TaskState> = new Set([
  TaskState.FAILED,
  TaskState.REJECTED,
  TaskState.CANCELED,
  TaskState.AUTH_REQUIRED,
]);

const KNOWN_STATES: ReadonlySet<string> = new Set(Object.values(TaskState));

function isTaskState(value: unknown): value is TaskState {
  return typeof value === 'string' && KNOWN_STATES.has(value);
}

function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), ms);
    promise.then(
      (val) => { clearTimeout(timer); resolve(val); },
      (err: unknown) => { clearTimeout(timer); reject(err); },
    );
  });
}

function replyFromMessage(value: unknown, state: TaskState, taskId?: string): StepReply {
  let message: Message;
  try {
    message = parseMessage(value);
  } catch (err) {
    throw new ProtocolError(`Downstream reply is malformed: ${describeError(err)}`);
  }
  return {
    ...(taskId ? { taskId } : {}),
    state,
    text: extractText(message),
    data: extractData(message),
  };
}

/** Read the Task (or bare Message) a downstream agent returned. */
export function readStepReply(result: unknown): StepReply {
  if (!isRecord(result)) {
    throw new ProtocolError('Downstream result is not an object');
  }

  if (result['kind'] === 'message') {
    return replyFromMessage(result, TaskState.COMPLETED);
  }

  const status = result['status'];
  if (result['kind'] !== 'task' || typeof result['id'] !== 'string' || !isRecord(status)) {
    throw new ProtocolError('Downstream result is neither a task nor a message');
  }
  const state = status['state'];
  if (!isTaskState(state)) {
    throw new ProtocolError(`Downstream task has unknown state "${String(state)}"`);
  }
  if (status['message'] === undefined) {
    return { taskId: result['id'], state, text: '', data: [] };
  }
  return replyFromMessage(status['message'], state, result['id']);
}

/**
 * Coordinator capability: runs `steps` strictly in order against downstream
 * agents. The first failing step ends the workflow; later steps never run.
 */
export function createCoordinatorHandler(options: CoordinatorOptions): CapabilityHandler {
  const { steps, invoker, defaultTimeoutMs = DEFAULT_STEP_TIMEOUT_MS } = options;
  const logger = options.logger ?? noopLogger;
  const workflowSteps = steps.map((s) => s.description);

  async function runStep(
    step: CoordinatorStep,
    message: Message,
    parentSignal: AbortSignal,
  ): Promise<StepReply> {
    const timeoutMs = step.timeoutMs ?? defaultTimeoutMs;
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    parentSignal.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await withTimeout(
        invoker.invoke(step.agent, message, { timeoutMs, signal: controller.signal }),
        timeoutMs,
        () => {
          controller.abort();
          return new AgentTimeoutError(step.agent, timeoutMs);
        },
      );

      if (isErrorResponse(response)) {
        throw new Error(`${response.error.message} (code ${response.error.code})`);
      }

      const reply = readStepReply(response.result);
      if (FAILED_STATES.has(reply.state)) {
        throw new Error(`Agent task ${reply.state}${reply.text ? `: ${reply.text}` : ''}`);
      }
      return reply;
    } finally {
      parentSignal.removeEventListener('abort', onAbort);
    }
  }

  return {
    async handle(inbound, task, ctx) {
      const input = extractText(inbound);
      const completed: StepResult[] = [];

      for (const step of steps) {
        ctx.signal.throwIfAborted();
        await ctx.progress(step.description);

        const parts: Part[] = [textPart(step.prompt.replaceAll('{input}', input))];
        if (step.includePriorResults) {
          const priorResults = completed.map((r) => ({
            id: r.id,
            agent: r.agent,
            text: r.result.text,
            data: r.result.data,
          }));
          parts.push(dataPart({ priorResults }));
        }
        const outbound = createMessage('user', parts, { contextId: task.contextId });

        let reply: StepReply;
        try {
          reply = await runStep(step, outbound, ctx.signal);
        } catch (err) {
          const error = describeError(err);
          logger.warn(`Workflow step "${step.id}" failed: ${error}`);
          throw new HandlerError(`Workflow failed at step "${step.id}": ${error}`, [
            dataPart({
              status: 'failed',
              workflowSteps,
              steps: completed,
              failedStep: { id: step.id, description: step.description, error },
            }),
          ]);
        }

        logger.debug(`Workflow step "${step.id}" completed via ${step.agent}`);
        completed.push({ id: step.id, description: step.description, agent: step.agent, result: reply });
      }

      const summary = [
        `Workflow completed (${completed.length} steps)`,
        ...completed.map((r) => `${r.id}: ${r.result.text}`),
      ].join('\n');

      return {
        parts: [
          textPart(summary),
          dataPart({ status: 'completed', workflowSteps, steps: completed }),
        ],
      };
    },
  };
}
