import type {
  AgentCard,
  JsonRpcRequest,
  JsonRpcResponse,
  Logger,
  Message,
  RequestId,
  Task,
} from '@agent-mesh/core';
import {
  RpcErrorCode,
  RpcMethod,
  createMessage,
  describeError,
  noopLogger,
} from '@agent-mesh/core';
import type { AgentIdentity } from './agent-card.js';
import { buildAgentCard } from './agent-card.js';
import { decodeRequest, errorResponse, parseMessage, successResponse } from './envelope-codec.js';
import { HandlerError, MethodNotFoundError, RpcError } from './errors.js';
import type { CapabilityHandler, HandlerContext, HandlerResult } from './handler.js';
import type { Disposable, RequestInterceptor, TransportContext } from './interceptor-registry.js';
import { InterceptorRegistry } from './interceptor-registry.js';
import { streamTask } from './streaming.js';
import { TaskLifecycle } from './task-lifecycle.js';
import { TaskStore } from './task-store.js';

export interface AgentRuntimeOptions {
  identity: AgentIdentity;
  handler: CapabilityHandler;
  /** Accept `message/stream` and advertise `capabilities.streaming`. */
  streaming?: boolean;
  taskStore?: TaskStore;
  logger?: Logger;
}

/** What the transport should send back for one inbound request. */
export type RpcOutcome =
  | { type: 'response'; response: JsonRpcResponse }
  | { type: 'stream'; events: AsyncGenerator<JsonRpcResponse, void, undefined> };

const NO_TRANSPORT: TransportContext = { headers: {} };

/**
 * Binds one capability handler to the envelope codec, the interceptor chain
 * and the task lifecycle. Transport-agnostic: the gateway feeds it raw
 * request bodies and writes back whatever `handle()` returns.
 */
export class AgentRuntime {
  readonly tasks: TaskStore;
  private readonly lifecycle: TaskLifecycle;
  private readonly interceptors = new InterceptorRegistry();
  private identity: AgentIdentity;
  private readonly handler: CapabilityHandler;
  private readonly streaming: boolean;
  private readonly logger: Logger;

  constructor(options: AgentRuntimeOptions) {
    this.identity = options.identity;
    this.handler = options.handler;
    this.streaming = options.streaming ?? false;
    this.logger = options.logger ?? noopLogger;
    this.tasks = options.taskStore ?? new TaskStore();
    this.lifecycle = new TaskLifecycle(this.tasks);
  }

  get name(): string {
    return this.identity.name;
  }

  getAgentCard(): AgentCard {
    return buildAgentCard({
      ...this.identity,
      capabilities: { ...this.identity.capabilities, streaming: this.streaming },
    });
  }

  /** Change the advertised RPC endpoint, e.g. once an ephemeral port is bound. */
  setUrl(url: string): void {
    this.identity = { ...this.identity, url };
  }

  /** Add a request interceptor (e.g. a credential gatekeeper). */
  use(interceptor: RequestInterceptor, priority?: number): Disposable {
    return this.interceptors.register(interceptor, priority);
  }

  getTask(taskId: string): Task | undefined {
    return this.tasks.get(taskId);
  }

  async handle(raw: string | Buffer, transport: TransportContext = NO_TRANSPORT): Promise<RpcOutcome> {
    const decoded = decodeRequest(raw);
    if (!decoded.ok) {
      this.logger.debug(`Rejected malformed request: ${decoded.response.error.message}`);
      return { type: 'response', response: decoded.response };
    }

    const { request } = decoded;
    try {
      await this.interceptors.run({ request, transport });
      return await this.dispatch(request, transport);
    } catch (err) {
      return { type: 'response', response: this.toErrorResponse(request.id, err) };
    }
  }

  private async dispatch(request: JsonRpcRequest, transport: TransportContext): Promise<RpcOutcome> {
    this.logger.debug(`${request.method} (id=${String(request.id)})`);

    switch (request.method) {
      case RpcMethod.SEND: {
        const message = parseMessage(request.params['message']);
        return { type: 'response', response: await this.sendMessage(request.id, message) };
      }
      case RpcMethod.STREAM: {
        if (!this.streaming) throw new MethodNotFoundError(request.method);
        const message = parseMessage(request.params['message']);
        const events = streamTask({
          lifecycle: this.lifecycle,
          handler: this.handler,
          message,
          requestId: request.id,
          logger: this.logger,
          ...(transport.signal ? { signal: transport.signal } : {}),
        });
        return { type: 'stream', events: this.guardStream(request.id, events) };
      }
      default:
        throw new MethodNotFoundError(request.method);
    }
  }

  /** Synchronous path: submitted → completed | failed. */
  private async sendMessage(requestId: string | number, message: Message): Promise<JsonRpcResponse> {
    const task = this.lifecycle.createTask(message);
    const ctx: HandlerContext = {
      logger: this.logger,
      signal: new AbortController().signal,
      progress: async () => {},
    };

    let result: HandlerResult;
    try {
      const stamped: Message = { ...message, taskId: task.id, contextId: task.contextId };
      result = await this.handler.handle(stamped, task, ctx);
    } catch (err) {
      this.logger.warn(`Task ${task.id} failed: ${describeError(err)}`);
      const failed = this.lifecycle.failTask(
        task.id,
        describeError(err),
        err instanceof HandlerError ? err.parts : [],
      );
      return successResponse(requestId, failed);
    }

    const reply = createMessage('agent', result.parts);
    if (result.metadata) reply.metadata = result.metadata;
    return successResponse(requestId, this.lifecycle.completeTask(task.id, reply, result.artifacts));
  }

  private async *guardStream(
    requestId: RequestId,
    events: AsyncGenerator<JsonRpcResponse, void, undefined>,
  ): AsyncGenerator<JsonRpcResponse, void, undefined> {
    try {
      yield* events;
    } catch (err) {
      yield this.toErrorResponse(requestId, err);
    }
  }

  private toErrorResponse(id: RequestId, err: unknown): JsonRpcResponse {
    if (err instanceof RpcError) {
      return errorResponse(id, err.code, err.message, err.data);
    }
    this.logger.error(`Unexpected error handling request ${String(id)}: ${describeError(err)}`);
    return errorResponse(id, RpcErrorCode.INTERNAL_ERROR, `Internal error: ${describeError(err)}`);
  }
}
