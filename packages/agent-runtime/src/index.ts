// Runtime
export { AgentRuntime } from './agent-runtime.js';
export type { AgentRuntimeOptions, RpcOutcome } from './agent-runtime.js';

// Envelope codec
export {
  decodeRequest,
  decodeResponse,
  encodeEnvelope,
  encodeStreamEvent,
  errorResponse,
  successResponse,
  parseMessage,
  StreamFrameDecoder,
} from './envelope-codec.js';
export type { DecodeResult } from './envelope-codec.js';

// Capability document
export { buildAgentCard, DEFAULT_MODES } from './agent-card.js';
export type { AgentIdentity } from './agent-card.js';

// Task store & lifecycle
export { TaskStore } from './task-store.js';
export type { TaskStoreOptions } from './task-store.js';
export { TaskLifecycle, canTransition } from './task-lifecycle.js';

// Handler contract
export { createStagedHandler } from './handler.js';
export type {
  CapabilityHandler,
  HandlerContext,
  HandlerResult,
  StagedHandlerOptions,
} from './handler.js';

// Interceptors
export { InterceptorRegistry } from './interceptor-registry.js';
export type {
  Disposable,
  InterceptorContext,
  RequestInterceptor,
  TransportContext,
} from './interceptor-registry.js';

// Streaming
export { streamTask } from './streaming.js';
export type { StreamEvent, StreamTaskOptions } from './streaming.js';
export { AsyncEventQueue } from './async-event-queue.js';

// Errors
export {
  RpcError,
  MethodNotFoundError,
  InvalidParamsError,
  AuthenticationRequiredError,
  InvalidTaskTransitionError,
  TaskNotFoundError,
  HandlerError,
  ProtocolError,
} from './errors.js';
