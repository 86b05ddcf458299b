// Protocol data model
export { TaskState, TERMINAL_TASK_STATES, isTerminalState } from './protocol.js';
export type {
  Metadata,
  TextPart,
  DataPart,
  Part,
  MessageRole,
  Message,
  TaskStatus,
  Artifact,
  Task,
  TaskStatusUpdateEvent,
} from './protocol.js';

// Capability document
export type {
  AgentSkill,
  AgentCapabilities,
  ApiKeySecurityScheme,
  HttpSecurityScheme,
  SecurityScheme,
  AgentCard,
} from './agent-card.js';

// JSON-RPC envelope
export { RpcErrorCode, RpcMethod, isErrorResponse } from './envelope.js';
export type {
  RequestId,
  JsonRpcRequest,
  JsonRpcErrorObject,
  JsonRpcSuccessResponse,
  JsonRpcErrorResponse,
  JsonRpcResponse,
  RpcErrorCodeValue,
} from './envelope.js';

// Part / message helpers
export { textPart, dataPart, createMessage, extractText, extractData } from './parts.js';

// Logging
export { noopLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';

// Configuration
export type {
  MeshConfig,
  AgentEntry,
  SecurityConfig,
  PipelineStepEntry,
  TaskStoreConfig,
  ClientConfig,
  LoggingConfig,
} from './config.js';

export { validateConfig, loadConfig } from './config-validator.js';
export type { ConfigValidationError, ConfigValidationResult } from './config-validator.js';
export { applyEnvOverrides } from './config-env-overlay.js';

// Utilities
export { generateId, now, isRecord, describeError } from './utils.js';
