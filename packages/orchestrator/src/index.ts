// Outbound client
export { A2AClient, parseAgentCard } from './a2a-client.js';
export type { A2AClientOptions, RequestOptions } from './a2a-client.js';

// Discovery
export { AgentDirectory } from './agent-directory.js';
export type { AgentDirectoryOptions } from './agent-directory.js';
export { A2AInvoker } from './a2a-invoker.js';
export type { A2AInvokerOptions } from './a2a-invoker.js';

// Coordinator workflow
export { createCoordinatorHandler, readStepReply } from './coordinator.js';
export type {
  CoordinatorStep,
  CoordinatorOptions,
  DownstreamInvoker,
  InvokeOptions,
  StepReply,
  StepResult,
} from './coordinator.js';

// Errors
export { AgentTimeoutError, AgentTransportError } from './errors.js';
