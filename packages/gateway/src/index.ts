export type { HealthStatus } from './types.js';

// HTTP transport
export { AgentServer, AGENT_CARD_PATH, DEFAULT_RPC_PATH } from './agent-server.js';
export type { AgentServerOptions } from './agent-server.js';

// Credentials
export {
  createCredentialGatekeeper,
  securitySchemesFor,
  DEFAULT_API_KEY_HEADER,
} from './credential-gatekeeper.js';
export type { CredentialOptions } from './credential-gatekeeper.js';
