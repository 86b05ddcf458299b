import type { AgentSkill } from './agent-card.js';
import type { LogLevel } from './logger.js';

/** Top-level configuration loaded from `config/default.json5`. */
export interface MeshConfig {
  agents: AgentEntry[];
  taskStore: TaskStoreConfig;
  client: ClientConfig;
  logging?: LoggingConfig;
}

export interface AgentEntry {
  id: string;
  name: string;
  description: string;
  /** Semver. */
  version: string;
  /** Key into the handler factory table (e.g. "patient-registry", "coordinator"). */
  handler: string;
  port: number;
  host?: string;
  /** Default: "/a2a/v1". */
  rpcPath?: string;
  /** Externally reachable base URL. Default: `http://{host}:{port}`. */
  publicUrl?: string;
  documentationUrl?: string;
  streaming?: boolean;
  skills: AgentSkill[];
  security?: SecurityConfig;
  /** Coordinator agents only. */
  pipeline?: PipelineStepEntry[];
  /** Staged (streaming) agents only. */
  stages?: string[];
  stageDelayMs?: number;
}

export interface SecurityConfig {
  apiKeys?: string[];
  bearerTokens?: string[];
  /** Default: "X-API-Key". */
  headerName?: string;
}

export interface PipelineStepEntry {
  id: string;
  description: string;
  /** Agent id from `agents`, or an http(s) base URL. */
  agent: string;
  /** Outbound text; `{input}` is replaced by the original request text. */
  prompt: string;
  timeoutMs?: number;
  includePriorResults?: boolean;
}

export interface TaskStoreConfig {
  ttlMs: number;
  maxTasks: number;
}

export interface ClientConfig {
  timeoutMs: number;
  cardCacheTtlMs: number;
  /** Sent as the API key header on outbound calls. */
  apiKey?: string;
}

export interface LoggingConfig {
  level: LogLevel;
}
