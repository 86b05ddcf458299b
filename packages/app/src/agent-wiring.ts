import type { AgentEntry, Logger, TaskStoreConfig } from '@agent-mesh/core';
import { AgentRuntime, TaskStore } from '@agent-mesh/agent-runtime';
import type { AgentIdentity, CapabilityHandler } from '@agent-mesh/agent-runtime';
import {
  AgentServer,
  DEFAULT_RPC_PATH,
  createCredentialGatekeeper,
  securitySchemesFor,
} from '@agent-mesh/gateway';

export const DEFAULT_HOST = '127.0.0.1';

export interface AgentWiringOptions {
  entry: AgentEntry;
  handler: CapabilityHandler;
  taskStore: TaskStoreConfig;
  logger: Logger;
}

export interface WiredAgent {
  entry: AgentEntry;
  runtime: AgentRuntime;
  server: AgentServer;
  /** Bound port (differs from `entry.port` when that is 0). */
  port: number;
  /** Base URL the agent card is discovered under. */
  baseUrl: string;
  cleanup: () => Promise<void>;
}

function identityFor(entry: AgentEntry, url: string): AgentIdentity {
  const schemes = entry.security ? securitySchemesFor(entry.security) : {};
  return {
    name: entry.name,
    description: entry.description,
    url,
    version: entry.version,
    skills: entry.skills,
    ...(entry.documentationUrl ? { documentationUrl: entry.documentationUrl } : {}),
    ...(Object.keys(schemes).length > 0 ? { securitySchemes: schemes } : {}),
  };
}

/**
 * Wire one configured agent: runtime, task store, credential gatekeeper and
 * HTTP server. Resolves once the server is listening.
 */
export async function wireAgent(options: AgentWiringOptions): Promise<WiredAgent> {
  const { entry, handler, taskStore, logger } = options;
  const host = entry.host ?? DEFAULT_HOST;
  const rpcPath = entry.rpcPath ?? DEFAULT_RPC_PATH;
  const publicUrl = entry.publicUrl?.replace(/\/+$/, '');

  const runtime = new AgentRuntime({
    identity: identityFor(entry, `${publicUrl ?? `http://${host}:${entry.port}`}${rpcPath}`),
    handler,
    streaming: entry.streaming ?? false,
    taskStore: new TaskStore({ ttlMs: taskStore.ttlMs, maxTasks: taskStore.maxTasks }),
    logger,
  });
  if (entry.security) {
    runtime.use(createCredentialGatekeeper(entry.security));
  }

  const server = new AgentServer(runtime, { rpcPath, logger });
  const port = await server.start(entry.port, host);
  const baseUrl = publicUrl ?? `http://${host}:${port}`;
  if (publicUrl === undefined && port !== entry.port) {
    runtime.setUrl(`${baseUrl}${rpcPath}`);
  }

  return {
    entry,
    runtime,
    server,
    port,
    baseUrl,
    cleanup: () => server.close(),
  };
}
