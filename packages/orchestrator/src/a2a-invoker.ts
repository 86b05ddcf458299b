import type { JsonRpcResponse, Message } from '@agent-mesh/core';
import type { A2AClient } from './a2a-client.js';
import type { AgentDirectory } from './agent-directory.js';
import type { DownstreamInvoker, InvokeOptions } from './coordinator.js';
import { AgentTransportError } from './errors.js';

export interface A2AInvokerOptions {
  client: A2AClient;
  directory: AgentDirectory;
  /** Agent id → base URL. Targets that are already URLs bypass this table. */
  agents?: Record<string, string>;
}

const URL_PATTERN = /^https?:\/\//;

/** Invokes downstream agents over HTTP, discovering endpoints through their cards. */
export class A2AInvoker implements DownstreamInvoker {
  private readonly client: A2AClient;
  private readonly directory: AgentDirectory;
  private readonly agents: Record<string, string>;

  constructor(options: A2AInvokerOptions) {
    this.client = options.client;
    this.directory = options.directory;
    this.agents = options.agents ?? {};
  }

  resolveBaseUrl(agent: string): string {
    if (URL_PATTERN.test(agent)) return agent;
    const baseUrl = this.agents[agent];
    if (baseUrl === undefined) {
      throw new AgentTransportError(`Unknown agent "${agent}"`);
    }
    return baseUrl;
  }

  async invoke(agent: string, message: Message, options: InvokeOptions): Promise<JsonRpcResponse> {
    const baseUrl = this.resolveBaseUrl(agent);
    const rpcUrl = await this.directory.resolveRpcUrl(baseUrl);
    try {
      return await this.client.sendMessage(rpcUrl, message, options);
    } catch (err) {
      // Force rediscovery on the next call.
      if (err instanceof AgentTransportError) this.directory.invalidate(baseUrl);
      throw err;
    }
  }
}
