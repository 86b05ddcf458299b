import type { AgentCard, Logger } from '@agent-mesh/core';
import { noopLogger } from '@agent-mesh/core';
import type { A2AClient } from './a2a-client.js';

export interface AgentDirectoryOptions {
  /** How long a fetched card is trusted. Default: 5 minutes. */
  cacheTtlMs?: number;
  clock?: () => number;
  logger?: Logger;
}

interface CachedCard {
  card: AgentCard;
  fetchedAt: number;
}

const DEFAULT_CACHE_TTL_MS = 5 * 60 * 1000;

function normalize(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '');
}

/**
 * Discovers downstream agents through their cards. Cards are cached per
 * base URL; concurrent lookups of the same agent share one fetch.
 */
export class AgentDirectory {
  private readonly cache = new Map<string, CachedCard>();
  private readonly inflight = new Map<string, Promise<AgentCard>>();
  private readonly cacheTtlMs: number;
  private readonly clock: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly client: A2AClient,
    options: AgentDirectoryOptions = {},
  ) {
    this.cacheTtlMs = options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? noopLogger;
  }

  async getCard(baseUrl: string): Promise<AgentCard> {
    const key = normalize(baseUrl);
    const cached = this.cache.get(key);
    if (cached && this.clock() - cached.fetchedAt < this.cacheTtlMs) {
      return cached.card;
    }

    const pending = this.inflight.get(key);
    if (pending) return pending;

    const fetching = this.client
      .fetchAgentCard(key)
      .then((card) => {
        this.cache.set(key, { card, fetchedAt: this.clock() });
        this.logger.debug(`Discovered ${card.name} at ${card.url}`);
        return card;
      })
      .finally(() => this.inflight.delete(key));
    this.inflight.set(key, fetching);
    return fetching;
  }

  /** RPC endpoint advertised by the agent at `baseUrl`. */
  async resolveRpcUrl(baseUrl: string): Promise<string> {
    return (await this.getCard(baseUrl)).url;
  }

  /** Drop one cached card, or all of them. */
  invalidate(baseUrl?: string): void {
    if (baseUrl === undefined) {
      this.cache.clear();
      return;
    }
    this.cache.delete(normalize(baseUrl));
  }
}
