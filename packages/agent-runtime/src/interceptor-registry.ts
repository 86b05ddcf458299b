import type { JsonRpcRequest } from '@agent-mesh/core';

/** Transport-level facts about one inbound request. */
export interface TransportContext {
  /** Lowercased header names, as Node's `http` module delivers them. */
  headers: Record<string, string | string[] | undefined>;
  remoteAddress?: string;
  /** Aborted when the underlying connection closes. */
  signal?: AbortSignal;
}

export interface InterceptorContext {
  request: JsonRpcRequest;
  transport: TransportContext;
}

/**
 * Runs after decoding and before method routing. Blocks the request by
 * throwing an `RpcError` (e.g. `AuthenticationRequiredError`).
 */
export type RequestInterceptor = (ctx: InterceptorContext) => Promise<void> | void;

/** Disposable handle returned from registrations. */
export interface Disposable {
  dispose(): void;
}

interface InterceptorEntry {
  priority: number;
  interceptor: RequestInterceptor;
}

export class InterceptorRegistry {
  private entries: InterceptorEntry[] = [];

  /** Lower priority runs first. */
  register(interceptor: RequestInterceptor, priority = 100): Disposable {
    const entry: InterceptorEntry = { priority, interceptor };
    this.entries.push(entry);

    return {
      dispose: () => {
        const idx = this.entries.indexOf(entry);
        if (idx !== -1) this.entries.splice(idx, 1);
      },
    };
  }

  async run(ctx: InterceptorContext): Promise<void> {
    const sorted = [...this.entries].sort((a, b) => a.priority - b.priority);
    for (const entry of sorted) {
      await entry.interceptor(ctx);
    }
  }

  get size(): number {
    return this.entries.length;
  }
}
