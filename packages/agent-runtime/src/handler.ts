import type { Artifact, Logger, Message, Metadata, Part, Task } from '@agent-mesh/core';
import { setTimeout as delay } from 'node:timers/promises';

/** What a capability handler produces on success. */
export interface HandlerResult {
  parts: Part[];
  artifacts?: Artifact[];
  metadata?: Metadata;
}

export interface HandlerContext {
  logger: Logger;
  /** Aborted when the caller goes away (streaming disconnect). */
  signal: AbortSignal;
  /**
   * Report a processing stage. In a stream this emits a `working` event and
   * resolves once the transport has taken it; otherwise it resolves at once.
   */
  progress(text: string): Promise<void>;
}

/**
 * The single pluggable contract every agent binds. Interpretation of the
 * message content is entirely the handler's business. Failures are thrown:
 * a `HandlerError` carries extra reply parts, any other error only its text.
 *
 * Handlers may be invoked concurrently and must keep per-request state local.
 */
export interface CapabilityHandler {
  handle(message: Message, task: Task, ctx: HandlerContext): Promise<HandlerResult>;
}

export interface StagedHandlerOptions {
  /** Human-readable stage descriptions, reported in order. */
  stages: readonly string[];
  /** Artificial pause before each stage. Default: 0. */
  stageDelayMs?: number;
  /** Produces the final result once every stage has been reported. */
  finish: CapabilityHandler['handle'];
}

/** A handler that walks through fixed named stages before finishing. */
export function createStagedHandler(options: StagedHandlerOptions): CapabilityHandler {
  const { stages, stageDelayMs = 0, finish } = options;

  return {
    async handle(message, task, ctx) {
      for (const stage of stages) {
        if (stageDelayMs > 0) {
          await delay(stageDelayMs, undefined, { signal: ctx.signal });
        }
        ctx.signal.throwIfAborted();
        await ctx.progress(stage);
      }
      return finish(message, task, ctx);
    },
  };
}
