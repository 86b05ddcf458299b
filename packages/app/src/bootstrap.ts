import * as path from 'node:path';
import type { Logger, MeshConfig } from '@agent-mesh/core';
import { applyEnvOverrides, loadConfig, validateConfig } from '@agent-mesh/core';
import { DEFAULT_API_KEY_HEADER } from '@agent-mesh/gateway';
import { A2AClient, A2AInvoker, AgentDirectory } from '@agent-mesh/orchestrator';
import { wireAgent } from './agent-wiring.js';
import type { WiredAgent } from './agent-wiring.js';
import { createHandler } from './handlers/index.js';
import { createConsoleLogger, withScope } from './logger.js';

/** Variables read by the process entry rather than overlaid onto the config. */
export const CONFIG_PATH_ENV = 'AGENT_MESH_CONFIG';
export const LOG_LEVEL_ENV = 'AGENT_MESH_LOG_LEVEL';

export interface BootstrapOptions {
  configPath: string;
  /** Default: console logger at the configured level. */
  logger?: Logger;
  /** Source of `AGENT_MESH_*` overrides. Default: `process.env`. */
  env?: Record<string, string | undefined>;
  /** Physician roster file. Default: `roster.json` beside the config file. */
  rosterPath?: string;
  clock?: () => Date;
}

export interface AppServer {
  config: MeshConfig;
  agents: Map<string, WiredAgent>;
  logger: Logger;
  shutdown: () => Promise<void>;
}

function formatErrors(errors: { path: string; message: string }[]): string {
  return errors.map((e) => `${e.path}: ${e.message}`).join('; ');
}

/**
 * Bootstrap every configured agent:
 * 1. Load and validate config, then apply env overrides
 * 2. Build the shared outbound client used by coordinators
 * 3. Wire each agent (handler, runtime, HTTP server)
 * 4. Return an AppServer handle for lifecycle management
 */
export async function bootstrap(options: BootstrapOptions): Promise<AppServer> {
  const { configPath, env = process.env } = options;

  // 1. Load config
  const result = loadConfig(configPath);
  if (!result.valid || !result.config) {
    throw new Error(`Invalid configuration: ${formatErrors(result.errors)}`);
  }
  const overrides = Object.fromEntries(
    Object.entries(env).filter(([key]) => key !== CONFIG_PATH_ENV && key !== LOG_LEVEL_ENV),
  );
  const config = applyEnvOverrides(result.config, overrides);
  const recheck = validateConfig(JSON.stringify(config));
  if (!recheck.valid) {
    throw new Error(`Invalid configuration after environment overrides: ${formatErrors(recheck.errors)}`);
  }

  const logger = options.logger ?? createConsoleLogger(config.logging?.level ?? 'info', 'mesh');
  const rosterPath = options.rosterPath ?? path.join(path.dirname(configPath), 'roster.json');

  // 2. Outbound side. Base URLs are filled in as agents come up.
  const agentUrls: Record<string, string> = {};
  const client = new A2AClient({
    timeoutMs: config.client.timeoutMs,
    headers: config.client.apiKey ? { [DEFAULT_API_KEY_HEADER]: config.client.apiKey } : {},
    logger: withScope(logger, 'client'),
  });
  const directory = new AgentDirectory(client, {
    cacheTtlMs: config.client.cardCacheTtlMs,
    logger: withScope(logger, 'directory'),
  });
  const invoker = new A2AInvoker({ client, directory, agents: agentUrls });

  // 3. Wire agents
  const agents = new Map<string, WiredAgent>();

  for (const entry of config.agents) {
    const agentLogger = withScope(logger, entry.id);
    try {
      const handler = createHandler({
        entry,
        logger: agentLogger,
        invoker,
        stepTimeoutMs: config.client.timeoutMs,
        rosterPath,
        ...(options.clock ? { clock: options.clock } : {}),
      });
      const wired = await wireAgent({ entry, handler, taskStore: config.taskStore, logger: agentLogger });
      agents.set(entry.id, wired);
      agentUrls[entry.id] = wired.baseUrl;
    } catch (err) {
      logger.error(`Failed to wire agent "${entry.id}": ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  logger.info(`${agents.size} agent(s) wired and ready`);

  // 4. Build shutdown handler
  let shutdownPromise: Promise<void> | null = null;
  let isShutdown = false;

  const shutdown = async () => {
    if (isShutdown) return;
    if (shutdownPromise) return shutdownPromise;

    shutdownPromise = (async () => {
      logger.info('Shutting down...');
      for (const [id, wired] of agents) {
        try {
          await wired.cleanup();
          logger.info(`Agent "${id}" shut down`);
        } catch (err) {
          logger.error(`Error shutting down agent "${id}": ${err instanceof Error ? err.message : String(err)}`);
        }
      }
    })();

    try {
      await shutdownPromise;
    } finally {
      isShutdown = true;
      shutdownPromise = null;
    }
  };

  return { config, agents, logger, shutdown };
}
