export { bootstrap, CONFIG_PATH_ENV, LOG_LEVEL_ENV } from './bootstrap.js';
export type { BootstrapOptions, AppServer } from './bootstrap.js';

export { wireAgent, DEFAULT_HOST } from './agent-wiring.js';
export type { AgentWiringOptions, WiredAgent } from './agent-wiring.js';

export { createConsoleLogger, withScope, isLogLevel } from './logger.js';

export * from './handlers/index.js';
