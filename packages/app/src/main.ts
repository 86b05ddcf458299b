import * as path from 'node:path';
import { bootstrap, CONFIG_PATH_ENV, LOG_LEVEL_ENV } from './bootstrap.js';
import { createConsoleLogger, isLogLevel } from './logger.js';

async function main(): Promise<void> {
  const configPath = process.env[CONFIG_PATH_ENV] ?? path.resolve(process.cwd(), 'config/default.json5');
  const level = process.env[LOG_LEVEL_ENV];

  const app = await bootstrap({
    configPath,
    ...(isLogLevel(level) ? { logger: createConsoleLogger(level, 'mesh') } : {}),
  });

  // Handle shutdown signals
  const handleShutdown = (): void => {
    app.shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('Shutdown failed:', err);
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', handleShutdown);
  process.on('SIGTERM', handleShutdown);

  for (const wired of app.agents.values()) {
    app.logger.info(`${wired.entry.name} at ${wired.baseUrl}`);
  }
}

main().catch((err) => {
  console.error('Fatal:', err);
  process.exit(1);
});
