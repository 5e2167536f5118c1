/**
 * Broadcast service entry point.
 *
 * Loads `.env`, reads `config/bot-config.yaml` (or the path in
 * BOT_CONFIG_PATH), starts the scheduled jobs and stops them on SIGINT or
 * SIGTERM.
 */

import { EnvLoader, env } from './utils/env';
import { toError } from './system/error-handling';
import { ConfigManager } from './system/config';
import { System } from './system/system';
import { defaultLogger } from './utils/logger';

export * from './store';
export * from './content';
export * from './analytics';
export * from './system';
export { BroadcastLogger, LogLevel, createComponentLogger, parseLogLevel } from './utils/logger';
export { EnvLoader, env } from './utils/env';

export async function main(): Promise<System> {
  EnvLoader.initialize();

  const config = new ConfigManager(env.get('BOT_CONFIG_PATH'));
  const system = new System({ config });
  system.logger.info('Configuration loaded', {
    configPath: config.getConfigPath(),
    envFile: EnvLoader.source()
  }, 'startup');

  const shutdown = (signal: string): void => {
    system.logger.info(`Received ${signal}, shutting down`, undefined, 'shutdown');
    system.stop()
      .then(() => process.exit(0))
      .catch(error => {
        system.logger.fatal('Shutdown failed', toError(error), undefined, 'shutdown');
        process.exit(1);
      });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await system.start();
  return system;
}

if (require.main === module) {
  main().catch(error => {
    defaultLogger.fatal('Broadcast service failed to start', toError(error), undefined, 'startup');
    process.exit(1);
  });
}
