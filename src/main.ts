import { ConfigError, loadConfig, type AppConfig } from './config.js';
import { createLogger } from './logger.js';
import { cloudflare } from './providers/cloudflare.js';
import { startServer } from './server.js';

const bootLogger = createLogger();

async function main() {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      bootLogger.fatal(err.message);
      process.exit(1);
    }
    throw err;
  }

  const logger = createLogger({ level: config.logLevel });
  const provider = cloudflare({
    apiToken: config.cloudflare.apiToken,
    zoneId: config.cloudflare.zoneId,
  });

  const server = await startServer({ config, provider, logger });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down');
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'Error while closing server');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  bootLogger.fatal({ err }, 'Failed to start');
  process.exit(1);
});
