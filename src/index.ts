import { ConfigError, LedgerConfig, loadConfigFromEnvironment } from './config';
import { LedgerApiServer } from './operator/api-server';
import { LedgerPlatform } from './platform';
import { MetricsCollector } from './scaling/metrics';
import { StructuredLogger } from './scaling/structured-logger';

function readConfig(): LedgerConfig {
  try {
    return loadConfigFromEnvironment();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`ERROR: invalid configuration, ${error.message}`);
      console.error('Copy .env.example to .env and fill in the missing values.');
      console.error('Run "npm run generate-keys" to create a signer key.');
      process.exit(1);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const config = readConfig();

  const logger = new StructuredLogger({ minLevel: config.logLevel });
  logger.info('main', 'Starting reward ledger node', {
    network: config.domain.network,
    verifyingEndpoint: config.domain.verifyingEndpoint,
    admin: config.adminAccount,
    port: config.port,
    dataDir: config.dataDir,
  });

  const platform = new LedgerPlatform({
    domain: config.domain,
    adminAccount: config.adminAccount,
    marketplaceAccount: config.marketplaceAccount,
    backendSignerAccount: config.backendSignerAccount,
    eventManagerAccount: config.eventManagerAccount,
    platformFeeBps: config.platformFeeBps,
    maxPlatformFeeBps: config.maxPlatformFeeBps,
    dataDir: config.dataDir,
    logger,
    metrics: new MetricsCollector(),
  });
  const server = new LedgerApiServer(platform, config.port);

  const shutdown = (signal: string) => {
    logger.info('main', `Received ${signal}, shutting down gracefully`);
    server
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('main', 'Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await server.start();
}

main().catch((error: unknown) => {
  console.error('FATAL ERROR:', error instanceof Error ? error.stack ?? error.message : error);
  process.exit(1);
});
