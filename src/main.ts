// src/main.ts
import 'dotenv/config';
import { ConfigError, loadConfig } from './env.js';
import { getLogger, setLogLevel } from './logger.js';
import { createCapabilities, describeCapabilities } from './ai/registry.js';
import { bindServer, createGatewayServer, shutdownServer } from './grpc-server/index.js';

const log = getLogger('main');

const SHUTDOWN_GRACE_MS = 10_000;

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  log.info(
    { nodeEnv: config.nodeEnv, address: config.grpc.address, callers: config.auth.apiKeys.length },
    'config loaded',
  );

  const capabilities = createCapabilities(config.providers);
  const gateway = await createGatewayServer({ config, capabilities });
  const port = await bindServer(gateway.server, config.grpc.address);
  log.info(
    { port, providers: describeCapabilities(config.providers), language: config.providers.language },
    'gRPC server started',
  );

  let stopping = false;
  const shutdown = (sig: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    log.info({ sig }, 'shutting down');
    shutdownServer(gateway, SHUTDOWN_GRACE_MS).then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'shutdown failed');
        process.exit(1);
      },
    );
  };

  for (const sig of ['SIGINT', 'SIGTERM'] as const) {
    process.on(sig, () => shutdown(sig));
  }
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    log.error({ fieldErrors: err.fieldErrors }, 'Invalid env');
  } else {
    log.error({ err }, 'Fatal error starting server');
  }
  process.exit(1);
});
