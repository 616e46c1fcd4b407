import * as path from 'node:path';
import { EchoAgent, createConsoleLogger } from '@agentwire/core';
import { bootstrap } from './bootstrap.js';

async function main(): Promise<void> {
  const configPath = process.env['AGENTWIRE_CONFIG']
    ?? path.resolve(process.cwd(), 'config/default.json5');
  const logger = createConsoleLogger('agentwire');

  const app = await bootstrap({
    configPath,
    agents: [new EchoAgent()],
    logger,
  });

  const handleShutdown = () => {
    app.shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('Shutdown failed', err);
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', handleShutdown);
  process.on('SIGTERM', handleShutdown);

  logger.info(`agentwire running with ${app.servers.size} agent(s) and ${app.remotes.size} remote(s)`);
}

main().catch((err: unknown) => {
  console.error('Fatal:', err);
  process.exit(1);
});
