/**
 * Switchyard Application Entry Point
 *
 * Boot sequence: configuration, logging, routes, servers.
 */

import { Application } from './framework/app.ts';
import { loadConfig } from './framework/config/mod.ts';
import { Logger, setLogger } from './framework/telemetry/logger.ts';
import { registerRoutes } from './src/routes/mod.ts';

async function main(): Promise<void> {
  // 1. Load configuration
  const config = await loadConfig();

  // 2. Configure logging
  const logger = new Logger({
    level: config.debug ? 'debug' : config.logLevel,
    format: config.env === 'production' ? 'json' : 'pretty',
    context: { service: 'switchyard' },
  });
  setLogger(logger);

  // 3. Create application instance
  const app = new Application({ config, logger });

  // 4. Register routes (from src/)
  registerRoutes(app, {
    adminToken: process.env.ADMIN_TOKEN,
    users: [{ name: 'alice', email: 'alice@example.com' }],
  });

  // 5. Start servers from the server config file
  await app.listen();
}

main().catch((error: unknown) => {
  console.error('Failed to start Switchyard:', error);
  process.exit(1);
});
