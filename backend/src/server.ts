/**
 * Server entrypoint
 *
 * Run: npx tsx src/server.ts
 */

import { buildApp } from './app.js';
import { env } from './config/env.js';

async function main(): Promise<void> {
  const app = buildApp();

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    app.log.info(`Received ${signal}, shutting down...`);
    await app.close();
    app.log.info('Shutdown complete');
    process.exit(0);
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        app.log.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }

  await app.listen({ port: env.PORT, host: env.HOST });
  app.log.info('Endpoints: GET /health, GET /cycle/day-info');
}

main().catch((err: unknown) => {
  console.error('[Server] Fatal error:', err);
  process.exit(1);
});
