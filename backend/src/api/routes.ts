/**
 * API route registration
 */

import type { FastifyInstance } from 'fastify';
import { registerCycleRoutes } from '../modules/cycle/index.js';

export type RoutesOptions = {
  now: () => Date;
};

export async function registerRoutes(app: FastifyInstance, options: RoutesOptions): Promise<void> {
  app.get('/health', async () => ({
    ok: true,
    timestamp: options.now().toISOString(),
  }));

  await registerCycleRoutes(app, { now: options.now });
}
