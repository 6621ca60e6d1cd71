import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import type { SelfHealingSupervisor } from './scheduler';
import type { Clock, IncidentStore } from './types';
import { registerHealthRoutes } from './routes/health';
import { registerIncidentRoutes } from './routes/incidents';
import { registerPollRoutes } from './routes/poll';

export type ServerOptions = {
  logger: boolean;
  corsOrigin: string;
};

export type RouteDeps = {
  supervisor: SelfHealingSupervisor;
  store: IncidentStore;
  checkDatabase: () => Promise<void>;
  clock?: Clock;
};

export async function createServer(options: ServerOptions) {
  const app = Fastify({ logger: options.logger });

  await app.register(cors, {
    origin: options.corsOrigin === '*' ? true : options.corsOrigin.split(',').map((o) => o.trim())
  });

  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof ZodError) {
      reply.code(400).send({ error: 'invalid request', issues: err.issues });
      return;
    }
    app.log.error(err);
    reply.code(err.statusCode ?? 500).send({ error: err.message });
  });

  return app;
}

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps) {
  await registerHealthRoutes(app, deps);
  await registerIncidentRoutes(app, deps);
  await registerPollRoutes(app, deps);
}
