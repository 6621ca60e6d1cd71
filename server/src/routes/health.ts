import type { FastifyInstance } from 'fastify';
import { errorMessage } from '../errors';
import type { SelfHealingSupervisor } from '../scheduler';
import type { IncidentStore } from '../types';

export type HealthRouteDeps = {
  supervisor: SelfHealingSupervisor;
  store: IncidentStore;
  checkDatabase: () => Promise<void>;
};

export async function registerHealthRoutes(app: FastifyInstance, deps: HealthRouteDeps) {
  const { supervisor, store, checkDatabase } = deps;

  app.get('/api/health', async (_req, reply) => {
    const health = supervisor.getHealthStatus();
    const staleness = supervisor.getStalenessInfo();

    let databaseAccessible = true;
    try {
      await checkDatabase();
    } catch (err: unknown) {
      databaseAccessible = false;
      app.log.error(`database health check failed: ${errorMessage(err)}`);
    }

    const ok = health.healthStatus !== 'critical' && databaseAccessible;
    reply.code(ok ? 200 : 503).send({ ...health, staleness, databaseAccessible });
  });

  app.get('/api/status', async () => {
    const open = await store.listOpenIncidents();
    return {
      activeIncidents: open.length,
      hostIncidents: open.filter((incident) => incident.incidentType === 'host').length,
      serviceIncidents: open.filter((incident) => incident.incidentType === 'service').length,
      lastPoll: supervisor.getPollMetadata(),
      staleness: supervisor.getStalenessInfo()
    };
  });
}
