import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { Clock, IncidentFilter, IncidentStore } from '../types';

export type IncidentRouteDeps = {
  store: IncidentStore;
  clock?: Clock;
};

const idParams = z.object({ id: z.coerce.number().int().positive() });

const listQuery = z.object({
  active: z.enum(['true', 'false']).optional(),
  hours: z.coerce.number().int().min(1).max(8760).default(24),
  host: z.string().min(1).optional(),
  service: z.string().min(1).optional()
});

export async function registerIncidentRoutes(app: FastifyInstance, deps: IncidentRouteDeps) {
  const { store } = deps;
  const clock = deps.clock ?? (() => new Date());

  app.get('/api/incidents', async (req) => {
    const query = listQuery.parse(req.query);
    const filter: IncidentFilter = {
      hostName: query.host,
      serviceDescription: query.service
    };
    if (query.active === 'true') {
      filter.activeOnly = true;
    } else {
      filter.since = new Date(clock().getTime() - query.hours * 60 * 60 * 1000);
    }
    const incidents = await store.listIncidents(filter);
    return { incidents };
  });

  app.get('/api/incidents/:id', async (req, reply) => {
    const { id } = idParams.parse(req.params);
    const incident = await store.getIncident(id);
    if (!incident) {
      reply.code(404).send({ error: 'incident not found' });
      return;
    }
    const comments = await store.listIncidentComments(id);
    reply.send({ incident, comments });
  });

  app.patch('/api/incidents/:id/ack', async (req, reply) => {
    const { id } = idParams.parse(req.params);
    const body = z.object({ acknowledged: z.boolean().default(true) }).parse(req.body ?? {});
    const found = await store.setIncidentAcknowledged(id, body.acknowledged);
    if (!found) {
      reply.code(404).send({ error: 'incident not found' });
      return;
    }
    reply.send({ ok: true, acknowledged: body.acknowledged });
  });
}
