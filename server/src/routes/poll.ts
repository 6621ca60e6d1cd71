import type { FastifyInstance } from 'fastify';
import { PollInProgressError } from '../errors';
import type { SelfHealingSupervisor } from '../scheduler';

export async function registerPollRoutes(app: FastifyInstance, deps: { supervisor: SelfHealingSupervisor }) {
  const { supervisor } = deps;

  app.post('/api/poll', async (_req, reply) => {
    try {
      const outcome = await supervisor.triggerManualPoll();
      reply.send({ outcome });
    } catch (err: unknown) {
      if (err instanceof PollInProgressError) {
        reply.code(409).send({ error: err.message });
        return;
      }
      throw err;
    }
  });

  app.get('/api/poll/last', async () => {
    return { metadata: supervisor.getPollMetadata() };
  });
}
