import { createServer, registerRoutes } from './app';
import { env } from './env';
import { dbHealth, ensureSchema, pool } from './db';
import { PgIncidentStore } from './store';
import { PollExecutor } from './collector/executor';
import { FileSnapshotSource } from './collector/source';
import { SelfHealingSupervisor } from './scheduler';

async function start() {
  const app = await createServer({ logger: true, corsOrigin: env.CORS_ORIGIN });
  await dbHealth();
  await ensureSchema();

  const store = new PgIncidentStore(pool);
  const executor = new PollExecutor({
    source: new FileSnapshotSource(env.STATUS_DAT_PATH),
    store,
    logger: app.log,
    filter: { hosts: env.MONITORED_HOSTS, services: env.MONITORED_SERVICES },
    sourceTimeoutMs: env.SOURCE_TIMEOUT_MS,
    stalenessThresholdSec: env.STALENESS_THRESHOLD_SEC,
    expectEntities: env.EXPECT_ENTITIES,
    pullComments: env.PULL_COMMENTS,
    retentionDays: env.RETENTION_DAYS
  });
  await executor.restoreMetadata();

  const supervisor = new SelfHealingSupervisor({
    executor,
    logger: app.log,
    pollIntervalSec: env.POLL_INTERVAL_SEC,
    stalenessThresholdSec: env.STALENESS_THRESHOLD_SEC,
    maxConsecutiveFailures: env.MAX_CONSECUTIVE_FAILURES
  });

  await registerRoutes(app, { supervisor, store, checkDatabase: dbHealth });

  app.addHook('onClose', async () => {
    await supervisor.stop();
    await pool.end();
  });

  await app.listen({ host: env.HOST, port: env.PORT });
  supervisor.start();

  const shutdown = (signal: string) => {
    app.log.info(`received ${signal}, shutting down`);
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error(err);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

start().catch((err) => {
  console.error(err);
  process.exit(1);
});
