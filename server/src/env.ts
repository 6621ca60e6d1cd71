import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1');

const list = z
  .string()
  .optional()
  .default('')
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

const serviceList = list.pipe(
  z.array(
    z
      .string()
      .regex(/^[^/]+\/.+$/, 'expected host/service')
      .transform((item) => {
        const slash = item.indexOf('/');
        return { hostName: item.slice(0, slash), serviceDescription: item.slice(slash + 1) };
      })
  )
);

const schema = z.object({
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().default(4000),
  CORS_ORIGIN: z.string().default('*'),

  PGHOST: z.string(),
  PGPORT: z.coerce.number().default(5432),
  PGDATABASE: z.string(),
  PGUSER: z.string(),
  PGPASSWORD: z.string(),

  STATUS_DAT_PATH: z.string().min(1),
  POLL_INTERVAL_SEC: z.coerce.number().int().min(1).max(86400).default(60),
  STALENESS_THRESHOLD_SEC: z.coerce.number().int().min(1).default(600),
  MAX_CONSECUTIVE_FAILURES: z.coerce.number().int().min(1).max(100).default(3),
  SOURCE_TIMEOUT_MS: z.coerce.number().int().min(100).max(600000).default(10000),
  MONITORED_HOSTS: list,
  MONITORED_SERVICES: serviceList,
  PULL_COMMENTS: flag(true),
  EXPECT_ENTITIES: flag(true),
  RETENTION_DAYS: z.coerce.number().int().min(0).default(0)
});

export const env = schema.parse(process.env);
