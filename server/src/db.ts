import { Pool } from 'pg';
import { env } from './env';

export const pool = new Pool({
  host: env.PGHOST,
  port: env.PGPORT,
  database: env.PGDATABASE,
  user: env.PGUSER,
  password: env.PGPASSWORD,
  max: 10
});

const schema = `
CREATE TABLE IF NOT EXISTS incidents (
  id SERIAL PRIMARY KEY,
  incident_type TEXT NOT NULL CHECK (incident_type IN ('host', 'service')),
  host_name TEXT NOT NULL,
  service_description TEXT,
  state TEXT NOT NULL,
  started_at TIMESTAMPTZ NOT NULL,
  ended_at TIMESTAMPTZ,
  acknowledged BOOLEAN NOT NULL DEFAULT false,
  plugin_output TEXT NOT NULL DEFAULT '',
  last_check TIMESTAMPTZ,
  CHECK (ended_at IS NULL OR ended_at >= started_at)
);

CREATE UNIQUE INDEX IF NOT EXISTS incidents_one_open_per_entity
  ON incidents (incident_type, host_name, COALESCE(service_description, ''))
  WHERE ended_at IS NULL;

CREATE INDEX IF NOT EXISTS incidents_started_at_idx ON incidents (started_at DESC);

CREATE TABLE IF NOT EXISTS incident_comments (
  id SERIAL PRIMARY KEY,
  incident_id INTEGER NOT NULL REFERENCES incidents(id) ON DELETE CASCADE,
  comment_id INTEGER NOT NULL,
  host_name TEXT NOT NULL,
  service_description TEXT,
  author TEXT NOT NULL,
  comment_text TEXT NOT NULL,
  entry_time TIMESTAMPTZ NOT NULL,
  UNIQUE (incident_id, comment_id)
);

CREATE TABLE IF NOT EXISTS poll_metadata (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  last_attempt_at TIMESTAMPTZ,
  last_success_at TIMESTAMPTZ,
  last_outcome TEXT,
  records_processed INTEGER NOT NULL DEFAULT 0,
  source_modified_at TIMESTAMPTZ
);
`;

export async function ensureSchema() {
  await pool.query(schema);
}

export async function dbHealth() {
  await pool.query('select 1 as ok');
}
