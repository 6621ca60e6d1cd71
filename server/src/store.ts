import type { Pool } from 'pg';
import type {
  EntityKind,
  Incident,
  IncidentChange,
  IncidentComment,
  IncidentFilter,
  IncidentStore,
  NewIncident,
  ObservedComment,
  PollMetadata,
  PollStatus,
  StateName
} from './types';

type IncidentRow = {
  id: number;
  incident_type: EntityKind;
  host_name: string;
  service_description: string | null;
  state: StateName;
  started_at: Date;
  ended_at: Date | null;
  acknowledged: boolean;
  plugin_output: string;
  last_check: Date | null;
};

type CommentRow = {
  id: number;
  incident_id: number;
  comment_id: number;
  host_name: string;
  service_description: string | null;
  author: string;
  comment_text: string;
  entry_time: Date;
};

type PollMetadataRow = {
  last_attempt_at: Date | null;
  last_success_at: Date | null;
  last_outcome: PollStatus | null;
  records_processed: number;
  source_modified_at: Date | null;
};

const INCIDENT_COLUMNS = `
  id, incident_type, host_name, service_description, state,
  started_at, ended_at, acknowledged, plugin_output, last_check
`;

function mapRowToIncident(row: IncidentRow): Incident {
  return {
    id: row.id,
    incidentType: row.incident_type,
    hostName: row.host_name,
    serviceDescription: row.service_description ?? null,
    state: row.state,
    startedAt: row.started_at,
    endedAt: row.ended_at ?? null,
    acknowledged: row.acknowledged,
    pluginOutput: row.plugin_output,
    lastCheck: row.last_check ?? null
  };
}

function mapRowToComment(row: CommentRow): IncidentComment {
  return {
    id: row.id,
    incidentId: row.incident_id,
    commentId: row.comment_id,
    hostName: row.host_name,
    serviceDescription: row.service_description ?? null,
    author: row.author,
    text: row.comment_text,
    entryTime: row.entry_time
  };
}

export class PgIncidentStore implements IncidentStore {
  private pool: Pool;

  constructor(pool: Pool) {
    this.pool = pool;
  }

  async listOpenIncidents(): Promise<Incident[]> {
    const res = await this.pool.query<IncidentRow>(
      `SELECT ${INCIDENT_COLUMNS} FROM incidents WHERE ended_at IS NULL ORDER BY started_at DESC`
    );
    return res.rows.map(mapRowToIncident);
  }

  async createIncident(data: NewIncident): Promise<Incident> {
    const res = await this.pool.query<IncidentRow>(
      `
      INSERT INTO incidents (incident_type, host_name, service_description, state, started_at, plugin_output, last_check)
      VALUES ($1, $2, $3, $4, $5, $6, $7)
      RETURNING ${INCIDENT_COLUMNS}
      `,
      [
        data.incidentType,
        data.hostName,
        data.serviceDescription,
        data.state,
        data.startedAt,
        data.pluginOutput,
        data.lastCheck
      ]
    );
    return mapRowToIncident(res.rows[0]);
  }

  async updateIncident(id: number, change: IncidentChange) {
    await this.pool.query(
      `
      UPDATE incidents
         SET state = $2,
             plugin_output = $3,
             last_check = $4
       WHERE id = $1 AND ended_at IS NULL
      `,
      [id, change.state, change.pluginOutput, change.lastCheck]
    );
  }

  async closeIncident(id: number, change: IncidentChange, endedAt: Date) {
    await this.pool.query(
      `
      UPDATE incidents
         SET state = $2,
             plugin_output = $3,
             last_check = $4,
             ended_at = GREATEST($5::timestamptz, started_at)
       WHERE id = $1 AND ended_at IS NULL
      `,
      [id, change.state, change.pluginOutput, change.lastCheck, endedAt]
    );
  }

  async recordComment(incidentId: number, comment: ObservedComment) {
    const res = await this.pool.query(
      `
      INSERT INTO incident_comments
        (incident_id, comment_id, host_name, service_description, author, comment_text, entry_time)
      VALUES ($1, $2, $3, $4, $5, $6, $7)
      ON CONFLICT (incident_id, comment_id) DO NOTHING
      `,
      [
        incidentId,
        comment.commentId,
        comment.hostName,
        comment.serviceDescription,
        comment.author,
        comment.text,
        comment.entryTime
      ]
    );
    return (res.rowCount ?? 0) > 0;
  }

  async purgeClosedIncidents(olderThan: Date) {
    const res = await this.pool.query(
      'DELETE FROM incidents WHERE ended_at IS NOT NULL AND ended_at < $1',
      [olderThan]
    );
    return res.rowCount ?? 0;
  }

  async recordPollMetadata(metadata: PollMetadata) {
    await this.pool.query(
      `
      INSERT INTO poll_metadata (id, last_attempt_at, last_success_at, last_outcome, records_processed, source_modified_at)
      VALUES (1, $1, $2, $3, $4, $5)
      ON CONFLICT (id) DO UPDATE
         SET last_attempt_at = EXCLUDED.last_attempt_at,
             last_success_at = EXCLUDED.last_success_at,
             last_outcome = EXCLUDED.last_outcome,
             records_processed = EXCLUDED.records_processed,
             source_modified_at = EXCLUDED.source_modified_at
      `,
      [
        metadata.lastAttemptAt,
        metadata.lastSuccessAt,
        metadata.lastOutcome,
        metadata.recordsProcessed,
        metadata.sourceModifiedAt
      ]
    );
  }

  async getLatestPollMetadata(): Promise<PollMetadata | null> {
    const res = await this.pool.query<PollMetadataRow>(
      `
      SELECT last_attempt_at, last_success_at, last_outcome, records_processed, source_modified_at
        FROM poll_metadata
       WHERE id = 1
      `
    );
    const row = res.rows[0];
    if (!row) {
      return null;
    }
    return {
      lastAttemptAt: row.last_attempt_at,
      lastSuccessAt: row.last_success_at,
      lastOutcome: row.last_outcome,
      recordsProcessed: row.records_processed,
      sourceModifiedAt: row.source_modified_at
    };
  }

  async listIncidents(filter: IncidentFilter): Promise<Incident[]> {
    const where: string[] = [];
    const params: unknown[] = [];
    const param = (value: unknown) => {
      params.push(value);
      return `$${params.length}`;
    };

    if (filter.activeOnly) {
      where.push('ended_at IS NULL');
    }
    if (filter.since) {
      where.push(`(ended_at IS NULL OR ended_at >= ${param(filter.since)})`);
    }
    if (filter.hostName) {
      where.push(`host_name = ${param(filter.hostName)}`);
    }
    if (filter.serviceDescription) {
      where.push(`service_description = ${param(filter.serviceDescription)}`);
    }

    const res = await this.pool.query<IncidentRow>(
      `
      SELECT ${INCIDENT_COLUMNS}
        FROM incidents
       ${where.length ? `WHERE ${where.join(' AND ')}` : ''}
       ORDER BY started_at DESC
      `,
      params
    );
    return res.rows.map(mapRowToIncident);
  }

  async getIncident(id: number): Promise<Incident | null> {
    const res = await this.pool.query<IncidentRow>(`SELECT ${INCIDENT_COLUMNS} FROM incidents WHERE id = $1`, [id]);
    return res.rows[0] ? mapRowToIncident(res.rows[0]) : null;
  }

  async listIncidentComments(incidentId: number): Promise<IncidentComment[]> {
    const res = await this.pool.query<CommentRow>(
      `
      SELECT id, incident_id, comment_id, host_name, service_description, author, comment_text, entry_time
        FROM incident_comments
       WHERE incident_id = $1
       ORDER BY entry_time DESC
      `,
      [incidentId]
    );
    return res.rows.map(mapRowToComment);
  }

  async setIncidentAcknowledged(id: number, acknowledged: boolean) {
    const res = await this.pool.query('UPDATE incidents SET acknowledged = $2 WHERE id = $1', [id, acknowledged]);
    return (res.rowCount ?? 0) > 0;
  }
}
