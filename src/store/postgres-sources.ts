// ============================================================================
// PostgreSQL Sources - endpoint configs (api_endpoints) and traffic logs
// (traffic_logs), read with keyset pagination and retried queries
// ============================================================================

import { Pool, QueryResultRow } from 'pg';
import { Logger } from '../utils/logger';
import { withRetry } from '../utils/retry';
import { SourceError, errorMessage, isPostureError } from '../core/errors';
import { EndpointSettingsSchema, parseWith } from '../types/schemas';
import { EndpointConfig, EndpointSummary, TimeRange, TrafficEntry } from '../types';
import { EndpointConfigSource, TrafficLogSource } from './sources';

const logger = new Logger('pg-sources');

export function createPool(connectionString: string, statementTimeoutMs = 30_000): Pool {
  return new Pool({ connectionString, statement_timeout: statementTimeoutMs, max: 10 });
}

async function runQuery<R extends QueryResultRow>(
  pool: Pool,
  operation: string,
  text: string,
  values: unknown[],
): Promise<R[]> {
  try {
    const result = await withRetry(() => pool.query<R>(text, values), { logger, label: operation });
    return result.rows;
  } catch (error) {
    throw new SourceError(`${operation} failed: ${errorMessage(error)}`, operation);
  }
}

// ---------------------------------------------------------------------------
// Endpoint Configs
// ---------------------------------------------------------------------------
interface EndpointRow {
  id: string;
  name: string;
  config: unknown;
  auth_method?: string | null;
  updated_at: Date | null;
}

export class PostgresEndpointConfigSource implements EndpointConfigSource {
  constructor(private readonly pool: Pool) {}

  async list(): Promise<EndpointSummary[]> {
    const rows = await runQuery<EndpointRow>(
      this.pool,
      'list endpoints',
      `SELECT id, name, config->>'authMethod' AS auth_method, updated_at
       FROM api_endpoints
       ORDER BY id`,
      [],
    );
    return rows.map((row) => ({
      id: row.id,
      name: row.name,
      authMethod: row.auth_method || 'None',
      updatedAt: row.updated_at ? row.updated_at.toISOString() : undefined,
    }));
  }

  async get(endpointId: string): Promise<EndpointConfig | null> {
    const rows = await runQuery<EndpointRow>(
      this.pool,
      'load endpoint config',
      'SELECT id, name, config, updated_at FROM api_endpoints WHERE id = $1',
      [endpointId],
    );
    const row = rows[0];
    if (!row) return null;

    try {
      const settings = parseWith(EndpointSettingsSchema, row.config ?? {}, `stored config for ${row.id}`);
      return { ...settings, id: row.id, name: row.name };
    } catch (error) {
      if (isPostureError(error)) {
        throw new SourceError(error.message, 'load endpoint config');
      }
      throw error;
    }
  }
}

// ---------------------------------------------------------------------------
// Traffic Logs
// ---------------------------------------------------------------------------
interface TrafficRow {
  id: string;
  ts: Date;
  status_code: number;
  source_ip: string | null;
  scheme: string | null;
  headers: unknown;
  body: string | null;
}

function headersFrom(value: unknown): Record<string, string> {
  const headers: Record<string, string> = {};
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return headers;
  for (const [name, raw] of Object.entries(value)) {
    if (raw !== null && raw !== undefined) headers[name] = String(raw);
  }
  return headers;
}

function schemeFrom(value: string | null): TrafficEntry['scheme'] {
  const scheme = value?.toLowerCase();
  return scheme === 'http' || scheme === 'https' ? scheme : null;
}

export function toTrafficEntry(row: TrafficRow): TrafficEntry {
  return {
    timestamp: row.ts,
    statusCode: Number(row.status_code),
    headers: headersFrom(row.headers),
    body: row.body,
    sourceIp: row.source_ip,
    scheme: schemeFrom(row.scheme),
  };
}

export class PostgresTrafficLogSource implements TrafficLogSource {
  constructor(private readonly pool: Pool) {}

  async *pages(endpointId: string, range: TimeRange, pageSize: number): AsyncIterable<TrafficEntry[]> {
    let cursor: { ts: Date; id: string } | null = null;

    while (true) {
      const rows: TrafficRow[] = await runQuery<TrafficRow>(
        this.pool,
        'read traffic logs',
        `SELECT id, ts, status_code, source_ip, scheme, headers, body
         FROM traffic_logs
         WHERE endpoint_id = $1
           AND ts >= $2 AND ts <= $3
           AND ($4::timestamptz IS NULL OR (ts, id) < ($4::timestamptz, $5::bigint))
         ORDER BY ts DESC, id DESC
         LIMIT $6`,
        [endpointId, range.start, range.end, cursor?.ts ?? null, cursor?.id ?? null, pageSize],
      );
      if (rows.length === 0) return;

      yield rows.map(toTrafficEntry);

      if (rows.length < pageSize) return;
      const last = rows[rows.length - 1];
      cursor = { ts: last.ts, id: last.id };
    }
  }
}

// ---------------------------------------------------------------------------
// Database Schema Setup
// ---------------------------------------------------------------------------
export async function initializeSchema(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS api_endpoints (
      id VARCHAR(100) PRIMARY KEY,
      name TEXT NOT NULL,
      config JSONB NOT NULL DEFAULT '{}'::jsonb,
      updated_at TIMESTAMP WITH TIME ZONE DEFAULT NOW()
    );

    CREATE TABLE IF NOT EXISTS traffic_logs (
      id BIGSERIAL PRIMARY KEY,
      endpoint_id VARCHAR(100) NOT NULL REFERENCES api_endpoints(id) ON DELETE CASCADE,
      ts TIMESTAMP WITH TIME ZONE NOT NULL,
      status_code INTEGER NOT NULL,
      source_ip TEXT,
      scheme VARCHAR(5),
      headers JSONB NOT NULL DEFAULT '{}'::jsonb,
      body TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_traffic_logs_endpoint_ts ON traffic_logs(endpoint_id, ts DESC, id DESC);
  `);

  logger.info('Source schema initialized');
}
