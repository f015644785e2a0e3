import { Pool } from 'pg';
import { parsePlacementRecord, stableDigest } from '@vramfit/protocol';
import type { PlacementRecord } from '@vramfit/protocol';
import type { PlacementDbConfig } from '../config';
import { RequestConflictError } from '../errors';
import { logError } from '../logging';
import { DEFAULT_LIST_LIMIT } from './types';
import type { DecisionStore, PlacementQuery } from './types';

const TABLES = {
  requests: 'placement_requests',
  decisions: 'placement_decisions',
};

/** The part of a pg `Pool` (and its clients) the store relies on. */
export type SqlResult = { rows: unknown[]; rowCount: number | null };

export type SqlClient = {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
  release(): void;
};

export type SqlPool = {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
  connect(): Promise<SqlClient>;
};

export const createPostgresPool = (config: PlacementDbConfig): Pool => {
  return new Pool({
    connectionString: config.url,
    ssl: config.ssl ? { rejectUnauthorized: false } : undefined,
  });
};

const createTables = async (pool: SqlPool): Promise<void> => {
  await pool.query(`
    create table if not exists ${TABLES.requests} (
      request_id text primary key,
      requester_id text not null,
      organization_id text,
      data jsonb not null,
      created_at timestamptz not null default now()
    );
  `);
  await pool.query(`
    create table if not exists ${TABLES.decisions} (
      decision_id text primary key,
      request_id text not null references ${TABLES.requests} (request_id),
      node_id text,
      created_at_ms bigint not null,
      data jsonb not null
    );
  `);
  await pool.query(
    `create index if not exists ${TABLES.decisions}_request_idx on ${TABLES.decisions} (request_id, created_at_ms desc)`,
  );
};

const toRecord = (row: unknown): PlacementRecord => {
  const parsed = parsePlacementRecord(row);
  if (!parsed.ok) {
    throw new Error(`stored placement is malformed: ${parsed.errors.join('; ')}`);
  }
  return parsed.value;
};

export const createPostgresDecisionStore = async (pool: SqlPool): Promise<DecisionStore> => {
  await createTables(pool);

  return {
    async savePlacement(record: PlacementRecord): Promise<void> {
      const { request, decision } = record;
      const client = await pool.connect();
      try {
        await client.query('begin');
        const inserted = await client.query(
          `insert into ${TABLES.requests} (request_id, requester_id, organization_id, data)
           values ($1, $2, $3, $4)
           on conflict (request_id) do nothing
           returning request_id`,
          [request.requestId, request.requesterId, request.organizationId ?? null, request],
        );
        if (inserted.rowCount === 0) {
          // Row lock holds the stored request steady until commit.
          const stored = await client.query(
            `select data from ${TABLES.requests} where request_id = $1 for update`,
            [request.requestId],
          );
          const row = stored.rows[0];
          const data = typeof row === 'object' && row !== null && 'data' in row ? row.data : undefined;
          if (data === undefined || stableDigest(data) !== stableDigest(request)) {
            throw new RequestConflictError(request.requestId);
          }
        }
        await client.query(
          `insert into ${TABLES.decisions} (decision_id, request_id, node_id, created_at_ms, data)
           values ($1, $2, $3, $4, $5)`,
          [decision.decisionId, decision.requestId, decision.nodeId, decision.createdAtMs, decision],
        );
        await client.query('commit');
      } catch (error) {
        try {
          await client.query('rollback');
        } catch (rollbackError) {
          logError('[placement] rollback failed', rollbackError);
        }
        throw error;
      } finally {
        client.release();
      }
    },

    async getPlacement(requestId: string): Promise<PlacementRecord | null> {
      const result = await pool.query(
        `select r.data as request, d.data as decision
         from ${TABLES.decisions} d
         join ${TABLES.requests} r on r.request_id = d.request_id
         where d.request_id = $1
         order by d.created_at_ms desc
         limit 1`,
        [requestId],
      );
      const row = result.rows[0];
      return row ? toRecord(row) : null;
    },

    async listPlacements(query: PlacementQuery = {}): Promise<PlacementRecord[]> {
      const clauses: string[] = [];
      const params: Array<string | number> = [];
      if (query.organizationId !== undefined) {
        params.push(query.organizationId);
        clauses.push(`r.organization_id = $${params.length}`);
      }
      if (query.requesterId !== undefined) {
        params.push(query.requesterId);
        clauses.push(`r.requester_id = $${params.length}`);
      }
      params.push(query.limit ?? DEFAULT_LIST_LIMIT);
      const where = clauses.length > 0 ? `where ${clauses.join(' and ')}` : '';
      const result = await pool.query(
        `select r.data as request, d.data as decision
         from ${TABLES.decisions} d
         join ${TABLES.requests} r on r.request_id = d.request_id
         ${where}
         order by d.created_at_ms desc
         limit $${params.length}`,
        params,
      );
      return result.rows.map(toRecord);
    },
  };
};
