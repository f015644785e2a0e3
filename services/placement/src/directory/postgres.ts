import type { Pool } from 'pg';
import { parseNodeSnapshot } from '@vramfit/protocol';
import type { DirectorySnapshot, NodeSnapshot } from '@vramfit/protocol';
import { SnapshotUnavailableError } from '../errors';
import { logWarn } from '../logging';
import type { NodeDirectory } from './types';

export const NODES_TABLE = 'placement_nodes';

export type PostgresNodeDirectory = NodeDirectory & {
  saveNode(node: NodeSnapshot): Promise<void>;
};

export const createNodesTable = async (pool: Pool): Promise<void> => {
  await pool.query(`
    create table if not exists ${NODES_TABLE} (
      node_id text primary key,
      data jsonb not null,
      updated_at timestamptz not null default now()
    );
  `);
};

export const createPostgresNodeDirectory = async (
  pool: Pool,
  nowMs: () => number = Date.now,
): Promise<PostgresNodeDirectory> => {
  await createNodesTable(pool);

  return {
    async snapshot(): Promise<DirectorySnapshot> {
      const capturedAtMs = nowMs();
      let rows: Array<{ node_id: string; data: unknown }>;
      try {
        const result = await pool.query<{ node_id: string; data: unknown }>(
          `select node_id, data from ${NODES_TABLE} order by node_id`,
        );
        rows = result.rows;
      } catch (error) {
        throw new SnapshotUnavailableError('node directory query failed', { cause: error });
      }

      const nodes: NodeSnapshot[] = [];
      for (const row of rows) {
        const parsed = parseNodeSnapshot(row.data);
        if (!parsed.ok) {
          logWarn('[placement] skipping malformed node row', { nodeId: row.node_id, errors: parsed.errors });
          continue;
        }
        nodes.push(parsed.value);
      }
      return { capturedAtMs, nodes };
    },

    async saveNode(node: NodeSnapshot): Promise<void> {
      await pool.query(
        `insert into ${NODES_TABLE} (node_id, data) values ($1, $2)
         on conflict (node_id) do update set data = excluded.data, updated_at = now()`,
        [node.nodeId, node],
      );
    },
  };
};
