import { ok, err, type Result } from 'neverthrow';
import type { GraphExecutor, GraphQueryError } from '../types/provider.js';
import { safeNumber, safeString } from '../utils/safe-cast.js';

export interface NodeTypeCount {
  label: string;
  count: number;
}

export interface GraphStats {
  totalNodes: number;
  totalRelationships: number;
  /** Node counts grouped by first label, largest first. */
  nodeTypes: NodeTypeCount[];
}

const COUNT_NODES = 'MATCH (n) RETURN count(n) AS count';
const COUNT_RELATIONSHIPS = 'MATCH ()-[r]->() RETURN count(r) AS count';
const COUNT_NODE_TYPES =
  'MATCH (n) RETURN labels(n)[0] AS type, count(*) AS count ORDER BY count DESC';

async function countOf(
  executor: GraphExecutor,
  query: string,
): Promise<Result<number, GraphQueryError>> {
  const result = await executor.execute(query, {});
  return result.map((rows) => safeNumber(rows[0]?.['count'], 0));
}

export async function collectGraphStats(
  executor: GraphExecutor,
): Promise<Result<GraphStats, GraphQueryError>> {
  const [nodes, relationships, types] = await Promise.all([
    countOf(executor, COUNT_NODES),
    countOf(executor, COUNT_RELATIONSHIPS),
    executor.execute(COUNT_NODE_TYPES, {}),
  ]);

  if (nodes.isErr()) return err(nodes.error);
  if (relationships.isErr()) return err(relationships.error);
  if (types.isErr()) return err(types.error);

  return ok({
    totalNodes: nodes.value,
    totalRelationships: relationships.value,
    nodeTypes: types.value.map((row) => ({
      label: safeString(row['type'], 'unlabelled'),
      count: safeNumber(row['count'], 0),
    })),
  });
}
