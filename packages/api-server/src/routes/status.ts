import { Router } from 'express';
import { collectGraphStats, type GraphExecutor, type PaperGraphConfig, type NodeTypeCount } from '@papergraph/core';

export interface StatusResponse {
  health: 'ok' | 'degraded' | 'not_initialized';
  graph_uri: string | null;
  top_n: number | null;
  total_nodes: number;
  total_relationships: number;
  node_types: NodeTypeCount[];
  message?: string;
}

export interface StatusRouteDeps {
  readonly executor: GraphExecutor | null;
  readonly config: PaperGraphConfig | null;
}

export function createStatusRouter(deps: StatusRouteDeps): Router {
  const router = Router();

  router.get('/', async (_req, res) => {
    const status: StatusResponse = {
      health: 'not_initialized',
      graph_uri: deps.config?.graph.uri ?? null,
      top_n: deps.config?.ranking.topN ?? null,
      total_nodes: 0,
      total_relationships: 0,
      node_types: [],
    };

    if (!deps.executor) {
      res.json(status);
      return;
    }

    try {
      const stats = await collectGraphStats(deps.executor);
      if (stats.isErr()) {
        res.json({ ...status, health: 'degraded', message: stats.error.message });
        return;
      }

      // An empty graph is reachable but has nothing loaded yet
      res.json({
        ...status,
        health: stats.value.totalNodes > 0 ? 'ok' : 'degraded',
        total_nodes: stats.value.totalNodes,
        total_relationships: stats.value.totalRelationships,
        node_types: stats.value.nodeTypes,
      });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      res.status(500).json({
        error: 'Status Check Failed',
        message,
        health: 'degraded',
      });
    }
  });

  return router;
}
