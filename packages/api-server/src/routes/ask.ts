import { Router } from 'express';
import { z } from 'zod';
import type { QuestionAnswerer, ScoredRow, QueryTag } from '@papergraph/core';

export const askRequestSchema = z.object({
  question: z
    .string()
    .max(2000, 'question must be at most 2000 characters')
    .refine((q) => q.trim().length > 0, 'question must not be empty'),
  top_n: z.number().int().positive().max(100).optional(),
});

export type AskRequest = z.infer<typeof askRequestSchema>;

export interface AskResponseItem {
  tag: QueryTag;
  score: number;
  fields: Record<string, unknown>;
}

export function formatRow(row: ScoredRow): AskResponseItem {
  const { _score, _tag, ...fields } = row;
  return { tag: _tag, score: _score, fields };
}

export interface AskRouteDeps {
  readonly answerer: QuestionAnswerer | null;
}

export function createAskRouter(deps: AskRouteDeps): Router {
  const router = Router();

  router.post('/', async (req, res) => {
    const parsed = askRequestSchema.safeParse(req.body);

    if (!parsed.success) {
      res.status(400).json({
        error: 'Validation Error',
        details: parsed.error.issues,
      });
      return;
    }

    if (!deps.answerer) {
      res.status(503).json({
        error: 'Service Unavailable',
        message: 'Graph connection not initialized. Check .papergraph.yaml and that Neo4j is running.',
      });
      return;
    }

    try {
      const { question, top_n } = parsed.data;
      const answer = await deps.answerer.answer(question, top_n !== undefined ? { topN: top_n } : {});

      if (answer.isErr()) {
        res.status(500).json({
          error: 'Query Failed',
          message: answer.error.message,
        });
        return;
      }

      const { intent, entities, rows, totalRows } = answer.value;
      res.json({
        question,
        intent,
        entities,
        results: rows.map(formatRow),
        total: totalRows,
      });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      res.status(500).json({
        error: 'Internal Server Error',
        message,
      });
    }
  });

  return router;
}
