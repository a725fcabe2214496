import { Router } from 'express';
import { z } from 'zod';
import { planQuestion } from '@papergraph/core';

export const classifyRequestSchema = z.object({
  question: z
    .string()
    .max(2000, 'question must be at most 2000 characters')
    .refine((q) => q.trim().length > 0, 'question must not be empty'),
});

export type ClassifyRequest = z.infer<typeof classifyRequestSchema>;

/** Classification and query plan only; the graph is never touched. */
export function createClassifyRouter(): Router {
  const router = Router();

  router.post('/', (req, res) => {
    const parsed = classifyRequestSchema.safeParse(req.body);

    if (!parsed.success) {
      res.status(400).json({
        error: 'Validation Error',
        details: parsed.error.issues,
      });
      return;
    }

    const { question, intent, entities, specs } = planQuestion(parsed.data.question);

    res.json({
      question,
      intent,
      entities,
      queries: specs.map((spec) => ({ tag: spec.tag, query: spec.query, params: spec.params })),
    });
  });

  return router;
}
