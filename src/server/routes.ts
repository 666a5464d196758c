/**
 * Query API Routes
 * Express routes for document question answering.
 */

import { Router, type Request, type Response } from 'express';
import { queryRequestSchema, type QueryHandler, type QueryResponse } from '../answering/index.js';
import { requireBearerToken } from './auth.js';
import { toValidationDetails } from './errors.js';

/**
 * Create Express router for the query endpoints.
 */
export function createQueryRoutes(queryHandler: QueryHandler, apiToken: string): Router {
  const router = Router();

  /**
   * POST /api/v1/hackrx/run
   * Answer questions about a document.
   * Body: { documents: string (URL), questions: string[] }
   */
  router.post('/hackrx/run', requireBearerToken(apiToken), async (req: Request, res: Response) => {
    const parsed = queryRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(422).json({ detail: toValidationDetails(parsed.error) });
      return;
    }

    const startTime = Date.now();
    const result: QueryResponse = await queryHandler.run(parsed.data);
    console.log(
      `[API] Answered ${parsed.data.questions.length} questions for ${parsed.data.documents} (${Date.now() - startTime}ms)`
    );

    res.json(result);
  });

  return router;
}
