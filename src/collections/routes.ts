/**
 * Collections API Routes
 * Express routes for listing, inspecting, retrieving from and asking collections.
 */

import { Router, type Request, type Response } from 'express';
import { isCollectionsError, type CollectionsErrorCode } from '../errors.js';
import type { CollectionService } from './service.js';

const STATUS_BY_CODE: Record<CollectionsErrorCode, number> = {
  UNKNOWN_COLLECTION: 404,
  INVALID_CONFIGURATION: 400,
  MISSING_CREDENTIAL: 400,
  GENERATION_FAILED: 502,
  RETRIEVAL_FAILED: 500,
  STORE_UNAVAILABLE: 503,
};

function sendError(res: Response, error: unknown, fallback: string): void {
  if (isCollectionsError(error)) {
    res.status(STATUS_BY_CODE[error.code]).json({ error: error.message, code: error.code, operation: error.operation });
    return;
  }
  res.status(500).json({ error: fallback });
}

function collectionParam(req: Request): string {
  const name = req.params.name;
  return Array.isArray(name) ? String(name[0]) : String(name);
}

function optionalTopK(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Create Express router for collection endpoints.
 */
export function createCollectionRoutes(service: CollectionService): Router {
  const router = Router();

  /**
   * GET /api/collections
   * Registered collections in registration order.
   */
  router.get('/', (_req: Request, res: Response) => {
    res.json(service.listRegistered());
  });

  /**
   * GET /api/collections/stats
   * Stats for every collection present in the store.
   */
  router.get('/stats', async (_req: Request, res: Response) => {
    try {
      res.json(await service.listAll());
    } catch (error) {
      console.error('[Collections] Failed to list collection stats:', error);
      sendError(res, error, 'Failed to list collections');
    }
  });

  /**
   * GET /api/collections/:name
   * Collection info.
   */
  router.get('/:name', async (req: Request, res: Response) => {
    try {
      res.json(await service.info(collectionParam(req)));
    } catch (error) {
      console.error('[Collections] Failed to get collection info:', error);
      sendError(res, error, 'Failed to get collection info');
    }
  });

  /**
   * POST /api/collections/:name/retrieve
   * Body: { query: string, topK?: number }
   */
  router.post('/:name/retrieve', async (req: Request, res: Response) => {
    try {
      const { query, topK } = req.body ?? {};

      if (!query || typeof query !== 'string') {
        res.status(400).json({ error: 'Query is required' });
        return;
      }

      res.json(await service.retrieve(collectionParam(req), query, optionalTopK(topK)));
    } catch (error) {
      console.error('[Collections] Retrieve error:', error);
      sendError(res, error, 'Retrieval failed');
    }
  });

  /**
   * POST /api/collections/:name/ask
   * Body: { question: string, topK?: number }
   */
  router.post('/:name/ask', async (req: Request, res: Response) => {
    try {
      const { question, topK } = req.body ?? {};

      if (!question || typeof question !== 'string') {
        res.status(400).json({ error: 'Question is required' });
        return;
      }

      res.json(await service.ask(collectionParam(req), question, optionalTopK(topK)));
    } catch (error) {
      console.error('[Collections] Ask error:', error);
      sendError(res, error, 'RAG query failed');
    }
  });

  return router;
}
