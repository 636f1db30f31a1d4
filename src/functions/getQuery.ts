import { Request, Response } from 'express';
import { QueryOrchestrator } from '../helpers/queryOrchestrator';
import { StorageError, getErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { QueryView, toQueryView } from '../utils/serializer';

export interface GetQueryResponse {
  success: boolean;
  query?: QueryView;
  error?: string;
}

/**
 * GET /queries/:id
 */
export function createGetQueryHandler(orchestrator: QueryOrchestrator) {
  return async function getQuery(
    req: Request<{ id: string }>,
    res: Response<GetQueryResponse>
  ): Promise<void> {
    try {
      const query = await orchestrator.getQuery(req.params.id);
      if (!query) {
        res.status(404).json({ success: false, error: `Query not found: ${req.params.id}` });
        return;
      }
      res.status(200).json({ success: true, query: toQueryView(query) });
    } catch (error) {
      logger.error('get_query_error', { queryId: req.params.id, error: getErrorMessage(error) });
      res
        .status(error instanceof StorageError ? 503 : 500)
        .json({ success: false, error: getErrorMessage(error) });
    }
  };
}
