import { Request, Response } from 'express';
import { QueryOrchestrator } from '../helpers/queryOrchestrator';
import { StorageError, ValidationError, getErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { parseHistoryParams } from '../utils/normalizer';
import { QueryView, toQueryView } from '../utils/serializer';
import { ValidationConstraints } from '../utils/validator';

export interface HistoryResponse {
  success: boolean;
  queries?: QueryView[];
  nextPageToken?: string;
  error?: string;
  errors?: string[];
}

/**
 * GET /queries
 * Query string:
 *   - pageSize?: number
 *   - pageToken?: string
 *   - status?: pending | inFlight | complete | failed
 *   - billRef?: string
 *   - createdAfter?: ISO date (inclusive)
 *   - createdBefore?: ISO date (exclusive)
 */
export function createQueryHistoryHandler(
  orchestrator: QueryOrchestrator,
  defaultPageSize: number,
  constraints: ValidationConstraints
) {
  return async function queryHistory(req: Request, res: Response<HistoryResponse>): Promise<void> {
    try {
      const request = parseHistoryParams(req.query, defaultPageSize, constraints);
      const page = await orchestrator.history(request);

      logger.info('query_history_request', {
        pageSize: request.pageSize,
        returned: page.queries.length,
        hasMore: page.nextPageToken !== undefined,
      });

      res.status(200).json({
        success: true,
        queries: page.queries.map(toQueryView),
        nextPageToken: page.nextPageToken,
      });
    } catch (error) {
      if (error instanceof ValidationError) {
        res.status(400).json({ success: false, errors: error.errors });
        return;
      }

      logger.error('query_history_error', { error: getErrorMessage(error) });
      res
        .status(error instanceof StorageError ? 503 : 500)
        .json({ success: false, error: getErrorMessage(error) });
    }
  };
}
