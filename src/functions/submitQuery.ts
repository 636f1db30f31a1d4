import { Request, Response } from 'express';
import { QueryOrchestrator } from '../helpers/queryOrchestrator';
import { QueryErrorInfo, QueryStatus } from '../types';
import {
  StorageError,
  ValidationError,
  WaitAbandonedError,
  getErrorMessage,
} from '../utils/errors';
import { logger } from '../utils/logger';

export interface SubmitResponse {
  success: boolean;
  queryId?: string;
  status?: QueryStatus;
  result?: string;
  errorKind?: QueryErrorInfo['kind'] | 'storage';
  error?: string;
  errors?: string[];
}

/**
 * POST /queries
 * Body:
 *   - text: string (required)
 *   - billRefs?: string[]
 */
export function createSubmitQueryHandler(orchestrator: QueryOrchestrator) {
  return async function submitQuery(req: Request, res: Response<SubmitResponse>): Promise<void> {
    const startTime = Date.now();
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    try {
      const query = await orchestrator.submit(req.body, { signal: controller.signal });

      logger.info('submit_query_request', {
        queryId: query.id,
        status: query.status,
        processingTimeMs: Date.now() - startTime,
      });

      res.status(200).json({
        success: query.status === 'complete',
        queryId: query.id,
        status: query.status,
        result: query.result?.answer,
        errorKind: query.errorInfo?.kind,
        error: query.errorInfo?.message,
      });
    } catch (error) {
      if (error instanceof ValidationError) {
        logger.warn('submit_query_validation_failed', { errors: error.errors.join(', ') });
        res.status(400).json({ success: false, errors: error.errors });
        return;
      }

      if (error instanceof WaitAbandonedError) {
        // Client went away; the in-flight call carries on without it
        logger.info('submit_query_abandoned', { fingerprint: error.fingerprint });
        return;
      }

      logger.error('submit_query_error', {
        error: getErrorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });

      if (error instanceof StorageError) {
        res.status(503).json({ success: false, errorKind: 'storage', error: error.message });
        return;
      }

      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
