import { Request, Response } from 'express';
import { QueryOrchestrator } from '../helpers/queryOrchestrator';
import { QueryStats } from '../types';
import { StorageError, getErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface StatsResponse {
  success: boolean;
  stats?: QueryStats;
  error?: string;
}

/**
 * GET /stats
 */
export function createQueryStatsHandler(orchestrator: QueryOrchestrator) {
  return async function queryStats(_req: Request, res: Response<StatsResponse>): Promise<void> {
    try {
      const stats = await orchestrator.stats();
      res.status(200).json({ success: true, stats });
    } catch (error) {
      logger.error('query_stats_error', { error: getErrorMessage(error) });
      res
        .status(error instanceof StorageError ? 503 : 500)
        .json({ success: false, error: getErrorMessage(error) });
    }
  };
}
