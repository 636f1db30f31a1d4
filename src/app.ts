import express, { ErrorRequestHandler, Express } from 'express';
import { Container } from './config/container';
import { createGetQueryHandler } from './functions/getQuery';
import { createQueryHistoryHandler } from './functions/queryHistory';
import { createQueryStatsHandler } from './functions/queryStats';
import { createSubmitQueryHandler } from './functions/submitQuery';
import { getErrorMessage } from './utils/errors';
import { logger } from './utils/logger';

const handleErrors: ErrorRequestHandler = (error, _req, res, _next) => {
  // body-parser rejects malformed JSON with a 4xx status
  const status = typeof error?.status === 'number' && error.status < 500 ? error.status : 500;
  logger.warn('http_request_error', { status, error: getErrorMessage(error) });
  res.status(status).json({ success: false, error: getErrorMessage(error) });
};

export function createApp(container: Container): Express {
  const { orchestrator, settings, constraints } = container;
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.post('/queries', createSubmitQueryHandler(orchestrator));
  app.get(
    '/queries',
    createQueryHistoryHandler(orchestrator, settings.history.defaultPageSize, constraints)
  );
  app.get('/queries/:id', createGetQueryHandler(orchestrator));
  app.get('/stats', createQueryStatsHandler(orchestrator));

  app.all(['/queries', '/queries/:id', '/stats'], (_req, res) => {
    res.status(405).json({ success: false, error: 'Method not allowed' });
  });

  app.use(handleErrors);
  return app;
}
