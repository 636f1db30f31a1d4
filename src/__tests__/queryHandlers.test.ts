import { Request, Response } from 'express';
import { Timestamp } from 'firebase-admin/firestore';
import { createGetQueryHandler } from '../functions/getQuery';
import { createQueryHistoryHandler } from '../functions/queryHistory';
import { createQueryStatsHandler } from '../functions/queryStats';
import { createSubmitQueryHandler } from '../functions/submitQuery';
import { MemoryBillDirectory } from '../helpers/billDirectory';
import { InflightCoordinator } from '../helpers/inflightCoordinator';
import { MemoryResultStore } from '../helpers/memoryResultStore';
import { QueryOrchestrator } from '../helpers/queryOrchestrator';
import { ReasoningClient } from '../helpers/reasoningClient';
import { Query, ReasoningRequest, ReasoningResult } from '../types';
import { ExternalServiceError, StorageError } from '../utils/errors';
import { DEFAULT_CONSTRAINTS } from '../utils/validator';

jest.mock('../utils/logger');

const NOW_MS = Date.UTC(2026, 0, 15, 12, 0, 0);
const NOW_ISO = '2026-01-15T12:00:00.000Z';

interface MockResponse {
  status: jest.Mock;
  json: jest.Mock;
  on: jest.Mock;
  writableEnded: boolean;
}

function mockResponse(): MockResponse {
  return {
    status: jest.fn().mockReturnThis(),
    json: jest.fn(),
    on: jest.fn(),
    writableEnded: false,
  };
}

function asRequest<P = Record<string, string>>(fields: Record<string, unknown>): Request<P> {
  return { headers: {}, ...fields } as unknown as Request<P>;
}

function asResponse(res: MockResponse): Response {
  return res as unknown as Response;
}

describe('Query HTTP handlers', () => {
  let store: MemoryResultStore;
  let complete: jest.Mock<Promise<ReasoningResult>, [ReasoningRequest, AbortSignal]>;
  let orchestrator: QueryOrchestrator;
  const answer: ReasoningResult = { answer: 'About $100,000 per QALY.', model: 'gpt-4o' };

  beforeEach(() => {
    jest.clearAllMocks();
    let ids = 0;
    const clock = () => Timestamp.fromMillis(NOW_MS);

    store = new MemoryResultStore(3600, clock);
    complete = jest.fn<Promise<ReasoningResult>, [ReasoningRequest, AbortSignal]>();
    orchestrator = new QueryOrchestrator({
      store,
      bills: new MemoryBillDirectory([{ id: 'bill-1', filename: 'er-visit.pdf', status: 'pending' }]),
      client: new ReasoningClient(
        { complete },
        { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0, jitterMs: 0, timeoutMs: 1000 }
      ),
      coordinator: new InflightCoordinator<Query>(),
      model: 'gpt-4o',
      idFactory: () => `query-${++ids}`,
      now: clock,
    });
  });

  describe('POST /queries', () => {
    const submitQuery = () => createSubmitQueryHandler(orchestrator);

    it('should return the completed answer', async () => {
      complete.mockResolvedValue(answer);
      const res = mockResponse();

      await submitQuery()(
        asRequest({ method: 'POST', body: { text: 'What is the QALY threshold for drug X?' } }),
        asResponse(res)
      );

      expect(res.status).toHaveBeenCalledWith(200);
      expect(res.json).toHaveBeenCalledWith({
        success: true,
        queryId: 'query-1',
        status: 'complete',
        result: 'About $100,000 per QALY.',
      });
    });

    it('should report a failed query with its error kind', async () => {
      complete.mockRejectedValue(new ExternalServiceError('permanent', 'contentPolicy', 'withheld'));
      const res = mockResponse();

      await submitQuery()(asRequest({ method: 'POST', body: { text: 'Cost of insulin?' } }), asResponse(res));

      expect(res.status).toHaveBeenCalledWith(200);
      expect(res.json).toHaveBeenCalledWith({
        success: false,
        queryId: 'query-1',
        status: 'failed',
        errorKind: 'permanent',
        error: 'withheld',
      });
    });

    it('should return 400 for an invalid body', async () => {
      const res = mockResponse();

      await submitQuery()(
        asRequest({ method: 'POST', body: { text: '', billRefs: ['a/b'] } }),
        asResponse(res)
      );

      expect(res.status).toHaveBeenCalledWith(400);
      expect(res.json).toHaveBeenCalledWith({
        success: false,
        errors: ['text cannot be empty', 'Bill reference cannot contain "/": a/b'],
      });
      expect(complete).not.toHaveBeenCalled();
    });

    it('should return 400 for an unknown bill', async () => {
      const res = mockResponse();

      await submitQuery()(
        asRequest({ method: 'POST', body: { text: 'Cost of insulin?', billRefs: ['bill-9'] } }),
        asResponse(res)
      );

      expect(res.status).toHaveBeenCalledWith(400);
      expect(res.json).toHaveBeenCalledWith({
        success: false,
        errors: ['Unknown bill reference: bill-9'],
      });
    });

    it('should return 503 when storage is unavailable', async () => {
      jest.spyOn(store, 'lookup').mockRejectedValue(new StorageError('Result store lookup failed: down'));
      const res = mockResponse();

      await submitQuery()(asRequest({ method: 'POST', body: { text: 'Cost of insulin?' } }), asResponse(res));

      expect(res.status).toHaveBeenCalledWith(503);
      expect(res.json).toHaveBeenCalledWith({
        success: false,
        errorKind: 'storage',
        error: 'Result store lookup failed: down',
      });
    });

    it('should stop waiting without responding when the client disconnects', async () => {
      let finish: (result: ReasoningResult) => void = () => undefined;
      complete.mockReturnValue(
        new Promise<ReasoningResult>((resolve) => {
          finish = resolve;
        })
      );
      const res = mockResponse();

      const handling = submitQuery()(
        asRequest({ method: 'POST', body: { text: 'Cost of insulin?' } }),
        asResponse(res)
      );
      await new Promise((resolve) => setImmediate(resolve));

      const [event, onClose] = res.on.mock.calls[0];
      expect(event).toBe('close');
      onClose();
      await handling;

      expect(res.status).not.toHaveBeenCalled();

      finish(answer);
      await new Promise((resolve) => setImmediate(resolve));
      expect((await store.get('query-1'))?.status).toBe('complete');
    });
  });

  describe('GET /queries', () => {
    const queryHistory = () => createQueryHistoryHandler(orchestrator, 20, DEFAULT_CONSTRAINTS);

    it('should return a page of query views', async () => {
      complete.mockResolvedValue(answer);
      await orchestrator.submit({ text: 'Cost of insulin?', billRefs: ['bill-1'] });
      await orchestrator.submit({ text: 'What is the QALY threshold for drug X?' });
      const res = mockResponse();

      await queryHistory()(asRequest({ method: 'GET', query: { pageSize: '1' } }), asResponse(res));

      expect(res.status).toHaveBeenCalledWith(200);
      const body = res.json.mock.calls[0][0];
      expect(body.success).toBe(true);
      expect(body.queries).toEqual([
        {
          queryId: 'query-2',
          text: 'What is the QALY threshold for drug X?',
          billRefs: [],
          status: 'complete',
          model: 'gpt-4o',
          result: 'About $100,000 per QALY.',
          createdAt: NOW_ISO,
          completedAt: NOW_ISO,
        },
      ]);
      expect(typeof body.nextPageToken).toBe('string');
    });

    it('should filter by bill', async () => {
      complete.mockResolvedValue(answer);
      await orchestrator.submit({ text: 'Cost of insulin?', billRefs: ['bill-1'] });
      await orchestrator.submit({ text: 'What is the QALY threshold for drug X?' });
      const res = mockResponse();

      await queryHistory()(asRequest({ method: 'GET', query: { billRef: 'bill-1' } }), asResponse(res));

      const body = res.json.mock.calls[0][0];
      expect(body.queries.map((view: { queryId: string }) => view.queryId)).toEqual(['query-1']);
      expect(body.nextPageToken).toBeUndefined();
    });

    it('should return 400 for invalid parameters', async () => {
      const res = mockResponse();

      await queryHistory()(
        asRequest({ method: 'GET', query: { pageSize: '0', status: 'done' } }),
        asResponse(res)
      );

      expect(res.status).toHaveBeenCalledWith(400);
      expect(res.json).toHaveBeenCalledWith({
        success: false,
        errors: [
          'pageSize must be an integer between 1 and 100',
          'status must be one of: pending, inFlight, complete, failed',
        ],
      });
    });

    it('should return 400 for a malformed page token', async () => {
      const res = mockResponse();

      await queryHistory()(asRequest({ method: 'GET', query: { pageToken: 'garbage' } }), asResponse(res));

      expect(res.status).toHaveBeenCalledWith(400);
      expect(res.json).toHaveBeenCalledWith({ success: false, errors: ['Invalid page token'] });
    });
  });

  describe('GET /queries/:id', () => {
    const getQuery = () => createGetQueryHandler(orchestrator);

    it('should return 404 for an unknown id', async () => {
      const res = mockResponse();

      await getQuery()(
        asRequest<{ id: string }>({ method: 'GET', params: { id: 'missing' } }),
        asResponse(res)
      );

      expect(res.status).toHaveBeenCalledWith(404);
      expect(res.json).toHaveBeenCalledWith({ success: false, error: 'Query not found: missing' });
    });

    it('should return a stored query', async () => {
      complete.mockResolvedValue(answer);
      await orchestrator.submit({ text: 'Cost of insulin?', billRefs: ['bill-1'] });
      const res = mockResponse();

      await getQuery()(
        asRequest<{ id: string }>({ method: 'GET', params: { id: 'query-1' } }),
        asResponse(res)
      );

      expect(res.status).toHaveBeenCalledWith(200);
      expect(res.json).toHaveBeenCalledWith({
        success: true,
        query: expect.objectContaining({ queryId: 'query-1', billRefs: ['bill-1'], status: 'complete' }),
      });
    });
  });

  describe('GET /stats', () => {
    const queryStats = () => createQueryStatsHandler(orchestrator);

    it('should return query and bill counts', async () => {
      complete.mockResolvedValue(answer);
      await orchestrator.submit({ text: 'Cost of insulin?', billRefs: ['bill-1'] });
      const res = mockResponse();

      await queryStats()(asRequest({ method: 'GET' }), asResponse(res));

      expect(res.status).toHaveBeenCalledWith(200);
      expect(res.json).toHaveBeenCalledWith({ success: true, stats: { queries: 1, bills: 1 } });
    });

    it('should return 503 when storage is unavailable', async () => {
      jest.spyOn(store, 'count').mockRejectedValue(new StorageError('Result store count failed: down'));
      const res = mockResponse();

      await queryStats()(asRequest({ method: 'GET' }), asResponse(res));

      expect(res.status).toHaveBeenCalledWith(503);
      expect(res.json).toHaveBeenCalledWith({ success: false, error: 'Result store count failed: down' });
    });
  });
});
