import { randomUUID } from 'crypto';
import { Timestamp } from 'firebase-admin/firestore';
import {
  Bill,
  Clock,
  Fingerprint,
  HistoryPage,
  HistoryRequest,
  Query,
  QueryStats,
  ReasoningResult,
} from '../types';
import { ValidationError, toExternalServiceError, toQueryErrorInfo } from '../utils/errors';
import { logger } from '../utils/logger';
import { metrics } from '../utils/metrics';
import { DEFAULT_CONSTRAINTS, ValidationConstraints } from '../utils/validator';
import { NormalizedSubmission, parseSubmission } from '../utils/normalizer';
import { BillDirectory } from './billDirectory';
import { fingerprint } from './fingerprintHelper';
import { InflightCoordinator, InflightHandle } from './inflightCoordinator';
import { ReasoningClient } from './reasoningClient';
import { ResultStore } from './resultStore';

export interface OrchestratorDeps {
  store: ResultStore;
  bills: BillDirectory;
  client: ReasoningClient;
  coordinator: InflightCoordinator<Query>;
  model: string;
  constraints?: ValidationConstraints;
  idFactory?: () => string;
  now?: Clock;
}

export interface SubmitOptions {
  /** Aborting abandons this caller's wait only */
  signal?: AbortSignal;
}

type Admission =
  | { kind: 'cached'; query: Query }
  | { kind: 'joined'; isLeader: boolean; handle: InflightHandle<Query> };

/**
 * Turns a submission into a deduplicated, cached, persisted query.
 *
 * State machine: pending -> inFlight -> complete | failed. Identical
 * submissions arriving while a call is outstanding share its Query.
 */
export class QueryOrchestrator {
  private readonly store: ResultStore;
  private readonly bills: BillDirectory;
  private readonly client: ReasoningClient;
  private readonly coordinator: InflightCoordinator<Query>;
  private readonly model: string;
  private readonly constraints: ValidationConstraints;
  private readonly idFactory: () => string;
  private readonly now: Clock;

  constructor(deps: OrchestratorDeps) {
    this.store = deps.store;
    this.bills = deps.bills;
    this.client = deps.client;
    this.coordinator = deps.coordinator;
    this.model = deps.model;
    this.constraints = deps.constraints ?? DEFAULT_CONSTRAINTS;
    this.idFactory = deps.idFactory ?? randomUUID;
    this.now = deps.now ?? (() => Timestamp.now());
  }

  async submit(payload: unknown, options: SubmitOptions = {}): Promise<Query> {
    const startTime = Date.now();

    const submission = this.parse(payload);
    const bills = await this.resolveBills(submission.billRefs);
    const fp = fingerprint(submission.text, submission.billRefs);

    const admission = await this.coordinator.withLock(fp.value, async (): Promise<Admission> => {
      const cached = await this.store.lookup(fp.value);
      metrics.recordCacheLookup(cached !== null);
      if (cached) {
        return { kind: 'cached', query: cached };
      }
      const { isLeader, handle } = this.coordinator.join(fp.value, () =>
        this.execute(submission.text, fp, bills)
      );
      return { kind: 'joined', isLeader, handle };
    });

    if (admission.kind === 'cached') {
      logger.info('submit_query_cache_hit', {
        fingerprint: fp.value,
        queryId: admission.query.id,
      });
      metrics.recordSubmitDuration('cached', Date.now() - startTime);
      return admission.query;
    }

    logger.info('submit_query_joined', {
      fingerprint: fp.value,
      role: admission.isLeader ? 'leader' : 'follower',
      billCount: bills.length,
    });

    const query = await admission.handle.wait(options.signal);
    metrics.recordSubmitDuration(query.status, Date.now() - startTime);
    return query;
  }

  async history(request: HistoryRequest): Promise<HistoryPage> {
    return this.store.history(request.filter, request.pageToken, request.pageSize);
  }

  async getQuery(id: string): Promise<Query | null> {
    return this.store.get(id);
  }

  async stats(): Promise<QueryStats> {
    const [queries, bills] = await Promise.all([this.store.count(), this.bills.count()]);
    return { queries, bills };
  }

  private parse(payload: unknown): NormalizedSubmission {
    try {
      return parseSubmission(payload, this.constraints);
    } catch (error) {
      metrics.recordValidationFailure('payload');
      throw error;
    }
  }

  /**
   * Unknown bill ids are rejected before anything is fingerprinted
   */
  private async resolveBills(billRefs: string[]): Promise<Bill[]> {
    const found = await Promise.all(billRefs.map((id) => this.bills.get(id)));
    const unknown = billRefs.filter((_, index) => found[index] === null);
    if (unknown.length > 0) {
      metrics.recordValidationFailure('unknown_bill');
      throw new ValidationError(unknown.map((id) => `Unknown bill reference: ${id}`));
    }
    return found.filter((bill): bill is Bill => bill !== null);
  }

  /**
   * Leader's unit of work. Its outcome is shared with every waiter.
   */
  private async execute(rawText: string, fp: Fingerprint, bills: Bill[]): Promise<Query> {
    const created = await this.store.create({
      id: this.idFactory(),
      rawText,
      normalizedText: fp.normalizedText,
      contextRefs: fp.contextRefs,
      fingerprint: fp.value,
      status: 'pending',
      result: null,
      errorInfo: null,
      model: this.model,
      createdAt: this.now(),
      startedAt: null,
      completedAt: null,
    });
    const running = await this.store.markInFlight(created.id);
    logger.info('query_started', { queryId: running.id, fingerprint: fp.value });

    let result: ReasoningResult;
    try {
      result = await this.client.invoke({ text: rawText, contextDocuments: bills });
    } catch (error) {
      const classified = toExternalServiceError(error);
      const failed = await this.store.fail(running.id, toQueryErrorInfo(classified));
      logger.warn('query_failed', {
        queryId: failed.id,
        fingerprint: fp.value,
        kind: failed.errorInfo?.kind,
        reason: failed.errorInfo?.reason,
        attempts: failed.errorInfo?.attempts,
      });
      return failed;
    }

    const completed = await this.store.complete(running.id, result);
    logger.info('query_completed', { queryId: completed.id, fingerprint: fp.value });
    return completed;
  }
}
