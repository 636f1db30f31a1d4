import { Timestamp } from 'firebase-admin/firestore';
import {
  CacheIndexEntry,
  Clock,
  HistoryFilter,
  HistoryPage,
  Query,
  QueryErrorInfo,
  ReasoningResult,
} from '../types';
import { StorageError } from '../utils/errors';
import {
  ResultStore,
  compareNewestFirst,
  decodePageToken,
  encodePageToken,
  isFresh,
  matchesFilter,
  toComplete,
  toFailed,
  toInFlight,
} from './resultStore';

/**
 * Stored records share nothing mutable with callers
 */
function freeze(query: Query): Query {
  return Object.freeze({
    ...query,
    contextRefs: [...query.contextRefs],
    result: query.result ? Object.freeze({ ...query.result }) : null,
    errorInfo: query.errorInfo ? Object.freeze({ ...query.errorInfo }) : null,
  });
}

/**
 * Process-local result store for local runs without Firestore
 */
export class MemoryResultStore implements ResultStore {
  private queries = new Map<string, Query>();
  private cacheIndex = new Map<string, CacheIndexEntry>();

  constructor(
    private readonly ttlSeconds: number,
    private readonly now: Clock = () => Timestamp.now()
  ) {}

  async lookup(fingerprint: string): Promise<Query | null> {
    const entry = this.cacheIndex.get(fingerprint);
    if (!entry || !isFresh(entry.completedAt, this.now(), this.ttlSeconds)) {
      return null;
    }
    const query = this.queries.get(entry.queryId);
    return query && query.status === 'complete' ? query : null;
  }

  async create(query: Query): Promise<Query> {
    if (this.queries.has(query.id)) {
      throw new StorageError(`Query already exists: ${query.id}`);
    }
    const stored = freeze(query);
    this.queries.set(stored.id, stored);
    return stored;
  }

  async get(id: string): Promise<Query | null> {
    return this.queries.get(id) ?? null;
  }

  async markInFlight(id: string): Promise<Query> {
    return this.transition(id, (query) => toInFlight(query, this.now()));
  }

  async complete(id: string, result: ReasoningResult): Promise<Query> {
    const completed = await this.transition(id, (query) => toComplete(query, result, this.now()));
    if (completed.status === 'complete' && completed.completedAt) {
      const current = this.cacheIndex.get(completed.fingerprint);
      if (!current || current.completedAt.toMillis() <= completed.completedAt.toMillis()) {
        this.cacheIndex.set(completed.fingerprint, {
          queryId: completed.id,
          completedAt: completed.completedAt,
        });
      }
    }
    return completed;
  }

  async fail(id: string, errorInfo: QueryErrorInfo): Promise<Query> {
    return this.transition(id, (query) => toFailed(query, errorInfo, this.now()));
  }

  async history(
    filter: HistoryFilter,
    pageToken: string | undefined,
    pageSize: number
  ): Promise<HistoryPage> {
    const cursor = pageToken ? decodePageToken(pageToken) : null;
    const after = cursor
      ? { createdAt: new Timestamp(cursor.seconds, cursor.nanoseconds), id: cursor.id }
      : null;

    const matching = Array.from(this.queries.values())
      .filter((query) => matchesFilter(query, filter))
      .filter((query) => !after || compareNewestFirst(after, query) < 0)
      .sort(compareNewestFirst);

    const page = matching.slice(0, pageSize);
    return {
      queries: page,
      nextPageToken:
        matching.length > pageSize ? encodePageToken(page[page.length - 1]) : undefined,
    };
  }

  async count(): Promise<number> {
    return this.queries.size;
  }

  private transition(id: string, apply: (query: Query) => Query): Query {
    const current = this.queries.get(id);
    if (!current) {
      throw new StorageError(`Query not found: ${id}`);
    }
    const next = apply(current);
    if (next === current) {
      return current;
    }
    const stored = freeze(next);
    this.queries.set(id, stored);
    return stored;
  }
}
