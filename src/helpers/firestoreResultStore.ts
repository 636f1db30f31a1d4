import {
  CollectionReference,
  FieldPath,
  Firestore,
  Query as FirestoreQuery,
  Timestamp,
} from 'firebase-admin/firestore';
import { COLLECTIONS } from '../config/firestore';
import {
  CacheIndexEntry,
  Clock,
  HistoryFilter,
  HistoryPage,
  Query,
  QueryErrorInfo,
  ReasoningResult,
} from '../types';
import { StorageError, ValidationError, getErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import {
  ResultStore,
  decodePageToken,
  encodePageToken,
  isFresh,
  toComplete,
  toFailed,
  toInFlight,
} from './resultStore';

/**
 * Firestore-backed result store. Queries live in `queries/{id}`; the cache
 * index lives in `queryCache/{fingerprint}` and is written in the same
 * transaction that completes a query.
 */
export class FirestoreResultStore implements ResultStore {
  constructor(
    private readonly db: Firestore,
    private readonly ttlSeconds: number,
    private readonly now: Clock = () => Timestamp.now()
  ) {}

  async lookup(fingerprint: string): Promise<Query | null> {
    return this.guard('lookup', async () => {
      const indexDoc = await this.cacheIndex().doc(fingerprint).get();
      if (!indexDoc.exists) {
        return null;
      }

      const entry = indexDoc.data() as CacheIndexEntry;
      if (!isFresh(entry.completedAt, this.now(), this.ttlSeconds)) {
        return null;
      }

      const queryDoc = await this.queries().doc(entry.queryId).get();
      if (!queryDoc.exists) {
        return null;
      }
      const query = queryDoc.data() as Query;
      return query.status === 'complete' ? query : null;
    });
  }

  async create(query: Query): Promise<Query> {
    return this.guard('create', async () => {
      await this.queries().doc(query.id).create(query);
      return query;
    });
  }

  async get(id: string): Promise<Query | null> {
    return this.guard('get', async () => {
      const doc = await this.queries().doc(id).get();
      return doc.exists ? (doc.data() as Query) : null;
    });
  }

  async markInFlight(id: string): Promise<Query> {
    return this.transition('markInFlight', id, (query) => toInFlight(query, this.now()));
  }

  async complete(id: string, result: ReasoningResult): Promise<Query> {
    return this.transition('complete', id, (query) => toComplete(query, result, this.now()));
  }

  async fail(id: string, errorInfo: QueryErrorInfo): Promise<Query> {
    return this.transition('fail', id, (query) => toFailed(query, errorInfo, this.now()));
  }

  async history(
    filter: HistoryFilter,
    pageToken: string | undefined,
    pageSize: number
  ): Promise<HistoryPage> {
    // Decode outside the guard so a bad token stays a ValidationError
    const cursor = pageToken ? decodePageToken(pageToken) : null;

    return this.guard('history', async () => {
      let q: FirestoreQuery = this.queries();
      if (filter.status) {
        q = q.where('status', '==', filter.status);
      }
      if (filter.billRef) {
        q = q.where('contextRefs', 'array-contains', filter.billRef);
      }
      if (filter.createdAfter) {
        q = q.where('createdAt', '>=', filter.createdAfter);
      }
      if (filter.createdBefore) {
        q = q.where('createdAt', '<', filter.createdBefore);
      }

      q = q.orderBy('createdAt', 'desc').orderBy(FieldPath.documentId(), 'desc');
      if (cursor) {
        q = q.startAfter(new Timestamp(cursor.seconds, cursor.nanoseconds), cursor.id);
      }

      // One extra row tells us whether another page exists
      const snapshot = await q.limit(pageSize + 1).get();
      const rows = snapshot.docs.map((doc) => doc.data() as Query);
      const page = rows.slice(0, pageSize);

      return {
        queries: page,
        nextPageToken: rows.length > pageSize ? encodePageToken(page[page.length - 1]) : undefined,
      };
    });
  }

  async count(): Promise<number> {
    return this.guard('count', async () => {
      const snapshot = await this.queries().count().get();
      return snapshot.data().count;
    });
  }

  private queries(): CollectionReference {
    return this.db.collection(COLLECTIONS.QUERIES);
  }

  private cacheIndex(): CollectionReference {
    return this.db.collection(COLLECTIONS.QUERY_CACHE);
  }

  private async transition(
    operation: string,
    id: string,
    apply: (query: Query) => Query
  ): Promise<Query> {
    return this.guard(operation, () =>
      this.db.runTransaction(async (transaction) => {
        const ref = this.queries().doc(id);
        const doc = await transaction.get(ref);
        if (!doc.exists) {
          throw new StorageError(`Query not found: ${id}`);
        }

        const current = doc.data() as Query;
        const next = apply(current);
        if (next === current) {
          return current;
        }

        transaction.set(ref, next);
        if (next.status === 'complete' && next.completedAt) {
          const entry: CacheIndexEntry = { queryId: next.id, completedAt: next.completedAt };
          transaction.set(this.cacheIndex().doc(next.fingerprint), entry);
        }
        return next;
      })
    );
  }

  /**
   * Wraps Firestore failures in StorageError
   */
  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof StorageError || error instanceof ValidationError) {
        throw error;
      }
      logger.error('result_store_error', { operation, error: getErrorMessage(error) });
      throw new StorageError(`Result store ${operation} failed: ${getErrorMessage(error)}`, error);
    }
  }
}
