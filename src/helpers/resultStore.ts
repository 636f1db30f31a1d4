import { Timestamp } from 'firebase-admin/firestore';
import {
  HistoryFilter,
  HistoryPage,
  Query,
  QueryErrorInfo,
  ReasoningResult,
  TERMINAL_STATUSES,
  isTimestampRange,
} from '../types';
import { ValidationError } from '../utils/errors';

/**
 * Persistence for queries plus the fingerprint cache index kept over them.
 * Every method is a single-record atomic write or a read.
 */
export interface ResultStore {
  /** Fresh completed query for `fingerprint`, or null */
  lookup(fingerprint: string): Promise<Query | null>;
  create(query: Query): Promise<Query>;
  get(id: string): Promise<Query | null>;
  markInFlight(id: string): Promise<Query>;
  /** No-op returning the stored record when it is already terminal */
  complete(id: string, result: ReasoningResult): Promise<Query>;
  /** No-op returning the stored record when it is already terminal */
  fail(id: string, errorInfo: QueryErrorInfo): Promise<Query>;
  history(filter: HistoryFilter, pageToken: string | undefined, pageSize: number): Promise<HistoryPage>;
  /** Total stored queries, any status */
  count(): Promise<number>;
}

export function isTerminal(query: Query): boolean {
  return TERMINAL_STATUSES.includes(query.status);
}

/**
 * Whether a completion is still inside the cache window
 */
export function isFresh(completedAt: Timestamp, now: Timestamp, ttlSeconds: number): boolean {
  return now.toMillis() - completedAt.toMillis() <= ttlSeconds * 1000;
}

export function toInFlight(query: Query, now: Timestamp): Query {
  if (query.status !== 'pending') {
    return query;
  }
  return { ...query, status: 'inFlight', startedAt: now };
}

export function toComplete(query: Query, result: ReasoningResult, now: Timestamp): Query {
  if (isTerminal(query)) {
    return query;
  }
  return { ...query, status: 'complete', result, errorInfo: null, completedAt: now };
}

export function toFailed(query: Query, errorInfo: QueryErrorInfo, now: Timestamp): Query {
  if (isTerminal(query)) {
    return query;
  }
  return { ...query, status: 'failed', result: null, errorInfo, completedAt: now };
}

export interface HistoryCursor {
  seconds: number;
  nanoseconds: number;
  id: string;
}

export function encodePageToken(query: Query): string {
  const cursor: HistoryCursor = {
    seconds: query.createdAt.seconds,
    nanoseconds: query.createdAt.nanoseconds,
    id: query.id,
  };
  return Buffer.from(JSON.stringify(cursor), 'utf8').toString('base64url');
}

export function decodePageToken(token: string): HistoryCursor {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(token, 'base64url').toString('utf8'));
  } catch {
    throw new ValidationError(['Invalid page token']);
  }

  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'seconds' in parsed &&
    'nanoseconds' in parsed &&
    'id' in parsed &&
    Number.isInteger(parsed.seconds) &&
    Number.isInteger(parsed.nanoseconds) &&
    typeof parsed.seconds === 'number' &&
    typeof parsed.nanoseconds === 'number' &&
    typeof parsed.id === 'string' &&
    isTimestampRange(parsed.seconds, parsed.nanoseconds)
  ) {
    return { seconds: parsed.seconds, nanoseconds: parsed.nanoseconds, id: parsed.id };
  }
  throw new ValidationError(['Invalid page token']);
}

/**
 * Newest first; ties broken by id descending
 */
export function compareNewestFirst(
  a: { createdAt: Timestamp; id: string },
  b: { createdAt: Timestamp; id: string }
): number {
  if (a.createdAt.seconds !== b.createdAt.seconds) {
    return b.createdAt.seconds - a.createdAt.seconds;
  }
  if (a.createdAt.nanoseconds !== b.createdAt.nanoseconds) {
    return b.createdAt.nanoseconds - a.createdAt.nanoseconds;
  }
  if (a.id === b.id) {
    return 0;
  }
  return a.id < b.id ? 1 : -1;
}

export function matchesFilter(query: Query, filter: HistoryFilter): boolean {
  if (filter.status && query.status !== filter.status) {
    return false;
  }
  if (filter.billRef && !query.contextRefs.includes(filter.billRef)) {
    return false;
  }
  if (filter.createdAfter && query.createdAt.toMillis() < filter.createdAfter.toMillis()) {
    return false;
  }
  if (filter.createdBefore && query.createdAt.toMillis() >= filter.createdBefore.toMillis()) {
    return false;
  }
  return true;
}
