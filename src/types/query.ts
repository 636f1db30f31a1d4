import { Timestamp } from 'firebase-admin/firestore';
import { ReasoningResult } from './reasoning';

export type QueryStatus = 'pending' | 'inFlight' | 'complete' | 'failed';

export const QUERY_STATUSES: readonly QueryStatus[] = [
  'pending',
  'inFlight',
  'complete',
  'failed',
];

export const TERMINAL_STATUSES: readonly QueryStatus[] = ['complete', 'failed'];

/**
 * Why a query ended up `failed`
 */
export interface QueryErrorInfo {
  kind: 'permanent' | 'retryExhausted';
  reason: string;
  message: string;
  attempts: number;
}

/**
 * Query document structure
 */
export interface Query {
  id: string;
  rawText: string;
  normalizedText: string;
  contextRefs: string[]; // sorted bill ids
  fingerprint: string;
  status: QueryStatus;
  result: ReasoningResult | null;
  errorInfo: QueryErrorInfo | null;
  model: string;
  createdAt: Timestamp;
  startedAt: Timestamp | null;
  completedAt: Timestamp | null;
}

/**
 * Cache index document, keyed by fingerprint
 */
export interface CacheIndexEntry {
  queryId: string;
  completedAt: Timestamp;
}

/**
 * Normalized identity of a query
 */
export interface Fingerprint {
  value: string;
  normalizedText: string;
  contextRefs: string[];
}

export interface HistoryFilter {
  createdAfter?: Timestamp; // inclusive
  createdBefore?: Timestamp; // exclusive
  billRef?: string;
  status?: QueryStatus;
}

export interface HistoryRequest {
  filter: HistoryFilter;
  pageToken?: string;
  pageSize: number;
}

export interface HistoryPage {
  queries: Query[];
  nextPageToken?: string;
}

export interface QueryStats {
  queries: number;
  bills: number;
}

export type Clock = () => Timestamp;

/**
 * Range a Firestore Timestamp accepts, 0001-01-01 to 9999-12-31 UTC
 */
export const TIMESTAMP_MIN_SECONDS = -62135596800;
export const TIMESTAMP_MAX_SECONDS = 253402300799;

export function isTimestampRange(seconds: number, nanoseconds = 0): boolean {
  return (
    seconds >= TIMESTAMP_MIN_SECONDS &&
    seconds <= TIMESTAMP_MAX_SECONDS &&
    nanoseconds >= 0 &&
    nanoseconds < 1e9
  );
}
