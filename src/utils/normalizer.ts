import { Timestamp } from 'firebase-admin/firestore';
import { HistoryRequest, QueryStatus, QUERY_STATUSES } from '../types';
import { ValidationError } from './errors';
import {
  DEFAULT_CONSTRAINTS,
  RawHistoryParams,
  ValidationConstraints,
  isRecord,
  validateHistoryParams,
  validateSubmission,
} from './validator';

export interface NormalizedSubmission {
  text: string;
  billRefs: string[];
}

/**
 * Trim, collapse internal whitespace, case-fold
 */
export function normalizeText(rawText: string): string {
  return rawText.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * De-duplicates and sorts bill references
 */
export function normalizeContextRefs(refs: readonly string[]): string[] {
  return Array.from(new Set(refs.map((ref) => ref.trim()))).sort();
}

/**
 * Validates a raw submission and narrows it. The raw text is kept as typed.
 */
export function parseSubmission(
  payload: unknown,
  constraints: ValidationConstraints = DEFAULT_CONSTRAINTS
): NormalizedSubmission {
  const validation = validateSubmission(payload, constraints);
  if (!validation.isValid || !isRecord(payload) || typeof payload.text !== 'string') {
    throw new ValidationError(validation.errors);
  }

  const billRefs = Array.isArray(payload.billRefs)
    ? payload.billRefs.filter((ref): ref is string => typeof ref === 'string')
    : [];

  return {
    text: payload.text,
    billRefs: normalizeContextRefs(billRefs),
  };
}

function toStatus(value: unknown): QueryStatus | undefined {
  return QUERY_STATUSES.find((status) => status === value);
}

function toTimestamp(value: unknown): Timestamp | undefined {
  return typeof value === 'string' ? Timestamp.fromDate(new Date(value)) : undefined;
}

/**
 * Validates history query parameters and converts them into a store request
 */
export function parseHistoryParams(
  params: RawHistoryParams,
  defaultPageSize: number,
  constraints: ValidationConstraints = DEFAULT_CONSTRAINTS
): HistoryRequest {
  const validation = validateHistoryParams(params, constraints);
  if (!validation.isValid) {
    throw new ValidationError(validation.errors);
  }

  return {
    filter: {
      createdAfter: toTimestamp(params.createdAfter),
      createdBefore: toTimestamp(params.createdBefore),
      billRef: typeof params.billRef === 'string' ? params.billRef : undefined,
      status: toStatus(params.status),
    },
    pageToken: typeof params.pageToken === 'string' ? params.pageToken : undefined,
    pageSize: params.pageSize !== undefined ? Number(params.pageSize) : defaultPageSize,
  };
}
