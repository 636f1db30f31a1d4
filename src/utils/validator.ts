import { QUERY_STATUSES, isTimestampRange } from '../types';

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
}

export interface ValidationConstraints {
  maxTextLength: number; // characters
  maxBillRefs: number;
  maxBillRefLength: number;
  maxPageSize: number;
}

export const DEFAULT_CONSTRAINTS: ValidationConstraints = {
  maxTextLength: 4000,
  maxBillRefs: 20,
  maxBillRefLength: 128,
  maxPageSize: 100,
};

/**
 * Raw history query string from the client
 */
export type RawHistoryParams = Record<string, unknown>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates a single bill reference (must be usable as a Firestore document id)
 */
export function validateBillRef(
  ref: unknown,
  constraints: ValidationConstraints = DEFAULT_CONSTRAINTS
): ValidationResult {
  const errors: string[] = [];

  if (typeof ref !== 'string' || ref.trim() === '') {
    errors.push('Bill reference must be a non-empty string');
  } else if (ref.includes('/')) {
    errors.push(`Bill reference cannot contain "/": ${ref}`);
  } else if (ref.length > constraints.maxBillRefLength) {
    errors.push(
      `Bill reference exceeds maximum length: ${ref.length} (max: ${constraints.maxBillRefLength})`
    );
  }

  return {
    isValid: errors.length === 0,
    errors,
  };
}

/**
 * Validates a submission body
 */
export function validateSubmission(
  payload: unknown,
  constraints: ValidationConstraints = DEFAULT_CONSTRAINTS
): ValidationResult {
  const errors: string[] = [];

  if (!isRecord(payload)) {
    return { isValid: false, errors: ['Request body must be a JSON object'] };
  }

  const { text, billRefs } = payload;

  if (typeof text !== 'string') {
    errors.push('text is required and must be a string');
  } else if (text.trim() === '') {
    errors.push('text cannot be empty');
  } else if (text.length > constraints.maxTextLength) {
    errors.push(
      `text exceeds maximum length: ${text.length} (max: ${constraints.maxTextLength})`
    );
  }

  if (billRefs !== undefined) {
    if (!Array.isArray(billRefs)) {
      errors.push('billRefs must be an array of strings');
    } else {
      if (billRefs.length > constraints.maxBillRefs) {
        errors.push(
          `Too many billRefs: ${billRefs.length} (max: ${constraints.maxBillRefs})`
        );
      }
      for (const ref of billRefs) {
        errors.push(...validateBillRef(ref, constraints).errors);
      }
    }
  }

  return {
    isValid: errors.length === 0,
    errors,
  };
}

/**
 * Validates history query parameters
 */
export function validateHistoryParams(
  params: RawHistoryParams,
  constraints: ValidationConstraints = DEFAULT_CONSTRAINTS
): ValidationResult {
  const errors: string[] = [];

  if (params.pageSize !== undefined) {
    const pageSize = Number(params.pageSize);
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > constraints.maxPageSize) {
      errors.push(`pageSize must be an integer between 1 and ${constraints.maxPageSize}`);
    }
  }

  if (params.pageToken !== undefined && typeof params.pageToken !== 'string') {
    errors.push('pageToken must be a string');
  }

  if (params.status !== undefined) {
    if (typeof params.status !== 'string' || !QUERY_STATUSES.some((s) => s === params.status)) {
      errors.push(`status must be one of: ${QUERY_STATUSES.join(', ')}`);
    }
  }

  if (params.billRef !== undefined) {
    errors.push(...validateBillRef(params.billRef, constraints).errors);
  }

  for (const field of ['createdAfter', 'createdBefore'] as const) {
    const value = params[field];
    if (value === undefined) {
      continue;
    }
    const millis = typeof value === 'string' ? new Date(value).getTime() : NaN;
    if (isNaN(millis)) {
      errors.push(`${field} must be an ISO-8601 date string`);
    } else if (!isTimestampRange(Math.floor(millis / 1000))) {
      errors.push(`${field} must be between 0001-01-01 and 9999-12-31`);
    }
  }

  return {
    isValid: errors.length === 0,
    errors,
  };
}
