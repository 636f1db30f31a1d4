import { Bill } from './bill';

export interface ReasoningRequest {
  text: string;
  contextDocuments: Bill[];
}

export interface ReasoningResult {
  answer: string;
  model: string;
}

/**
 * Immutable retry/timeout policy for the reasoning client
 */
export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitterMs: number;
  readonly timeoutMs: number; // per attempt
}

/**
 * The external reasoning service boundary
 */
export interface ReasoningService {
  complete(request: ReasoningRequest, signal: AbortSignal): Promise<ReasoningResult>;
}
