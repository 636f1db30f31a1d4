import { ReasoningRequest, ReasoningResult, ReasoningService, RetryPolicy } from '../types';
import { ExternalServiceError, toExternalServiceError } from '../utils/errors';
import { logger } from '../utils/logger';
import { metrics } from '../utils/metrics';

export interface ReasoningClientOptions {
  sleep?: (ms: number) => Promise<void>;
  random?: () => number; // [0, 1)
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Exponential backoff with additive jitter, in milliseconds
 */
export function backoffDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, attempt - 1));
  return exponential + Math.floor(random() * policy.jitterMs);
}

/**
 * Resilient wrapper around the reasoning service: per-attempt timeout,
 * bounded retries for transient failures, immediate failure otherwise.
 */
export class ReasoningClient {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(
    private readonly service: ReasoningService,
    private readonly policy: RetryPolicy,
    options: ReasoningClientOptions = {}
  ) {
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  async invoke(request: ReasoningRequest): Promise<ReasoningResult> {
    const { maxAttempts } = this.policy;

    for (let attempt = 1; ; attempt++) {
      const startTime = Date.now();
      try {
        const result = await this.attempt(request);
        const latencyMs = Date.now() - startTime;

        metrics.recordReasoningAttempt(attempt, 'success', latencyMs);
        logger.info('reasoning_attempt', {
          attempt,
          maxAttempts,
          latencyMs,
          outcome: 'success',
          model: result.model,
        });
        return result;
      } catch (error) {
        const classified = toExternalServiceError(error);
        const latencyMs = Date.now() - startTime;

        metrics.recordReasoningAttempt(attempt, classified.kind, latencyMs);
        logger.warn('reasoning_attempt', {
          attempt,
          maxAttempts,
          latencyMs,
          outcome: classified.kind,
          reason: classified.reason,
          status: classified.status,
          error: classified.message,
        });

        if (!classified.isTransient) {
          throw classified.withAttempts(attempt);
        }
        if (attempt >= maxAttempts) {
          throw classified.withAttempts(attempt, true);
        }

        const delayMs = backoffDelay(attempt, this.policy, this.random);
        logger.debug('reasoning_retry_scheduled', { attempt, delayMs });
        await this.sleep(delayMs);
      }
    }
  }

  private attempt(request: ReasoningRequest): Promise<ReasoningResult> {
    const { timeoutMs } = this.policy;
    const controller = new AbortController();

    return new Promise<ReasoningResult>((resolve, reject) => {
      const timer = setTimeout(() => {
        controller.abort();
        reject(
          new ExternalServiceError(
            'transient',
            'timeout',
            `Reasoning call timed out after ${timeoutMs}ms`
          )
        );
      }, timeoutMs);

      Promise.resolve()
        .then(() => this.service.complete(request, controller.signal))
        .then(
          (result) => {
            clearTimeout(timer);
            resolve(result);
          },
          (error: unknown) => {
            clearTimeout(timer);
            reject(error);
          }
        );
    });
  }
}
