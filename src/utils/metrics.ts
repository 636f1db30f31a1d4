/**
 * In-process metrics for the query engine
 */

export interface Metric {
  name: string;
  value: number;
  tags: Record<string, string>;
  timestamp: number;
}

const MAX_BUFFERED_METRICS = 1000;

class MetricsCollector {
  private metrics: Metric[] = [];

  record(name: string, value: number, tags: Record<string, string> = {}): void {
    this.metrics.push({
      name,
      value,
      tags,
      timestamp: Date.now(),
    });
    if (this.metrics.length > MAX_BUFFERED_METRICS) {
      this.metrics.shift();
    }
  }

  increment(name: string, tags: Record<string, string> = {}): void {
    this.record(name, 1, tags);
  }

  recordCacheLookup(hit: boolean): void {
    this.increment(hit ? 'query_engine.cache.hit' : 'query_engine.cache.miss');
  }

  /**
   * Record a submission joining the in-flight registry
   */
  recordInflightJoin(role: 'leader' | 'follower'): void {
    this.increment('query_engine.inflight.joined', { role });
  }

  recordLeaderPromotion(): void {
    this.increment('query_engine.inflight.leader_promoted');
  }

  recordReasoningAttempt(attempt: number, outcome: string, latencyMs: number): void {
    this.increment('query_engine.reasoning.attempt', {
      attempt: attempt.toString(),
      outcome,
    });
    this.record('query_engine.reasoning.latency_ms', latencyMs, { outcome });
  }

  recordValidationFailure(reason: string): void {
    this.increment('query_engine.submit.validation_failed', { reason });
  }

  recordSubmitDuration(status: string, durationMs: number): void {
    this.record('query_engine.submit.duration_ms', durationMs, { status });
  }

  // For testing purposes
  getMetrics(): Metric[] {
    return [...this.metrics];
  }

  getMetricsByName(name: string): Metric[] {
    return this.metrics.filter((m) => m.name === name);
  }

  clearMetrics(): void {
    this.metrics = [];
  }
}

export const metrics = new MetricsCollector();
