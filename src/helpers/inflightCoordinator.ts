import { WaitAbandonedError, getErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { metrics } from '../utils/metrics';

interface InflightEntry<T> {
  fingerprint: string;
  startedAt: number;
  waiters: number[]; // waiter ids in join order
  leaderId: number | null;
  outcome: Promise<T>;
}

export interface InflightHandle<T> {
  readonly fingerprint: string;
  readonly waiterId: number;
  /**
   * Resolves with the shared outcome. Aborting `signal` releases only this
   * waiter; the leader's task keeps running.
   */
  wait(signal?: AbortSignal): Promise<T>;
}

export interface JoinResult<T> {
  isLeader: boolean;
  handle: InflightHandle<T>;
}

export interface InflightSnapshot {
  fingerprint: string;
  startedAt: number;
  waiterCount: number;
  leaderId: number | null;
}

/**
 * Process-scoped single-flight registry. One instance is created when the
 * service starts and injected into the orchestrator; entries live only
 * while a call for their fingerprint is outstanding and are never persisted.
 */
export class InflightCoordinator<T> {
  private entries = new Map<string, InflightEntry<T>>();
  private locks = new Map<string, Promise<void>>();
  private nextWaiterId = 1;

  /**
   * Runs `fn` in the critical section for `fingerprint`. Calls for other
   * fingerprints are not blocked.
   */
  async withLock<R>(fingerprint: string, fn: () => Promise<R>): Promise<R> {
    const previous = this.locks.get(fingerprint) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.locks.set(fingerprint, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.locks.get(fingerprint) === tail) {
        this.locks.delete(fingerprint);
      }
    }
  }

  /**
   * Joins the in-flight call for `fingerprint`. The first caller becomes the
   * leader and `task` is started; later callers share its outcome and their
   * `task` is ignored.
   */
  join(fingerprint: string, task: () => Promise<T>): JoinResult<T> {
    const waiterId = this.nextWaiterId++;
    const existing = this.entries.get(fingerprint);

    if (existing) {
      existing.waiters.push(waiterId);
      if (existing.leaderId === null) {
        existing.leaderId = waiterId;
      }
      metrics.recordInflightJoin('follower');
      logger.debug('inflight_joined', {
        fingerprint,
        role: 'follower',
        waiterCount: existing.waiters.length,
      });
      return { isLeader: false, handle: this.createHandle(existing, waiterId) };
    }

    const entry: InflightEntry<T> = {
      fingerprint,
      startedAt: Date.now(),
      waiters: [waiterId],
      leaderId: waiterId,
      outcome: Promise.resolve().then(task),
    };
    this.entries.set(fingerprint, entry);
    metrics.recordInflightJoin('leader');
    logger.debug('inflight_joined', { fingerprint, role: 'leader', waiterCount: 1 });

    entry.outcome.then(
      () => this.settle(entry, 'success'),
      (error: unknown) => this.settle(entry, 'failure', error)
    );

    return { isLeader: true, handle: this.createHandle(entry, waiterId) };
  }

  has(fingerprint: string): boolean {
    return this.entries.has(fingerprint);
  }

  size(): number {
    return this.entries.size;
  }

  describe(fingerprint: string): InflightSnapshot | null {
    const entry = this.entries.get(fingerprint);
    if (!entry) {
      return null;
    }
    return {
      fingerprint,
      startedAt: entry.startedAt,
      waiterCount: entry.waiters.length,
      leaderId: entry.leaderId,
    };
  }

  private createHandle(entry: InflightEntry<T>, waiterId: number): InflightHandle<T> {
    return {
      fingerprint: entry.fingerprint,
      waiterId,
      wait: (signal?: AbortSignal) => this.wait(entry, waiterId, signal),
    };
  }

  private wait(entry: InflightEntry<T>, waiterId: number, signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      this.release(entry, waiterId);
      return Promise.reject(new WaitAbandonedError(entry.fingerprint));
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        this.release(entry, waiterId);
        reject(new WaitAbandonedError(entry.fingerprint));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      entry.outcome.then(
        (value) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  /**
   * Drops a waiter that stopped waiting. A departing leader hands the role
   * to the oldest remaining follower.
   */
  private release(entry: InflightEntry<T>, waiterId: number): void {
    const index = entry.waiters.indexOf(waiterId);
    if (index === -1) {
      return;
    }
    entry.waiters.splice(index, 1);

    if (entry.leaderId !== waiterId) {
      return;
    }

    entry.leaderId = entry.waiters.length > 0 ? entry.waiters[0] : null;
    if (entry.leaderId !== null) {
      metrics.recordLeaderPromotion();
      logger.info('inflight_leader_promoted', {
        fingerprint: entry.fingerprint,
        previousLeader: waiterId,
        newLeader: entry.leaderId,
      });
    } else {
      logger.info('inflight_all_waiters_left', { fingerprint: entry.fingerprint });
    }
  }

  private settle(entry: InflightEntry<T>, outcome: 'success' | 'failure', error?: unknown): void {
    if (this.entries.get(entry.fingerprint) === entry) {
      this.entries.delete(entry.fingerprint);
    }

    const context = {
      fingerprint: entry.fingerprint,
      outcome,
      waiterCount: entry.waiters.length,
      durationMs: Date.now() - entry.startedAt,
    };
    if (outcome === 'failure') {
      logger.error('inflight_settled', { ...context, error: getErrorMessage(error) });
    } else {
      logger.debug('inflight_settled', context);
    }
  }
}
