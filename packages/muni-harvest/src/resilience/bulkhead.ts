/**
 * Bulkhead Isolation Pattern
 *
 * Bounded worker pool for the extraction fan-out: at most `maxConcurrent`
 * tasks run at once, overflow waits in a FIFO queue.
 *
 * DESIGN:
 * - Limit concurrent executions per operation type
 * - Queue overflow requests until a slot frees up or the run is aborted
 * - A failing task never affects its siblings
 *
 * BASED ON:
 * - Michael Nygard's "Release It!" bulkhead pattern
 * - Netflix Hystrix semaphore isolation
 */

import { logger } from '../core/utils/logger.js';

/**
 * Bulkhead configuration
 */
export interface BulkheadConfig {
  readonly name: string;
  /** Max concurrent executions */
  readonly maxConcurrent: number;
}

export interface BulkheadStats {
  readonly name: string;
  readonly activeCount: number;
  readonly queuedCount: number;
  readonly rejectedCount: number;
  readonly completedCount: number;
  readonly avgExecutionMs: number;
}

interface QueuedRequest {
  readonly start: () => void;
  readonly reject: (error: Error) => void;
}

/**
 * @example
 * ```typescript
 * const bulkhead = new Bulkhead({
 *   name: 'entity-pages',
 *   maxConcurrent: 8,
 * });
 *
 * const outcome = await bulkhead.execute(() => parsePage(client, job));
 * ```
 */
export class Bulkhead {
  private readonly config: BulkheadConfig;
  private activeCount = 0;
  private readonly queue: QueuedRequest[] = [];
  private rejectedCount = 0;
  private completedCount = 0;
  private totalExecutionMs = 0;

  constructor(config: BulkheadConfig) {
    if (!Number.isInteger(config.maxConcurrent) || config.maxConcurrent < 1) {
      throw new RangeError(`Bulkhead '${config.name}' needs maxConcurrent >= 1`);
    }
    this.config = config;
  }

  /**
   * Execute function with bulkhead protection
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.activeCount < this.config.maxConcurrent) {
      return this.executeImmediate(fn);
    }

    return this.enqueue(fn);
  }

  private async executeImmediate<T>(fn: () => Promise<T>): Promise<T> {
    this.activeCount++;
    const startTime = Date.now();

    try {
      return await fn();
    } finally {
      this.activeCount--;
      this.completedCount++;
      this.totalExecutionMs += Date.now() - startTime;

      this.processNextQueued();
    }
  }

  private enqueue<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        start: () => {
          this.executeImmediate(fn).then(resolve, reject);
        },
        reject,
      });
    });
  }

  private processNextQueued(): void {
    if (this.activeCount >= this.config.maxConcurrent) {
      return;
    }

    const request = this.queue.shift();
    if (!request) {
      return;
    }

    request.start();
  }

  /**
   * Reject every queued request; running tasks are left alone
   */
  rejectQueued(reason: Error): number {
    const dropped = this.queue.splice(0, this.queue.length);
    this.rejectedCount += dropped.length;
    if (dropped.length > 0) {
      logger.warn('Bulkhead rejected queued requests', {
        bulkhead: this.config.name,
        rejected: dropped.length,
        reason: reason.message,
      });
    }
    for (const request of dropped) {
      request.reject(reason);
    }
    return dropped.length;
  }

  getStats(): BulkheadStats {
    return {
      name: this.config.name,
      activeCount: this.activeCount,
      queuedCount: this.queue.length,
      rejectedCount: this.rejectedCount,
      completedCount: this.completedCount,
      avgExecutionMs:
        this.completedCount > 0 ? this.totalExecutionMs / this.completedCount : 0,
    };
  }
}

/**
 * Create bulkhead with an unbounded FIFO queue
 */
export function createBulkhead(name: string, maxConcurrent = 8): Bulkhead {
  return new Bulkhead({ name, maxConcurrent });
}
