import { logger } from '../utils/logger';

export interface PoolItem {
  id: string;
}

/**
 * WorkerPool - Runs queued items with a concurrency limit
 * Each item runs behind its own try/catch, so one failing item never
 * stops the others
 */
export class WorkerPool<T extends PoolItem> {
  private queue: T[] = [];
  private processing: Set<string> = new Set();
  private readonly maxConcurrent: number;
  private processingCallback?: (item: T) => Promise<void>;
  private idleWaiters: Array<() => void> = [];
  private isProcessingNext: boolean = false;
  private stopped: boolean = false;

  constructor(maxConcurrent: number = 2) {
    this.maxConcurrent = Math.max(1, maxConcurrent);
    logger.debug('🎯 WorkerPool initialized', { maxConcurrent: this.maxConcurrent });
  }

  /**
   * Set the callback function that processes one item
   */
  setProcessingCallback(callback: (item: T) => Promise<void>): void {
    this.processingCallback = callback;
  }

  /**
   * Add an item to the queue. Returns its queue position
   */
  add(item: T): number {
    if (this.stopped) {
      throw new Error('WorkerPool is stopped');
    }
    this.queue.push(item);
    void this.processNext();
    return this.queue.length;
  }

  /**
   * Resolves once the queue is empty and nothing is processing
   */
  onIdle(): Promise<void> {
    if (this.queue.length === 0 && this.processing.size === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Start the next item if capacity allows; fills all free slots
   */
  async processNext(): Promise<void> {
    // Prevent re-entry in the decision phase
    if (this.isProcessingNext) return;
    this.isProcessingNext = true;

    let item: T | undefined;

    try {
      if (!this.stopped && this.processing.size < this.maxConcurrent) {
        item = this.queue.shift();
      }
      if (item) {
        // Mark as processing immediately inside the lock
        this.processing.add(item.id);
        logger.debug('▶️ Processing item', {
          id: item.id,
          processing: this.processing.size,
          queued: this.queue.length,
        });
      }
    } finally {
      this.isProcessingNext = false;
    }

    if (!item) {
      this.notifyIfIdle();
      return;
    }

    // Fill remaining slots before awaiting this item
    if (this.queue.length > 0 && this.processing.size < this.maxConcurrent) {
      void this.processNext();
    }

    try {
      if (this.processingCallback) {
        await this.processingCallback(item);
      } else {
        logger.error('No processing callback set for WorkerPool');
      }
    } catch (error: unknown) {
      logger.error('Failed to process item', {
        id: item.id,
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.processing.delete(item.id);
      setImmediate(() => void this.processNext());
    }
  }

  /**
   * Stop dispatching; returns the items that never started.
   * Items already processing finish on their own.
   */
  stop(): T[] {
    this.stopped = true;
    const dropped = this.queue;
    this.queue = [];

    if (dropped.length > 0 || this.processing.size > 0) {
      logger.info('🛑 Stopping WorkerPool', {
        dropped: dropped.length,
        processing: this.processing.size,
      });
    }

    this.notifyIfIdle();
    return dropped;
  }

  getProcessingCount(): number {
    return this.processing.size;
  }

  getQueueLength(): number {
    return this.queue.length;
  }

  private notifyIfIdle(): void {
    if (this.queue.length > 0 || this.processing.size > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}
