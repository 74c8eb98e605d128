import type { Logger } from '@logtape/logtape';
import { threadId } from 'node:worker_threads';
import type { Action, ThreadMarshaller } from '../types';
import { getCellwireLogger } from '../utils/logger';

export const DEFAULT_MAX_ACTIONS_PER_TICK = 100;
export const DEFAULT_TICK_INTERVAL_MS = 16;

export type QueuedThreadMarshallerOptions = {
  readonly maxActionsPerTick?: number;
  /** Defaults to the thread constructing the marshaller. */
  readonly ownerThreadId?: number;
  readonly logger?: Logger;
};

function assertActionLimit(value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(
      `maxActionsPerTick must be a positive integer, got ${value}`
    );
  }

  return value;
}

/**
 * Live marshaller: actions are queued and drained in FIFO order, at most
 * `maxActionsPerTick` per call to `processMainThreadActions`. Whatever does
 * not fit stays queued for the next tick.
 */
export class QueuedThreadMarshaller implements ThreadMarshaller {
  readonly #queue: Action[] = [];
  readonly #ownerThreadId: number;
  readonly #logger: Logger;
  #maxActionsPerTick: number;
  #timer: NodeJS.Timeout | undefined;

  constructor(options: QueuedThreadMarshallerOptions = {}) {
    this.#maxActionsPerTick = assertActionLimit(
      options.maxActionsPerTick ?? DEFAULT_MAX_ACTIONS_PER_TICK
    );
    this.#ownerThreadId = options.ownerThreadId ?? threadId;
    this.#logger = getCellwireLogger('threading', options.logger);
  }

  executeOnMainThread(action: Action): void {
    this.#queue.push(action);
  }

  isMainThread(): boolean {
    return threadId === this.#ownerThreadId;
  }

  get queuedActionCount(): number {
    return this.#queue.length;
  }

  get maxActionsPerTick(): number {
    return this.#maxActionsPerTick;
  }

  get isRunning(): boolean {
    return this.#timer !== undefined;
  }

  setMaxActionsPerTick(maxActions: number): void {
    this.#maxActionsPerTick = assertActionLimit(maxActions);
  }

  /**
   * Drains one tick worth of actions and returns how many ran. Actions
   * queued while draining wait for the next tick.
   */
  processMainThreadActions(): number {
    const batch = this.#queue.splice(0, this.#maxActionsPerTick);

    for (const action of batch) {
      try {
        action();
      } catch (error) {
        this.#logger.error('Main thread action failed: {error}', { error });
      }
    }

    if (this.#queue.length > 0) {
      this.#logger.debug('{pending} actions deferred to the next tick', {
        pending: this.#queue.length
      });
    }

    return batch.length;
  }

  clearQueue(): void {
    this.#queue.length = 0;
  }

  start(intervalMs = DEFAULT_TICK_INTERVAL_MS): void {
    if (this.#timer !== undefined) {
      return;
    }

    this.#timer = setInterval(() => this.processMainThreadActions(), intervalMs);
    this.#timer.unref();
  }

  stop(): void {
    if (this.#timer === undefined) {
      return;
    }

    clearInterval(this.#timer);
    this.#timer = undefined;
  }

  get [Symbol.toStringTag]() {
    return 'QueuedThreadMarshaller';
  }
}
