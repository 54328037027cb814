/**
 * The single serialization point of the hub, and the inbox that transport
 * callbacks are posted into.
 */

import { ReentrancyError, logError } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('SerialInbox');

/**
 * Runs bodies one at a time. Every state change of the hub happens inside
 * `run`; entering it again from inside a body is a programming error.
 */
export class CriticalSection {
  private held = false;

  run<T>(body: () => T): T {
    if (this.held) {
      throw new ReentrancyError();
    }
    this.held = true;
    try {
      return body();
    } finally {
      this.held = false;
    }
  }

  isHeld(): boolean {
    return this.held;
  }
}

/**
 * Single-consumer inbox. Messages are handled in the order they were posted,
 * each inside the critical section. A message posted while the inbox is
 * draining waits for its turn.
 *
 * A handler may return a follow-up, which runs after the critical section is
 * released and before the next message is handled.
 */
export class SerialInbox<M> {
  private queue: M[] = [];
  private draining = false;

  constructor(
    private criticalSection: CriticalSection,
    private handler: (message: M) => (() => void) | void,
    private onError?: (error: unknown, message: M) => void
  ) {}

  post(message: M): void {
    this.queue.push(message);
    if (this.draining) {
      return;
    }
    this.draining = true;
    try {
      let next = this.queue.shift();
      while (next !== undefined) {
        const message = next;
        try {
          const followUp = this.criticalSection.run(() => this.handler(message));
          if (followUp) {
            followUp();
          }
        } catch (error) {
          logError(error, { component: 'SerialInbox' });
          this.onError?.(error, message);
        }
        next = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
    logger.debug('Inbox drained');
  }

  pending(): number {
    return this.queue.length;
  }
}
