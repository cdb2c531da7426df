/**
 * Mailbox: runs posted commands one at a time, in posting order.
 *
 * A command may carry an absolute deadline (epoch ms). If the deadline
 * has passed by the time the command reaches the head of the queue it
 * is rejected with PLUGIN_TIMEOUT without running, since its caller has
 * already given up on the reply.
 */

import { ErrorCode } from '../types/errors.js';
import { CoreError } from '../core/core-error.js';

export interface MailboxOptions {
  name: string;
  /** Clock for deadline checks. Defaults to `Date.now`. */
  now?: () => number;
}

export class Mailbox {
  readonly name: string;
  private readonly now: () => number;
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  constructor(options: MailboxOptions) {
    this.name = options.name;
    this.now = options.now ?? (() => Date.now());
  }

  /** Commands posted and not yet settled, including the running one. */
  get pending(): number {
    return this.queued;
  }

  post<T>(command: () => Promise<T>, deadline?: number): Promise<T> {
    this.queued++;
    const run = this.tail.then(async () => {
      if (deadline !== undefined && this.now() >= deadline) {
        throw new CoreError(
          ErrorCode.PLUGIN_TIMEOUT,
          `${this.name}: command expired while queued`,
        );
      }
      return command();
    });
    const settled = run.finally(() => {
      this.queued--;
    });
    // The caller observes `settled`; the chain only needs to know it finished.
    this.tail = settled.then(
      () => undefined,
      () => undefined,
    );
    return settled;
  }
}
