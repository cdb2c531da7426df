/**
 * Deadline on a reply.
 *
 * Script engines cannot be interrupted, so a deadline only stops the
 * caller from waiting: the work keeps running and its eventual outcome
 * is discarded.
 */

import { ErrorCode } from '../types/errors.js';
import { CoreError } from './core-error.js';

/**
 * Resolve with `promise`, or reject with PLUGIN_TIMEOUT once `ms` have
 * passed, whichever happens first.
 */
export async function withDeadline<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(
        new CoreError(ErrorCode.PLUGIN_TIMEOUT, `${label} did not respond within ${ms}ms`, {
          detail: { timeoutMs: ms },
        }),
      );
    }, ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
  }
}
