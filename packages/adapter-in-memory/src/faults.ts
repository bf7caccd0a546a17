/**
 * Injected failures, queued per operation, for the in-memory targets.
 */

import { RemoteError, type FailureKind } from "@rowsync/core";

const STATUS_BY_KIND: Record<FailureKind, number | undefined> = {
  rate_limited: 429,
  server_error: 503,
  network: undefined,
  payload_too_large: 413,
  permanent: 422,
  protocol: 200,
};

interface InjectedFailure {
  error: RemoteError;
  remaining: number;
}

export class FaultInjector<Operation extends string> {
  private readonly failures = new Map<Operation, InjectedFailure[]>();

  /**
   * Make the next `times` calls of an operation fail.
   * Failures queued for the same operation are consumed in order.
   */
  add(operation: Operation, failure: FailureKind | RemoteError, times = 1): void {
    const error =
      failure instanceof RemoteError
        ? failure
        : new RemoteError(failure, `Injected ${failure} failure on ${operation}`, {
            statusCode: STATUS_BY_KIND[failure],
          });
    const queue = this.failures.get(operation) ?? [];
    queue.push({ error, remaining: times });
    this.failures.set(operation, queue);
  }

  /**
   * The failure for the current call of an operation, if one is queued.
   */
  take(operation: Operation): RemoteError | undefined {
    const queue = this.failures.get(operation);
    const head = queue?.[0];
    if (!queue || !head) {
      return undefined;
    }
    head.remaining--;
    if (head.remaining <= 0) {
      queue.shift();
    }
    return head.error;
  }

  clear(): void {
    this.failures.clear();
  }
}
