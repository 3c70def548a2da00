/** Requeue-or-terminal decisions for failed attempts */
import type { FetchError } from '../errors.js';
import type { AttemptInfo, ErrorRecord, SuccessRecord, Task } from '../types.js';

export type FailureDecision =
  | { needsRetry: true }
  | { needsRetry: false; record: ErrorRecord };

/**
 * `task.retries` counts re-attempts already granted, so it never exceeds
 * maxRetries: a task runs at most maxRetries + 1 times.
 */
export class RetryPolicy {
  constructor(readonly maxRetries: number) {}

  shouldRetry(task: Task): boolean {
    return task.retries < this.maxRetries;
  }

  attemptInfo(task: Task): AttemptInfo {
    return { number: task.retries + 1, final: !this.shouldRetry(task) };
  }

  /** Grants another attempt, or builds the terminal record. Never both. */
  recordFailure(task: Task, error: FetchError): FailureDecision {
    if (this.shouldRetry(task)) {
      task.retries += 1;
      return { needsRetry: true };
    }
    return {
      needsRetry: false,
      record: {
        identity: task.identity,
        status: 'error',
        error: error.message,
        errorKind: error.kind,
        retriesUsed: task.retries,
      },
    };
  }

  recordSuccess<TPayload>(task: Task, payload: TPayload): SuccessRecord<TPayload> {
    return { identity: task.identity, status: 'success', payload, retriesUsed: task.retries };
  }
}
