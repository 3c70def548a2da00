/** Fetch contract shared by the HTTP and browser executors */
import type { FetchError } from '../errors.js';
import type { AttemptInfo, Task, WorkItem } from '../types.js';

export type ExecutionOutcome<TPayload> =
  | { ok: true; payload: TPayload }
  | { ok: false; error: FetchError };

/**
 * Runs one attempt of a task on a worker's client. Implementations catch every
 * I/O failure and return it as an outcome; a rejected promise is a bug.
 */
export interface TaskExecutor<TClient, TItem extends WorkItem, TPayload> {
  execute(client: TClient, task: Task<TItem>, attempt: AttemptInfo): Promise<ExecutionOutcome<TPayload>>;
}

export const succeed = <TPayload>(payload: TPayload): ExecutionOutcome<TPayload> => ({ ok: true, payload });
export const fail = <TPayload>(error: FetchError): ExecutionOutcome<TPayload> => ({ ok: false, error });
