/** Per-attempt measurement wrapper: timing, performance log and progress report */
import type { Logger } from '../logger.js';
import type { AttemptInfo, ResultRecord, Task } from '../types.js';
import type { ExecutionOutcome } from '../executors/TaskExecutor.js';
import type { ProgressTracker } from './ProgressTracker.js';

export interface AttemptContext {
  task: Task;
  attempt: AttemptInfo;
  workerId: number;
  proxy: string;
}

/** What the worker decided for one attempt. `record` is absent when the task was requeued. */
export interface SettledAttempt<TPayload> {
  success: boolean;
  retry: boolean;
  record?: ResultRecord<TPayload>;
}

export interface MeasureDeps {
  perf: Logger;
  tracker: ProgressTracker;
  now?: () => number;
}

/**
 * Times one execution, lets the caller settle the outcome, then writes a
 * performance line and reports the settled attempt to the tracker.
 */
export async function measureAttempt<TPayload>(
  ctx: AttemptContext,
  run: () => Promise<ExecutionOutcome<TPayload>>,
  settle: (outcome: ExecutionOutcome<TPayload>) => SettledAttempt<TPayload>,
  deps: MeasureDeps,
): Promise<SettledAttempt<TPayload>> {
  const now = deps.now ?? Date.now;
  const start = now();
  const outcome = await run();
  const durationMs = now() - start;
  const settled = settle(outcome);

  deps.tracker.update(ctx.task.identity, { success: settled.success, retry: settled.retry });
  deps.perf.debug({
    identity: ctx.task.identity,
    attempt: ctx.attempt.number,
    workerId: ctx.workerId,
    proxy: ctx.proxy,
    durationMs,
    success: settled.success,
    error: outcome.ok ? null : outcome.error.message,
    errorKind: outcome.ok ? null : outcome.error.kind,
    retryScheduled: settled.retry,
  }, 'attempt');

  return settled;
}
