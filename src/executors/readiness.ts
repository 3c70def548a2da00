/** Two-stage readiness waiter: primary condition, then an optional fallback */
import { ReadinessTimeoutError, toErrorMessage } from '../errors.js';
import type { PageHandle } from '../clients/handles.js';

/** A CSS selector to wait for (attached), or a custom wait that rejects on timeout. */
export type ReadinessCondition<TPage extends PageHandle = PageHandle> =
  | string
  | ((page: TPage, timeoutMs: number) => Promise<unknown>);

export interface ReadinessSpec<TPage extends PageHandle = PageHandle> {
  primary?: ReadinessCondition<TPage>;
  fallback?: ReadinessCondition<TPage>;
  timeoutMs: number;
}

export type ReadinessStage = 'none' | 'primary' | 'fallback';

const describe = <TPage extends PageHandle>(condition: ReadinessCondition<TPage>) =>
  typeof condition === 'string' ? `'${condition}'` : condition.name || 'custom condition';

async function waitFor<TPage extends PageHandle>(page: TPage, condition: ReadinessCondition<TPage>, timeoutMs: number) {
  if (typeof condition === 'string') {
    await page.waitForSelector(condition, { timeout: timeoutMs, state: 'attached' });
  } else {
    await condition(page, timeoutMs);
  }
}

/**
 * Resolves with the stage that succeeded. Both stages get the full timeout.
 * Throws ReadinessTimeoutError when neither is satisfied.
 */
export async function waitForReadiness<TPage extends PageHandle>(
  page: TPage,
  spec: ReadinessSpec<TPage>,
): Promise<ReadinessStage> {
  if (!spec.primary) return 'none';

  try {
    await waitFor(page, spec.primary, spec.timeoutMs);
    return 'primary';
  } catch (primaryError) {
    if (!spec.fallback) {
      throw new ReadinessTimeoutError(
        `Timeout waiting for ${describe(spec.primary)}: ${toErrorMessage(primaryError)}`,
        { cause: primaryError },
      );
    }
    try {
      await waitFor(page, spec.fallback, spec.timeoutMs);
      return 'fallback';
    } catch (fallbackError) {
      throw new ReadinessTimeoutError(
        `Both primary ${describe(spec.primary)} and fallback ${describe(spec.fallback)} failed: ` +
          `${toErrorMessage(primaryError)}, ${toErrorMessage(fallbackError)}`,
        { cause: fallbackError },
      );
    }
  }
}
