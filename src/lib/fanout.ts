/**
 * DevGate — Fan-out Coordinator
 *
 * Runs one follow-up task per item of an already fetched list, all at
 * once, and waits for every task to settle. A rejected task contributes
 * nothing; the others still land in input order. Tasks are never
 * cancelled when a sibling fails.
 *
 * The first-stage call that produced the items is NOT run through here:
 * when it fails there is nothing to fan out over and the whole request
 * fails. Follow-up failures are dropped.
 */

import { logger as rootLogger, type Logger } from './logger';

export interface FanOutFailure {
  index: number;
  error: string;
}

export interface FanOutOutcome<R> {
  /** Fulfilled results, in the order of the input items. */
  values: R[];
  failures: FanOutFailure[];
}

export interface FanOutOptions {
  /** Name of the batch for log lines, e.g. "hackernews.topstories". */
  label: string;
  logger?: Logger;
}

export async function fanOut<T, R>(
  items: readonly T[],
  task: (item: T, index: number) => Promise<R>,
  options: FanOutOptions
): Promise<FanOutOutcome<R>> {
  const log = options.logger ?? rootLogger;

  const settled = await Promise.allSettled(
    // async wrapper turns a synchronous throw into a rejection
    items.map(async (item, index) => task(item, index))
  );

  const values: R[] = [];
  const failures: FanOutFailure[] = [];

  settled.forEach((result, index) => {
    if (result.status === 'fulfilled') {
      values.push(result.value);
      return;
    }
    const error = result.reason instanceof Error ? result.reason.message : String(result.reason);
    failures.push({ index, error });
  });

  if (failures.length > 0) {
    log.warn('Dropped failed fan-out tasks', {
      batch: options.label,
      dispatched: items.length,
      failed: failures.length,
      errors: failures.map(f => f.error),
    });
  } else {
    log.debug('Fan-out completed', { batch: options.label, dispatched: items.length });
  }

  return { values, failures };
}
