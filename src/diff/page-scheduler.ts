// Page Scheduler - bounded fan-out of per-page tasks joined by one barrier

import { PartialResultError, toPageFailure, type ComparisonStage, type PageFailure } from '../errors';

export interface PageTaskOptions {
  /** Max tasks in flight */
  limit: number;
  signal?: AbortSignal;
  /** Stage reported for failures that carry none of their own */
  stage?: ComparisonStage;
}

const yieldToEventLoop = () => new Promise<void>(resolve => setImmediate(resolve));

/**
 * Run `task(pageIndex)` for every page with at most `limit` tasks running.
 * Resolves only when every page finished; any failure or an abort before
 * completion rejects with PartialResultError naming the affected pages.
 */
export async function runPageTasks<T>(
  count: number,
  task: (pageIndex: number) => T | Promise<T>,
  options: PageTaskOptions
): Promise<T[]> {
  const completed = new Map<number, { value: T }>();
  const failures: PageFailure[] = [];
  let next = 0;

  const worker = async () => {
    while (next < count) {
      if (options.signal?.aborted) return;
      const pageIndex = next++;
      try {
        completed.set(pageIndex, { value: await task(pageIndex) });
      } catch (error) {
        failures.push(toPageFailure(error, pageIndex, options.stage ?? 'scheduling'));
      }
      await yieldToEventLoop();
    }
  };

  const workers = Array.from({ length: Math.min(Math.max(1, options.limit), count) }, () => worker());
  await Promise.all(workers);

  const results: T[] = [];
  const failedPages = new Set(failures.map(f => f.pageIndex));
  const pending: PageFailure[] = [];
  for (let pageIndex = 0; pageIndex < count; pageIndex++) {
    const slot = completed.get(pageIndex);
    if (slot) {
      results.push(slot.value);
    } else if (!failedPages.has(pageIndex)) {
      pending.push({ pageIndex, stage: 'scheduling', message: 'Cancelled before the page was processed' });
    }
  }

  if (failures.length > 0 || pending.length > 0) {
    const parts: string[] = [];
    if (failures.length > 0) {
      parts.push(`failed on page(s) ${[...failedPages].sort((x, y) => x - y).join(', ')}`);
    }
    if (pending.length > 0) {
      parts.push(`cancelled with ${pending.length} of ${count} page(s) unprocessed`);
    }
    throw new PartialResultError(`Comparison ${parts.join('; ')}`, [...failures, ...pending], pending.length > 0);
  }

  return results;
}
