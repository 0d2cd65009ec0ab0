/**
 * Detail batch
 *
 * Fetches detail documents for many summary events with a bounded worker
 * pool and flattens each into a row. A failing event is logged and skipped;
 * a batch in which every event fails raises ConnectionError. Rows keep the
 * input order.
 */

import { CancelledError, ConnectionError, throwIfAborted } from '../core/errors.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import type { DetailEvent } from '../models/detail-event.js';
import type { SummaryEvent } from '../models/summary-event.js';
import type { CatalogClient, DetailOptions } from '../search/catalog-client.js';
import { detailRow, type DetailRowOptions } from './event-rows.js';
import type { Row } from './types.js';

export const DEFAULT_DETAIL_CONCURRENCY = 5;

export interface DetailBatchOptions extends DetailRowOptions {
  /** Parallel detail requests (default 5) */
  readonly concurrency?: number;
  readonly signal?: AbortSignal;
  readonly includeSuperseded?: DetailOptions['includeSuperseded'];
  readonly includeDeleted?: DetailOptions['includeDeleted'];
  /** Called after each event settles */
  readonly onProgress?: (completed: number, total: number) => void;
  readonly logger?: Logger;
}

export interface DetailBatchFailure {
  readonly eventId: string;
  readonly error: Error;
}

export interface DetailBatchResult {
  readonly rows: Row[];
  readonly failures: DetailBatchFailure[];
}

/**
 * Run `task` over `items` with at most `concurrency` in flight
 */
async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  signal: AbortSignal | undefined,
  task: (item: T, index: number) => Promise<void>
): Promise<void> {
  let currentIndex = 0;
  const worker = async (): Promise<void> => {
    while (currentIndex < items.length) {
      if (signal?.aborted) return;
      const index = currentIndex++;
      const item = items[index];
      if (item !== undefined) {
        await task(item, index);
      }
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, () => worker());
  await Promise.all(workers);
}

export interface DetailFetchResult<T> {
  /** One result per event that succeeded, in input order */
  readonly results: T[];
  readonly failures: DetailBatchFailure[];
}

/**
 * Fetch detail documents and map each one, skipping events that fail
 *
 * @throws {ConnectionError} When every event fails
 * @throws {CancelledError} When the signal aborts
 */
export async function fetchDetails<T>(
  client: CatalogClient,
  events: readonly SummaryEvent[],
  options: DetailBatchOptions,
  map: (detail: DetailEvent) => T
): Promise<DetailFetchResult<T>> {
  const log = options.logger ?? createLogger({ module: 'detail-batch' });
  throwIfAborted(options.signal, 'Detail batch');

  const results: (T | undefined)[] = new Array<T | undefined>(events.length).fill(undefined);
  const failures: DetailBatchFailure[] = [];
  let completed = 0;

  await runPool(events, options.concurrency ?? DEFAULT_DETAIL_CONCURRENCY, options.signal, async (event, index) => {
    try {
      const detail = await client.getDetailEvent(event, {
        signal: options.signal,
        includeSuperseded: options.includeSuperseded,
        includeDeleted: options.includeDeleted,
      });
      results[index] = map(detail);
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      const cause = error instanceof Error ? error : new Error(String(error));
      log.warn('Skipping event after failed detail fetch', { eventId: event.id, error: cause.message });
      failures.push({ eventId: event.id, error: cause });
    } finally {
      completed++;
      options.onProgress?.(completed, events.length);
    }
  });

  throwIfAborted(options.signal, 'Detail batch');

  const first = failures[0];
  if (first && failures.length === events.length) {
    const url = events.find((event) => event.id === first.eventId)?.detailUrl ?? first.eventId;
    throw new ConnectionError(url, `all ${events.length} detail requests failed (first: ${first.error.message})`, {
      cause: first.error,
    });
  }

  return {
    results: results.filter((result): result is T => result !== undefined),
    failures,
  };
}

/**
 * Fetch detail documents and flatten them into rows
 *
 * @throws {ConnectionError} When every event fails
 * @throws {CancelledError} When the signal aborts
 */
export async function fetchDetailRows(
  client: CatalogClient,
  events: readonly SummaryEvent[],
  options: DetailBatchOptions = {}
): Promise<DetailBatchResult> {
  const { results, failures } = await fetchDetails(client, events, options, (detail) => detailRow(detail, options));
  return { rows: results, failures };
}
