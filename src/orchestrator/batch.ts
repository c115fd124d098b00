// src/orchestrator/batch.ts
import type { Logger } from 'pino';
import { GatewayError, ProviderError, type ProviderErrorKind } from '../errors.js';

export interface BatchItem {
  readonly id: string;
  readonly label: string;
}

export type ItemFailureKind = ProviderErrorKind | 'Internal';

export type ProviderResult =
  | { status: 'success'; value: string }
  | { status: 'failure'; kind: ItemFailureKind; message: string };

export interface ItemOutcome {
  id: string;
  label: string;
  result: ProviderResult;
}

export type ItemInvoker<T extends BatchItem> = (item: T, signal: AbortSignal) => Promise<string>;

export interface BatchOptions {
  /** Max provider calls in flight for this batch. */
  concurrency: number;
  /** Deadline for a single item; the item fails with ProviderTimeout past it. */
  itemTimeoutMs: number;
  /** Aborted when the inbound call is cancelled. */
  signal?: AbortSignal;
  log?: Logger;
}

/**
 * A small concurrency pool. Stops spawning once `signal` aborts; resolves
 * when every started worker has settled.
 */
async function withPool<T>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<void>,
  concurrency: number,
  signal?: AbortSignal,
) {
  let i = 0;
  let running = 0;
  let err: unknown;
  return new Promise<void>((resolve, reject) => {
    const kick = () => {
      if (err) return; // stop spawning
      while (running < concurrency && i < items.length && !signal?.aborted) {
        const idx = i++;
        running++;
        Promise.resolve()
          .then(() => worker(items[idx], idx))
          .then(() => {
            running--;
            if (err) return;
            if ((i >= items.length || signal?.aborted) && running === 0) resolve();
            else kick();
          })
          .catch((e: unknown) => {
            err = e;
            reject(e);
          });
      }
      if (running === 0) resolve();
    };
    kick();
  });
}

function withTimeout<T>(p: Promise<T>, ms: number, onTimeout: (error: ProviderError) => void): Promise<T> {
  let to: NodeJS.Timeout | undefined;
  const t = new Promise<T>((_, rej) => {
    to = setTimeout(() => {
      const error = new ProviderError('ProviderTimeout', `provider call timed out after ${ms}ms`);
      onTimeout(error);
      rej(error);
    }, ms);
  });
  return Promise.race([p, t]).finally(() => clearTimeout(to));
}

function toFailure(err: unknown, item: BatchItem, log?: Logger): ProviderResult {
  if (err instanceof ProviderError) {
    return { status: 'failure', kind: err.kind, message: err.message };
  }
  log?.error({ err, itemId: item.id }, 'unexpected item failure');
  return { status: 'failure', kind: 'Internal', message: 'internal error' };
}

async function runItem<T extends BatchItem>(item: T, invoke: ItemInvoker<T>, opts: BatchOptions): Promise<ProviderResult> {
  const controller = new AbortController();
  const onAbort = () => controller.abort(opts.signal?.reason);
  opts.signal?.addEventListener('abort', onAbort, { once: true });
  try {
    const value = await withTimeout(
      Promise.resolve().then(() => invoke(item, controller.signal)),
      opts.itemTimeoutMs,
      (error) => controller.abort(error),
    );
    return { status: 'success', value };
  } catch (err) {
    return toFailure(err, item, opts.log);
  } finally {
    opts.signal?.removeEventListener('abort', onAbort);
  }
}

function untilAborted(signal?: AbortSignal): { promise: Promise<void>; dispose: () => void } {
  if (!signal) return { promise: new Promise<void>(() => undefined), dispose: () => undefined };
  let onAbort: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    onAbort = () => resolve();
    if (signal.aborted) resolve();
    else signal.addEventListener('abort', onAbort, { once: true });
  });
  return { promise, dispose: () => signal.removeEventListener('abort', onAbort) };
}

export function findDuplicateId(items: readonly BatchItem[]): string | undefined {
  const seen = new Set<string>();
  for (const item of items) {
    if (seen.has(item.id)) return item.id;
    seen.add(item.id);
  }
  return undefined;
}

/**
 * Run `invoke` once per item and return one outcome per item, in input
 * order. Item failures never reject the batch; only a cancelled call
 * (or a duplicate id, checked before anything runs) does.
 */
export async function processBatch<T extends BatchItem>(
  items: readonly T[],
  invoke: ItemInvoker<T>,
  opts: BatchOptions,
): Promise<ItemOutcome[]> {
  const duplicate = findDuplicateId(items);
  if (duplicate !== undefined) {
    throw new GatewayError('InvalidArgument', `duplicate item id: ${duplicate}`);
  }
  if (items.length === 0) return [];

  const results = new Array<ProviderResult | undefined>(items.length);
  const pool = withPool(
    items,
    async (item, index) => {
      results[index] = await runItem(item, invoke, opts);
    },
    Math.max(1, opts.concurrency),
    opts.signal,
  );

  // Cancellation does not wait for in-flight items that ignore their signal.
  const cancelled = untilAborted(opts.signal);
  try {
    await Promise.race([pool, cancelled.promise]);
  } finally {
    cancelled.dispose();
  }
  if (opts.signal?.aborted) {
    throw new GatewayError('Cancelled', 'call cancelled by client');
  }

  return items.map((item, index) => ({
    id: item.id,
    label: item.label,
    result: results[index] ?? { status: 'failure', kind: 'Internal', message: 'item was not processed' },
  }));
}

export function failures(outcomes: readonly ItemOutcome[]) {
  return outcomes.filter(
    (o): o is ItemOutcome & { result: Extract<ProviderResult, { status: 'failure' }> } => o.result.status === 'failure',
  );
}
