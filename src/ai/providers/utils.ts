// src/ai/providers/utils.ts
import type { z } from 'zod';
import { ProviderError } from '../../errors.js';

export interface RequestOptions {
  vendor: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export function requireKey(vendor: string, envName: string, key: string): string {
  if (!key) throw new ProviderError('ProviderUnavailable', `${vendor}: ${envName} not set`);
  return key;
}

function abortReason(signal: AbortSignal, vendor: string): ProviderError {
  const reason: unknown = signal.reason;
  if (reason instanceof ProviderError) return reason;
  return new ProviderError('ProviderUnavailable', `${vendor} request aborted`);
}

/**
 * fetch with a deadline that also follows the caller's signal. The body is
 * read inside the deadline so a stalled stream times out too.
 */
export async function abortableFetch<T>(
  url: string,
  init: RequestInit,
  opts: RequestOptions,
  read: (response: Response) => Promise<T>,
): Promise<T> {
  const { vendor, timeoutMs, signal } = opts;
  const controller = new AbortController();
  const timeout = setTimeout(
    () => controller.abort(new ProviderError('ProviderTimeout', `${vendor} request timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );
  const onAbort = () => controller.abort(signal?.reason);
  if (signal?.aborted) onAbort();
  else signal?.addEventListener('abort', onAbort, { once: true });

  try {
    let response: Response;
    try {
      response = await fetch(url, { ...init, signal: controller.signal });
    } catch (err) {
      if (controller.signal.aborted) throw abortReason(controller.signal, vendor);
      throw new ProviderError('ProviderUnavailable', `${vendor} unreachable: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (!response.ok) {
      await response.body?.cancel().catch(() => undefined);
      throw new ProviderError('ProviderUnavailable', `${vendor} API error: ${response.status}`);
    }
    try {
      return await read(response);
    } catch (err) {
      if (controller.signal.aborted) throw abortReason(controller.signal, vendor);
      if (err instanceof ProviderError) throw err;
      throw new ProviderError('ProviderInvalidResponse', `${vendor} returned an unreadable body`);
    }
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener('abort', onAbort);
  }
}

/** POST a JSON body and validate the JSON reply against the vendor's shape. */
export function postJson<S extends z.ZodTypeAny>(
  url: string,
  headers: Record<string, string>,
  body: unknown,
  schema: S,
  opts: RequestOptions,
): Promise<z.infer<S>> {
  return abortableFetch(
    url,
    { method: 'POST', headers: { 'content-type': 'application/json', ...headers }, body: JSON.stringify(body) },
    opts,
    async (response) => parseWith(schema, await response.json(), opts.vendor),
  );
}

export function parseWith<S extends z.ZodTypeAny>(schema: S, data: unknown, vendor: string): z.infer<S> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new ProviderError('ProviderInvalidResponse', `${vendor} response did not match the expected shape`);
  }
  return parsed.data;
}

export function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}
