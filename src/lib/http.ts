import { fetch } from "undici";
import type { RequestInit, Response } from "undici";

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export const defaultFetch: FetchLike = (input, init) => fetch(input, init);

const RETRYABLE_STATUS = new Set([429, 502, 503, 504]);
const BASE_DELAY_MS = 200;

interface CacheEntry<T> {
  data: T;
  until: number;
}

const cacheStore = new Map<string, CacheEntry<unknown>>();

export const delay = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export class FetchTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = "FetchTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export interface FetchedBody<T> {
  response: Response;
  body: T;
}

const untilAborted = <T>(promise: Promise<T>, signal: AbortSignal): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });

/**
 * Fetches and reads the body under one deadline. The timer stays armed until
 * `read` has consumed the body, so a peer that sends headers and then stalls
 * still times out.
 */
export const fetchWithDeadline = async <T>(
  fetchImpl: FetchLike,
  url: string | URL,
  init: RequestInit,
  timeoutMs: number,
  read: (response: Response) => Promise<T>,
): Promise<FetchedBody<T>> => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  const upstreamSignal = init.signal;
  const onUpstreamAbort = () => controller.abort();
  upstreamSignal?.addEventListener("abort", onUpstreamAbort, { once: true });

  try {
    const response = await untilAborted(
      fetchImpl(url, { ...init, signal: controller.signal }),
      controller.signal,
    );
    const body = await untilAborted(read(response), controller.signal);
    return { response, body };
  } catch (error) {
    if (controller.signal.aborted && !upstreamSignal?.aborted) {
      throw new FetchTimeoutError(String(url), timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timer);
    upstreamSignal?.removeEventListener("abort", onUpstreamAbort);
  }
};

export const fetchText = (
  fetchImpl: FetchLike,
  url: string | URL,
  init: RequestInit,
  timeoutMs: number,
): Promise<FetchedBody<string>> => fetchWithDeadline(fetchImpl, url, init, timeoutMs, (response) => response.text());

export const fetchBuffer = (
  fetchImpl: FetchLike,
  url: string | URL,
  init: RequestInit,
  timeoutMs: number,
): Promise<FetchedBody<Buffer>> =>
  fetchWithDeadline(fetchImpl, url, init, timeoutMs, async (response) =>
    Buffer.from(await response.arrayBuffer()),
  );

/** `fetchBuffer` with backoff on 429/5xx gateway statuses and network errors. */
export const fetchBufferWithRetry = async (
  fetchImpl: FetchLike,
  url: string | URL,
  init: RequestInit,
  { maxRetries = 3, timeoutMs = 30_000 }: { maxRetries?: number; timeoutMs?: number } = {},
): Promise<FetchedBody<Buffer>> => {
  let attempt = 0;
  let lastError: unknown;
  let lastResult: FetchedBody<Buffer> | null = null;

  while (attempt < maxRetries) {
    try {
      const result = await fetchBuffer(fetchImpl, url, init, timeoutMs);
      lastResult = result;

      if (!RETRYABLE_STATUS.has(result.response.status)) {
        return result;
      }
    } catch (error) {
      lastError = error;
    }

    attempt += 1;
    if (attempt >= maxRetries) {
      break;
    }

    await delay(BASE_DELAY_MS * 2 ** (attempt - 1));
  }

  if (lastResult) {
    return lastResult;
  }

  throw lastError ?? new Error("fetch_failed");
};

export const readCache = <T>(key: string): T | undefined => {
  const entry = cacheStore.get(key);
  if (!entry) {
    return undefined;
  }

  if (entry.until < Date.now()) {
    cacheStore.delete(key);
    return undefined;
  }

  return entry.data as T;
};

export const writeCache = <T>(key: string, data: T, ttlMs: number): void => {
  cacheStore.set(key, { data, until: Date.now() + ttlMs });
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const toTrimmedString = (value: unknown): string => {
  if (typeof value === "string") {
    return value.trim();
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return "";
};

export const toFiniteNumber = (value: unknown): number | null => {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};
