import { ApiError } from './errors.js';

export interface RequestOptions extends RequestInit {
  timeoutMs?: number;
}

/**
 * Combine a caller signal with a request timeout
 */
export function withTimeout(timeoutMs: number | undefined, signal?: AbortSignal | null): AbortSignal | undefined {
  const signals: AbortSignal[] = [];
  if (signal) signals.push(signal);
  if (timeoutMs !== undefined && timeoutMs > 0) signals.push(AbortSignal.timeout(timeoutMs));
  if (signals.length === 0) return undefined;
  return signals.length === 1 ? signals[0] : AbortSignal.any(signals);
}

/**
 * fetch() that throws ApiError on non-2xx responses
 */
export async function request(url: string, label: string, options: RequestOptions = {}): Promise<Response> {
  const { timeoutMs, signal, ...init } = options;
  const combined = withTimeout(timeoutMs, signal);
  const res = await fetch(url, combined ? { ...init, signal: combined } : init);

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    throw new ApiError(`${label} failed (${res.status}): ${text.slice(0, 500)}`, label, res.status);
  }
  return res;
}

export async function requestJson(url: string, label: string, options: RequestOptions = {}): Promise<unknown> {
  const res = await request(url, label, options);
  return res.json();
}

/**
 * Network failures and 5xx/429 responses are worth another attempt
 */
export function isTransientHttpError(error: unknown): boolean {
  if (error instanceof ApiError) {
    return error.status === undefined || error.status === 429 || error.status >= 500;
  }
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return false;
  }
  return true;
}
