import { setTimeout as sleep } from 'timers/promises';

export interface RetryOptions {
  retries?: number;
  base?: number;
  max?: number;
}

/** Retries throttled (408/429) and server-side (5xx) failures with jittered backoff. */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { retries = 3, base = 250, max = 8000 } = options;
  let attempt = 0;

  for (;;) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= retries || !shouldRetry(error)) {
        throw error;
      }
      await sleep(computeDelay(attempt, base, max));
      attempt += 1;
    }
  }
}

function computeDelay(attempt: number, base: number, max: number): number {
  const capped = Math.min(max, base * 2 ** attempt);
  const jitter = capped / 2 + Math.random() * (capped / 2);
  return Math.max(base, Math.min(max, Math.round(jitter)));
}

export function shouldRetry(error: unknown): boolean {
  const status = extractStatus(error);
  if (status === null) return false;
  return status === 408 || status === 429 || status >= 500;
}

function extractStatus(error: unknown): number | null {
  if (!error || typeof error !== 'object') return null;

  const candidates: unknown[] = [];
  if ('status' in error) candidates.push(error.status);
  if ('response' in error && error.response && typeof error.response === 'object') {
    const response = error.response;
    if ('status' in response) candidates.push(response.status);
  }

  for (const candidate of candidates) {
    if (typeof candidate === 'number' && Number.isFinite(candidate)) return candidate;
    if (typeof candidate === 'string') {
      const parsed = Number.parseInt(candidate, 10);
      if (!Number.isNaN(parsed)) return parsed;
    }
  }
  return null;
}
