/**
 * Fetch helpers that bound every request with a timeout.
 */

/**
 * Error raised when a request does not complete within its timeout.
 */
export class RequestTimeoutError extends Error {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

function describeInput(input: string | URL | Request): string {
  if (typeof input === 'string') {
    return input;
  }
  if (input instanceof URL) {
    return input.toString();
  }
  return input.url;
}

/**
 * Perform a fetch that aborts after `timeoutMs`.
 *
 * A caller-supplied signal still aborts the request early.
 */
export async function fetchWithTimeout(
  input: string | URL | Request,
  init: RequestInit = {},
  timeoutMs = 30000,
  fetchFn: typeof fetch = fetch
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  const upstream = init.signal;
  const onUpstreamAbort = (): void => controller.abort();
  if (upstream) {
    if (upstream.aborted) {
      controller.abort();
    } else {
      upstream.addEventListener('abort', onUpstreamAbort, { once: true });
    }
  }

  try {
    return await fetchFn(input, { ...init, signal: controller.signal });
  } catch (error) {
    if (controller.signal.aborted && !upstream?.aborted) {
      throw new RequestTimeoutError(describeInput(input), timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
    upstream?.removeEventListener('abort', onUpstreamAbort);
  }
}

/**
 * Wrap a fetch implementation so every call is bounded by `timeoutMs`.
 * Used as the Octokit request fetch.
 */
export function createTimedFetch(timeoutMs: number, fetchFn: typeof fetch = fetch): typeof fetch {
  return (input, init) => fetchWithTimeout(input, init ?? {}, timeoutMs, fetchFn);
}
