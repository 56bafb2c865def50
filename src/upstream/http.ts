/**
 * JSON-over-HTTP helper for upstream calls
 *
 * Every call is bounded by a timeout; a timeout, a network failure, a
 * non-2xx status or a non-JSON body all come back as UpstreamError values.
 */

import { err, ok, type Result } from '../utils/result.js';
import { upstreamError, type UpstreamError } from './errors.js';

export type FetchFunction = typeof fetch;

export interface FetchJsonOptions {
  headers?: Record<string, string>;
  timeoutMs: number;
  /** Map a non-2xx status to a specific error; transient by default */
  mapStatus?: (status: number) => UpstreamError | null;
  fetchFn?: FetchFunction;
}

function isTimeout(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError')
  );
}

export async function fetchJson(
  url: string,
  options: FetchJsonOptions
): Promise<Result<unknown, UpstreamError>> {
  const fetchFn = options.fetchFn ?? fetch;

  let response: Response;
  try {
    response = await fetchFn(url, {
      method: 'GET',
      headers: options.headers,
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    if (isTimeout(error)) {
      return err(upstreamError('timeout', `Upstream request timed out after ${options.timeoutMs}ms`));
    }
    const message = error instanceof Error ? error.message : String(error);
    return err(upstreamError('transient', `Upstream request failed: ${message}`));
  }

  if (!response.ok) {
    const mapped = options.mapStatus?.(response.status) ?? null;
    if (mapped) {
      return err(mapped);
    }
    return err(
      upstreamError('transient', `Upstream responded with ${response.status} ${response.statusText}`, {
        status: response.status,
      })
    );
  }

  try {
    return ok(await response.json());
  } catch (error) {
    if (isTimeout(error)) {
      return err(upstreamError('timeout', `Upstream request timed out after ${options.timeoutMs}ms`));
    }
    return err(upstreamError('transient', 'Upstream returned a body that is not JSON', { status: response.status }));
  }
}
