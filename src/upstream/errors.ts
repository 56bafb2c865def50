/**
 * Upstream error variants
 *
 * Every upstream call returns Result<T, UpstreamError>. The first three
 * kinds are the service rejecting the account; the rest are failures of the
 * call itself or of the returned data.
 */

export type UpstreamErrorKind =
  | 'account-not-found'
  | 'data-not-public'
  | 'invalid-credentials'
  | 'timeout'
  | 'transient'
  | 'incomplete';

export interface UpstreamError {
  kind: UpstreamErrorKind;
  message: string;
  /** HoYoLAB API return code, when the service answered with one */
  retcode?: number;
  /** HTTP status, when the service answered with a non-2xx */
  status?: number;
}

export function upstreamError(
  kind: UpstreamErrorKind,
  message: string,
  extra: Pick<UpstreamError, 'retcode' | 'status'> = {}
): UpstreamError {
  return { kind, message, ...extra };
}
