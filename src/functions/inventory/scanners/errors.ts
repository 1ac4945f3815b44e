/**
 * Provider error classification for region scans.
 */

import type { ScanError } from '@shared/types';

/**
 * Code recorded when an abort signal cut a scan short. Not an error.
 */
export const SCAN_ABORTED = 'ScanAborted';

/**
 * Provider error codes that mean "this region (or this call) is not
 * available to us right now": throttling, missing permissions, disabled
 * or opt-in regions.
 */
const RECOVERABLE_ERROR_CODES: ReadonlySet<string> = new Set([
  'AccessDenied',
  'AccessDeniedException',
  'AuthFailure',
  'Blocked',
  'InvalidClientTokenId',
  'OptInRequired',
  'RequestExpired',
  'RequestLimitExceeded',
  'SlowDown',
  'Throttling',
  'ThrottlingException',
  'TooManyRequestsException',
  'UnauthorizedOperation',
  'UnrecognizedClientException',
  'RegionDisabledException',
]);

/**
 * Error name/code and message from an AWS SDK error or anything else thrown.
 */
export function describeProviderError(error: unknown): { code: string; message: string } {
  if (error instanceof Error) {
    const code =
      'Code' in error && typeof error.Code === 'string'
        ? error.Code
        : 'code' in error && typeof error.code === 'string'
          ? error.code
          : error.name;
    return { code, message: error.message };
  }
  return { code: 'UnknownError', message: String(error) };
}

export function isRecoverableErrorCode(code: string): boolean {
  return RECOVERABLE_ERROR_CODES.has(code);
}

/**
 * Build the scan error recorded for a failed (region, kind) scan.
 */
export function toScanError(
  error: unknown,
  kind: ScanError['kind'],
  region: string,
  signal?: AbortSignal
): ScanError {
  const { code, message } = signal?.aborted
    ? { code: SCAN_ABORTED, message: 'Scan aborted before completion' }
    : describeProviderError(error);

  return {
    kind,
    region,
    code,
    message,
    recoverable: code === SCAN_ABORTED || isRecoverableErrorCode(code),
    timestamp: new Date().toISOString(),
  };
}
