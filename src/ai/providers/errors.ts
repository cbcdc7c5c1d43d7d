// src/ai/providers/errors.ts
// Maps provider failures onto the classifier's retry taxonomy.

import { ClassifierPermanentError, ClassifierTransientError } from '../../analysis/errors';

/** 408, 429 and 5xx are worth retrying; any other non-2xx is not */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || (status >= 500 && status < 600);
}

export function httpFailure(
  provider: string,
  status: number,
  detail = ''
): ClassifierTransientError | ClassifierPermanentError {
  const message = `${provider} responded with HTTP ${status}${detail ? `: ${detail}` : ''}`;
  return isRetryableStatus(status)
    ? new ClassifierTransientError(message, status)
    : new ClassifierPermanentError(message, { httpStatus: status });
}

export function invalidResponse(provider: string, detail: string): ClassifierPermanentError {
  return new ClassifierPermanentError(`${provider} returned an invalid response: ${detail}`, {
    invalidResponse: true,
  });
}
