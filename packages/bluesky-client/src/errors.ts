/**
 * Human-readable messages for typed failures.
 */

import { truncate } from './utils/index.js';
import type { AuthError, PostError } from './types.js';

const BODY_PREVIEW = 200;

function describeResponse(status: number, body: string): string {
  if (status === 0) {
    return `network error: ${body}`;
  }
  const preview = truncate(body.trim(), BODY_PREVIEW);
  return preview ? `HTTP ${status}: ${preview}` : `HTTP ${status}`;
}

export function describeAuthError(error: AuthError): string {
  switch (error.kind) {
    case 'MissingCredentials':
      return `Missing credentials: ${error.message}`;
    case 'RemoteRejected':
      return `Login rejected (${describeResponse(error.status, error.body)})`;
    case 'RefreshFailed':
      return error.status === undefined
        ? `Session refresh failed: ${error.reason}`
        : `Session refresh failed: ${error.reason} (${describeResponse(error.status, error.body ?? '')})`;
    case 'StoreFailed':
      return `Session store error: ${error.message}`;
  }
}

export function describePostError(error: PostError): string {
  switch (error.kind) {
    case 'TooLong':
      return `Message is ${error.length} characters, ${error.excess} over the ${error.limit} limit`;
    case 'AuthExpired':
      return `Session expired and could not be refreshed. ${describeAuthError(error.cause)}`;
    case 'RemoteRejected':
      return `Post rejected (${describeResponse(error.status, error.body)})`;
  }
}
