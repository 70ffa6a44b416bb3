/**
 * Turns whatever a provider SDK threw into a one-line cause that is safe to return
 * to the caller: the error message without stack details.
 */
export function describeProviderError(error: unknown): string {
  if (error instanceof Error) {
    // fetch aborts carry the unhelpful "This operation was aborted"
    if (error.name === 'AbortError') {
      return 'Request timed out';
    }
    return error.message.split('\n')[0].trim() || error.name;
  }
  if (typeof error === 'string' && error.trim()) {
    return error.trim();
  }
  return 'Unknown error';
}

export function isFileNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Body parser and multer both report oversized payloads, each in its own way. */
export function isPayloadTooLargeError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  if ('type' in error && error.type === 'entity.too.large') {
    return true;
  }
  return 'code' in error && (error.code === 'LIMIT_FILE_SIZE' || error.code === 'LIMIT_FIELD_VALUE');
}

export function isMalformedBodyError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'type' in error && error.type === 'entity.parse.failed';
}
