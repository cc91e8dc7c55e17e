/**
 * Extract a meaningful error message from any thrown value.
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name || 'Unknown Error';
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object') {
    // Check common error-like properties
    for (const key of ['message', 'error', 'reason']) {
      const value: unknown = Reflect.get(error, key);
      if (typeof value === 'string') return value;
    }
    // Try to stringify, but handle circular refs
    try {
      const str = JSON.stringify(error);
      return str !== '{}'
        ? str
        : `Unknown error object: ${Object.keys(error).join(', ') || 'empty'}`;
    } catch {
      return `Non-serializable error: ${Object.prototype.toString.call(error)}`;
    }
  }
  return String(error);
}
