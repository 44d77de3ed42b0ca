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
    const message: unknown = Reflect.get(error, 'message');
    if (typeof message === 'string') return message;
    const reason: unknown = Reflect.get(error, 'reason');
    if (typeof reason === 'string') return reason;
    try {
      const str = JSON.stringify(error);
      return str !== '{}' ? str : 'Unknown error object';
    } catch {
      return `Non-serializable error: ${Object.prototype.toString.call(error)}`;
    }
  }
  return String(error);
}
