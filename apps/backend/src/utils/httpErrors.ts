function readString(error: object, key: 'name' | 'message' | 'code'): string {
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'string' ? value : '';
}

export function isTimeoutError(error: unknown): boolean {
  if (!error || typeof error !== 'object') return false;
  if (readString(error, 'name') === 'AbortError' || readString(error, 'name') === 'TimeoutError') return true;
  const msg = readString(error, 'message').toLowerCase();
  if (msg.includes('timeout')) return true;
  if (msg.includes('timed out')) return true;
  if (msg.includes('aborted')) return true;
  return readString(error, 'code').toUpperCase() === 'ETIMEDOUT';
}
