/**
 * Response cache contracts.
 *
 * A provider hands out a backend only while one is reachable; callers
 * check for null at every use instead of holding a backend reference.
 */

export interface CacheBackend {
  /** Short label for logs ("redis", "memory") */
  readonly name: string;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
}

export interface CacheProvider {
  /** Resolves the backend, or null while none is reachable. Never rejects. */
  acquire(): Promise<CacheBackend | null>;
  close(): Promise<void>;
}

/**
 * Raised when a cache operation outlives its timeout.
 */
export class CacheTimeoutError extends Error {
  constructor(operation: string, timeoutMs: number) {
    super(`Cache ${operation} timed out after ${timeoutMs}ms`);
    this.name = 'CacheTimeoutError';
  }
}

/**
 * Races a cache operation against a timer. The timer is cleared either way.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new CacheTimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
