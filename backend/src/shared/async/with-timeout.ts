/**
 * backend/src/shared/async/with-timeout.ts
 *
 * WHY:
 * - Every call to an external collaborator (cache, credential store, mail) gets a
 *   deadline. A slow dependency must surface as an error, never as a hung request.
 *
 * HOW TO USE:
 * - await withTimeout(client.get(key), 500, 'cache.get')
 * - Callers wrap TimeoutError into their own component error.
 */

export class TimeoutError extends Error {
  readonly label: string;
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.label = label;
    this.timeoutMs = timeoutMs;
  }
}

export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
