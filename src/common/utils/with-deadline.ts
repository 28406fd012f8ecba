import { GatewayError } from '../errors';

export const DEADLINE_EXCEEDED_MESSAGE = 'backend deadline exceeded';

/**
 * Races a backend call against a timer. The call itself is not aborted;
 * its eventual result is dropped once the deadline fires.
 */
export async function withDeadline<T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(GatewayError.internal(DEADLINE_EXCEEDED_MESSAGE, new Error(`${label} exceeded ${timeoutMs}ms`)));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
