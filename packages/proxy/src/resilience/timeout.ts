/**
 * @mqproxy/proxy - Timeout
 */

import { TimeoutError } from "../errors.js";

/**
 * Race `promise` against a timer; rejects with TimeoutError naming `target`
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, target: string): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new TimeoutError(target, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}
