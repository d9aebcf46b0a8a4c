/**
 * Tabla de espera explícita: tras el intento fallido `attemptsMade` se espera
 * `backoff[min(attemptsMade - 1, len - 1)]` segundos.
 */
export function backoffDelayMs(
  backoffSeconds: readonly number[],
  attemptsMade: number,
): number {
  if (backoffSeconds.length === 0) {
    return 0;
  }

  const index = Math.min(Math.max(attemptsMade, 1) - 1, backoffSeconds.length - 1);
  return backoffSeconds[index] * 1000;
}

export const STAIRCASE_BACKOFF = 'staircase';
