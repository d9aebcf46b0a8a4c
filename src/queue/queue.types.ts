import type { JobId, JobOptions } from 'bull';

/** Lo que los submitters usan de una cola de Bull. */
export interface JobQueue<T> {
  add(name: string, data: T, opts: JobOptions): Promise<{ id: JobId }>;
  readonly client: { readonly status: string };
}

// Sin conexión lista, `add` queda a la espera de reconexión y puede completarse
// más tarde; se rechaza antes de llamarlo.
export function assertQueueReady<T>(queue: JobQueue<T>, label: string): void {
  const status = queue.client.status;

  if (status !== 'ready') {
    throw new Error(`${label} queue not ready (redis ${status})`);
  }
}
