import type { JobOptions } from 'bull';
import type { JobQueue } from '../../src/queue/queue.types';

export interface AddedJob<T> {
  name: string;
  data: T;
  opts: JobOptions;
}

/** Cola en memoria: registra cada `add` y permite simular Redis lento o caído. */
export class FakeJobQueue<T> implements JobQueue<T> {
  readonly added: AddedJob<T>[] = [];
  readonly client = { status: 'ready' };
  addDelayMs = 0;
  private nextId = 1;

  async add(name: string, data: T, opts: JobOptions): Promise<{ id: number }> {
    this.added.push({ name, data, opts });

    if (this.addDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.addDelayMs));
    }

    return { id: this.nextId++ };
  }
}
