import type { MessageJobSpec, MessageJobState } from './types/message-job.type';

/**
 * Máquina de estados de un envío:
 * pending -> sending -> (succeeded | failed); failed -> pending mientras
 * queden intentos, si no -> exhausted.
 */
export class SendMessageJob {
  private currentState: MessageJobState = 'pending';
  private failedRecordId: string | undefined;

  constructor(
    readonly spec: MessageJobSpec,
    readonly maxTries: number,
    private attempts = 0,
  ) {
    this.failedRecordId = spec.failedMessageId;
  }

  get state(): MessageJobState {
    return this.currentState;
  }

  get attemptsMade(): number {
    return this.attempts;
  }

  get failedMessageId(): string | undefined {
    return this.failedRecordId;
  }

  begin(): number {
    this.transition('pending', 'sending');
    this.attempts += 1;
    return this.attempts;
  }

  succeed(): void {
    this.transition('sending', 'succeeded');
  }

  fail(): 'failed' | 'exhausted' {
    const next = this.attempts >= this.maxTries ? 'exhausted' : 'failed';
    this.transition('sending', next);
    return next;
  }

  retry(): void {
    this.transition('failed', 'pending');
  }

  attachFailedRecord(id: string): void {
    this.failedRecordId = id;
  }

  private transition(from: MessageJobState, to: MessageJobState): void {
    if (this.currentState !== from) {
      throw new Error(
        `Invalid send job transition ${this.currentState} -> ${to}`,
      );
    }
    this.currentState = to;
  }
}
