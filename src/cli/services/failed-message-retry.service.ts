import { Inject, Injectable } from '@nestjs/common';
import { errorMessage } from '../../common/record.utils';
import { FAILED_MESSAGE_PORT } from '../../ports';
import type { FailedMessageData, FailedMessagePort } from '../../ports';
import { SendMessageAttemptService } from '../../messaging/send-message-attempt.service';
import { SendMessageJob } from '../../messaging/send-message.job';

export interface RetryOptions {
  instanceName?: string;
  maxRetries: number;
  limit: number;
  dryRun: boolean;
}

export interface RetryOutcome {
  record: FailedMessageData;
  success: boolean;
  error: string | null;
}

export interface RetryReport {
  candidates: FailedMessageData[];
  outcomes: RetryOutcome[];
  succeeded: number;
  failed: number;
}

/**
 * Reintenta mensajes fallidos: un intento sincrónico por registro. El intento
 * borra el registro si sale bien o suma `retryCount` si vuelve a fallar.
 */
@Injectable()
export class FailedMessageRetryService {
  constructor(
    @Inject(FAILED_MESSAGE_PORT)
    private readonly failedMessages: FailedMessagePort,
    private readonly attempts: SendMessageAttemptService,
  ) {}

  findCandidates(options: RetryOptions): Promise<FailedMessageData[]> {
    return this.failedMessages.findRetryable({
      maxRetries: options.maxRetries,
      limit: options.limit,
      ...(options.instanceName ? { instanceName: options.instanceName } : {}),
    });
  }

  async retry(
    options: RetryOptions,
    onOutcome: (outcome: RetryOutcome) => void = () => undefined,
  ): Promise<RetryReport> {
    const candidates = await this.findCandidates(options);
    const outcomes: RetryOutcome[] = [];

    if (options.dryRun) {
      return { candidates, outcomes, succeeded: 0, failed: 0 };
    }

    for (const record of candidates) {
      const outcome = await this.retryOne(record);
      outcomes.push(outcome);
      onOutcome(outcome);
    }

    const succeeded = outcomes.filter((outcome) => outcome.success).length;
    return {
      candidates,
      outcomes,
      succeeded,
      failed: outcomes.length - succeeded,
    };
  }

  private async retryOne(record: FailedMessageData): Promise<RetryOutcome> {
    const job = new SendMessageJob(
      {
        instanceName: record.instanceName,
        messageType: record.messageType,
        message: record.payload,
        connectionName: record.connectionName,
        failedMessageId: record.id,
      },
      1,
    );

    try {
      await this.attempts.perform(job);
      return { record, success: true, error: null };
    } catch (error: unknown) {
      return { record, success: false, error: errorMessage(error) };
    }
  }
}
