import { Inject, Logger } from '@nestjs/common';
import { Process, Processor } from '@nestjs/bull';
import type { Job } from 'bull';
import { EVOLUTION_CONFIG } from '../../config/evolution.config';
import type { EvolutionConfig } from '../../config/evolution.config';
import { ConfigurationError } from '../../common/errors';
import { MESSAGE_QUEUE, SEND_MESSAGE_JOB } from '../../queue/queue.constants';
import { SendMessageAttemptService } from '../send-message-attempt.service';
import { SendMessageJob } from '../send-message.job';
import type { MessageJobSpec } from '../types/message-job.type';
import { toMessageJobSpec } from '../utils/message-request.utils';

/**
 * Bull lleva la cuenta de intentos y aplica la espera (`staircase`); aquí se
 * reconstruye el estado del job y se ejecuta un intento.
 */
export type SendMessageBullJob = Pick<
  Job<MessageJobSpec>,
  'id' | 'data' | 'opts' | 'attemptsMade' | 'discard' | 'update'
>;

@Processor(MESSAGE_QUEUE)
export class SendMessageConsumer {
  private readonly logger = new Logger(SendMessageConsumer.name);

  constructor(
    private readonly attempts: SendMessageAttemptService,
    @Inject(EVOLUTION_CONFIG)
    private readonly config: EvolutionConfig,
  ) {}

  @Process(SEND_MESSAGE_JOB)
  async handle(bullJob: SendMessageBullJob): Promise<unknown> {
    let spec: MessageJobSpec;

    try {
      spec = toMessageJobSpec(bullJob.data);
    } catch (error: unknown) {
      await bullJob.discard();
      throw error;
    }

    const job = new SendMessageJob(
      spec,
      bullJob.opts.attempts ?? this.config.queue.maxExceptions,
      bullJob.attemptsMade,
    );

    try {
      const response = await this.attempts.perform(job);
      return response.data;
    } catch (error: unknown) {
      if (error instanceof ConfigurationError) {
        this.logger.error(`Job ${String(bullJob.id)} descartado: ${error.message}`);
        await bullJob.discard();
      } else if (job.failedMessageId !== spec.failedMessageId) {
        // Los siguientes intentos actualizan el mismo registro
        await bullJob.update({ ...spec, failedMessageId: job.failedMessageId });
      }

      throw error;
    }
  }
}
