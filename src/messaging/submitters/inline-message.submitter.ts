import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { EVOLUTION_CONFIG } from '../../config/evolution.config';
import type { EvolutionConfig } from '../../config/evolution.config';
import { ConfigurationError } from '../../common/errors';
import { sleep } from '../../common/promise.utils';
import { SendMessageAttemptService } from '../send-message-attempt.service';
import { SendMessageJob } from '../send-message.job';
import type { MessageJobSpec } from '../types/message-job.type';
import { backoffDelayMs } from '../utils/backoff.utils';
import { RETRY_SLEEP } from './message-submitter.interface';
import type {
  MessageDispatchResult,
  MessageSubmitter,
  SleepFn,
} from './message-submitter.interface';

/**
 * Runtime en proceso (`queue.enabled = false`): reintenta con la misma tabla
 * de espera que la cola, bloqueando al llamador.
 */
@Injectable()
export class InlineMessageSubmitter implements MessageSubmitter {
  readonly mode = 'inline';
  private readonly logger = new Logger(InlineMessageSubmitter.name);
  private readonly wait: SleepFn;

  constructor(
    private readonly attempts: SendMessageAttemptService,
    @Inject(EVOLUTION_CONFIG)
    private readonly config: EvolutionConfig,
    @Optional() @Inject(RETRY_SLEEP) wait?: SleepFn,
  ) {
    this.wait = wait ?? sleep;
  }

  async submit(spec: MessageJobSpec): Promise<MessageDispatchResult> {
    const job = new SendMessageJob(spec, this.config.queue.maxExceptions);

    for (;;) {
      try {
        const response = await this.attempts.perform(job);
        return { mode: 'inline', response };
      } catch (error: unknown) {
        if (error instanceof ConfigurationError || job.state !== 'failed') {
          throw error;
        }

        const delay = backoffDelayMs(this.config.queue.backoff, job.attemptsMade);
        this.logger.log(`Reintentando envío en ${delay / 1000}s`);
        await this.wait(delay);
        job.retry();
      }
    }
  }
}
