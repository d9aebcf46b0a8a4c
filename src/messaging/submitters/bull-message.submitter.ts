import { Inject, Injectable } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bull';
import { EVOLUTION_CONFIG } from '../../config/evolution.config';
import type { EvolutionConfig } from '../../config/evolution.config';
import { MESSAGE_QUEUE, SEND_MESSAGE_JOB } from '../../queue/queue.constants';
import type { JobQueue } from '../../queue/queue.types';
import type { MessageJobSpec } from '../types/message-job.type';
import { STAIRCASE_BACKOFF } from '../utils/backoff.utils';
import type {
  MessageDispatchResult,
  MessageSubmitter,
} from './message-submitter.interface';

@Injectable()
export class BullMessageSubmitter implements MessageSubmitter {
  readonly mode = 'queued';

  constructor(
    @InjectQueue(MESSAGE_QUEUE)
    private readonly queue: JobQueue<MessageJobSpec>,
    @Inject(EVOLUTION_CONFIG)
    private readonly config: EvolutionConfig,
  ) {}

  async submit(spec: MessageJobSpec): Promise<MessageDispatchResult> {
    const job = await this.queue.add(SEND_MESSAGE_JOB, spec, {
      attempts: this.config.queue.maxExceptions,
      backoff: { type: STAIRCASE_BACKOFF },
      removeOnComplete: true,
    });

    return { mode: 'queued', jobId: String(job.id) };
  }
}
