import { InvalidWebhookPayloadError } from '../common/errors';
import { FakeJobQueue } from '../../test/fakes/fake-job-queue';
import { BullWebhookSubmitter } from './submitters/bull-webhook.submitter';
import { WebhookDispatcherService } from './webhook-dispatcher.service';
import type { WebhookSubmitter } from './submitters/webhook-submitter.interface';
import type {
  WebhookJobData,
  WebhookPayload,
} from './types/webhook-payload.type';

class FakeSubmitter implements WebhookSubmitter {
  readonly submitted: WebhookPayload[] = [];
  failWith: Error | null = null;

  constructor(readonly mode: 'queued' | 'inline') {}

  submit(payload: WebhookPayload): Promise<void> {
    if (this.failWith) {
      return Promise.reject(this.failWith);
    }

    this.submitted.push(payload);
    return Promise.resolve();
  }
}

describe('WebhookDispatcherService', () => {
  let queued: FakeSubmitter;
  let inline: FakeSubmitter;

  beforeEach(() => {
    queued = new FakeSubmitter('queued');
    inline = new FakeSubmitter('inline');
  });

  it('procesa en línea cuando la cola está desactivada', async () => {
    const dispatcher = new WebhookDispatcherService(inline, inline);

    await expect(
      dispatcher.dispatch({ event: 'messages.upsert', instance: 'i1' }),
    ).resolves.toEqual({ status: 'success', message: 'Webhook processed' });
    expect(inline.submitted.map((payload) => payload.instanceName)).toEqual([
      'i1',
    ]);
  });

  it('encola cuando la cola está activa', async () => {
    const dispatcher = new WebhookDispatcherService(queued, inline);

    await expect(
      dispatcher.dispatch({ event: 'messages.upsert' }, 'from-url'),
    ).resolves.toEqual({ status: 'success', message: 'Webhook queued' });
    expect(queued.submitted[0].instanceName).toBe('from-url');
    expect(inline.submitted).toEqual([]);
  });

  it('vuelve al procesamiento en línea si el encolado falla', async () => {
    queued.failWith = new Error('redis caído');
    const dispatcher = new WebhookDispatcherService(queued, inline);

    await expect(
      dispatcher.dispatch({ event: 'connection.update' }),
    ).resolves.toEqual({ status: 'success', message: 'Webhook processed' });
    expect(inline.submitted.map((payload) => payload.event)).toEqual([
      'connection.update',
    ]);
  });

  describe('con la cola de Bull', () => {
    let queue: FakeJobQueue<WebhookJobData>;
    let dispatcher: WebhookDispatcherService;

    beforeEach(() => {
      queue = new FakeJobQueue<WebhookJobData>();
      dispatcher = new WebhookDispatcherService(
        new BullWebhookSubmitter(queue),
        inline,
      );
    });

    it('un encolado lento no dispara además el procesamiento en línea', async () => {
      queue.addDelayMs = 50;

      await expect(
        dispatcher.dispatch({ event: 'messages.upsert', instance: 'i1' }),
      ).resolves.toEqual({ status: 'success', message: 'Webhook queued' });
      expect(queue.added.map((job) => job.data.event)).toEqual([
        'messages.upsert',
      ]);
      expect(inline.submitted).toEqual([]);
    });

    it('con redis caído procesa solo en línea', async () => {
      queue.client.status = 'connecting';

      await expect(
        dispatcher.dispatch({ event: 'messages.upsert', instance: 'i1' }),
      ).resolves.toEqual({ status: 'success', message: 'Webhook processed' });
      expect(queue.added).toEqual([]);
      expect(inline.submitted.map((payload) => payload.event)).toEqual([
        'messages.upsert',
      ]);
    });
  });

  it('propaga el error del procesamiento en línea', async () => {
    inline.failWith = new Error('falló el handler');
    const dispatcher = new WebhookDispatcherService(inline, inline);

    await expect(dispatcher.dispatch({ event: 'test' })).rejects.toThrow(
      'falló el handler',
    );
  });

  it('rechaza un payload sin evento sin efectos secundarios', async () => {
    const dispatcher = new WebhookDispatcherService(queued, inline);

    await expect(dispatcher.dispatch({ instance: 'i1' })).rejects.toBeInstanceOf(
      InvalidWebhookPayloadError,
    );
    expect(queued.submitted).toEqual([]);
    expect(inline.submitted).toEqual([]);
  });
});
