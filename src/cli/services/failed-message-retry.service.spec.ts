import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  FakeEvolutionClient,
  failure,
  ok,
} from '../../../test/fakes/fake-evolution-client';
import {
  InMemoryFailedMessages,
  InMemoryMessageLog,
} from '../../../test/fakes/in-memory-stores';
import { testConfig } from '../../../test/fakes/test-config';
import { SendMessageAttemptService } from '../../messaging/send-message-attempt.service';
import { FailedMessageRetryService } from './failed-message-retry.service';

describe('FailedMessageRetryService', () => {
  let client: FakeEvolutionClient;
  let failedMessages: InMemoryFailedMessages;
  let messageLog: InMemoryMessageLog;
  let service: FailedMessageRetryService;

  async function seed(instanceName: string, number: string): Promise<string> {
    const record = await failedMessages.record({
      instanceName,
      recipient: number,
      messageType: 'text',
      payload: { number, text: 'hola' },
      connectionName: null,
      error: 'Internal error',
    });
    return record.id;
  }

  beforeEach(async () => {
    client = new FakeEvolutionClient();
    failedMessages = new InMemoryFailedMessages();
    messageLog = new InMemoryMessageLog();
    const attempts = new SendMessageAttemptService(
      client,
      failedMessages,
      messageLog,
      new EventEmitter2(),
      testConfig(),
    );
    service = new FailedMessageRetryService(failedMessages, attempts);

    await seed('i1', '111');
    await seed('i1', '222');
    const exhausted = await seed('i2', '333');
    for (let i = 0; i < 3; i++) {
      await failedMessages.registerRetryFailure(exhausted, 'Internal error');
    }
  });

  it('borra los que salen y actualiza los que vuelven a fallar', async () => {
    client.respond = (call) =>
      call.body?.number === '222' ? failure(500, 'boom') : ok({ key: { id: 'MSG1' } });

    const report = await service.retry({ maxRetries: 3, limit: 100, dryRun: false });

    expect(report.candidates.map((record) => record.id)).toEqual([
      'failed-1',
      'failed-2',
    ]);
    expect(report.succeeded).toBe(1);
    expect(report.failed).toBe(1);
    expect(report.outcomes[1].error).toBe('boom');
    expect(failedMessages.rows.has('failed-1')).toBe(false);
    expect(failedMessages.rows.get('failed-2')).toMatchObject({
      retryCount: 1,
      lastError: 'boom',
    });
    expect(failedMessages.rows.get('failed-3')?.retryCount).toBe(3);
    expect(messageLog.rows.map((row) => row.entry.status)).toEqual([
      'sent',
      'failed',
    ]);
  });

  it('dry-run sólo lista', async () => {
    const report = await service.retry({ maxRetries: 3, limit: 100, dryRun: true });

    expect(report.candidates).toHaveLength(2);
    expect(report.outcomes).toEqual([]);
    expect(client.calls).toHaveLength(0);
  });

  it('filtra por instancia y respeta el límite', async () => {
    const byInstance = await service.findCandidates({
      instanceName: 'i2',
      maxRetries: 5,
      limit: 100,
      dryRun: true,
    });
    const limited = await service.findCandidates({
      maxRetries: 3,
      limit: 1,
      dryRun: true,
    });

    expect(byInstance.map((record) => record.id)).toEqual(['failed-3']);
    expect(limited.map((record) => record.id)).toEqual(['failed-1']);
  });
});
