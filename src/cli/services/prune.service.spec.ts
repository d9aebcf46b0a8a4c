import type { MessageLogEntry, WebhookLogEntry } from '../../ports';
import {
  InMemoryFailedMessages,
  InMemoryMessageLog,
  InMemoryWebhookLog,
} from '../../../test/fakes/in-memory-stores';
import { PruneService } from './prune.service';

const NOW = new Date('2026-03-31T00:00:00Z');
const OLD = new Date('2026-01-15T00:00:00Z');
const RECENT = new Date('2026-03-20T00:00:00Z');

const messageEntry: MessageLogEntry = {
  messageId: 'MSG1',
  instanceName: 'i1',
  remoteJid: '549@s.whatsapp.net',
  messageType: 'text',
  status: 'sent',
  payload: { number: '549', text: 'hola' },
  response: null,
  errorMessage: null,
};

const webhookEntry: WebhookLogEntry = {
  instanceName: 'i1',
  event: 'MESSAGES_UPSERT',
  payload: {},
  status: 'processed',
  errorMessage: null,
  processingTimeMs: 3,
};

describe('PruneService', () => {
  let messageLog: InMemoryMessageLog;
  let failedMessages: InMemoryFailedMessages;
  let webhookLog: InMemoryWebhookLog;
  let service: PruneService;

  beforeEach(async () => {
    messageLog = new InMemoryMessageLog();
    failedMessages = new InMemoryFailedMessages();
    webhookLog = new InMemoryWebhookLog();
    service = new PruneService(messageLog, failedMessages, webhookLog);

    messageLog.rows.push(
      { entry: messageEntry, createdAt: OLD },
      { entry: messageEntry, createdAt: OLD },
      { entry: messageEntry, createdAt: RECENT },
    );
    webhookLog.rows.push(
      { entry: webhookEntry, createdAt: OLD },
      { entry: webhookEntry, createdAt: RECENT },
    );

    const stale = await failedMessages.record({
      instanceName: 'i1',
      recipient: '549',
      messageType: 'text',
      payload: { number: '549', text: 'hola' },
      connectionName: null,
      error: 'boom',
    });
    failedMessages.rows.set(stale.id, { ...stale, createdAt: OLD });
  });

  it('cuenta sin borrar en dry-run', async () => {
    const report = await service.prune(
      { days: 30, messages: false, webhooks: false, dryRun: true },
      NOW,
    );

    expect(report).toEqual({
      cutoff: new Date('2026-03-01T00:00:00Z'),
      dryRun: true,
      counts: { messages: 2, failedMessages: 1, webhookLogs: 1 },
      total: 4,
    });
    expect(messageLog.rows).toHaveLength(3);
    expect(webhookLog.rows).toHaveLength(2);
  });

  it('sin selector borra mensajes y webhooks', async () => {
    const report = await service.prune(
      { days: 30, messages: false, webhooks: false, dryRun: false },
      NOW,
    );

    expect(report.total).toBe(4);
    expect(messageLog.rows.map((row) => row.createdAt)).toEqual([RECENT]);
    expect(webhookLog.rows.map((row) => row.createdAt)).toEqual([RECENT]);
    expect(failedMessages.rows.size).toBe(0);
  });

  it('--webhooks sólo toca los logs de webhooks', async () => {
    const report = await service.prune(
      { days: 30, messages: false, webhooks: true, dryRun: false },
      NOW,
    );

    expect(report.counts).toEqual({ messages: 0, failedMessages: 0, webhookLogs: 1 });
    expect(messageLog.rows).toHaveLength(3);
    expect(failedMessages.rows.size).toBe(1);
  });

  it('--messages incluye los mensajes fallidos', async () => {
    const report = await service.prune(
      { days: 30, messages: true, webhooks: false, dryRun: false },
      NOW,
    );

    expect(report.counts).toEqual({ messages: 2, failedMessages: 1, webhookLogs: 0 });
    expect(webhookLog.rows).toHaveLength(2);
  });
});
