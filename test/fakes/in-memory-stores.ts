import type {
  FailedMessageData,
  FailedMessagePort,
  InstancePort,
  InstanceSnapshot,
  MessageLogEntry,
  MessageLogPort,
  NewFailedMessage,
  RetryableFilter,
  WebhookLogEntry,
  WebhookLogPort,
} from '../../src/ports';

interface Timestamped<T> {
  entry: T;
  createdAt: Date;
}

export class InMemoryWebhookLog implements WebhookLogPort {
  readonly rows: Timestamped<WebhookLogEntry>[] = [];

  save(entry: WebhookLogEntry): Promise<void> {
    this.rows.push({ entry, createdAt: new Date() });
    return Promise.resolve();
  }

  countOlderThan(date: Date): Promise<number> {
    return Promise.resolve(this.rows.filter((row) => row.createdAt < date).length);
  }

  deleteOlderThan(date: Date): Promise<number> {
    const before = this.rows.length;
    const kept = this.rows.filter((row) => row.createdAt >= date);
    this.rows.splice(0, this.rows.length, ...kept);
    return Promise.resolve(before - kept.length);
  }
}

export class InMemoryMessageLog implements MessageLogPort {
  readonly rows: Timestamped<MessageLogEntry>[] = [];

  save(entry: MessageLogEntry): Promise<void> {
    this.rows.push({ entry, createdAt: new Date() });
    return Promise.resolve();
  }

  countOlderThan(date: Date): Promise<number> {
    return Promise.resolve(this.rows.filter((row) => row.createdAt < date).length);
  }

  deleteOlderThan(date: Date): Promise<number> {
    const before = this.rows.length;
    const kept = this.rows.filter((row) => row.createdAt >= date);
    this.rows.splice(0, this.rows.length, ...kept);
    return Promise.resolve(before - kept.length);
  }
}

export class InMemoryFailedMessages implements FailedMessagePort {
  readonly rows = new Map<string, FailedMessageData>();
  private sequence = 0;

  record(failure: NewFailedMessage): Promise<FailedMessageData> {
    this.sequence += 1;
    const row: FailedMessageData = {
      id: `failed-${this.sequence}`,
      instanceName: failure.instanceName,
      recipient: failure.recipient,
      messageType: failure.messageType,
      payload: failure.payload,
      connectionName: failure.connectionName,
      retryCount: 0,
      lastError: failure.error,
      createdAt: new Date(),
    };
    this.rows.set(row.id, row);
    return Promise.resolve(row);
  }

  registerRetryFailure(id: string, error: string): Promise<void> {
    const row = this.rows.get(id);

    if (row) {
      this.rows.set(id, { ...row, retryCount: row.retryCount + 1, lastError: error });
    }

    return Promise.resolve();
  }

  delete(id: string): Promise<void> {
    this.rows.delete(id);
    return Promise.resolve();
  }

  findRetryable(filter: RetryableFilter): Promise<FailedMessageData[]> {
    return Promise.resolve(
      [...this.rows.values()]
        .filter((row) => row.retryCount < filter.maxRetries)
        .filter(
          (row) =>
            filter.instanceName === undefined ||
            row.instanceName === filter.instanceName,
        )
        .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
        .slice(0, filter.limit),
    );
  }

  countOlderThan(date: Date): Promise<number> {
    return Promise.resolve(
      [...this.rows.values()].filter((row) => row.createdAt < date).length,
    );
  }

  deleteOlderThan(date: Date): Promise<number> {
    let deleted = 0;

    for (const row of [...this.rows.values()]) {
      if (row.createdAt < date) {
        this.rows.delete(row.id);
        deleted += 1;
      }
    }

    return Promise.resolve(deleted);
  }
}

export class InMemoryInstances implements InstancePort {
  readonly rows = new Map<string, InstanceSnapshot>();

  upsert(instance: InstanceSnapshot): Promise<void> {
    this.rows.set(instance.name, instance);
    return Promise.resolve();
  }
}
