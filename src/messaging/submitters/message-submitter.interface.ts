import type { ApiResponse } from '../../ports';
import type { MessageJobSpec } from '../types/message-job.type';

export type MessageDispatchResult =
  | { mode: 'queued'; jobId: string }
  | { mode: 'inline'; response: ApiResponse };

export interface MessageSubmitter {
  readonly mode: 'queued' | 'inline';
  submit(spec: MessageJobSpec): Promise<MessageDispatchResult>;
}

export const MESSAGE_SUBMITTER = Symbol('MESSAGE_SUBMITTER');
export const RETRY_SLEEP = Symbol('RETRY_SLEEP');

export type SleepFn = (ms: number) => Promise<void>;
