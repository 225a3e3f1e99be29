import { AsyncLocalStorage } from 'node:async_hooks';
import { randomBytes } from 'node:crypto';

export interface LogContext {
  runId: string;
}

export const logContext = new AsyncLocalStorage<LogContext>();

export function createRunId(): string {
  return randomBytes(4).toString('hex');
}
