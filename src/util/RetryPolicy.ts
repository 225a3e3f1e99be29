import { setTimeout as delay } from 'node:timers/promises';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = async (ms: number): Promise<void> => {
  await delay(ms);
};

export interface RetryPolicyOptions {
  /** 最大尝试次数（小于 1 时按 1 处理） */
  attempts: number;
  /** 两次尝试之间的等待时间 (ms)，最后一次失败后不再等待 */
  delayMs: number;
  sleep?: Sleep;
}

export interface FailedAttempt<T> {
  attempt: number;
  value?: T;
  error?: unknown;
}

export interface RetryHooks<T> {
  /** 判断一次尝试的返回值是否算成功，默认任何返回值都算成功 */
  isSuccess?: (value: T) => boolean;
  /** 抛出的错误是否值得重试，返回 false 时错误原样抛出 */
  isRetryable?: (error: unknown) => boolean;
  onAttemptFailed?: (failure: FailedAttempt<T>) => void;
}

export type RetryOutcome<T> =
  | { succeeded: true; value: T; attempts: number }
  | { succeeded: false; attempts: number; lastValue?: T; lastError?: unknown };

/**
 * 有界重试策略：固定次数、固定间隔。
 * Resolver、Prober、凭据获取和 Applier 共用。
 */
export class RetryPolicy {
  public readonly attempts: number;
  public readonly delayMs: number;
  private readonly sleep: Sleep;

  public constructor(options: RetryPolicyOptions) {
    this.attempts = Math.max(1, Math.trunc(options.attempts));
    this.delayMs = Math.max(0, options.delayMs);
    this.sleep = options.sleep ?? defaultSleep;
  }

  public async execute<T>(operation: (attempt: number) => Promise<T>, hooks: RetryHooks<T> = {}): Promise<RetryOutcome<T>> {
    let lastValue: T | undefined;
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      try {
        const value = await operation(attempt);
        if (!hooks.isSuccess || hooks.isSuccess(value)) {
          return { succeeded: true, value, attempts: attempt };
        }
        lastValue = value;
        lastError = undefined;
        hooks.onAttemptFailed?.({ attempt, value });
      } catch (error: unknown) {
        if (hooks.isRetryable && !hooks.isRetryable(error)) {
          throw error;
        }
        lastValue = undefined;
        lastError = error;
        hooks.onAttemptFailed?.({ attempt, error });
      }

      if (attempt < this.attempts && this.delayMs > 0) {
        await this.sleep(this.delayMs);
      }
    }

    return { succeeded: false, attempts: this.attempts, lastValue, lastError };
  }
}
