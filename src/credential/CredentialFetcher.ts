import { getLoggerFor } from 'global-logger-factory';
import type { ClusterApiClient } from '../cluster/ClusterApiClient';
import { RemoteQueryError, errorMessage } from '../errors/ProvisioningError';
import { parseJson } from '../util/parseJson';
import type { RetryPolicy } from '../util/RetryPolicy';
import { Credential } from './Credential';

export interface CredentialSource {
  fetchCredential(endpoint: string, eventId: string): Promise<Credential>;
}

/**
 * 从 getToken 的响应中取出凭据文档。
 * JSON 对象里带 token / skupper_token 字段时取该字段，其余情况原样返回整个响应体。
 */
export function parseCredentialDocument(body: string): string {
  const trimmed = body.trim();
  const parsed = parseJson(trimmed);
  if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
    for (const key of [ 'token', 'skupper_token' ]) {
      const value: unknown = Reflect.get(parsed, key);
      if (typeof value === 'string' && value.trim().length > 0) {
        return value;
      }
    }
  }
  return trimmed;
}

interface CredentialFetcherOptions {
  client: ClusterApiClient;
  retryPolicy: RetryPolicy;
}

export class CredentialFetcher implements CredentialSource {
  private readonly logger = getLoggerFor(this);
  private readonly client: ClusterApiClient;
  private readonly retryPolicy: RetryPolicy;

  public constructor(options: CredentialFetcherOptions) {
    this.client = options.client;
    this.retryPolicy = options.retryPolicy;
  }

  public async fetchCredential(endpoint: string, eventId: string): Promise<Credential> {
    this.logger.info(`Requesting tunnel credential for event ${eventId}`);
    const outcome = await this.retryPolicy.execute(
      async (): Promise<string> => parseCredentialDocument(await this.client.getCredential(endpoint, eventId)),
      {
        isSuccess: (document) => document.length > 0,
        // 认证被拒时重试没有意义
        isRetryable: (error) => !(error instanceof RemoteQueryError && error.authRejected),
        onAttemptFailed: ({ attempt, error }) => {
          const reason = error === undefined ? 'empty credential document' : errorMessage(error);
          this.logger.warn(`Credential request attempt ${attempt}/${this.retryPolicy.attempts} failed: ${reason}`);
        },
      },
    );

    if (!outcome.succeeded) {
      const cause = outcome.lastError;
      const status = cause instanceof RemoteQueryError ? cause.status : undefined;
      const reason = cause === undefined ? 'empty credential document' : errorMessage(cause);
      throw new RemoteQueryError(
        `Could not obtain tunnel credential after ${outcome.attempts} attempts: ${reason}`,
        status,
        { cause },
      );
    }

    this.logger.info('Tunnel credential retrieved');
    return new Credential(outcome.value);
  }
}
