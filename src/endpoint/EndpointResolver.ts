import { getLoggerFor } from 'global-logger-factory';
import { basicAuthorization } from '../cluster/ClusterApiClient';
import type { BasicCredentials } from '../config/ProvisionerConfig';
import { isHttpUrl } from '../config/ProvisionerConfig';
import { ResolutionError, errorMessage } from '../errors/ProvisioningError';
import type { RetryPolicy } from '../util/RetryPolicy';

/** 单次解析最多发出的请求数 */
export const MAX_REDIRECT_REQUESTS = 10;

export interface EndpointResolverOptions {
  /** EndpointPointer */
  redirectUrl: string;
  /** 为 true 时 redirectUrl 本身就是集群地址，不发请求 */
  redirectUrlIsCluster: boolean;
  auth: BasicCredentials;
  retryPolicy: RetryPolicy;
  timeoutMs?: number;
}

/**
 * Endpoint Resolver
 *
 * 通过固定的带认证重定向地址找到当前活动的集群。
 * 手动跟随重定向，以便每一跳（包括跨域跳转）都重新带上 Basic 认证头。
 */
export class EndpointResolver {
  private readonly logger = getLoggerFor(this);
  private readonly redirectUrl: string;
  private readonly redirectUrlIsCluster: boolean;
  private readonly authorization: string;
  private readonly retryPolicy: RetryPolicy;
  private readonly timeoutMs: number;

  public constructor(options: EndpointResolverOptions) {
    this.redirectUrl = options.redirectUrl;
    this.redirectUrlIsCluster = options.redirectUrlIsCluster;
    this.authorization = basicAuthorization(options.auth);
    this.retryPolicy = options.retryPolicy;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  public async resolve(): Promise<string> {
    if (this.redirectUrlIsCluster) {
      this.logger.info(`Using ${this.redirectUrl} as cluster endpoint (redirect resolution disabled)`);
      return this.redirectUrl;
    }

    const outcome = await this.retryPolicy.execute(
      async (): Promise<string> => this.followRedirects(),
      {
        // ResolutionError 只用于重试也无法解决的情况（认证被拒、重定向环）
        isRetryable: (error) => !(error instanceof ResolutionError),
        onAttemptFailed: ({ attempt, error }) => {
          this.logger.warn(`Redirect resolution attempt ${attempt}/${this.retryPolicy.attempts} failed: ${errorMessage(error)}`);
        },
      },
    );

    if (outcome.succeeded) {
      this.logger.info(`Resolved cluster endpoint: ${outcome.value}`);
      return outcome.value;
    }

    throw new ResolutionError(
      `Could not resolve cluster endpoint from ${this.redirectUrl} after ${outcome.attempts} attempts: ${errorMessage(outcome.lastError)}`,
      'exhausted',
      { cause: outcome.lastError },
    );
  }

  private async followRedirects(): Promise<string> {
    let url = this.redirectUrl;
    const seen = new Set<string>();

    for (let request = 0; request < MAX_REDIRECT_REQUESTS; request++) {
      if (seen.has(url)) {
        throw new ResolutionError(`Redirect loop detected at ${url}`, 'redirect-loop');
      }
      seen.add(url);

      this.logger.debug(`Following redirect URL: ${url}`);
      const response = await fetch(url, {
        method: 'GET',
        redirect: 'manual',
        headers: { Authorization: this.authorization },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      // 只看状态码和 Location，响应体一律丢弃以释放连接
      await response.body?.cancel();

      if (response.status === 401 || response.status === 403) {
        throw new ResolutionError(`Authentication rejected by ${url} (HTTP ${response.status})`, 'auth-rejected');
      }

      if (response.status >= 300 && response.status < 400) {
        const location = response.headers.get('location');
        if (!location) {
          throw new Error(`HTTP ${response.status} from ${url} without Location header`);
        }
        // 相对地址基于刚请求的 URL 解析，而不是最初的重定向地址
        url = new URL(location, url).toString();
        continue;
      }

      if (!response.ok) {
        throw new Error(`HTTP ${response.status} from ${url}`);
      }

      const endpoint = url.replace(/\/+$/u, '');
      if (!isHttpUrl(endpoint)) {
        throw new ResolutionError(`Resolved endpoint ${endpoint} is not an absolute http(s) URL`, 'invalid-endpoint');
      }
      return endpoint;
    }

    throw new ResolutionError(`Too many redirects (more than ${MAX_REDIRECT_REQUESTS - 1}) from ${this.redirectUrl}`, 'too-many-redirects');
  }
}
