import { getLoggerFor } from 'global-logger-factory';
import type { BasicCredentials } from '../config/ProvisionerConfig';
import { RemoteQueryError, errorMessage } from '../errors/ProvisioningError';

export interface ClusterApiClientOptions {
  auth: BasicCredentials;
  /** 上报给集群的设备名 (robot_name) */
  deviceName: string;
  timeoutMs?: number;
}

export function basicAuthorization(auth: BasicCredentials): string {
  return `Basic ${Buffer.from(`${auth.username}:${auth.password}`).toString('base64')}`;
}

/**
 * 去掉 query 和末尾的 `/`，得到可拼接路径的集群基地址
 */
export function clusterBaseUrl(endpoint: string): string {
  return endpoint.split('?')[0].replace(/\/+$/u, '');
}

/**
 * 集群控制接口 (`<endpoint>/control/...`) 的 HTTP 客户端。
 * 所有请求都带 Basic 认证；非 2xx 和网络错误统一转换为 RemoteQueryError。
 */
export class ClusterApiClient {
  private readonly logger = getLoggerFor(this);
  private readonly authorization: string;
  private readonly timeoutMs: number;
  public readonly deviceName: string;

  public constructor(options: ClusterApiClientOptions) {
    this.authorization = basicAuthorization(options.auth);
    this.deviceName = options.deviceName;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  public async getEventId(endpoint: string): Promise<string> {
    const url = this.controlUrl(endpoint, 'eventId', { robot_name: this.deviceName });
    this.logger.info(`Querying event ID from ${url}`);
    return this.request(url, { method: 'GET', headers: { Accept: 'application/json, text/plain' }});
  }

  public async getCredential(endpoint: string, eventId: string): Promise<string> {
    const url = this.controlUrl(endpoint, 'getToken', { robot_name: this.deviceName, event_id: eventId });
    this.logger.debug(`Requesting tunnel credential from ${url}`);
    return this.request(url, { method: 'GET', headers: { Accept: 'application/json, text/plain' }});
  }

  public async postInitStatus(endpoint: string, status: string): Promise<void> {
    const url = this.controlUrl(endpoint, 'initStatus');
    const body = new URLSearchParams({ robot_name: this.deviceName, status });
    await this.request(url, { method: 'POST', body });
  }

  private controlUrl(endpoint: string, operation: string, query?: Record<string, string>): string {
    const url = new URL(`${clusterBaseUrl(endpoint)}/control/${operation}`);
    for (const [ key, value ] of Object.entries(query ?? {})) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  private async request(url: string, init: { method: string; headers?: Record<string, string>; body?: URLSearchParams }): Promise<string> {
    let response: Response;
    try {
      response = await fetch(url, {
        method: init.method,
        headers: { ...init.headers, Authorization: this.authorization },
        body: init.body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error: unknown) {
      throw new RemoteQueryError(`Request to ${url} failed: ${errorMessage(error)}`, undefined, { cause: error });
    }

    if (!response.ok) {
      await this.discardBody(response);
      throw new RemoteQueryError(`Request to ${url} returned HTTP ${response.status}`, response.status);
    }
    // 读取响应体时同样可能超时或断流
    try {
      return await response.text();
    } catch (error: unknown) {
      throw new RemoteQueryError(`Reading response from ${url} failed: ${errorMessage(error)}`, response.status, { cause: error });
    }
  }

  private async discardBody(response: Response): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (error: unknown) {
      this.logger.debug(`Could not discard response body: ${errorMessage(error)}`);
    }
  }
}
