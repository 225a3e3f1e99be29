import os from 'node:os';
import path from 'node:path';
import { ConfigurationError } from '../errors/ProvisioningError';
import { normalizeBoolean, normalizeInteger, normalizeString, secondsToMs } from './normalize';

export const LOG_LEVELS = [ 'error', 'warn', 'info', 'verbose', 'debug', 'silly' ] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export const DEFAULT_EVENT_ID_FILE = '/var/lib/tunnel-provisioner/event-id';
/** /run 开机即清空，断电留下的锁不会影响下一次启动 */
export const DEFAULT_LOCK_FILE = '/run/tunnel-provisioner/provisioner.lock';
export const DEFAULT_CREDENTIAL_FILE = '/run/tunnel-provisioner/credential';
export const DEFAULT_PLAYBOOK_PATH = '/opt/tunnel-provisioner/ansible/configure-tunnel.yml';
export const DEFAULT_APPLIER_OUTPUT_LOG = '/var/log/tunnel-provisioner/applier.log';
export const DEFAULT_TUNNEL_STATUS_COMMAND = 'skupper status -n skupper';

export interface BasicCredentials {
  username: string;
  password: string;
}

export interface RemoteConfig {
  /** EndpointPointer */
  redirectUrl: string;
  redirectUrlIsCluster: boolean;
  redirectRetries: number;
  redirectRetryDelayMs: number;
  auth: BasicCredentials;
  requestTimeoutMs: number;
  credentialRetries: number;
  credentialRetryDelayMs: number;
}

export interface TunnelCheckConfig {
  initialDelayMs: number;
  retries: number;
  intervalMs: number;
  statusCommand: string;
  statusTimeoutMs: number;
}

export interface ApplierConfig {
  playbookPath: string;
  inventoryPath: string;
  retries: number;
  retryDelayMs: number;
  timeoutMs: number;
  /** undefined 表示不记录 playbook 输出 */
  outputLogPath?: string;
  credentialFile: string;
  credentialCleanupDelayMs: number;
}

export interface LoggingConfig {
  level: LogLevel;
  file?: string;
}

/**
 * 不依赖远端配置的部分，status / forget 命令只需要这些。
 */
export interface LocalConfig {
  deviceName: string;
  eventIdFile: string;
  lockFile: string;
  startupDelayMs: number;
  tunnel: TunnelCheckConfig;
  applier: ApplierConfig;
  logging: LoggingConfig;
}

export interface ProvisionerConfig extends LocalConfig {
  remote: RemoteConfig;
}

type Env = Record<string, string | undefined>;

export function loadLocalConfig(env: Env): LocalConfig {
  const playbookPath = normalizeString(env.APPLIER_PLAYBOOK_PATH) ?? DEFAULT_PLAYBOOK_PATH;
  const outputLog = env.APPLIER_OUTPUT_LOG === undefined ? DEFAULT_APPLIER_OUTPUT_LOG : normalizeString(env.APPLIER_OUTPUT_LOG);

  return {
    deviceName: normalizeString(env.DEVICE_NAME) ?? os.hostname(),
    eventIdFile: normalizeString(env.EVENT_ID_FILE) ?? DEFAULT_EVENT_ID_FILE,
    lockFile: normalizeString(env.LOCK_FILE) ?? DEFAULT_LOCK_FILE,
    startupDelayMs: secondsToMs(normalizeInteger('SERVICE_STARTUP_DELAY', env.SERVICE_STARTUP_DELAY, 0)),
    tunnel: {
      initialDelayMs: secondsToMs(normalizeInteger('TUNNEL_CHECK_INITIAL_DELAY', env.TUNNEL_CHECK_INITIAL_DELAY, 15)),
      retries: atLeastOne(normalizeInteger('TUNNEL_CHECK_RETRIES', env.TUNNEL_CHECK_RETRIES, 5)),
      intervalMs: secondsToMs(normalizeInteger('TUNNEL_CHECK_INTERVAL', env.TUNNEL_CHECK_INTERVAL, 10)),
      statusCommand: normalizeString(env.TUNNEL_STATUS_COMMAND) ?? DEFAULT_TUNNEL_STATUS_COMMAND,
      statusTimeoutMs: secondsToMs(normalizeInteger('TUNNEL_STATUS_TIMEOUT', env.TUNNEL_STATUS_TIMEOUT, 10)),
    },
    applier: {
      playbookPath,
      inventoryPath: normalizeString(env.APPLIER_INVENTORY_PATH) ?? path.join(path.dirname(playbookPath), 'inventory'),
      retries: atLeastOne(normalizeInteger('APPLIER_RETRIES', env.APPLIER_RETRIES, 2)),
      retryDelayMs: secondsToMs(normalizeInteger('APPLIER_RETRY_DELAY', env.APPLIER_RETRY_DELAY, 30)),
      timeoutMs: secondsToMs(normalizeInteger('APPLIER_TIMEOUT', env.APPLIER_TIMEOUT, 600)),
      outputLogPath: outputLog,
      credentialFile: normalizeString(env.CREDENTIAL_FILE) ?? DEFAULT_CREDENTIAL_FILE,
      credentialCleanupDelayMs: secondsToMs(normalizeInteger('CREDENTIAL_CLEANUP_DELAY', env.CREDENTIAL_CLEANUP_DELAY, 15)),
    },
    logging: {
      level: parseLogLevel(env.LOG_LEVEL),
      file: normalizeString(env.LOG_FILE),
    },
  };
}

/**
 * 从环境变量构造完整配置，启动时调用一次，之后以参数形式传给各组件。
 */
export function loadProvisionerConfig(env: Env): ProvisionerConfig {
  const redirectUrl = normalizeString(env.REDIRECT_URL);
  const username = normalizeString(env.API_USERNAME);
  const password = env.API_PASSWORD;

  const missing: string[] = [];
  if (!redirectUrl) {
    missing.push('REDIRECT_URL');
  }
  if (!username) {
    missing.push('API_USERNAME');
  }
  if (!password) {
    missing.push('API_PASSWORD');
  }
  if (!redirectUrl || !username || !password) {
    throw new ConfigurationError(`Missing required environment variables: ${missing.join(', ')}`);
  }

  if (!isHttpUrl(redirectUrl)) {
    throw new ConfigurationError(`REDIRECT_URL must be an absolute http(s) URL, got "${redirectUrl}"`);
  }

  return {
    ...loadLocalConfig(env),
    remote: {
      redirectUrl,
      redirectUrlIsCluster: normalizeBoolean(env.REDIRECT_URL_IS_CLUSTER),
      redirectRetries: atLeastOne(normalizeInteger('REDIRECT_RETRIES', env.REDIRECT_RETRIES, 3)),
      redirectRetryDelayMs: secondsToMs(normalizeInteger('REDIRECT_RETRY_DELAY', env.REDIRECT_RETRY_DELAY, 10)),
      auth: { username, password },
      requestTimeoutMs: secondsToMs(normalizeInteger('REQUEST_TIMEOUT', env.REQUEST_TIMEOUT, 10)),
      credentialRetries: atLeastOne(normalizeInteger('CREDENTIAL_RETRIES', env.CREDENTIAL_RETRIES, 12)),
      credentialRetryDelayMs: secondsToMs(normalizeInteger('CREDENTIAL_RETRY_DELAY', env.CREDENTIAL_RETRY_DELAY, 5)),
    },
  };
}

export function parseLogLevel(value?: string): LogLevel {
  const normalized = normalizeString(value)?.toLowerCase() ?? 'info';
  const level = normalized === 'warning' ? 'warn' : normalized;
  const match = LOG_LEVELS.find((candidate) => candidate === level);
  if (!match) {
    throw new ConfigurationError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${value ?? ''}"`);
  }
  return match;
}

export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

function atLeastOne(value: number): number {
  return Math.max(1, value);
}
