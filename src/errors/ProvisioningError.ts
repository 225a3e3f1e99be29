/**
 * 进程退出码，CLI 根据抛出的错误类型决定退出码。
 */
export const EXIT_OK = 0;
export const EXIT_CONFIG_ERROR = 20;
export const EXIT_STATE_LOCKED = 21;
export const EXIT_RESOLUTION_ERROR = 30;
export const EXIT_REMOTE_QUERY_ERROR = 31;
export const EXIT_APPLIER_FAILURE = 40;
export const EXIT_STATE_WRITE_ERROR = 41;
export const EXIT_INTERNAL_ERROR = 50;

/**
 * 所有可预期错误的基类
 */
export class ProvisioningError extends Error {
  public readonly exitCode: number;

  public constructor(message: string, exitCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProvisioningError';
    this.exitCode = exitCode;
  }
}

export class ConfigurationError extends ProvisioningError {
  public constructor(message: string) {
    super(message, EXIT_CONFIG_ERROR);
    this.name = 'ConfigurationError';
  }
}

export class StateLockedError extends ProvisioningError {
  public constructor(message: string) {
    super(message, EXIT_STATE_LOCKED);
    this.name = 'StateLockedError';
  }
}

export type ResolutionFailureReason =
  | 'exhausted'
  | 'auth-rejected'
  | 'redirect-loop'
  | 'too-many-redirects'
  | 'invalid-endpoint';

/**
 * 集群入口解析失败。`auth-rejected`、重定向环等情况重试无意义。
 */
export class ResolutionError extends ProvisioningError {
  public readonly reason: ResolutionFailureReason;

  public constructor(message: string, reason: ResolutionFailureReason, options?: { cause?: unknown }) {
    super(message, EXIT_RESOLUTION_ERROR, options);
    this.name = 'ResolutionError';
    this.reason = reason;
  }
}

export class RemoteQueryError extends ProvisioningError {
  public readonly status?: number;

  public constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, EXIT_REMOTE_QUERY_ERROR, options);
    this.name = 'RemoteQueryError';
    this.status = status;
  }

  public get authRejected(): boolean {
    return this.status === 401 || this.status === 403;
  }
}

/**
 * 本地隧道状态命令无法执行。不致命，只算一次失败的探测。
 */
export class ProbeToolError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProbeToolError';
  }
}

export class ApplierFailure extends ProvisioningError {
  public readonly processExitCode?: number | null;

  public constructor(message: string, processExitCode?: number | null, options?: { cause?: unknown }) {
    super(message, EXIT_APPLIER_FAILURE, options);
    this.name = 'ApplierFailure';
    this.processExitCode = processExitCode;
  }
}

export class StateWriteError extends ProvisioningError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, EXIT_STATE_WRITE_ERROR, options);
    this.name = 'StateWriteError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function exitCodeFor(error: unknown): number {
  return error instanceof ProvisioningError ? error.exitCode : EXIT_INTERNAL_ERROR;
}
