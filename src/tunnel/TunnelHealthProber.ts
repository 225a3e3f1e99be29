import { getLoggerFor } from 'global-logger-factory';
import { ConfigurationError, ProbeToolError, errorMessage } from '../errors/ProvisioningError';
import type { CommandRunner, ProcessResult } from '../util/ProcessRunner';
import { splitCommandLine } from '../util/ProcessRunner';
import type { RetryPolicy, Sleep } from '../util/RetryPolicy';
import { defaultSleep } from '../util/RetryPolicy';

const CONNECTED_SITES = /connected to (\d+) other sites?/u;

/**
 * 隧道代理的状态输出中是否明确写明与至少一个远端站点相连。
 * "not connected to any other sites" 之类的输出不算。
 */
export function reportsConnectivity(output: string): boolean {
  const match = CONNECTED_SITES.exec(output.toLowerCase());
  return match !== null && Number.parseInt(match[1], 10) > 0;
}

export interface TunnelHealthCheck {
  isTunnelHealthy(): Promise<boolean>;
}

export interface TunnelHealthProberOptions {
  runner: CommandRunner;
  /** 例如 "skupper status -n skupper" */
  statusCommand: string;
  /** 每次运行第一次探测前等待一次，给隧道代理启动留时间 */
  initialDelayMs: number;
  /** 探测次数与间隔 */
  retryPolicy: RetryPolicy;
  commandTimeoutMs?: number;
  sleep?: Sleep;
}

export class TunnelHealthProber implements TunnelHealthCheck {
  private readonly logger = getLoggerFor(this);
  private readonly runner: CommandRunner;
  private readonly command: string;
  private readonly args: string[];
  private readonly initialDelayMs: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly commandTimeoutMs: number;
  private readonly sleep: Sleep;
  private initialDelayDone = false;

  public constructor(options: TunnelHealthProberOptions) {
    const [ command, ...args ] = splitCommandLine(options.statusCommand);
    if (!command) {
      throw new ConfigurationError('TUNNEL_STATUS_COMMAND is empty');
    }
    this.runner = options.runner;
    this.command = command;
    this.args = args;
    this.initialDelayMs = options.initialDelayMs;
    this.retryPolicy = options.retryPolicy;
    this.commandTimeoutMs = options.commandTimeoutMs ?? 10_000;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * 任意一次探测成功即返回 true；只有所有探测都失败才返回 false。
   */
  public async isTunnelHealthy(): Promise<boolean> {
    if (!this.initialDelayDone) {
      this.initialDelayDone = true;
      if (this.initialDelayMs > 0) {
        this.logger.info(`Waiting ${this.initialDelayMs}ms before checking the tunnel`);
        await this.sleep(this.initialDelayMs);
      }
    }

    const outcome = await this.retryPolicy.execute(
      async (): Promise<boolean> => this.probeOnce(),
      {
        isSuccess: (connected) => connected,
        onAttemptFailed: ({ attempt }) => {
          this.logger.info(`Tunnel not connected (probe ${attempt}/${this.retryPolicy.attempts})`);
        },
      },
    );

    if (outcome.succeeded) {
      this.logger.info(`Tunnel is connected (probe ${outcome.attempts}/${this.retryPolicy.attempts})`);
      return true;
    }
    this.logger.warn(`Tunnel not connected after ${outcome.attempts} probes`);
    return false;
  }

  /**
   * 单次探测，不等待。命令无法执行时记为未连接。
   */
  public async probeOnce(): Promise<boolean> {
    try {
      return await this.runStatusCommand();
    } catch (error: unknown) {
      this.logger.warn(errorMessage(error));
      return false;
    }
  }

  private async runStatusCommand(): Promise<boolean> {
    let result: ProcessResult;
    try {
      result = await this.runner.run(this.command, this.args, { timeoutMs: this.commandTimeoutMs });
    } catch (error: unknown) {
      throw new ProbeToolError(`Could not run ${this.command}: ${errorMessage(error)}`, { cause: error });
    }

    if (result.timedOut) {
      throw new ProbeToolError(`${this.command} status check timed out after ${this.commandTimeoutMs}ms`);
    }
    if (result.exitCode !== 0) {
      this.logger.debug(`${this.command} exited with code ${result.exitCode ?? 'null'}: ${result.stderr.trim()}`);
      return false;
    }

    this.logger.debug(`${this.command} status: ${result.stdout.trim()}`);
    return reportsConnectivity(result.stdout);
  }
}
