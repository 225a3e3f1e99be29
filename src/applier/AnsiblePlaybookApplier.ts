import { promises as fs } from 'node:fs';
import path from 'node:path';
import { getLoggerFor } from 'global-logger-factory';
import type { Credential } from '../credential/Credential';
import type { CredentialFile } from '../credential/CredentialFile';
import { ApplierFailure, errorMessage } from '../errors/ProvisioningError';
import type { CommandRunner, ProcessResult } from '../util/ProcessRunner';
import type { RetryPolicy } from '../util/RetryPolicy';
import type { ApplyContext, ConfigurationApplier } from './ConfigurationApplier';

export const PLAYBOOK_COMMAND = 'ansible-playbook';
const OUTPUT_TAIL_LENGTH = 4_096;

export interface AnsiblePlaybookApplierOptions {
  playbookPath: string;
  inventoryPath: string;
  credentialFile: CredentialFile;
  runner: CommandRunner;
  retryPolicy: RetryPolicy;
  timeoutMs?: number;
  /** 追加记录每次 playbook 的完整输出，不设置则不记录 */
  outputLogPath?: string;
  /** 追加 -vv */
  verbose?: boolean;
  /** 子进程的基础环境变量，默认 process.env */
  baseEnv?: NodeJS.ProcessEnv;
}

/**
 * 通过 ansible-playbook 配置隧道。
 *
 * 凭据先写入凭据文件，再通过 TUNNEL_CREDENTIAL_FILE 环境变量交给 playbook；
 * playbook 的退出码是唯一的成功信号，不解析其输出。
 */
export class AnsiblePlaybookApplier implements ConfigurationApplier {
  private readonly logger = getLoggerFor(this);
  private readonly playbookPath: string;
  private readonly inventoryPath: string;
  private readonly credentialFile: CredentialFile;
  private readonly runner: CommandRunner;
  private readonly retryPolicy: RetryPolicy;
  private readonly timeoutMs: number;
  private readonly outputLogPath?: string;
  private readonly verbose: boolean;
  private readonly baseEnv: NodeJS.ProcessEnv;

  public constructor(options: AnsiblePlaybookApplierOptions) {
    this.playbookPath = options.playbookPath;
    this.inventoryPath = options.inventoryPath;
    this.credentialFile = options.credentialFile;
    this.runner = options.runner;
    this.retryPolicy = options.retryPolicy;
    this.timeoutMs = options.timeoutMs ?? 600_000;
    this.outputLogPath = options.outputLogPath;
    this.verbose = options.verbose ?? false;
    this.baseEnv = options.baseEnv ?? process.env;
  }

  public async apply(credential: Credential, context: ApplyContext): Promise<void> {
    try {
      await this.credentialFile.write(credential);
    } catch (error: unknown) {
      throw new ApplierFailure(`Could not write credential file ${this.credentialFile.filePath}: ${errorMessage(error)}`, undefined, { cause: error });
    }

    const outcome = await this.retryPolicy.execute(
      async (attempt): Promise<ProcessResult> => this.runOnce(context, attempt),
      {
        isSuccess: (result) => result.exitCode === 0 && !result.timedOut,
        // 无法启动 ansible-playbook（未安装等）时重试无意义
        isRetryable: () => false,
        onAttemptFailed: ({ attempt, value }) => {
          if (value) {
            this.logFailure(value, attempt);
          }
        },
      },
    );

    if (!outcome.succeeded) {
      const exitCode = outcome.lastValue?.exitCode;
      const reason = outcome.lastValue?.timedOut ? `timed out after ${this.timeoutMs}ms` : `exited with code ${exitCode ?? 'null'}`;
      throw new ApplierFailure(`${PLAYBOOK_COMMAND} ${reason} after ${outcome.attempts} attempt(s)`, exitCode);
    }
    this.logger.info('Ansible playbook completed successfully');
  }

  private async runOnce(context: ApplyContext, attempt: number): Promise<ProcessResult> {
    const cwd = path.dirname(this.playbookPath);
    const args = [ '-i', this.inventoryPath, path.basename(this.playbookPath) ];
    if (this.verbose) {
      args.push('-vv');
    }
    const env: NodeJS.ProcessEnv = {
      ...this.baseEnv,
      TUNNEL_CREDENTIAL_FILE: this.credentialFile.filePath,
      CLUSTER_URL: context.endpoint,
      TUNNEL_EVENT_ID: context.eventId,
    };

    this.logger.info(`Running ansible playbook ${this.playbookPath} (attempt ${attempt}/${this.retryPolicy.attempts})`);
    this.logger.debug(`Ansible command: cwd=${cwd} cmd=${PLAYBOOK_COMMAND} ${args.join(' ')}`);

    let result: ProcessResult;
    try {
      result = await this.runner.run(PLAYBOOK_COMMAND, args, { cwd, env, timeoutMs: this.timeoutMs });
    } catch (error: unknown) {
      throw new ApplierFailure(`Could not start ${PLAYBOOK_COMMAND}: ${errorMessage(error)}`, undefined, { cause: error });
    }

    await this.appendOutputLog(args, result);
    if (result.exitCode === 0 && !result.timedOut) {
      this.logger.debug(`Ansible stdout: ${result.stdout}`);
    }
    return result;
  }

  private logFailure(result: ProcessResult, attempt: number): void {
    if (result.timedOut) {
      this.logger.error(`Ansible playbook timed out after ${this.timeoutMs}ms (attempt ${attempt})`);
    } else {
      this.logger.error(`Ansible playbook failed with exit code ${result.exitCode ?? 'null'} (attempt ${attempt})`);
    }
    this.logger.error(`Ansible stdout (last ${OUTPUT_TAIL_LENGTH} chars): ${result.stdout.slice(-OUTPUT_TAIL_LENGTH)}`);
    this.logger.error(`Ansible stderr (last ${OUTPUT_TAIL_LENGTH} chars): ${result.stderr.slice(-OUTPUT_TAIL_LENGTH)}`);
    if (result.stdout.length > OUTPUT_TAIL_LENGTH || result.stderr.length > OUTPUT_TAIL_LENGTH) {
      this.logger.error('Output was truncated; set LOG_LEVEL=debug and re-run for full -vv ansible output');
    }
  }

  private async appendOutputLog(args: string[], result: ProcessResult): Promise<void> {
    if (!this.outputLogPath) {
      return;
    }
    const divider = '='.repeat(60);
    const lines = [
      '',
      divider,
      `[${new Date().toISOString()}] returncode=${result.exitCode ?? 'null'} timedOut=${result.timedOut} cmd=${PLAYBOOK_COMMAND} ${args.join(' ')}`,
      divider,
    ];
    if (result.stdout) {
      lines.push('--- stdout ---', result.stdout.replace(/\n$/u, ''));
    }
    if (result.stderr) {
      lines.push('--- stderr ---', result.stderr.replace(/\n$/u, ''));
    }
    try {
      await fs.mkdir(path.dirname(this.outputLogPath), { recursive: true });
      await fs.appendFile(this.outputLogPath, `${lines.join('\n')}\n`, 'utf8');
    } catch (error: unknown) {
      this.logger.warn(`Could not write ansible output to ${this.outputLogPath}: ${errorMessage(error)}`);
    }
  }
}
