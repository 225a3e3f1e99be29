import { spawn } from 'node:child_process';

export interface ProcessRunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** 超时后发送 SIGKILL，结果中 timedOut 为 true */
  timeoutMs?: number;
}

export interface ProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface CommandRunner {
  /**
   * 运行命令并收集输出。进程无法启动（例如可执行文件不存在）时 reject，
   * 非零退出码不算 reject。
   */
  run(command: string, args: string[], options?: ProcessRunOptions): Promise<ProcessResult>;
}

interface ProcessRunnerOptions {
  processFactory?: typeof spawn;
}

export class ProcessRunner implements CommandRunner {
  private readonly processFactory: typeof spawn;

  public constructor(options: ProcessRunnerOptions = {}) {
    this.processFactory = options.processFactory ?? spawn;
  }

  public async run(command: string, args: string[], options: ProcessRunOptions = {}): Promise<ProcessResult> {
    return new Promise<ProcessResult>((resolve, reject) => {
      const proc = this.processFactory(command, args, {
        cwd: options.cwd,
        env: options.env,
        stdio: 'pipe',
      });

      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let settled = false;

      const timer = options.timeoutMs && options.timeoutMs > 0 ?
        setTimeout(() => {
          timedOut = true;
          proc.kill('SIGKILL');
        }, options.timeoutMs) :
        undefined;

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.once('error', (error) => {
        if (timer) {
          clearTimeout(timer);
        }
        if (!settled) {
          settled = true;
          reject(error);
        }
      });

      proc.once('close', (code, signal) => {
        if (timer) {
          clearTimeout(timer);
        }
        if (!settled) {
          settled = true;
          resolve({ exitCode: code, signal, stdout, stderr, timedOut });
        }
      });
    });
  }
}

/**
 * 把 "skupper status -n skupper" 这类配置拆成命令和参数
 */
export function splitCommandLine(commandLine: string): string[] {
  return commandLine.trim().split(/\s+/u).filter((part) => part.length > 0);
}
