import { promises as fs } from 'node:fs';
import path from 'node:path';
import { getLoggerFor } from 'global-logger-factory';
import { StateLockedError, errorMessage } from '../errors/ProvisioningError';
import { isNotFound } from './EventStateStore';

export interface RunLockHandle {
  release(): Promise<void>;
}

interface RunLockOptions {
  /** 判断 pid 是否仍在运行，测试中可替换 */
  isProcessAlive?: (pid: number) => boolean;
}

/**
 * 建议锁：防止两个实例同时运行并同时写入事件 ID 文件。
 * 锁文件以独占方式创建，内容为持有者 pid；持有者已退出的锁视为过期锁并被接管。
 * 锁文件应放在开机即清空的目录（/run），上次断电留下的锁不会跨越重启。
 */
export class RunLock {
  private readonly logger = getLoggerFor(this);
  private readonly lockPath: string;
  private readonly isProcessAlive: (pid: number) => boolean;

  public constructor(lockPath: string, options: RunLockOptions = {}) {
    this.lockPath = lockPath;
    this.isProcessAlive = options.isProcessAlive ?? defaultIsProcessAlive;
  }

  public async acquire(): Promise<RunLockHandle> {
    await fs.mkdir(path.dirname(this.lockPath), { recursive: true });

    if (await this.tryCreate()) {
      return this.createHandle();
    }

    const holder = await this.readHolder(this.lockPath);
    // pid 跨重启会复用：与当前进程相同的 pid 只可能来自上一次启动
    if (holder !== undefined && holder !== process.pid && this.isProcessAlive(holder)) {
      throw new StateLockedError(`Another run (pid ${holder}) holds ${this.lockPath}`);
    }

    this.logger.warn(`Removing stale lock ${this.lockPath} (pid ${holder ?? 'unknown'})`);
    await this.discardStaleLock(holder);
    if (await this.tryCreate()) {
      return this.createHandle();
    }
    throw new StateLockedError(`Could not acquire ${this.lockPath}, another run started concurrently`);
  }

  /**
   * 先把过期锁原子地改名移走，再确认移走的确实是判定为过期的那一份；
   * 若其间已被另一个实例换成新锁，则放回原处并放弃。
   */
  private async discardStaleLock(staleHolder: number | undefined): Promise<void> {
    const asidePath = `${this.lockPath}.${process.pid}.stale`;
    try {
      await fs.rename(this.lockPath, asidePath);
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return;
      }
      throw error;
    }

    const moved = await this.readHolder(asidePath);
    if (moved !== staleHolder) {
      try {
        await fs.link(asidePath, this.lockPath);
      } catch (error: unknown) {
        // 已有更新的锁，同样说明另一个实例在运行
        if (!isAlreadyExists(error)) {
          throw error;
        }
      } finally {
        await fs.rm(asidePath, { force: true });
      }
      throw new StateLockedError(`Lock ${this.lockPath} was taken over by pid ${moved ?? 'unknown'} while acquiring`);
    }
    await fs.rm(asidePath, { force: true });
  }

  private async tryCreate(): Promise<boolean> {
    try {
      await fs.writeFile(this.lockPath, `${process.pid}\n`, { flag: 'wx' });
      return true;
    } catch (error: unknown) {
      if (isAlreadyExists(error)) {
        return false;
      }
      throw error;
    }
  }

  private async readHolder(filePath: string): Promise<number | undefined> {
    try {
      const pid = Number.parseInt((await fs.readFile(filePath, 'utf8')).trim(), 10);
      return Number.isInteger(pid) && pid > 0 ? pid : undefined;
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw error;
    }
  }

  private createHandle(): RunLockHandle {
    let released = false;
    return {
      release: async (): Promise<void> => {
        if (released) {
          return;
        }
        released = true;
        try {
          await fs.rm(this.lockPath, { force: true });
        } catch (error: unknown) {
          this.logger.warn(`Could not remove lock ${this.lockPath}: ${errorMessage(error)}`);
        }
      },
    };
  }
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

function defaultIsProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error: unknown) {
    // EPERM 说明进程存在，只是属于其他用户
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}
