import { promises as fs } from 'node:fs';
import path from 'node:path';
import { getLoggerFor } from 'global-logger-factory';
import { errorMessage } from '../errors/ProvisioningError';
import type { Credential } from './Credential';

/**
 * 供配置 playbook 读取的凭据缓存文件（0600）。
 * playbook 也可以脱离本服务、直接用这个文件手动重跑；隧道确认建立后再删除。
 */
export class CredentialFile {
  private readonly logger = getLoggerFor(this);
  public readonly filePath: string;

  public constructor(filePath: string) {
    this.filePath = filePath;
  }

  public async write(credential: Credential): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true, mode: 0o700 });
    await fs.writeFile(this.filePath, credential.reveal(), { mode: 0o600 });
    // 文件已存在时 writeFile 不会改权限
    await fs.chmod(this.filePath, 0o600);
  }

  public async exists(): Promise<boolean> {
    try {
      await fs.access(this.filePath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * 删除凭据文件，失败只记录警告
   */
  public async remove(): Promise<boolean> {
    try {
      await fs.rm(this.filePath, { force: true });
      return true;
    } catch (error: unknown) {
      this.logger.warn(`Could not remove credential file ${this.filePath}: ${errorMessage(error)}`);
      return false;
    }
  }
}
