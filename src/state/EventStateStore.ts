import { promises as fs } from 'node:fs';
import path from 'node:path';
import { getLoggerFor } from 'global-logger-factory';
import { StateWriteError, errorMessage } from '../errors/ProvisioningError';

/**
 * 合法的事件 ID：去掉首尾空白后非空，且不含控制字符
 */
export function isValidEventId(value: string): boolean {
  // eslint-disable-next-line no-control-regex
  return value.length > 0 && !/[\u0000-\u001f\u007f]/u.test(value);
}

/**
 * 本地持久化的事件 ID（上一次配置成功时的事件）。
 *
 * 文件不存在表示从未配置过；内容为空或不合法时同样按“没有记录”处理，
 * 让下一次运行无条件重新配置。写入采用临时文件 + rename，避免中途崩溃留下半个文件。
 */
export class EventStateStore {
  private readonly logger = getLoggerFor(this);
  public readonly filePath: string;

  public constructor(filePath: string) {
    this.filePath = filePath;
  }

  public async read(): Promise<string | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error: unknown) {
      if (isNotFound(error)) {
        this.logger.info(`No persisted event ID at ${this.filePath}`);
        return undefined;
      }
      // 读不到等同于没有记录：最坏情况是多做一次重新配置
      this.logger.warn(`Could not read persisted event ID from ${this.filePath}: ${errorMessage(error)}`);
      return undefined;
    }

    const eventId = raw.trim();
    if (!isValidEventId(eventId)) {
      this.logger.warn(`Persisted event ID file ${this.filePath} is empty or invalid, treating as not configured`);
      return undefined;
    }
    this.logger.info(`Found persisted event ID: ${eventId}`);
    return eventId;
  }

  public async write(eventId: string): Promise<void> {
    if (!isValidEventId(eventId)) {
      throw new StateWriteError(`Refusing to persist invalid event ID ${JSON.stringify(eventId)}`);
    }

    const directory = path.dirname(this.filePath);
    const tempPath = path.join(directory, `.${path.basename(this.filePath)}.${process.pid}.tmp`);
    try {
      await fs.mkdir(directory, { recursive: true });
      const handle = await fs.open(tempPath, 'w', 0o644);
      try {
        await handle.writeFile(`${eventId}\n`, 'utf8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tempPath, this.filePath);
    } catch (error: unknown) {
      await this.removeTempFile(tempPath);
      throw new StateWriteError(`Could not persist event ID to ${this.filePath}: ${errorMessage(error)}`, { cause: error });
    }
    this.logger.info(`Persisted event ID: ${eventId}`);
  }

  public async clear(): Promise<boolean> {
    try {
      await fs.unlink(this.filePath);
      return true;
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return false;
      }
      throw new StateWriteError(`Could not remove ${this.filePath}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async removeTempFile(tempPath: string): Promise<void> {
    try {
      await fs.rm(tempPath, { force: true });
    } catch (error: unknown) {
      this.logger.warn(`Could not remove temporary file ${tempPath}: ${errorMessage(error)}`);
    }
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
