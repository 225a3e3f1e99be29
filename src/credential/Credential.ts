import { inspect } from 'node:util';

const REDACTED = '[credential redacted]';

/**
 * 隧道凭据（完整的结构化 token 文档）。
 * 字符串、JSON 与 inspect 形式都是脱敏的，只有 reveal() 返回原文。
 */
export class Credential {
  readonly #secret: string;

  public constructor(secret: string) {
    this.#secret = secret;
  }

  public reveal(): string {
    return this.#secret;
  }

  public toString(): string {
    return REDACTED;
  }

  public toJSON(): string {
    return REDACTED;
  }

  public [inspect.custom](): string {
    return REDACTED;
  }
}
