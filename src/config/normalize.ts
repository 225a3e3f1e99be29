import { ConfigurationError } from '../errors/ProvisioningError';

export function normalizeString(value?: string): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function normalizeBoolean(value?: string | boolean): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    return normalized === 'true' || normalized === '1' || normalized === 'yes' || normalized === 'on';
  }
  return false;
}

/**
 * 解析非负整数；未设置时返回默认值，格式错误直接报配置错误。
 */
export function normalizeInteger(name: string, value: string | undefined, fallback: number): number {
  const trimmed = normalizeString(value);
  if (trimmed === undefined) {
    return fallback;
  }
  if (!/^\d+$/u.test(trimmed)) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got "${trimmed}"`);
  }
  return Number.parseInt(trimmed, 10);
}

export function secondsToMs(seconds: number): number {
  return seconds * 1_000;
}
