import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { setGlobalLoggerFactory } from 'global-logger-factory';
import type { LoggingConfig } from '../config/ProvisionerConfig';
import { ConfigurationError } from '../errors/ProvisioningError';
import { ConfigurableLoggerFactory } from '../logging/ConfigurableLoggerFactory';

/**
 * 加载 env 文件；已存在的环境变量优先（systemd EnvironmentFile 等）
 */
export function loadEnvFile(envPath: string): void {
  const resolved = path.resolve(envPath);
  if (!fs.existsSync(resolved)) {
    throw new ConfigurationError(`Env file not found: ${resolved}`);
  }
  const result = dotenv.config({ path: resolved, override: false });
  if (result.error) {
    throw new ConfigurationError(`Could not load env file ${resolved}: ${result.error.message}`);
  }
}

export function initLogger(config: LoggingConfig): void {
  setGlobalLoggerFactory(new ConfigurableLoggerFactory(config.level, { fileName: config.file }));
}

export function outputJson(payload: unknown): void {
  process.stdout.write(`${JSON.stringify(payload)}\n`);
}
