import { getLoggerFor } from 'global-logger-factory';
import type { CredentialFile } from '../credential/CredentialFile';
import type { EndpointResolver } from '../endpoint/EndpointResolver';
import type { EventTracker } from '../event/EventTracker';
import { createRunId, logContext } from '../logging/LogContext';
import type { ReconciliationEngine, ReconciliationResult } from '../reconcile/ReconciliationEngine';
import type { RunLock } from '../state/RunLock';
import type { TunnelHealthProber } from '../tunnel/TunnelHealthProber';
import type { Sleep } from '../util/RetryPolicy';
import { defaultSleep } from '../util/RetryPolicy';

export interface RunOutcome extends ReconciliationResult {
  runId: string;
  endpoint: string;
  remoteEventId: string;
  persistedEventId?: string;
}

export interface CredentialCleanupOptions {
  credentialFile: CredentialFile;
  /** playbook 结束后给隧道建立留出的时间 */
  delayMs: number;
}

export interface TunnelProvisionerOptions {
  resolver: EndpointResolver;
  tracker: EventTracker;
  engine: ReconciliationEngine;
  prober: TunnelHealthProber;
  lock: RunLock;
  startupDelayMs?: number;
  credentialCleanup?: CredentialCleanupOptions;
  sleep?: Sleep;
}

/**
 * 一次完整的开机运行：
 * 加锁 → 读本地事件 ID → 解析集群入口 → 取远端事件 ID → 决策并执行 → 清理凭据文件。
 * 入口解析或远端查询失败时直接抛出，不会进入决策，也不会改动本地状态。
 */
export class TunnelProvisioner {
  private readonly logger = getLoggerFor(this);
  private readonly resolver: EndpointResolver;
  private readonly tracker: EventTracker;
  private readonly engine: ReconciliationEngine;
  private readonly prober: TunnelHealthProber;
  private readonly lock: RunLock;
  private readonly startupDelayMs: number;
  private readonly credentialCleanup?: CredentialCleanupOptions;
  private readonly sleep: Sleep;

  public constructor(options: TunnelProvisionerOptions) {
    this.resolver = options.resolver;
    this.tracker = options.tracker;
    this.engine = options.engine;
    this.prober = options.prober;
    this.lock = options.lock;
    this.startupDelayMs = options.startupDelayMs ?? 0;
    this.credentialCleanup = options.credentialCleanup;
    this.sleep = options.sleep ?? defaultSleep;
  }

  public async run(): Promise<RunOutcome> {
    const runId = createRunId();
    return logContext.run({ runId }, async (): Promise<RunOutcome> => this.runInContext(runId));
  }

  private async runInContext(runId: string): Promise<RunOutcome> {
    this.logger.info('Tunnel provisioner starting');
    if (this.startupDelayMs > 0) {
      this.logger.info(`Waiting ${this.startupDelayMs}ms before starting`);
      await this.sleep(this.startupDelayMs);
    }

    const handle = await this.lock.acquire();
    try {
      const persistedEventId = await this.tracker.readPersistedEventId();
      const endpoint = await this.resolver.resolve();
      const remoteEventId = await this.tracker.fetchRemoteEventId(endpoint);

      const result = await this.engine.reconcile({ endpoint, remoteEventId, persistedEventId });
      if (result.persisted) {
        await this.discardCredentialWhenTunnelUp();
      }

      this.logger.info(`Run finished: decision=${result.decision} reason=${result.reason}`);
      return { ...result, runId, endpoint, remoteEventId, persistedEventId };
    } finally {
      await handle.release();
    }
  }

  /**
   * 隧道确认建立后才删除凭据文件，否则保留，便于手动重跑 playbook
   */
  private async discardCredentialWhenTunnelUp(): Promise<void> {
    if (!this.credentialCleanup) {
      return;
    }
    const { credentialFile, delayMs } = this.credentialCleanup;
    if (!await credentialFile.exists()) {
      return;
    }
    if (delayMs > 0) {
      await this.sleep(delayMs);
    }
    if (await this.prober.probeOnce()) {
      if (await credentialFile.remove()) {
        this.logger.info(`Tunnel established; removed credential file ${credentialFile.filePath}`);
      }
    } else {
      this.logger.info(`Credential file ${credentialFile.filePath} left in place (tunnel not yet up); the playbook can be re-run by hand`);
    }
  }
}
