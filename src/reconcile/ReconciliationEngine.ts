import { getLoggerFor } from 'global-logger-factory';
import type { ConfigurationApplier } from '../applier/ConfigurationApplier';
import type { CredentialSource } from '../credential/CredentialFetcher';
import type { PersistedEventWriter } from '../event/EventTracker';
import type { InitStatus, StatusReporter } from '../status/InitStatusReporter';
import { INIT_STATUS } from '../status/InitStatusReporter';
import type { TunnelHealthCheck } from '../tunnel/TunnelHealthProber';

export type ReconciliationDecision = 'skip' | 'reconfigure';

export type DecisionReason =
  | 'no-persisted-event'
  | 'event-changed'
  | 'tunnel-unhealthy'
  | 'up-to-date';

export interface ReconciliationInput {
  /** ResolvedEndpoint */
  endpoint: string;
  remoteEventId: string;
  /** undefined 表示从未成功配置过 */
  persistedEventId?: string;
}

export interface DecisionResult {
  decision: ReconciliationDecision;
  reason: DecisionReason;
  /** 未探测（首次运行分支）时为 undefined */
  tunnelHealthy?: boolean;
}

export interface ReconciliationResult extends DecisionResult {
  /** 是否写入了新的事件 ID */
  persisted: boolean;
}

export interface ReconciliationEngineOptions {
  prober: TunnelHealthCheck;
  credentials: CredentialSource;
  applier: ConfigurationApplier;
  state: PersistedEventWriter;
  statusReporter?: StatusReporter;
}

/**
 * Reconciliation Engine
 *
 * 每次运行执行一次，本层不重试：
 * 1. 没有本地事件 ID → 无条件重新配置，不探测隧道。
 * 2. 否则探测隧道；事件变化优先于隧道健康（连着错误事件的隧道不算成功）。
 * 3. 重新配置时：获取凭据 → 执行 Applier → 仅在 Applier 成功后写入新的事件 ID。
 *
 * 任一步失败都直接抛出，本地状态保持原样，下一次运行就是重试。
 */
export class ReconciliationEngine {
  private readonly logger = getLoggerFor(this);
  private readonly prober: TunnelHealthCheck;
  private readonly credentials: CredentialSource;
  private readonly applier: ConfigurationApplier;
  private readonly state: PersistedEventWriter;
  private readonly statusReporter?: StatusReporter;

  public constructor(options: ReconciliationEngineOptions) {
    this.prober = options.prober;
    this.credentials = options.credentials;
    this.applier = options.applier;
    this.state = options.state;
    this.statusReporter = options.statusReporter;
  }

  public async decide(input: ReconciliationInput): Promise<DecisionResult> {
    const { remoteEventId, persistedEventId } = input;

    if (persistedEventId === undefined) {
      this.logger.info(`No persisted event ID, configuring tunnel for event ${remoteEventId}`);
      return { decision: 'reconfigure', reason: 'no-persisted-event' };
    }

    const tunnelHealthy = await this.prober.isTunnelHealthy();

    if (remoteEventId !== persistedEventId) {
      this.logger.info(`New event ID detected: ${remoteEventId} (was: ${persistedEventId}), reconfiguring tunnel`);
      return { decision: 'reconfigure', reason: 'event-changed', tunnelHealthy };
    }
    if (!tunnelHealthy) {
      this.logger.info(`Event ID unchanged (${remoteEventId}) but tunnel is down, reconfiguring tunnel`);
      return { decision: 'reconfigure', reason: 'tunnel-unhealthy', tunnelHealthy };
    }

    this.logger.info(`Event ID unchanged (${remoteEventId}) and tunnel is up, no action`);
    return { decision: 'skip', reason: 'up-to-date', tunnelHealthy };
  }

  public async reconcile(input: ReconciliationInput): Promise<ReconciliationResult> {
    const decision = await this.decide(input);
    await this.report(input.endpoint, this.statusFor(decision.reason));

    if (decision.decision === 'skip') {
      return { ...decision, persisted: false };
    }

    await this.reconfigure(input);
    return { ...decision, persisted: true };
  }

  private async reconfigure(input: ReconciliationInput): Promise<void> {
    const { endpoint, remoteEventId } = input;

    await this.report(endpoint, INIT_STATUS.queryingCredential);
    const credential = await this.credentials.fetchCredential(endpoint, remoteEventId);
    await this.report(endpoint, INIT_STATUS.credentialRetrieved);

    await this.report(endpoint, INIT_STATUS.startingConfigure);
    try {
      await this.applier.apply(credential, { endpoint, eventId: remoteEventId });
    } catch (error: unknown) {
      await this.report(endpoint, INIT_STATUS.configureFailed);
      throw error;
    }
    await this.report(endpoint, INIT_STATUS.configured);

    await this.state.persistEventId(remoteEventId);
    this.logger.info(`Tunnel configured for event ${remoteEventId}`);
  }

  private statusFor(reason: DecisionReason): InitStatus {
    switch (reason) {
      case 'no-persisted-event': return INIT_STATUS.eventUnknown;
      case 'event-changed': return INIT_STATUS.eventChanged;
      case 'tunnel-unhealthy': return INIT_STATUS.tunnelDown;
      case 'up-to-date': return INIT_STATUS.eventKnown;
    }
  }

  private async report(endpoint: string, status: InitStatus): Promise<void> {
    await this.statusReporter?.report(endpoint, status);
  }
}
