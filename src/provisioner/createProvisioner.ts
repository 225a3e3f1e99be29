import { AnsiblePlaybookApplier } from '../applier/AnsiblePlaybookApplier';
import type { ConfigurationApplier } from '../applier/ConfigurationApplier';
import { ClusterApiClient } from '../cluster/ClusterApiClient';
import type { LocalConfig, ProvisionerConfig } from '../config/ProvisionerConfig';
import { CredentialFetcher } from '../credential/CredentialFetcher';
import { CredentialFile } from '../credential/CredentialFile';
import { EndpointResolver } from '../endpoint/EndpointResolver';
import { EventTracker } from '../event/EventTracker';
import { ReconciliationEngine } from '../reconcile/ReconciliationEngine';
import { EventStateStore } from '../state/EventStateStore';
import { RunLock } from '../state/RunLock';
import { InitStatusReporter } from '../status/InitStatusReporter';
import { TunnelHealthProber } from '../tunnel/TunnelHealthProber';
import type { CommandRunner } from '../util/ProcessRunner';
import { ProcessRunner } from '../util/ProcessRunner';
import type { Sleep } from '../util/RetryPolicy';
import { RetryPolicy, defaultSleep } from '../util/RetryPolicy';
import { TunnelProvisioner } from './TunnelProvisioner';

/**
 * 可替换的外部依赖，测试中注入假实现
 */
export interface ProvisionerDependencies {
  runner?: CommandRunner;
  sleep?: Sleep;
  applier?: ConfigurationApplier;
  skipStartupDelay?: boolean;
}

export function createTunnelProber(config: LocalConfig, dependencies: ProvisionerDependencies = {}): TunnelHealthProber {
  const sleep = dependencies.sleep ?? defaultSleep;
  return new TunnelHealthProber({
    runner: dependencies.runner ?? new ProcessRunner(),
    statusCommand: config.tunnel.statusCommand,
    initialDelayMs: config.tunnel.initialDelayMs,
    retryPolicy: new RetryPolicy({ attempts: config.tunnel.retries, delayMs: config.tunnel.intervalMs, sleep }),
    commandTimeoutMs: config.tunnel.statusTimeoutMs,
    sleep,
  });
}

/**
 * 根据配置组装一次运行所需的全部组件
 */
export function createProvisioner(config: ProvisionerConfig, dependencies: ProvisionerDependencies = {}): TunnelProvisioner {
  const sleep = dependencies.sleep ?? defaultSleep;
  const runner = dependencies.runner ?? new ProcessRunner();
  const { remote, applier: applierConfig } = config;

  const client = new ClusterApiClient({
    auth: remote.auth,
    deviceName: config.deviceName,
    timeoutMs: remote.requestTimeoutMs,
  });
  const tracker = new EventTracker({ client, store: new EventStateStore(config.eventIdFile) });
  const prober = createTunnelProber(config, { runner, sleep });
  const credentialFile = new CredentialFile(applierConfig.credentialFile);

  const applier = dependencies.applier ?? new AnsiblePlaybookApplier({
    playbookPath: applierConfig.playbookPath,
    inventoryPath: applierConfig.inventoryPath,
    credentialFile,
    runner,
    retryPolicy: new RetryPolicy({ attempts: applierConfig.retries, delayMs: applierConfig.retryDelayMs, sleep }),
    timeoutMs: applierConfig.timeoutMs,
    outputLogPath: applierConfig.outputLogPath,
    verbose: config.logging.level === 'debug' || config.logging.level === 'silly',
  });

  const engine = new ReconciliationEngine({
    prober,
    credentials: new CredentialFetcher({
      client,
      retryPolicy: new RetryPolicy({ attempts: remote.credentialRetries, delayMs: remote.credentialRetryDelayMs, sleep }),
    }),
    applier,
    state: tracker,
    statusReporter: new InitStatusReporter(client),
  });

  return new TunnelProvisioner({
    resolver: new EndpointResolver({
      redirectUrl: remote.redirectUrl,
      redirectUrlIsCluster: remote.redirectUrlIsCluster,
      auth: remote.auth,
      retryPolicy: new RetryPolicy({ attempts: remote.redirectRetries, delayMs: remote.redirectRetryDelayMs, sleep }),
      timeoutMs: remote.requestTimeoutMs,
    }),
    tracker,
    engine,
    prober,
    lock: new RunLock(config.lockFile),
    startupDelayMs: dependencies.skipStartupDelay ? 0 : config.startupDelayMs,
    credentialCleanup: { credentialFile, delayMs: applierConfig.credentialCleanupDelayMs },
    sleep,
  });
}
