import type { CommandModule } from 'yargs';
import type { LocalConfig } from '../../config/ProvisionerConfig';
import { loadLocalConfig } from '../../config/ProvisionerConfig';
import { errorMessage, exitCodeFor } from '../../errors/ProvisioningError';
import type { ProvisionerDependencies } from '../../provisioner/createProvisioner';
import { createTunnelProber } from '../../provisioner/createProvisioner';
import { EventStateStore } from '../../state/EventStateStore';
import { initLogger, loadEnvFile, outputJson } from '../bootstrap';

interface StatusArgs {
  env?: string;
  json: boolean;
}

export interface DeviceStatus {
  eventIdFile: string;
  persistedEventId: string | null;
  tunnelConnected: boolean;
}

/**
 * 读取本地事件 ID 并做一次隧道探测（不等待、不重试）
 */
export async function collectStatus(config: LocalConfig, dependencies: ProvisionerDependencies = {}): Promise<DeviceStatus> {
  const persisted = await new EventStateStore(config.eventIdFile).read();
  const tunnelConnected = await createTunnelProber(config, dependencies).probeOnce();
  return {
    eventIdFile: config.eventIdFile,
    persistedEventId: persisted ?? null,
    tunnelConnected,
  };
}

export const statusCommand: CommandModule<object, StatusArgs> = {
  command: 'status',
  describe: 'Show the persisted event ID and whether the tunnel is connected',
  builder: (yargs) =>
    yargs
      .option('env', {
        alias: 'e',
        type: 'string',
        description: 'Path to .env file',
      })
      .option('json', {
        type: 'boolean',
        description: 'Output as JSON',
        default: false,
      }),
  handler: async (argv) => {
    try {
      if (argv.env) {
        loadEnvFile(argv.env);
      }
      const config = loadLocalConfig(process.env);
      initLogger({ ...config.logging, level: 'error' });

      const status = await collectStatus(config);
      if (argv.json) {
        outputJson(status);
        return;
      }
      console.log(`Event ID file:    ${status.eventIdFile}`);
      console.log(`Persisted event:  ${status.persistedEventId ?? '(none)'}`);
      console.log(`Tunnel connected: ${status.tunnelConnected ? 'yes' : 'no'}`);
    } catch (error: unknown) {
      console.error(`Failed to read status: ${errorMessage(error)}`);
      process.exit(exitCodeFor(error));
    }
  },
};
