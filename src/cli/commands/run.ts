import type { CommandModule } from 'yargs';
import { getLoggerFor } from 'global-logger-factory';
import type { ProvisionerConfig } from '../../config/ProvisionerConfig';
import { loadProvisionerConfig } from '../../config/ProvisionerConfig';
import { EXIT_OK, errorMessage, exitCodeFor } from '../../errors/ProvisioningError';
import type { ProvisionerDependencies } from '../../provisioner/createProvisioner';
import { createProvisioner } from '../../provisioner/createProvisioner';
import { initLogger, loadEnvFile } from '../bootstrap';

interface RunArgs {
  env?: string;
  delay: boolean;
}

/**
 * 执行一次配置流程并返回退出码
 */
export async function executeRun(config: ProvisionerConfig, dependencies: ProvisionerDependencies = {}): Promise<number> {
  const logger = getLoggerFor('RunCommand');
  try {
    const outcome = await createProvisioner(config, dependencies).run();
    if (outcome.decision === 'skip') {
      logger.info(`Tunnel already configured for event ${outcome.remoteEventId}, nothing to do`);
    } else {
      logger.info(`Tunnel configured for event ${outcome.remoteEventId} (${outcome.reason})`);
    }
    return EXIT_OK;
  } catch (error: unknown) {
    logger.error(`Tunnel provisioning failed: ${errorMessage(error)}`);
    return exitCodeFor(error);
  }
}

export const runCommand: CommandModule<object, RunArgs> = {
  command: [ 'run', '$0' ],
  describe: 'Resolve the cluster, check the event and tunnel, and reconfigure when needed',
  builder: (yargs) =>
    yargs
      .option('env', {
        alias: 'e',
        type: 'string',
        description: 'Path to .env file',
      })
      .option('delay', {
        type: 'boolean',
        description: 'Honour SERVICE_STARTUP_DELAY (--no-delay skips it)',
        default: true,
      }),
  handler: async (argv) => {
    let config: ProvisionerConfig;
    try {
      if (argv.env) {
        loadEnvFile(argv.env);
      }
      config = loadProvisionerConfig(process.env);
    } catch (error: unknown) {
      console.error(`Invalid configuration: ${errorMessage(error)}`);
      process.exit(exitCodeFor(error));
    }

    initLogger(config.logging);
    process.exit(await executeRun(config, { skipStartupDelay: !argv.delay }));
  },
};
