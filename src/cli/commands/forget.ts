import type { CommandModule } from 'yargs';
import { loadLocalConfig } from '../../config/ProvisionerConfig';
import { errorMessage, exitCodeFor } from '../../errors/ProvisioningError';
import { EventStateStore } from '../../state/EventStateStore';
import { RunLock } from '../../state/RunLock';
import { initLogger, loadEnvFile } from '../bootstrap';

interface ForgetArgs {
  env?: string;
}

/**
 * 删除本地事件 ID，下一次运行会无条件重新配置。返回是否确实删除了文件。
 */
export async function forgetPersistedEvent(eventIdFile: string, lockFile: string): Promise<boolean> {
  const handle = await new RunLock(lockFile).acquire();
  try {
    return await new EventStateStore(eventIdFile).clear();
  } finally {
    await handle.release();
  }
}

export const forgetCommand: CommandModule<object, ForgetArgs> = {
  command: 'forget',
  describe: 'Delete the persisted event ID so the next run reconfigures the tunnel',
  builder: (yargs) =>
    yargs.option('env', {
      alias: 'e',
      type: 'string',
      description: 'Path to .env file',
    }),
  handler: async (argv) => {
    try {
      if (argv.env) {
        loadEnvFile(argv.env);
      }
      const { eventIdFile, lockFile, logging } = loadLocalConfig(process.env);
      initLogger(logging);
      const removed = await forgetPersistedEvent(eventIdFile, lockFile);
      console.log(removed ? `Removed ${eventIdFile}` : `No persisted event ID at ${eventIdFile}`);
    } catch (error: unknown) {
      console.error(`Failed to forget event ID: ${errorMessage(error)}`);
      process.exit(exitCodeFor(error));
    }
  },
};
