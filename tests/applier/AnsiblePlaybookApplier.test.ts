import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { AnsiblePlaybookApplier } from '../../src/applier/AnsiblePlaybookApplier';
import { Credential } from '../../src/credential/Credential';
import { CredentialFile } from '../../src/credential/CredentialFile';
import { ApplierFailure } from '../../src/errors/ProvisioningError';
import type { CommandRunner, ProcessResult, ProcessRunOptions } from '../../src/util/ProcessRunner';
import { RetryPolicy } from '../../src/util/RetryPolicy';

interface RecordedCall {
  command: string;
  args: string[];
  options?: ProcessRunOptions;
  credentialOnDisk: string;
}

function exit(exitCode: number, stdout = '', stderr = ''): ProcessResult {
  return { exitCode, signal: null, stdout, stderr, timedOut: false };
}

describe('AnsiblePlaybookApplier', () => {
  let tmpDir: string;
  let credentialFile: CredentialFile;
  const context = { endpoint: 'https://cluster.example', eventId: 'evt-5' };

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ansible-applier-'));
    credentialFile = new CredentialFile(path.join(tmpDir, 'credential'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  function createApplier(results: (ProcessResult | Error)[], options: { verbose?: boolean; outputLogPath?: string } = {}) {
    const calls: RecordedCall[] = [];
    const runner: CommandRunner = {
      run: async (command, args, runOptions) => {
        calls.push({ command, args, options: runOptions, credentialOnDisk: await fs.readFile(credentialFile.filePath, 'utf8') });
        const next = results[calls.length - 1] ?? exit(1);
        if (next instanceof Error) {
          throw next;
        }
        return next;
      },
    };
    const sleep = vi.fn(async (_ms: number): Promise<void> => undefined);
    const applier = new AnsiblePlaybookApplier({
      playbookPath: '/opt/playbooks/configure-tunnel.yml',
      inventoryPath: '/opt/playbooks/inventory',
      credentialFile,
      runner,
      retryPolicy: new RetryPolicy({ attempts: 2, delayMs: 30_000, sleep }),
      timeoutMs: 60_000,
      baseEnv: { PATH: '/usr/bin' },
      ...options,
    });
    return { applier, calls, sleep };
  }

  it('writes the credential and runs the playbook with the cluster context', async () => {
    const { applier, calls, sleep } = createApplier([ exit(0, 'PLAY RECAP ok=3') ]);

    await applier.apply(new Credential('test-token'), context);

    expect(calls).toEqual([{
      command: 'ansible-playbook',
      args: [ '-i', '/opt/playbooks/inventory', 'configure-tunnel.yml' ],
      options: {
        cwd: '/opt/playbooks',
        env: {
          PATH: '/usr/bin',
          TUNNEL_CREDENTIAL_FILE: credentialFile.filePath,
          CLUSTER_URL: 'https://cluster.example',
          TUNNEL_EVENT_ID: 'evt-5',
        },
        timeoutMs: 60_000,
      },
      credentialOnDisk: 'test-token',
    }]);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('adds -vv in verbose mode', async () => {
    const { applier, calls } = createApplier([ exit(0) ], { verbose: true });

    await applier.apply(new Credential('test-token'), context);
    expect(calls[0].args).toEqual([ '-i', '/opt/playbooks/inventory', 'configure-tunnel.yml', '-vv' ]);
  });

  it('retries a failed run and succeeds on the second attempt', async () => {
    const { applier, calls, sleep } = createApplier([ exit(2, '', 'unreachable'), exit(0) ]);

    await applier.apply(new Credential('test-token'), context);
    expect(calls).toHaveLength(2);
    expect(sleep).toHaveBeenCalledWith(30_000);
  });

  it('throws ApplierFailure with the exit code once attempts are exhausted', async () => {
    const { applier, calls } = createApplier([ exit(2), exit(4) ]);

    const error = await applier.apply(new Credential('test-token'), context).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ApplierFailure);
    expect(error).toMatchObject({
      message: 'ansible-playbook exited with code 4 after 2 attempt(s)',
      processExitCode: 4,
      exitCode: 40,
    });
    expect(calls).toHaveLength(2);
  });

  it('treats a timeout as a failure', async () => {
    const timedOut: ProcessResult = { exitCode: null, signal: 'SIGKILL', stdout: '', stderr: '', timedOut: true };
    const { applier } = createApplier([ timedOut, timedOut ]);

    await expect(applier.apply(new Credential('test-token'), context))
      .rejects.toThrow('ansible-playbook timed out after 60000ms after 2 attempt(s)');
  });

  it('does not retry when ansible-playbook cannot be started', async () => {
    const { applier, calls } = createApplier([ new Error('spawn ansible-playbook ENOENT') ]);

    await expect(applier.apply(new Credential('test-token'), context))
      .rejects.toThrow('Could not start ansible-playbook: spawn ansible-playbook ENOENT');
    expect(calls).toHaveLength(1);
  });

  it('appends every attempt to the output log', async () => {
    const outputLogPath = path.join(tmpDir, 'logs', 'applier.log');
    const { applier } = createApplier([ exit(2, 'first stdout\n'), exit(0, 'second stdout\n') ], { outputLogPath });

    await applier.apply(new Credential('test-token'), context);

    const log = await fs.readFile(outputLogPath, 'utf8');
    expect(log).toContain('returncode=2 timedOut=false cmd=ansible-playbook -i /opt/playbooks/inventory configure-tunnel.yml');
    expect(log).toContain('--- stdout ---\nfirst stdout\n');
    expect(log).toContain('returncode=0 timedOut=false');
    expect(log).toContain('--- stdout ---\nsecond stdout\n');
  });
});
