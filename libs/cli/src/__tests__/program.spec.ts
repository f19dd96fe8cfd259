/**
 * CLI tests — runCli against host fakes, with the log and lock in tmp dirs
 */

import * as fs from 'node:fs';
import type { PilotConfig } from '@debpilot/ipc';
import type { CliContext } from '../commands/index';
import { createRunEngine } from '../engine/index';
import { formatUsage, runCli } from '../program';
import { ArchiveBackupService } from '../utils/backup';
import { ArchiveDownloader } from '../utils/download';
import { lockFilePath, logFilePath } from '../utils/config';
import { RunLock } from '../utils/lock';
import { BufferSink, FakeHost, makeConfig, makeLogger, makeTempDir, readLog, removeDir } from './helpers/fakes';

describe('runCli', () => {
  let tmpDir: string;
  let config: PilotConfig;
  let host: FakeHost;
  let stdout: BufferSink;
  let fetchImpl: jest.Mock<Promise<Response>, Parameters<typeof fetch>>;

  function makeContext(lock = new RunLock(lockFilePath(config))): CliContext {
    const logger = makeLogger(logFilePath(config));
    return {
      config,
      logger,
      engine: createRunEngine({
        config,
        logger,
        packages: host.packages,
        service: host.service,
        backups: new ArchiveBackupService(config.packageName, config.archiveDir, config.backupDir),
        downloader: new ArchiveDownloader({ mirrorUrl: config.mirrorUrl, downloadDir: config.downloadDir, fetchImpl }),
      }),
      lock,
      stdout,
      stderr: new BufferSink(),
    };
  }

  function log(): string[] {
    return readLog(logFilePath(config));
  }

  beforeEach(() => {
    tmpDir = makeTempDir('cli-test-');
    config = makeConfig(tmpDir);
    fs.mkdirSync(config.archiveDir);
    host = new FakeHost();
    stdout = new BufferSink();
    fetchImpl = jest.fn<Promise<Response>, Parameters<typeof fetch>>(
      async () => new Response('deb-bytes', { status: 200 }),
    );
  });

  afterEach(() => removeDir(tmpDir));

  describe('bad invocations', () => {
    const BAD_ARGV: string[][] = [
      [],
      ['deploy'],
      ['update', 'extra'],
      ['update', '--force'],
      ['rollback'],
      ['rollback', '2.426.3', '2.426.2'],
      ['--help'],
      ['help'],
    ];

    for (const argv of BAD_ARGV) {
      it(`rejects ${JSON.stringify(argv)} with the usage text`, async () => {
        const exitCode = await runCli(argv, makeContext());

        expect(exitCode).toBe(1);
        expect(stdout.text).toBe(formatUsage('jenkins'));
        expect(host.events).toEqual([]);
        expect(log()).toEqual([
          'INFO File created.',
          'INFO ================================',
          'INFO New run:',
          'ERROR Parameter(s) is/are wrong. Exiting...',
        ]);
        expect(fs.existsSync(lockFilePath(config))).toBe(false);
      });
    }

    it('rejects an invalid rollback version before taking the lock', async () => {
      const exitCode = await runCli(['rollback', '2.440.1;reboot'], makeContext());

      expect(exitCode).toBe(1);
      expect(stdout.text).toBe(formatUsage('jenkins'));
      expect(host.events).toEqual([]);
      expect(fetchImpl).not.toHaveBeenCalled();
      expect(log().slice(-1)).toEqual([
        'ERROR Invalid version "2.440.1;reboot": Version may only contain letters, digits and the characters . + ~ : -. Exiting...',
      ]);
    });
  });

  it('prints usage naming the managed package', () => {
    expect(formatUsage('jenkins').split('\n').slice(0, 3)).toEqual([
      'Usage: debpilot {update|rollback} [version]',
      'The program accepts one or two parameters only; these are',
      '  update   - update the local jenkins installation via apt-get',
    ]);
  });

  it('updates, then finds nothing to do on the next run', async () => {
    host.candidate = '2.440.2';

    await expect(runCli(['update'], makeContext())).resolves.toBe(0);
    await expect(runCli(['update'], makeContext())).resolves.toBe(0);

    const lines = log();
    expect(lines.filter((line) => line === 'INFO File created.')).toHaveLength(1);
    expect(lines.filter((line) => line === 'INFO New run:')).toHaveLength(2);
    expect(lines).toContain('SUCCESS   - jenkins has been updated to 2.440.2');
    expect(lines.slice(-6)).toEqual([
      'INFO Nothing to do.',
      'INFO The current running version is the latest available.',
      'ACTION Checking jenkins service status:',
      'INFO   state=running',
      'SUCCESS   - jenkins service is running!',
      'INFO DONE!',
    ]);
    expect(host.events.filter((e) => e.startsWith('upgrade'))).toEqual(['upgrade:stopped']);
    expect(stdout.text).toBe('');
    expect(fs.existsSync(lockFilePath(config))).toBe(false);
  });

  it('rolls back to a downloaded archive', async () => {
    host.installed = '2.440.2';

    await expect(runCli(['rollback', '2.426.3'], makeContext())).resolves.toBe(0);

    expect(host.installed).toBe('2.426.3');
    expect(log().slice(-1)).toEqual(['INFO DONE!']);
  });

  it('exits 1 without installing when the download fails', async () => {
    fetchImpl.mockResolvedValue(new Response('gone', { status: 404 }));

    await expect(runCli(['rollback', '2.426.3'], makeContext())).resolves.toBe(1);

    expect(host.events).toEqual([]);
    expect(fs.existsSync(lockFilePath(config))).toBe(false);
  });

  it('exits 1 when another run holds the lock', async () => {
    const lockPath = lockFilePath(config);
    fs.mkdirSync(config.logDir, { recursive: true });
    fs.writeFileSync(lockPath, '4242\n');
    const lock = new RunLock(lockPath, { pid: 5151, isProcessAlive: () => true });

    await expect(runCli(['update'], makeContext(lock))).resolves.toBe(1);

    expect(host.events).toEqual([]);
    expect(fs.readFileSync(lockPath, 'utf-8')).toBe('4242\n');
    expect(log().slice(-1)).toEqual([`ERROR Another run (PID 4242) holds the lock ${lockPath}. Exiting...`]);
  });
});
