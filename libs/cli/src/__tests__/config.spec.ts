/**
 * Config loader tests — env objects are passed in, files live in tmp dirs
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { ConfigError } from '@debpilot/ipc';
import { loadConfig, lockFilePath, logFilePath } from '../utils/config';
import { makeTempDir, removeDir } from './helpers/fakes';

describe('loadConfig', () => {
  let tmpDir: string;
  let programPath: string;

  beforeEach(() => {
    tmpDir = makeTempDir('config-test-');
    programPath = path.join(tmpDir, 'bin', 'debpilot');
    fs.mkdirSync(path.dirname(programPath));
  });

  afterEach(() => removeDir(tmpDir));

  function writeConfig(file: string, content: unknown): void {
    fs.writeFileSync(file, typeof content === 'string' ? content : JSON.stringify(content));
  }

  it('uses the defaults, with logs beside the program', () => {
    const config = loadConfig({ programPath, env: {} });
    const binDir = path.join(tmpDir, 'bin');

    expect(config).toEqual({
      packageName: 'jenkins',
      serviceName: 'jenkins',
      mirrorUrl: 'https://pkg.jenkins.io/debian/binary/',
      archiveDir: '/var/cache/apt/archives',
      logDir: binDir,
      backupDir: path.join(binDir, 'backups'),
      downloadDir: path.join(binDir, 'backups'),
      echoToScreen: true,
      settleDelayMs: 3000,
    });
    expect(logFilePath(config)).toBe(path.join(binDir, 'debpilot.log'));
    expect(lockFilePath(config)).toBe(path.join(binDir, 'debpilot.lock'));
  });

  it('reads the config file beside the program, resolving its relative paths', () => {
    writeConfig(path.join(tmpDir, 'bin', 'debpilot.config.json'), {
      logDir: '../var/log',
      echoToScreen: false,
      mirrorUrl: 'https://mirror.test/debian/binary',
    });

    const config = loadConfig({ programPath, env: {} });

    expect(config.logDir).toBe(path.join(tmpDir, 'var', 'log'));
    expect(config.backupDir).toBe(path.join(tmpDir, 'var', 'log', 'backups'));
    expect(config.echoToScreen).toBe(false);
    expect(config.mirrorUrl).toBe('https://mirror.test/debian/binary/');
  });

  it('lets environment variables override the file', () => {
    const file = path.join(tmpDir, 'custom.json');
    writeConfig(file, { packageName: 'jenkins', serviceName: 'jenkins', settleDelayMs: 100 });

    const config = loadConfig({
      programPath,
      env: {
        DEBPILOT_CONFIG: file,
        DEBPILOT_SERVICE: 'jenkins-lts',
        DEBPILOT_ECHO: 'no',
        DEBPILOT_BACKUP_DIR: path.join(tmpDir, 'keep'),
        DEBPILOT_DOWNLOAD_DIR: path.join(tmpDir, 'dl'),
      },
    });

    expect(config.serviceName).toBe('jenkins-lts');
    expect(config.settleDelayMs).toBe(100);
    expect(config.echoToScreen).toBe(false);
    expect(config.backupDir).toBe(path.join(tmpDir, 'keep'));
    expect(config.downloadDir).toBe(path.join(tmpDir, 'dl'));
  });

  it('coerces the settle delay from the environment', () => {
    const config = loadConfig({ programPath, env: { DEBPILOT_SETTLE_DELAY_MS: '250' } });
    expect(config.settleDelayMs).toBe(250);
  });

  it('fails when DEBPILOT_CONFIG points at a missing file', () => {
    const missing = path.join(tmpDir, 'missing.json');
    expect(() => loadConfig({ programPath, env: { DEBPILOT_CONFIG: missing } })).toThrow(
      new ConfigError('Config file not found', missing),
    );
  });

  it('rejects unparseable JSON', () => {
    writeConfig(path.join(tmpDir, 'bin', 'debpilot.config.json'), '{ not json');
    expect(() => loadConfig({ programPath, env: {} })).toThrow(ConfigError);
  });

  it('rejects unknown keys in the file', () => {
    writeConfig(path.join(tmpDir, 'bin', 'debpilot.config.json'), { pkg: 'jenkins' });
    expect(() => loadConfig({ programPath, env: {} })).toThrow(/^Invalid config: /);
  });

  it('rejects an invalid package name', () => {
    expect(() => loadConfig({ programPath, env: { DEBPILOT_PACKAGE: 'Jenkins; rm -rf /' } })).toThrow(
      /^Invalid configuration: packageName: /,
    );
  });

  it('rejects an unrecognised echo flag', () => {
    expect(() => loadConfig({ programPath, env: { DEBPILOT_ECHO: 'maybe' } })).toThrow(
      /^Invalid environment: DEBPILOT_ECHO: /,
    );
  });

  it('rejects a mirror URL that is not http(s)', () => {
    expect(() => loadConfig({ programPath, env: { DEBPILOT_MIRROR_URL: 'ftp://mirror.test/debian/' } })).toThrow(
      ConfigError,
    );
  });
});
