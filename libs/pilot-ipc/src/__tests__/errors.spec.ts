import {
  PilotError,
  BadArgumentsError,
  InvalidVersionError,
  FetchError,
  VersionMismatchError,
  StepError,
} from '../errors';

describe('PilotError hierarchy', () => {
  it('exits with code 1 and keeps its code', () => {
    const err = new BadArgumentsError();
    expect(err).toBeInstanceOf(PilotError);
    expect(err.exitCode).toBe(1);
    expect(err.code).toBe('BAD_ARGUMENTS');
    expect(err.message).toBe('Parameter(s) is/are wrong');
  });

  it('treats an invalid version as bad arguments', () => {
    const err = new InvalidVersionError('a/b', 'bad characters');
    expect(err).toBeInstanceOf(BadArgumentsError);
    expect(err.code).toBe('INVALID_VERSION');
    expect(err.message).toBe('Invalid version "a/b": bad characters');
  });

  it('attaches step ids to step failures', () => {
    const cause = new Error('ECONNREFUSED');
    const err = new FetchError('https://mirror.test/x.deb', 'download failed', { cause });
    expect(err).toBeInstanceOf(StepError);
    expect(err.stepId).toBe('fetch-package');
    expect(err.cause).toBe(cause);
    expect(err.statusCode).toBeUndefined();
  });

  it('describes an unknown installed version', () => {
    const err = new VersionMismatchError('2.1', null);
    expect(err.message).toBe('Installed version is unknown, expected 2.1');
    expect(err.stepId).toBe('verify-version');
  });
});
