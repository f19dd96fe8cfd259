/**
 * Process helper tests
 */

import * as vm from 'node:vm';
import { errorMessage, hasErrorCode, processExists } from '../utils/process';

describe('hasErrorCode', () => {
  it('matches the code of an error from this realm', () => {
    const err = Object.assign(new Error('exists'), { code: 'EEXIST' });
    expect(hasErrorCode(err, 'EEXIST')).toBe(true);
    expect(hasErrorCode(err, 'ENOENT')).toBe(false);
  });

  it('matches the code of an error built in another realm', () => {
    const err: unknown = vm.runInNewContext(
      'Object.assign(new Error("EEXIST: file already exists"), { code: "EEXIST" })',
    );
    expect(err instanceof Error).toBe(false);
    expect(hasErrorCode(err, 'EEXIST')).toBe(true);
  });

  it('ignores values without a code', () => {
    expect(hasErrorCode(null, 'EEXIST')).toBe(false);
    expect(hasErrorCode('EEXIST', 'EEXIST')).toBe(false);
    expect(hasErrorCode(new Error('plain'), 'EEXIST')).toBe(false);
  });
});

describe('errorMessage', () => {
  it('reads the message of an error built in another realm', () => {
    const err: unknown = vm.runInNewContext('new Error("ENOENT: no such file or directory")');
    expect(errorMessage(err)).toBe('ENOENT: no such file or directory');
  });

  it('stringifies anything else', () => {
    expect(errorMessage('boom')).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});

describe('processExists', () => {
  it('finds the current process', () => {
    expect(processExists(process.pid)).toBe(true);
  });

  it('rejects PIDs that cannot name a process', () => {
    expect(processExists(0)).toBe(false);
    expect(processExists(-1)).toBe(false);
    expect(processExists(1.5)).toBe(false);
  });
});
