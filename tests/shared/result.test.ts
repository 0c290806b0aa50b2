import vm from 'vm';
import { describeError, errnoCode } from '../../src/shared/result';

describe('shared/result', () => {
  test('errnoCode reads the code of errors from another realm', () => {
    const foreign: unknown = vm.runInNewContext('const e = new Error("gone"); e.code = "ENOENT"; e');

    expect(foreign instanceof Error).toBe(false);
    expect(errnoCode(foreign)).toBe('ENOENT');
    expect(describeError(foreign)).toBe('gone');
  });

  test('errnoCode ignores values without a string code', () => {
    expect(errnoCode(new Error('plain'))).toBeUndefined();
    expect(errnoCode({ code: 2 })).toBeUndefined();
    expect(errnoCode('ENOENT')).toBeUndefined();
    expect(errnoCode(null)).toBeUndefined();
  });
});
