import { DEFAULT_POLICY, isAllowedImport, moduleRoot } from '../../../src/domain/policy/ExtensionPolicy';

describe('ExtensionPolicy', () => {
  test('moduleRoot keeps the package part of a specifier', () => {
    expect(moduleRoot('lodash')).toBe('lodash');
    expect(moduleRoot('lodash/fp')).toBe('lodash');
    expect(moduleRoot('@scope/pkg/sub/path')).toBe('@scope/pkg');
    expect(moduleRoot('@scope')).toBeNull();
    expect(moduleRoot('./helpers')).toBeNull();
    expect(moduleRoot('/abs/path')).toBeNull();
    expect(moduleRoot('')).toBeNull();
  });

  test('isAllowedImport checks the root against the allow-list', () => {
    expect(isAllowedImport(DEFAULT_POLICY, 'date-fns/addDays')).toBe(true);
    expect(isAllowedImport(DEFAULT_POLICY, 'lodash-es')).toBe(false);
    expect(isAllowedImport(DEFAULT_POLICY, 'node:fs')).toBe(false);
    expect(isAllowedImport({ ...DEFAULT_POLICY, allowedImports: ['@acme/math'] }, '@acme/math/round')).toBe(true);
  });
});
