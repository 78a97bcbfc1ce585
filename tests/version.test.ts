import { describe, it, expect } from 'vitest';
import { compareVersions, isVersionLike } from '../src/utils/version.js';

describe('version', () => {
  it.each(['1.0.0', 'v2.1.3', '1.2', '3', '1.0.0-beta.1'])('%s는 버전 디렉토리로 인식', (value) => {
    expect(isVersionLike(value)).toBe(true);
  });

  it.each(['drafts', 'latest', '1.0.0.0', ''])('%s는 버전이 아님', (value) => {
    expect(isVersionLike(value)).toBe(false);
  });

  it('should compare numerically rather than lexically', () => {
    expect(compareVersions('1.10.0', '1.2.0')).toBe(1);
    expect(compareVersions('1.2.0', '1.10.0')).toBe(-1);
  });

  it('should ignore a v prefix, missing parts and pre-release tails', () => {
    expect(compareVersions('v1.2.0', '1.2')).toBe(0);
    expect(compareVersions('1.2.0-rc.1', '1.2.0')).toBe(0);
  });
});
