import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { getPackageRoot } from './paths.js';

export function getPackageVersion(): string {
  try {
    const pkgPath = join(getPackageRoot(), 'package.json');
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

const VERSION_PATTERN = /^v?\d+(\.\d+){0,2}([-+][0-9A-Za-z.-]+)?$/;

export function isVersionLike(value: string): boolean {
  return VERSION_PATTERN.test(value);
}

/** 'v' 접두사와 pre-release 꼬리는 비교에서 무시 */
export function compareVersions(a: string, b: string): number {
  const pa = parseCore(a);
  const pb = parseCore(b);
  for (let i = 0; i < 3; i++) {
    const na = pa[i] || 0;
    const nb = pb[i] || 0;
    if (na > nb) return 1;
    if (na < nb) return -1;
  }
  return 0;
}

function parseCore(version: string): number[] {
  return version
    .replace(/^v/, '')
    .split(/[-+]/)[0]
    .split('.')
    .map(Number);
}
