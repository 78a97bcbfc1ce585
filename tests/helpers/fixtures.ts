import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { StencilConfig } from '../../src/types/config.js';
import type { UpstreamProvider, UpstreamRelease } from '../../src/types/upstream.js';
import { listFilesRecursive } from '../../src/core/file-ops.js';

export function makeConfig(overrides: Partial<StencilConfig> = {}): StencilConfig {
  return {
    trackedDirs: ['.claude'],
    backup: { enabled: true, retention: 5 },
    protectedPaths: [],
    ...overrides,
  };
}

export function writeFiles(root: string, files: Record<string, Buffer | string>): void {
  for (const [path, content] of Object.entries(files)) {
    const full = join(root, path);
    mkdirSync(dirname(full), { recursive: true });
    writeFileSync(full, content);
  }
}

/** 디렉토리 아래 모든 파일을 { 상대경로: 내용 } 으로 */
export function readTree(root: string, dir: string): Record<string, string> {
  const tree: Record<string, string> = {};
  for (const file of listFilesRecursive(join(root, dir))) {
    tree[`${dir}/${file}`] = readFileSync(join(root, dir, file), 'utf-8');
  }
  return tree;
}

/** 문자열 내용은 UTF-8 바이트로 변환됩니다 */
export function release(version: string, files: Record<string, Buffer | string>): UpstreamRelease {
  const contents = new Map<string, Buffer>();
  for (const [path, content] of Object.entries(files)) {
    contents.set(path, typeof content === 'string' ? Buffer.from(content, 'utf-8') : content);
  }
  return { version, files: contents };
}

/** 메모리 배포처 */
export class StaticUpstreamProvider implements UpstreamProvider {
  private readonly releases = new Map<string, UpstreamRelease>();

  constructor(releases: UpstreamRelease[]) {
    for (const rel of releases) {
      this.releases.set(rel.version, rel);
    }
  }

  latestVersion(): string {
    const versions = [...this.releases.keys()];
    return versions[versions.length - 1];
  }

  versionExists(version: string): boolean {
    return this.releases.has(version);
  }

  fetch(version: string): UpstreamRelease {
    const rel = this.releases.get(version);
    if (!rel) throw new Error(`no release ${version}`);
    return rel;
  }
}
