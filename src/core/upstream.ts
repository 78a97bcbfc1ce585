import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { UpstreamProvider, UpstreamRelease } from '../types/upstream.js';
import { listFilesRecursive } from './file-ops.js';
import { UpstreamError } from './errors.js';
import { compareVersions, isVersionLike } from '../utils/version.js';

/**
 * 로컬 디렉토리 배포처
 *
 * <templatesDir>/
 *   1.0.0/.claude/commands/plan.md
 *   1.1.0/.claude/commands/plan.md
 *
 * 버전 디렉토리 아래 경로가 그대로 프로젝트 상대 경로가 됩니다.
 */
export class DirectoryUpstreamProvider implements UpstreamProvider {
  constructor(private readonly templatesDir: string) {}

  listVersions(): string[] {
    if (!existsSync(this.templatesDir)) {
      throw new UpstreamError(`템플릿 디렉토리가 없습니다: ${this.templatesDir}`);
    }
    return readdirSync(this.templatesDir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory() && isVersionLike(entry.name))
      .map((entry) => entry.name)
      .sort(compareVersions);
  }

  latestVersion(): string {
    const versions = this.listVersions();
    if (versions.length === 0) {
      throw new UpstreamError(`배포 버전이 없습니다: ${this.templatesDir}`);
    }
    return versions[versions.length - 1];
  }

  versionExists(version: string): boolean {
    return this.listVersions().includes(version);
  }

  fetch(version: string): UpstreamRelease {
    if (!this.versionExists(version)) {
      throw new UpstreamError(`존재하지 않는 버전입니다: ${version}`);
    }
    const root = join(this.templatesDir, version);
    const files = new Map<string, Buffer>();
    for (const path of listFilesRecursive(root)) {
      files.set(path, readFileSync(join(root, path)));
    }
    return { version, files };
  }
}

export interface ResolveVersionOptions {
  requested?: string;
  /** 현재 manifest의 배포 버전 (없으면 최초 설치) */
  current?: string;
  allowDowngrade?: boolean;
}

/**
 * 적용할 버전을 결정합니다. 미지정이면 최신, 지정 버전은 존재해야 하며
 * allowDowngrade 없이 현재보다 낮은 버전은 거부합니다.
 */
export function resolveTargetVersion(provider: UpstreamProvider, options: ResolveVersionOptions = {}): string {
  const target = options.requested ?? provider.latestVersion();
  if (options.requested && !provider.versionExists(options.requested)) {
    throw new UpstreamError(`존재하지 않는 버전입니다: ${options.requested}`);
  }
  if (options.current && !options.allowDowngrade && compareVersions(target, options.current) < 0) {
    throw new UpstreamError(
      `다운그레이드(${options.current} → ${target})는 allowDowngrade 옵션이 필요합니다`,
    );
  }
  return target;
}
