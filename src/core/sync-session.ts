/**
 * CLI / MCP 공용 진입점
 *
 * plan(설정 → manifest → upstream → reconcile)과 execute(apply)를 분리합니다.
 * plan은 아무것도 기록하지 않으므로, 사용자가 확인 단계에서 취소하거나 dry-run이면
 * 최초 실행에서 만든 manifest도 메모리에서 버려지고 부작용이 남지 않습니다.
 */

import { join } from 'node:path';
import type { ApplyOptions, ApplyOutcome } from '../types/apply.js';
import type { Backup } from '../types/backup.js';
import type { ReconcileResult } from '../types/common.js';
import type { StencilConfig } from '../types/config.js';
import type { Manifest } from '../types/manifest.js';
import type { UpstreamProvider, UpstreamRelease } from '../types/upstream.js';
import { loadConfig } from './config.js';
import { createManifest, loadManifest, resetBaseline, saveManifest, updateHashes } from './state-store.js';
import { isUpToDate, reconcileAll } from './reconcile-engine.js';
import { applyReconciliation } from './apply-coordinator.js';
import { listBackups } from './backup-manager.js';
import { DirectoryUpstreamProvider, resolveTargetVersion } from './upstream.js';
import { hasConflictMarkers } from './conflict-markers.js';
import { readFileContent } from './file-ops.js';
import { PrerequisiteError } from './errors.js';
import { resolveTemplatesDir } from '../utils/paths.js';

/** 아직 한 번도 동기화되지 않은 manifest의 배포 버전 */
export const UNSYNCED_VERSION = '0.0.0';

export interface PlanOptions {
  config?: StencilConfig;
  provider?: UpstreamProvider;
  version?: string;
  allowDowngrade?: boolean;
}

export interface SyncPlan {
  projectRoot: string;
  config: StencilConfig;
  manifest: Manifest;
  /** true면 manifest는 메모리에만 있음 (커밋 시 처음 기록됨) */
  isNewManifest: boolean;
  release: UpstreamRelease;
  result: ReconcileResult;
}

export function planSync(projectRoot: string, options: PlanOptions = {}): SyncPlan {
  const config = options.config ?? loadConfig(projectRoot);
  const provider = options.provider ?? new DirectoryUpstreamProvider(resolveTemplatesDir(projectRoot, config));

  const existing = loadManifest(projectRoot);
  const version = resolveTargetVersion(provider, {
    requested: options.version,
    current: existing?.distributionVersion,
    allowDowngrade: options.allowDowngrade,
  });
  const release = provider.fetch(version);

  const manifest =
    existing ??
    createManifest(projectRoot, config, UNSYNCED_VERSION, {
      assumeAllCustomized: true,
      officialPaths: new Set(release.files.keys()),
    });

  return {
    projectRoot,
    config,
    manifest,
    isNewManifest: existing === null,
    release,
    result: reconcileAll(projectRoot, config, manifest, release),
  };
}

/**
 * 파일 변경도, 버전 변경도, 새로 기록할 manifest도 없으면 false.
 * 이 경우 백업을 만들 필요가 없습니다.
 */
export function needsApply(plan: SyncPlan): boolean {
  return (
    plan.isNewManifest ||
    plan.result.sourceVersion !== plan.result.targetVersion ||
    !isUpToDate(plan.result)
  );
}

export function executePlan(plan: SyncPlan, options: ApplyOptions = {}): ApplyOutcome {
  return applyReconciliation(plan.projectRoot, plan.config, plan.manifest, plan.result, plan.release, options);
}

export interface RescanOptions {
  /** customized 플래그까지 해제 (현재 내용을 배포 원본으로 간주) */
  resetCustomized?: boolean;
}

/**
 * 현재 디스크 내용을 새 기준선으로 기록합니다. 사용자 확인 후에만 호출합니다.
 */
export function rescan(projectRoot: string, options: RescanOptions = {}): Manifest {
  const manifest = loadManifest(projectRoot);
  if (!manifest) {
    throw new PrerequisiteError('manifest가 없습니다. 먼저 update를 실행하세요.');
  }
  if (options.resetCustomized) {
    resetBaseline(manifest, projectRoot);
  } else {
    updateHashes(manifest, projectRoot);
  }
  saveManifest(projectRoot, manifest);
  return manifest;
}

export interface ProjectStatus {
  manifest: Manifest | null;
  backups: Backup[];
  /** 충돌 마커가 남아 있는 추적 파일 */
  unresolvedConflicts: string[];
}

export function inspectProject(projectRoot: string): ProjectStatus {
  const manifest = loadManifest(projectRoot);
  const unresolvedConflicts = (manifest?.trackedFiles ?? [])
    .filter((file) => file.customized)
    .map((file) => file.path)
    .filter((path) => {
      const content = readFileContent(join(projectRoot, path));
      return content !== null && hasConflictMarkers(content);
    });

  return {
    manifest,
    backups: listBackups(projectRoot),
    unresolvedConflicts,
  };
}
