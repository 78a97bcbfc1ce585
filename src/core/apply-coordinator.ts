/**
 * Apply Coordinator
 *
 * idle → backed-up → applying → committed      (성공)
 * idle → backed-up → applying → rolled-back    (적용 중 실패, 백업으로 복원)
 * idle → aborted                               (전제조건/백업 실패, 변경 없음)
 *
 * manifest 저장이 유일한 커밋 지점입니다. 저장까지 성공해야 committed입니다.
 */

import { accessSync, constants, existsSync } from 'node:fs';
import { join } from 'node:path';
import type { ApplyOptions, ApplyOutcome, ApplyPhase, FileOps } from '../types/apply.js';
import type { Backup } from '../types/backup.js';
import type { FileState, ReconcileResult } from '../types/common.js';
import type { StencilConfig } from '../types/config.js';
import type { Manifest } from '../types/manifest.js';
import type { UpstreamRelease } from '../types/upstream.js';
import { nodeFileOps } from './file-ops.js';
import { decodeText, hashesEqual, normalizedHash } from './fingerprint.js';
import { buildConflictBlock } from './conflict-markers.js';
import { createBackup, pruneBackups, restoreBackup, restoreManifestSnapshot } from './backup-manager.js';
import { cloneManifest, removeTrackedFile, saveManifest, upsertTrackedFile } from './state-store.js';
import { PrerequisiteError, RollbackFailedError, describeError } from './errors.js';
import { logger } from '../utils/logger.js';

/** 루프 안에서 기록되는 결과 (커밋 전) */
interface LoopRecord {
  added: FileState[];
  updated: FileState[];
  removed: FileState[];
  preserved: FileState[];
  conflicts: FileState[];
  falsePositives: FileState[];
  skippedCustom: string[];
}

export function applyReconciliation(
  projectRoot: string,
  config: StencilConfig,
  manifest: Manifest,
  result: ReconcileResult,
  upstream: UpstreamRelease,
  options: ApplyOptions = {},
): ApplyOutcome {
  const fileOps = options.fileOps ?? nodeFileOps;
  const setPhase = (next: ApplyPhase): void => {
    options.onPhase?.(next);
  };

  if (upstream.version !== result.targetVersion) {
    setPhase('aborted');
    throw new PrerequisiteError(
      `reconcile 결과(${result.targetVersion})와 upstream 버전(${upstream.version})이 다릅니다`,
    );
  }

  try {
    assertWritable(projectRoot, config);
  } catch (err) {
    setPhase('aborted');
    throw err;
  }

  let backup: Backup | null = null;
  if (options.backup ?? config.backup.enabled) {
    try {
      backup = createBackup(projectRoot, config, {
        sourceVersion: result.sourceVersion,
        targetVersion: result.targetVersion,
        now: options.now,
      });
    } catch (err) {
      setPhase('aborted');
      logger.error(`백업 실패로 중단: 변경된 파일 없음 (${describeError(err)})`);
      throw err;
    }
    setPhase('backed-up');
  } else {
    logger.warn('백업 비활성화 상태로 적용합니다. 실패 시 자동 복원이 불가능합니다.');
  }

  setPhase('applying');
  let committed: Manifest;
  let record: LoopRecord;
  try {
    record = applyStates(projectRoot, result, upstream, fileOps);
    committed = commitManifest(projectRoot, manifest, result, record);
  } catch (err) {
    if (!backup) {
      logger.error(`적용 실패 (백업 없음, 복원 불가): ${describeError(err)}`);
      throw err;
    }
    try {
      restoreBackup(projectRoot, config, backup);
    } catch (restoreErr) {
      logger.error(`복원 실패. 수동 복구 필요: ${backup.storagePath}`);
      throw new RollbackFailedError(err, restoreErr, backup.storagePath);
    }
    setPhase('rolled-back');
    logger.warn(`적용 실패로 백업에서 복원했습니다 (${backup.name}): ${describeError(err)}`);
    throw err;
  }
  setPhase('committed');
  logger.ok(`${result.sourceVersion} → ${result.targetVersion} 적용 완료`);

  const prune = options.prune ? pruneBackups(projectRoot, options.prune) : null;

  return {
    phase: 'committed',
    backup,
    added: record.added.map((s) => s.path),
    updated: record.updated.map((s) => s.path),
    removed: record.removed.map((s) => s.path),
    preserved: record.preserved.map((s) => s.path),
    conflicts: record.conflicts.map((s) => s.path),
    falsePositives: record.falsePositives.map((s) => s.path),
    skippedCustom: record.skippedCustom,
    distributionVersion: committed.distributionVersion,
    manifest: committed,
    prune,
  };
}

/**
 * 목록 순서대로 파일 액션을 실행합니다. 커스텀 파일은 분류와 무관하게 건너뜁니다.
 */
function applyStates(
  projectRoot: string,
  result: ReconcileResult,
  upstream: UpstreamRelease,
  fileOps: FileOps,
): LoopRecord {
  const record: LoopRecord = {
    added: [],
    updated: [],
    removed: [],
    preserved: [],
    conflicts: [],
    falsePositives: [],
    skippedCustom: [],
  };
  const custom = new Set(result.customFiles);

  for (const state of result.states) {
    if (custom.has(state.path)) {
      if (state.action !== 'skip' && state.action !== 'preserve') {
        record.skippedCustom.push(state.path);
        logger.fileAction('custom', `${state.path} (사용자 파일, ${state.action} 건너뜀)`);
      }
      continue;
    }

    const target = join(projectRoot, state.path);

    switch (state.action) {
      case 'add':
        fileOps.writeFile(target, incomingContent(upstream, state));
        record.added.push(state);
        logger.fileAction('add', state.path);
        break;
      case 'update':
        fileOps.writeFile(target, incomingContent(upstream, state));
        record.updated.push(state);
        logger.fileAction('update', state.path);
        break;
      case 'remove':
        fileOps.removeFile(target);
        record.removed.push(state);
        logger.fileAction('remove', state.path);
        break;
      case 'preserve':
        record.preserved.push(state);
        logger.fileAction('preserve', state.path);
        break;
      case 'merge': {
        const incoming = incomingContent(upstream, state);
        const current = fileOps.readFile(target);
        // 플래그만 customized이고 실제 내용은 upstream과 같으면 오탐: update로 처리
        if (current !== null && hashesEqual(normalizedHash(current), state.upstreamHash)) {
          fileOps.writeFile(target, incoming);
          record.falsePositives.push(state);
          logger.fileAction('update', `${state.path} (오탐 해소: upstream과 동일)`);
        } else {
          const currentText = decodeText(current ?? '');
          const incomingText = decodeText(incoming);
          if (currentText === null || incomingText === null) {
            // 바이너리에는 마커를 넣을 수 없음: 로컬 내용을 그대로 두고 충돌로만 기록
            logger.fileAction('conflict', `${state.path} (바이너리, 로컬 유지. upstream ${result.targetVersion}과 수동 비교 필요)`);
          } else {
            fileOps.writeFile(target, buildConflictBlock(currentText, incomingText, result.targetVersion));
            logger.fileAction('conflict', `${state.path} (수동 해결 필요)`);
          }
          record.conflicts.push(state);
        }
        break;
      }
      case 'skip':
        break;
      default: {
        const unreachable: never = state.action;
        throw new Error(`알 수 없는 액션: ${String(unreachable)}`);
      }
    }
  }

  return record;
}

/**
 * 루프 결과를 manifest 사본에 반영하고 저장합니다 (커밋 지점).
 * - add/update/오탐: originalHash = upstream 해시, customized 해제
 * - remove: 추적 해제
 * - 충돌: originalHash = upstream 해시, customized 유지 → 다음 실행에서 마커 파일은 preserve
 */
function commitManifest(
  projectRoot: string,
  manifest: Manifest,
  result: ReconcileResult,
  record: LoopRecord,
): Manifest {
  const next = cloneManifest(manifest);

  for (const state of [...record.added, ...record.updated, ...record.falsePositives]) {
    upsertTrackedFile(next, {
      path: state.path,
      originalHash: state.upstreamHash,
      customized: false,
      isOfficial: true,
    });
  }
  for (const state of record.conflicts) {
    upsertTrackedFile(next, {
      path: state.path,
      originalHash: state.upstreamHash,
      customized: true,
      isOfficial: true,
    });
  }
  for (const state of record.removed) {
    removeTrackedFile(next, state.path);
  }

  next.distributionVersion = result.targetVersion;
  saveManifest(projectRoot, next);
  return next;
}

function incomingContent(upstream: UpstreamRelease, state: FileState): Buffer {
  const content = upstream.files.get(state.path);
  if (content === undefined) {
    throw new Error(`upstream에 ${state.path} 내용이 없습니다 (action: ${state.action})`);
  }
  return content;
}

function assertWritable(projectRoot: string, config: StencilConfig): void {
  const targets = [projectRoot, ...config.trackedDirs.map((dir) => join(projectRoot, dir))];
  for (const target of targets) {
    if (!existsSync(target)) continue;
    try {
      accessSync(target, constants.W_OK);
    } catch (err) {
      throw new PrerequisiteError(`쓰기 권한이 없습니다: ${target}`, { cause: err });
    }
  }
}

/**
 * 지정한 백업으로 작업 사본과 manifest를 되돌립니다.
 */
export function rollbackTo(projectRoot: string, config: StencilConfig, backup: Backup): void {
  restoreBackup(projectRoot, config, backup);
  restoreManifestSnapshot(projectRoot, backup);
  logger.ok(`${backup.name} 시점으로 롤백했습니다 (${backup.sourceVersion})`);
}
