/**
 * 백업 관리
 *
 * 변경 직전에 추적 디렉토리 전체를 .stencil/backups/<name>/ 으로 복사합니다.
 * 개별 파일이 아닌 디렉토리 단위이므로 아직 추적되지 않은 파일까지 보존됩니다.
 *
 * 이름 형식: <timestamp>__<sourceVersion>__<targetVersion>
 *   예) 2026-10-18T09-30-00-000Z__1.0.0__1.1.0
 * 이름만으로 정렬/해석이 가능하므로 별도 인덱스 파일은 두지 않습니다.
 */

import { copyFileSync, existsSync, readdirSync, renameSync } from 'node:fs';
import { join, relative } from 'node:path';
import type { Backup, CreateBackupOptions, PruneOptions, PruneResult } from '../types/backup.js';
import type { TreeEntry } from './file-ops.js';
import type { StencilConfig } from '../types/config.js';
import { DEFAULT_RETENTION } from '../types/config.js';
import {
  copyDirRecursive,
  ensureDir,
  listTreeEntries,
  removeDir,
  removeFileIfExists,
  toPosixPath,
} from './file-ops.js';
import { backupPath, backupsDir, manifestPath, stencilDir } from './project-paths.js';
import { BackupError, describeError } from './errors.js';
import { logger } from '../utils/logger.js';

const NAME_SEPARATOR = '__';
const PARTIAL_SUFFIX = '.partial';
/** 백업 루트에 함께 저장되는 manifest 사본 */
const MANIFEST_SNAPSHOT = '.manifest.json';
const STAMP_PATTERN = /^(\d{4}-\d{2}-\d{2})T(\d{2})-(\d{2})-(\d{2})-(\d{3})Z$/;

// ============================================================
// 이름 인코딩
// ============================================================

export function formatBackupName(date: Date, sourceVersion: string, targetVersion: string): string {
  const stamp = date.toISOString().replace(/[:.]/g, '-');
  return [stamp, sanitizeVersion(sourceVersion), sanitizeVersion(targetVersion)].join(NAME_SEPARATOR);
}

export function parseBackupName(projectRoot: string, name: string): Backup | null {
  if (name.endsWith(PARTIAL_SUFFIX)) return null;
  const parts = name.split(NAME_SEPARATOR);
  if (parts.length !== 3) return null;

  const [stamp, sourceVersion, targetVersion] = parts;
  const match = STAMP_PATTERN.exec(stamp);
  if (!match) return null;

  const [, day, hh, mm, ss, ms] = match;
  return {
    name,
    timestamp: `${day}T${hh}:${mm}:${ss}.${ms}Z`,
    sourceVersion,
    targetVersion,
    storagePath: backupPath(projectRoot, name),
  };
}

function sanitizeVersion(version: string): string {
  return version.replace(/[^0-9A-Za-z.+-]/g, '-') || 'none';
}

// ============================================================
// 생성 / 복원
// ============================================================

/**
 * 추적 디렉토리 스냅샷을 만듭니다.
 * .partial 디렉토리에 복사 → 항목 목록(종류, 링크 대상 포함) 검증 → rename 순서라서
 * 중간에 실패하거나 죽어도 유효한 백업처럼 보이는 부분 사본이 남지 않습니다.
 */
export function createBackup(projectRoot: string, config: StencilConfig, options: CreateBackupOptions): Backup {
  const now = options.now ?? (() => new Date());

  let date = now();
  let name = formatBackupName(date, options.sourceVersion, options.targetVersion);
  while (existsSync(backupPath(projectRoot, name))) {
    date = new Date(date.getTime() + 1);
    name = formatBackupName(date, options.sourceVersion, options.targetVersion);
  }

  const finalPath = backupPath(projectRoot, name);
  const stagingPath = finalPath + PARTIAL_SUFFIX;

  try {
    removeDir(stagingPath);
    ensureDir(stagingPath);

    for (const dir of config.trackedDirs) {
      const source = join(projectRoot, dir);
      if (!existsSync(source)) continue;

      const dest = join(stagingPath, dir);
      copyDirRecursive(source, dest);

      const missing = diffTrees(listTreeEntries(source), listTreeEntries(dest));
      if (missing.length > 0) {
        throw new Error(`${dir}: 복사되지 않은 항목이 있습니다 (${missing.slice(0, 5).join(', ')})`);
      }
    }

    if (existsSync(manifestPath(projectRoot))) {
      copyFileSync(manifestPath(projectRoot), join(stagingPath, MANIFEST_SNAPSHOT));
    }

    renameSync(stagingPath, finalPath);
  } catch (err) {
    try {
      removeDir(stagingPath);
    } catch (cleanupErr) {
      logger.warn(`임시 백업 디렉토리 정리 실패: ${stagingPath} (${describeError(cleanupErr)})`);
    }
    throw new BackupError(`백업 생성 실패: ${describeError(err)}`, { cause: err });
  }

  const backup = parseBackupName(projectRoot, name);
  if (!backup) {
    throw new BackupError(`백업 이름을 해석할 수 없습니다: ${name}`);
  }
  logger.fileAction('backup', toPosixPath(relative(projectRoot, finalPath)));
  return backup;
}

/** 원본 항목 중 사본에 같은 경로/종류/링크 대상으로 없는 것 */
function diffTrees(expected: TreeEntry[], copied: TreeEntry[]): string[] {
  const signature = (entry: TreeEntry): string =>
    entry.kind === 'symlink' ? `${entry.path} -> ${entry.linkTarget ?? ''}` : `${entry.kind}:${entry.path}`;
  const copiedSet = new Set(copied.map(signature));
  const missing = expected.map(signature).filter((sig) => !copiedSet.has(sig));
  if (missing.length === 0 && copied.length !== expected.length) {
    missing.push(`항목 수 불일치 ${expected.length} → ${copied.length}`);
  }
  return missing;
}

/**
 * 작업 사본의 추적 디렉토리를 백업 내용으로 교체합니다 (병합하지 않음).
 * 백업 시점에 없던 디렉토리는 삭제된 상태로 남습니다.
 * 부분 적용된 업데이트 이후에도 안전하게 호출할 수 있습니다.
 */
export function restoreBackup(projectRoot: string, config: StencilConfig, backup: Backup): void {
  if (!existsSync(backup.storagePath)) {
    throw new BackupError(`백업 디렉토리가 없습니다: ${backup.storagePath}`);
  }

  for (const dir of config.trackedDirs) {
    const target = join(projectRoot, dir);
    const source = join(backup.storagePath, dir);
    removeDir(target);
    if (existsSync(source)) {
      copyDirRecursive(source, target);
    }
  }

  logger.fileAction('restore', backup.name);
}

/**
 * 백업 시점의 manifest로 되돌립니다. 백업 당시 manifest가 없었다면 현재 manifest를 지웁니다.
 * 명시적 롤백(rollbackTo)에서만 사용됩니다. 적용 실패 경로에서는 manifest가 기록되지 않았으므로 불필요합니다.
 */
export function restoreManifestSnapshot(projectRoot: string, backup: Backup): void {
  const snapshot = join(backup.storagePath, MANIFEST_SNAPSHOT);
  if (existsSync(snapshot)) {
    ensureDir(stencilDir(projectRoot));
    copyFileSync(snapshot, manifestPath(projectRoot));
  } else {
    removeFileIfExists(manifestPath(projectRoot));
  }
}

// ============================================================
// 조회 / 보존 정책
// ============================================================

/** 최신순 */
export function listBackups(projectRoot: string): Backup[] {
  const dir = backupsDir(projectRoot);
  if (!existsSync(dir)) return [];

  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => parseBackupName(projectRoot, entry.name))
    .filter((backup): backup is Backup => backup !== null)
    .sort((a, b) => (a.name < b.name ? 1 : a.name > b.name ? -1 : 0));
}

export function findBackup(projectRoot: string, name: string): Backup | undefined {
  return listBackups(projectRoot).find((backup) => backup.name === name);
}

/** 최신순 목록에서 keep개 이후 (삭제 대상) */
export function selectPrunable(backups: Backup[], keep: number): Backup[] {
  return backups.slice(keep);
}

/**
 * 최신 keep개만 남기고 삭제합니다. confirm이 true를 반환할 때만 삭제하며
 * 삭제 대상이 없으면 confirm을 호출하지 않습니다.
 */
export function pruneBackups(projectRoot: string, options: PruneOptions): PruneResult {
  const keep = options.keep ?? DEFAULT_RETENTION;
  if (!Number.isInteger(keep) || keep < 0) {
    throw new RangeError(`keep은 0 이상의 정수여야 합니다: ${keep}`);
  }

  const backups = listBackups(projectRoot);
  const doomed = selectPrunable(backups, keep);
  const kept = backups.slice(0, keep);

  if (doomed.length === 0) {
    return { confirmed: true, deleted: [], kept };
  }

  if (!options.confirm(doomed)) {
    logger.info(`백업 정리 취소됨 (${doomed.length}개 유지)`);
    return { confirmed: false, deleted: [], kept: backups };
  }

  for (const backup of doomed) {
    removeDir(backup.storagePath);
  }
  logger.ok(`오래된 백업 ${doomed.length}개 삭제, ${kept.length}개 보존`);
  return { confirmed: true, deleted: doomed, kept };
}
