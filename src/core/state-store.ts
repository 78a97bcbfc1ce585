/**
 * State Store: .stencil/manifest.json 수명 주기
 *
 * manifest는 load → 변환 → save로 명시적으로 전달됩니다 (전역 싱글톤 없음).
 * 업데이트 중에는 커밋 시점에 딱 한 번 기록되므로, 적용 도중 중단되면
 * 디스크의 manifest는 적용 전 상태(= 백업이 복원하는 상태)를 그대로 가리킵니다.
 */

import { join } from 'node:path';
import type { StencilConfig } from '../types/config.js';
import type { CreateManifestOptions, Manifest, TrackedFile } from '../types/manifest.js';
import { MANIFEST_SCHEMA_VERSION } from '../types/manifest.js';
import { manifestSchema } from '../schemas/manifest.schema.js';
import { atomicWriteFile, readFileContent, listFilesRecursive } from './file-ops.js';
import { fileHash } from './fingerprint.js';
import { manifestPath } from './project-paths.js';
import { isProtectedPath } from './config.js';
import { ManifestCorruptError } from './errors.js';
import { logger } from '../utils/logger.js';

/**
 * manifest를 읽습니다.
 * @returns 파일이 없으면 null. 손상/읽기 불가는 ManifestCorruptError
 */
export function loadManifest(projectRoot: string): Manifest | null {
  const path = manifestPath(projectRoot);

  let content: string | null;
  try {
    content = readFileContent(path);
  } catch (err) {
    throw new ManifestCorruptError(path, `읽기 실패: ${String(err)}`, { cause: err });
  }
  if (content === null) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ManifestCorruptError(path, 'JSON 파싱 실패', { cause: err });
  }

  const parsed = manifestSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ManifestCorruptError(path, detail, { cause: parsed.error });
  }
  return parsed.data;
}

/**
 * 최초 실행용 manifest를 메모리에 만듭니다 (디스크에 쓰지 않음).
 *
 * 안전 기본값: 기존 파일이 사용자 수정본인지 알 수 없으므로 모두 customized로 표시합니다.
 * 첫 reconcile에서는 전부 preserve 또는 merge가 되고, 이후 rescan으로 기준선을 재설정할 수 있습니다.
 */
export function createManifest(
  projectRoot: string,
  config: StencilConfig,
  version: string,
  options: CreateManifestOptions = {},
): Manifest {
  const assumeAllCustomized = options.assumeAllCustomized ?? true;
  const now = new Date().toISOString();
  const trackedFiles: TrackedFile[] = [];

  for (const dir of config.trackedDirs) {
    for (const file of listFilesRecursive(join(projectRoot, dir))) {
      const path = `${dir}/${file}`;
      if (isProtectedPath(config, path)) continue;
      trackedFiles.push({
        path,
        originalHash: null,
        customized: assumeAllCustomized,
        isOfficial: options.officialPaths ? options.officialPaths.has(path) : true,
      });
    }
  }

  return {
    schemaVersion: MANIFEST_SCHEMA_VERSION,
    distributionVersion: version,
    createdAt: now,
    updatedAt: now,
    trackedFiles,
  };
}

export function saveManifest(projectRoot: string, manifest: Manifest): void {
  manifest.updatedAt = new Date().toISOString();
  atomicWriteFile(manifestPath(projectRoot), JSON.stringify(manifest, null, 2) + '\n');
}

/**
 * 추적 파일을 다시 스캔해 originalHash를 현재 디스크 해시로 재설정합니다.
 * 사용자가 현재 상태를 기준선으로 확정한 경우에만 호출됩니다 (rescan).
 * customized 플래그는 건드리지 않습니다.
 */
export function updateHashes(manifest: Manifest, projectRoot: string): Manifest {
  for (const file of manifest.trackedFiles) {
    file.originalHash = fileHash(join(projectRoot, file.path));
  }
  return manifest;
}

/** rescan 결과를 반영하고 customized 플래그까지 초기화 */
export function resetBaseline(manifest: Manifest, projectRoot: string): Manifest {
  updateHashes(manifest, projectRoot);
  let cleared = 0;
  for (const file of manifest.trackedFiles) {
    if (file.customized && file.originalHash !== null) {
      file.customized = false;
      cleared++;
    }
  }
  logger.info(`기준선 재설정: ${manifest.trackedFiles.length}개 파일, customized 해제 ${cleared}개`);
  return manifest;
}

export function findTrackedFile(manifest: Manifest, path: string): TrackedFile | undefined {
  return manifest.trackedFiles.find((file) => file.path === path);
}

/** 경로가 이미 있으면 제자리 갱신, 없으면 끝에 추가 (순서 유지) */
export function upsertTrackedFile(manifest: Manifest, entry: TrackedFile): void {
  const existing = findTrackedFile(manifest, entry.path);
  if (existing) {
    existing.originalHash = entry.originalHash;
    existing.customized = entry.customized;
    existing.isOfficial = entry.isOfficial;
  } else {
    manifest.trackedFiles.push({ ...entry });
  }
}

export function removeTrackedFile(manifest: Manifest, path: string): void {
  manifest.trackedFiles = manifest.trackedFiles.filter((file) => file.path !== path);
}

export function cloneManifest(manifest: Manifest): Manifest {
  return {
    ...manifest,
    trackedFiles: manifest.trackedFiles.map((file) => ({ ...file })),
  };
}
