import { join } from 'node:path';
import { createPatch } from 'diff';
import type { ActionSummary, FileAction, FileState, ReconcileResult } from '../types/common.js';
import type { StencilConfig } from '../types/config.js';
import type { Manifest } from '../types/manifest.js';
import type { UpstreamRelease } from '../types/upstream.js';
import { decodeText, fileHash, hashesEqual, normalizedHash } from './fingerprint.js';
import { listFilesRecursive, readFileBytes } from './file-ops.js';
import { isInTrackedDir, isProtectedPath } from './config.js';
import { ReconcileError, describeError } from './errors.js';

export interface ClassifyInput {
  path: string;
  originalHash: string | null;
  upstreamHash: string | null;
  currentHash: string | null;
  isOfficial: boolean;
  /** manifest의 customized 플래그. 해시 비교보다 우선합니다 */
  flaggedCustomized?: boolean;
}

/**
 * 파일 하나의 상태와 액션을 결정합니다.
 *
 * | current | upstream | 조건                          | action   |
 * |---------|----------|-------------------------------|----------|
 * | 없음    | 있음     |                               | add      |
 * | 없음    | 없음     |                               | skip     |
 * | 있음    | 없음     | 커스텀이거나 original과 다름  | preserve |
 * | 있음    | 없음     | original과 같음               | remove   |
 * | 있음    | 있음     | 커스텀 + upstream 변경        | merge    |
 * | 있음    | 있음     | 커스텀                        | preserve |
 * | 있음    | 있음     | upstream 변경                 | update   |
 * | 있음    | 있음     | 그 외                         | skip     |
 */
export function classify(input: ClassifyInput): FileState {
  const { path, originalHash, upstreamHash, currentHash, isOfficial } = input;

  const hashCustomized =
    currentHash !== null && originalHash !== null && !hashesEqual(currentHash, originalHash);
  const isCustomized = currentHash !== null && ((input.flaggedCustomized ?? false) || hashCustomized);

  const hasUpstreamChanges =
    (originalHash === null) !== (upstreamHash === null) ||
    (originalHash !== null && upstreamHash !== null && !hashesEqual(originalHash, upstreamHash));

  const isConflict = isCustomized && hasUpstreamChanges;

  return {
    path,
    currentHash,
    originalHash,
    upstreamHash,
    isCustomized,
    hasUpstreamChanges,
    isConflict,
    isOfficial,
    action: decideAction(currentHash, originalHash, upstreamHash, isCustomized, hasUpstreamChanges),
  };
}

function decideAction(
  currentHash: string | null,
  originalHash: string | null,
  upstreamHash: string | null,
  isCustomized: boolean,
  hasUpstreamChanges: boolean,
): FileAction {
  if (currentHash === null) {
    return upstreamHash !== null ? 'add' : 'skip';
  }

  if (upstreamHash === null) {
    // original과 일치가 확인된 파일만 삭제. 기록 없는 파일은 보존
    return !isCustomized && hashesEqual(currentHash, originalHash) ? 'remove' : 'preserve';
  }

  // current가 original, upstream 모두와 같은데 둘이 다르면 해시 충돌이나 로직 오류. 사용자 검토로 넘김
  if (
    hashesEqual(currentHash, originalHash) &&
    hashesEqual(currentHash, upstreamHash) &&
    !hashesEqual(originalHash, upstreamHash)
  ) {
    return 'merge';
  }

  if (isCustomized && hasUpstreamChanges) return 'merge';
  if (isCustomized) return 'preserve';
  if (hasUpstreamChanges) return 'update';
  return 'skip';
}

/**
 * manifest의 모든 추적 파일과 upstream에만 있는 신규 파일을 분류합니다.
 *
 * 결과 순서: manifest 순서 → upstream 제공 순서의 신규 파일.
 * 관리 디렉토리 안에 있지만 공식 추적 파일이 아닌 파일은 customFiles로 분리되며
 * apply는 분류와 무관하게 이 파일들을 건드리지 않습니다.
 * 오류가 하나라도 나면 부분 결과 없이 ReconcileError를 던집니다.
 */
export function reconcileAll(
  projectRoot: string,
  config: StencilConfig,
  manifest: Manifest,
  upstream: UpstreamRelease,
): ReconcileResult {
  for (const path of upstream.files.keys()) {
    assertUpstreamPath(config, path);
  }

  const states: FileState[] = [];
  const trackedPaths = new Set<string>();
  const officialPaths = new Set<string>();

  for (const tracked of manifest.trackedFiles) {
    trackedPaths.add(tracked.path);
    if (tracked.isOfficial && !isProtectedPath(config, tracked.path)) {
      officialPaths.add(tracked.path);
    }

    const content = upstream.files.get(tracked.path);
    states.push(
      classify({
        path: tracked.path,
        originalHash: tracked.originalHash,
        upstreamHash: content === undefined ? null : normalizedHash(content),
        currentHash: readCurrentHash(projectRoot, tracked.path),
        isOfficial: tracked.isOfficial,
        flaggedCustomized: tracked.customized,
      }),
    );
  }

  const newPaths: string[] = [];
  for (const [path, content] of upstream.files) {
    if (trackedPaths.has(path)) continue;
    newPaths.push(path);
    states.push(
      classify({
        path,
        originalHash: null,
        upstreamHash: normalizedHash(content),
        currentHash: readCurrentHash(projectRoot, path),
        isOfficial: true,
      }),
    );
  }

  return {
    sourceVersion: manifest.distributionVersion,
    targetVersion: upstream.version,
    states,
    customFiles: findCustomFiles(projectRoot, config, officialPaths, states, newPaths),
  };
}

/**
 * 사용자 파일 목록:
 * - 추적 디렉토리에 있으나 공식 추적 파일이 아닌 파일
 * - 이미 로컬에 존재하는 신규 upstream 경로 (덮어쓰지 않음)
 * - protectedPaths에 해당하는 모든 상태 경로
 */
function findCustomFiles(
  projectRoot: string,
  config: StencilConfig,
  officialPaths: ReadonlySet<string>,
  states: FileState[],
  newPaths: string[],
): string[] {
  const custom = new Set<string>();

  for (const dir of config.trackedDirs) {
    for (const file of listFilesRecursive(join(projectRoot, dir))) {
      const path = `${dir}/${file}`;
      if (!officialPaths.has(path)) custom.add(path);
    }
  }

  const newPathSet = new Set(newPaths);
  for (const state of states) {
    if (newPathSet.has(state.path) && state.currentHash !== null) custom.add(state.path);
    if (isProtectedPath(config, state.path)) custom.add(state.path);
  }

  return [...custom].sort();
}

function assertUpstreamPath(config: StencilConfig, path: string): void {
  if (path.startsWith('/') || /^[A-Za-z]:/.test(path) || path.includes('\\')) {
    throw new ReconcileError(`upstream 경로는 POSIX 상대 경로여야 합니다: ${path}`);
  }
  if (path.split('/').some((segment) => segment === '..' || segment === '.' || segment === '')) {
    throw new ReconcileError(`upstream 경로가 올바르지 않습니다: ${path}`);
  }
  if (!isInTrackedDir(config, path)) {
    throw new ReconcileError(`upstream 경로가 추적 디렉토리 밖에 있습니다: ${path}`);
  }
}

function readCurrentHash(projectRoot: string, path: string): string | null {
  try {
    return fileHash(join(projectRoot, path));
  } catch (err) {
    throw new ReconcileError(`로컬 파일을 읽을 수 없습니다: ${path} (${describeError(err)})`, { cause: err });
  }
}

export function summarizeActions(states: FileState[]): ActionSummary {
  const summary: ActionSummary = { add: 0, remove: 0, preserve: 0, update: 0, merge: 0, skip: 0 };
  for (const state of states) {
    summary[state.action]++;
  }
  return summary;
}

/** 커스텀 파일을 제외하고 실제 파일 변경이 필요한 상태가 없는지 */
export function isUpToDate(result: ReconcileResult): boolean {
  const custom = new Set(result.customFiles);
  return result.states.every(
    (state) => custom.has(state.path) || state.action === 'skip' || state.action === 'preserve',
  );
}

/** 어느 한쪽이라도 바이너리면 패치 대신 한 줄 안내를 반환합니다 */
export function generateDiff(
  projectRoot: string,
  relativePath: string,
  incoming: Buffer | string | null,
): string {
  const current = decodeText(readFileBytes(join(projectRoot, relativePath)) ?? '');
  const next = decodeText(incoming ?? '');
  if (current === null || next === null) {
    return `Binary files ${relativePath} differ`;
  }
  return createPatch(relativePath, current, next, 'current', 'incoming');
}
