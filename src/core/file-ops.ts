import {
  copyFileSync,
  readFileSync,
  writeFileSync,
  mkdirSync,
  existsSync,
  readdirSync,
  readlinkSync,
  renameSync,
  rmSync,
  symlinkSync,
  unlinkSync,
} from 'node:fs';
import { dirname, join, posix, relative, sep } from 'node:path';
import type { FileOps } from '../types/apply.js';

export function ensureDir(dirPath: string): void {
  mkdirSync(dirPath, { recursive: true });
}

/** 문자열은 UTF-8로, Buffer는 바이트 그대로 기록 */
export function safeWriteFile(filePath: string, content: Buffer | string): void {
  ensureDir(dirname(filePath));
  writeFileSync(filePath, content);
}

/** tmp 파일에 쓴 뒤 rename. 중간에 죽어도 기존 파일은 온전함 */
export function atomicWriteFile(filePath: string, content: string): void {
  ensureDir(dirname(filePath));
  const tmpPath = `${filePath}.tmp`;
  writeFileSync(tmpPath, content, 'utf-8');
  renameSync(tmpPath, filePath);
}

/**
 * 파일이 없으면 null. 그 외 읽기 오류(권한, 디렉토리 등)는 그대로 던집니다.
 */
export function readFileContent(filePath: string): string | null {
  try {
    return readFileSync(filePath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

/** readFileContent의 바이트 버전. 템플릿/추적 파일 내용은 항상 이쪽으로 읽습니다 */
export function readFileBytes(filePath: string): Buffer | null {
  try {
    return readFileSync(filePath);
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

export function removeFileIfExists(filePath: string): void {
  if (existsSync(filePath)) {
    unlinkSync(filePath);
  }
}

export function removeDir(dirPath: string): void {
  rmSync(dirPath, { recursive: true, force: true });
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** OS 경로 → manifest 경로 (POSIX 구분자) */
export function toPosixPath(path: string): string {
  return path.split(sep).join(posix.sep);
}

/**
 * rootDir 아래 모든 파일을 rootDir 기준 POSIX 상대 경로로 반환 (정렬됨).
 * 디렉토리가 없으면 빈 배열.
 */
export function listFilesRecursive(rootDir: string): string[] {
  if (!existsSync(rootDir)) return [];

  const files: string[] = [];
  const walk = (dir: string): void => {
    for (const entry of readdirSync(dir, { withFileTypes: true })) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(fullPath);
      } else if (entry.isFile()) {
        files.push(toPosixPath(relative(rootDir, fullPath)));
      }
    }
  };
  walk(rootDir);

  return files.sort();
}

export type TreeEntryKind = 'dir' | 'file' | 'symlink' | 'other';

export interface TreeEntry {
  path: string;
  kind: TreeEntryKind;
  /** symlink의 링크 대상 (해석하지 않은 원문) */
  linkTarget?: string;
}

/**
 * rootDir 아래 모든 항목(디렉토리, 파일, 심볼릭 링크, 그 외)을 정렬해 반환합니다.
 * 링크는 따라가지 않습니다. 백업 사본 검증용.
 */
export function listTreeEntries(rootDir: string): TreeEntry[] {
  if (!existsSync(rootDir)) return [];

  const entries: TreeEntry[] = [];
  const walk = (dir: string): void => {
    for (const entry of readdirSync(dir, { withFileTypes: true })) {
      const fullPath = join(dir, entry.name);
      const path = toPosixPath(relative(rootDir, fullPath));
      if (entry.isDirectory()) {
        entries.push({ path, kind: 'dir' });
        walk(fullPath);
      } else if (entry.isFile()) {
        entries.push({ path, kind: 'file' });
      } else if (entry.isSymbolicLink()) {
        entries.push({ path, kind: 'symlink', linkTarget: readlinkSync(fullPath) });
      } else {
        entries.push({ path, kind: 'other' });
      }
    }
  };
  walk(rootDir);

  return entries.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

/**
 * 디렉토리 트리를 통째로 복사합니다 (빈 디렉토리 포함).
 * 심볼릭 링크는 대상을 따라가지 않고 링크 자체를 같은 대상 문자열로 다시 만듭니다.
 * 소켓/FIFO 같은 특수 파일은 복사하지 않으므로 listTreeEntries 비교에서 드러납니다.
 * dest는 존재하지 않아야 합니다.
 */
export function copyDirRecursive(src: string, dest: string): void {
  mkdirSync(dest, { recursive: true });
  for (const entry of readdirSync(src, { withFileTypes: true })) {
    const from = join(src, entry.name);
    const to = join(dest, entry.name);
    if (entry.isDirectory()) {
      copyDirRecursive(from, to);
    } else if (entry.isFile()) {
      copyFileSync(from, to);
    } else if (entry.isSymbolicLink()) {
      symlinkSync(readlinkSync(from), to);
    }
  }
}

export const nodeFileOps: FileOps = {
  writeFile: safeWriteFile,
  removeFile: removeFileIfExists,
  readFile: readFileBytes,
};
