/**
 * 프로젝트 레벨 경로 빌더
 *
 * .stencil/ 하위 경로를 중앙화합니다.
 * 다른 모듈에서 .stencil/ 경로를 직접 하드코딩하지 않습니다.
 */

import { join } from 'node:path';
import { STENCIL_DIR } from '../types/common.js';
import { CONFIG_FILENAME } from '../types/config.js';
import { MANIFEST_FILENAME } from '../types/manifest.js';

/** .stencil/ 디렉토리 */
export function stencilDir(projectRoot: string): string {
  return join(projectRoot, STENCIL_DIR);
}

/** .stencil/manifest.json */
export function manifestPath(projectRoot: string): string {
  return join(projectRoot, STENCIL_DIR, MANIFEST_FILENAME);
}

/** .stencil/backups/ */
export function backupsDir(projectRoot: string): string {
  return join(projectRoot, STENCIL_DIR, 'backups');
}

/** .stencil/backups/<name>/ */
export function backupPath(projectRoot: string, name: string): string {
  return join(backupsDir(projectRoot), name);
}

/** stencil-sync.config.json (프로젝트 루트) */
export function configPath(projectRoot: string): string {
  return join(projectRoot, CONFIG_FILENAME);
}
