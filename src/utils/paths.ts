import { resolve, join, isAbsolute } from 'node:path';
import { fileURLToPath } from 'node:url';
import { dirname } from 'node:path';
import type { StencilConfig } from '../types/config.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export function getPackageRoot(): string {
  // dist/utils/paths.js, src/utils/paths.ts 둘 다 두 단계 위
  return resolve(__dirname, '..', '..');
}

/** 패키지에 번들된 템플릿 (<version>/ 하위 디렉토리 구조) */
export function getTemplatesDir(): string {
  return join(getPackageRoot(), 'templates');
}

export function getProjectRoot(cwd?: string): string {
  return resolve(cwd || process.cwd());
}

export function resolveTemplatesDir(projectRoot: string, config: StencilConfig): string {
  if (!config.templatesDir) return getTemplatesDir();
  return isAbsolute(config.templatesDir)
    ? config.templatesDir
    : resolve(projectRoot, config.templatesDir);
}
