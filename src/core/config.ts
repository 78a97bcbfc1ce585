import type { StencilConfig } from '../types/config.js';
import { DEFAULT_CONFIG } from '../types/config.js';
import { configSchema } from '../schemas/config.schema.js';
import { readFileContent } from './file-ops.js';
import { configPath } from './project-paths.js';
import { ConfigError } from './errors.js';

/**
 * stencil-sync.config.json을 읽습니다. 파일이 없으면 기본값.
 * 파싱/스키마 오류는 ConfigError (기본값으로 대체하지 않음).
 */
export function loadConfig(projectRoot: string): StencilConfig {
  const path = configPath(projectRoot);
  const content = readFileContent(path);
  if (content === null) {
    return cloneDefaults();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`설정 파일 JSON 파싱 실패 (${path}): ${String(err)}`, { cause: err });
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`설정 파일이 올바르지 않습니다 (${path}): ${detail}`, { cause: parsed.error });
  }
  return parsed.data;
}

/** 경로가 protectedPaths의 파일이거나 그 하위인지 */
export function isProtectedPath(config: StencilConfig, relativePath: string): boolean {
  return config.protectedPaths.some((protectedPath) => {
    const prefix = protectedPath.replace(/\/+$/, '');
    return relativePath === prefix || relativePath.startsWith(prefix + '/');
  });
}

/** 경로가 추적 디렉토리 중 하나 아래에 있는지 */
export function isInTrackedDir(config: StencilConfig, relativePath: string): boolean {
  return config.trackedDirs.some((dir) => relativePath.startsWith(dir + '/'));
}

function cloneDefaults(): StencilConfig {
  return {
    ...DEFAULT_CONFIG,
    trackedDirs: [...DEFAULT_CONFIG.trackedDirs],
    backup: { ...DEFAULT_CONFIG.backup },
    protectedPaths: [...DEFAULT_CONFIG.protectedPaths],
  };
}
