/**
 * stencil-sync 오류 분류
 *
 * - 전제조건 오류(Config/Manifest/Prerequisite/Upstream): 변경 전에 보고, 자동 재시도 없음
 * - BackupError: 변경 전 중단
 * - apply 중 오류: 백업 복원 후 원래 오류를 다시 던짐
 * - RollbackFailedError: 복원까지 실패. 일관성을 보장할 수 없는 유일한 경우
 */

export type StencilErrorCode =
  | 'CONFIG_INVALID'
  | 'MANIFEST_CORRUPT'
  | 'PREREQUISITE_FAILED'
  | 'UPSTREAM_UNAVAILABLE'
  | 'RECONCILE_FAILED'
  | 'BACKUP_FAILED'
  | 'ROLLBACK_FAILED';

export class StencilError extends Error {
  readonly code: StencilErrorCode;

  constructor(message: string, code: StencilErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StencilError';
    this.code = code;
  }
}

export class ConfigError extends StencilError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIG_INVALID', options);
    this.name = 'ConfigError';
  }
}

export class ManifestCorruptError extends StencilError {
  readonly manifestPath: string;

  constructor(manifestPath: string, detail: string, options?: { cause?: unknown }) {
    super(`manifest를 읽을 수 없습니다 (${manifestPath}): ${detail}`, 'MANIFEST_CORRUPT', options);
    this.name = 'ManifestCorruptError';
    this.manifestPath = manifestPath;
  }
}

export class PrerequisiteError extends StencilError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PREREQUISITE_FAILED', options);
    this.name = 'PrerequisiteError';
  }
}

export class UpstreamError extends StencilError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'UPSTREAM_UNAVAILABLE', options);
    this.name = 'UpstreamError';
  }
}

export class ReconcileError extends StencilError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'RECONCILE_FAILED', options);
    this.name = 'ReconcileError';
  }
}

export class BackupError extends StencilError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'BACKUP_FAILED', options);
    this.name = 'BackupError';
  }
}

export class RollbackFailedError extends StencilError {
  readonly originalError: unknown;
  readonly restoreError: unknown;
  readonly backupPath: string;

  constructor(originalError: unknown, restoreError: unknown, backupPath: string) {
    super(
      `적용 실패 후 복원도 실패했습니다. 작업 사본이 일관되지 않을 수 있습니다. ` +
        `수동 복구용 백업: ${backupPath} ` +
        `(적용 오류: ${describeError(originalError)} / 복원 오류: ${describeError(restoreError)})`,
      'ROLLBACK_FAILED',
      { cause: originalError },
    );
    this.name = 'RollbackFailedError';
    this.originalError = originalError;
    this.restoreError = restoreError;
    this.backupPath = backupPath;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isStencilError(err: unknown): err is StencilError {
  return err instanceof StencilError;
}
