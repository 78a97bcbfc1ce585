import type { Backup, PruneOptions, PruneResult } from './backup.js';
import type { Manifest } from './manifest.js';

export type ApplyPhase = 'idle' | 'backed-up' | 'applying' | 'committed' | 'rolled-back' | 'aborted';

/** apply 루프가 파일시스템을 건드리는 유일한 경로 */
export interface FileOps {
  writeFile(absolutePath: string, content: Buffer | string): void;
  removeFile(absolutePath: string): void;
  readFile(absolutePath: string): Buffer | null;
}

export interface ApplyOptions {
  /** false면 백업 없이 적용 (호출자가 명시적으로 끈 경우만) */
  backup?: boolean;
  fileOps?: FileOps;
  now?: () => Date;
  /** 커밋 후 보존 정책 적용. confirm이 false면 아무것도 지우지 않음 */
  prune?: PruneOptions;
  onPhase?: (phase: ApplyPhase) => void;
}

export interface ApplyOutcome {
  phase: ApplyPhase;
  backup: Backup | null;
  added: string[];
  updated: string[];
  removed: string[];
  preserved: string[];
  /** 충돌 마커가 기록되어 수동 해결이 필요한 파일 */
  conflicts: string[];
  /** merge로 분류됐지만 내용이 upstream과 같아 update로 처리된 파일 */
  falsePositives: string[];
  skippedCustom: string[];
  distributionVersion: string;
  /** 커밋된 manifest (실패 시 결과 자체가 반환되지 않음) */
  manifest: Manifest;
  prune: PruneResult | null;
}
