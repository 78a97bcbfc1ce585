/**
 * 파일 단위 조정(reconcile) 액션.
 * apply 루프는 이 유니온을 exhaustive switch로 분기합니다.
 */
export type FileAction = 'add' | 'remove' | 'preserve' | 'update' | 'merge' | 'skip';

export const FILE_ACTIONS: readonly FileAction[] = [
  'add',
  'remove',
  'preserve',
  'update',
  'merge',
  'skip',
] as const;

/** 한 번의 reconcile 실행에서 계산되는 파일 상태 (저장되지 않음) */
export interface FileState {
  path: string;
  currentHash: string | null;
  originalHash: string | null;
  upstreamHash: string | null;
  isCustomized: boolean;
  hasUpstreamChanges: boolean;
  /** 항상 isCustomized && hasUpstreamChanges */
  isConflict: boolean;
  isOfficial: boolean;
  action: FileAction;
}

export interface ReconcileResult {
  /** 배포 버전 (적용 후 manifest.distributionVersion이 됨) */
  targetVersion: string;
  sourceVersion: string;
  /** manifest 순서 → 신규 upstream 파일 순서 */
  states: FileState[];
  /** 어떤 액션으로도 건드리지 않는 사용자 파일 */
  customFiles: string[];
}

export type ActionSummary = Record<FileAction, number>;

/** 스탠실 작업 디렉토리 (manifest, 백업). 추적 디렉토리와 겹칠 수 없음 */
export const STENCIL_DIR = '.stencil';
