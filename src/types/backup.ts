export interface Backup {
  /** 디렉토리 이름: <timestamp>__<sourceVersion>__<targetVersion> */
  name: string;
  /** ISO 8601 */
  timestamp: string;
  sourceVersion: string;
  targetVersion: string;
  storagePath: string;
}

export interface CreateBackupOptions {
  sourceVersion: string;
  targetVersion: string;
  now?: () => Date;
}

export interface PruneOptions {
  keep?: number;
  /** 삭제 대상 목록을 받아 true를 반환할 때만 삭제 */
  confirm: (doomed: Backup[]) => boolean;
}

export interface PruneResult {
  confirmed: boolean;
  deleted: Backup[];
  kept: Backup[];
}
