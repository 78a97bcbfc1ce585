export interface BackupSettings {
  enabled: boolean;
  /** 보존할 최신 백업 개수 */
  retention: number;
}

export interface StencilConfig {
  /** 템플릿이 설치되는 관리 디렉토리 (프로젝트 상대) */
  trackedDirs: string[];
  /** upstream 템플릿 루트. 상대 경로는 프로젝트 루트 기준, 없으면 패키지 templates/ */
  templatesDir?: string;
  backup: BackupSettings;
  /** 절대 건드리지 않는 파일/디렉토리 접두사 */
  protectedPaths: string[];
}

export const DEFAULT_RETENTION = 5;

export const DEFAULT_CONFIG: StencilConfig = {
  trackedDirs: ['.claude', '.agent'],
  backup: {
    enabled: true,
    retention: DEFAULT_RETENTION,
  },
  protectedPaths: [],
};

export const CONFIG_FILENAME = 'stencil-sync.config.json';
