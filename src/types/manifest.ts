export interface TrackedFile {
  /** 프로젝트 상대 경로 (POSIX 구분자) */
  path: string;
  /** 마지막 동기화 시점의 정규화 해시. null = 기록된 적 없음 */
  originalHash: string | null;
  /** 해시 비교와 별개로 설정되는 커스텀 플래그 */
  customized: boolean;
  /** 배포본 파일 여부 (false면 관리 디렉토리 안의 사용자 파일) */
  isOfficial: boolean;
}

export interface Manifest {
  schemaVersion: string;
  distributionVersion: string;
  createdAt: string;
  updatedAt: string;
  trackedFiles: TrackedFile[];
}

export const MANIFEST_SCHEMA_VERSION = '1';
export const MANIFEST_FILENAME = 'manifest.json';

export interface CreateManifestOptions {
  /** 최초 manifest의 안전 기본값: 발견된 모든 파일을 customized로 표시 */
  assumeAllCustomized?: boolean;
  /** 주어지면 이 집합에 있는 경로만 isOfficial */
  officialPaths?: ReadonlySet<string>;
}
