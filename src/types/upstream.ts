/** 상대 경로 → 파일 바이트. 삽입 순서가 upstream 제공 순서 */
export type UpstreamContents = ReadonlyMap<string, Buffer>;

export interface UpstreamRelease {
  version: string;
  files: UpstreamContents;
}

/**
 * 템플릿 배포처. 네트워크/재시도는 구현체 책임이며
 * 엔진은 동기 호출로만 취급합니다.
 */
export interface UpstreamProvider {
  latestVersion(): string;
  versionExists(version: string): boolean;
  fetch(version: string): UpstreamRelease;
}
