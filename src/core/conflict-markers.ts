/**
 * 충돌 마커: git 스타일 세 부분 블록
 *
 * <<<<<<< current (local)
 * (사용자 현재 내용)
 * =======
 * (upstream 새 내용)
 * >>>>>>> incoming (upstream 1.2.0)
 *
 * 에디터 내장 충돌 해결 UI가 그대로 인식하는 형식입니다. 내용은 병합하지 않습니다.
 */

export const MARKER_CURRENT = '<<<<<<< current (local)';
export const MARKER_SEPARATOR = '=======';
export const MARKER_INCOMING_PREFIX = '>>>>>>> incoming';

export function buildConflictBlock(current: string, incoming: string, incomingVersion: string): string {
  return [
    MARKER_CURRENT + '\n',
    withTrailingNewline(current),
    MARKER_SEPARATOR + '\n',
    withTrailingNewline(incoming),
    `${MARKER_INCOMING_PREFIX} (upstream ${incomingVersion})\n`,
  ].join('');
}

export function hasConflictMarkers(content: string): boolean {
  return (
    /^<<<<<<< /m.test(content) &&
    /^=======\r?$/m.test(content) &&
    /^>>>>>>> /m.test(content)
  );
}

function withTrailingNewline(content: string): string {
  return content === '' || content.endsWith('\n') ? content : content + '\n';
}
