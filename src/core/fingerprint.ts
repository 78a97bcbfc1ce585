import { isUtf8 } from 'node:buffer';
import { createHash } from 'node:crypto';
import { readFileBytes } from './file-ops.js';

const HASH_PREFIX = 'sha256:';
const BOM = '\uFEFF';

/**
 * 해시 전 정규화: CRLF → LF, 선행 BOM 제거, 각 줄 끝 공백 제거.
 * 들여쓰기(줄 앞 공백)는 의미가 있으므로 유지합니다.
 */
export function normalizeContent(content: string): string {
  let text = content.replace(/\r\n/g, '\n');
  if (text.startsWith(BOM)) {
    text = text.slice(BOM.length);
  }
  return text
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n');
}

/**
 * 유효한 UTF-8이면 텍스트로 디코딩, 아니면 null (바이너리).
 * 문자열은 이미 텍스트로 취급합니다.
 */
export function decodeText(content: Buffer | string): string | null {
  if (typeof content === 'string') return content;
  return isUtf8(content) ? content.toString('utf-8') : null;
}

/**
 * 텍스트는 정규화한 UTF-8 바이트를, 바이너리는 원본 바이트를 해시합니다.
 * 정규화 결과는 항상 유효한 UTF-8이므로 두 경우의 입력이 겹치지 않습니다.
 */
export function normalizedHash(content: Buffer | string): string {
  const text = decodeText(content);
  const hash = createHash('sha256');
  if (text === null) {
    hash.update(content);
  } else {
    hash.update(normalizeContent(text), 'utf-8');
  }
  return HASH_PREFIX + hash.digest('hex');
}

/** 파일이 없으면 null */
export function fileHash(filePath: string): string | null {
  const content = readFileBytes(filePath);
  return content === null ? null : normalizedHash(content);
}

/** 부재는 동일함이 아님: 어느 쪽이든 null이면 false (null == null 포함) */
export function hashesEqual(a: string | null, b: string | null): boolean {
  if (a === null || b === null) return false;
  return a === b;
}
