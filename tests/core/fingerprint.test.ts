import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createHash } from 'node:crypto';
import { decodeText, fileHash, hashesEqual, normalizeContent, normalizedHash } from '../../src/core/fingerprint.js';

describe('fingerprint', () => {
  describe('normalizeContent', () => {
    it('should convert CRLF to LF and strip trailing whitespace per line', () => {
      expect(normalizeContent('a \r\nb\t\r\n')).toBe('a\nb\n');
    });

    it('should strip a leading BOM', () => {
      expect(normalizeContent('\uFEFFhello')).toBe('hello');
    });

    it('should keep leading indentation', () => {
      expect(normalizeContent('  - item\n\tcode')).toBe('  - item\n\tcode');
    });
  });

  describe('normalizedHash', () => {
    it('should use sha256: prefix with 64 hex chars', () => {
      expect(normalizedHash('content')).toMatch(/^sha256:[0-9a-f]{64}$/);
    });

    it('줄바꿈/BOM/끝 공백 차이는 같은 해시', () => {
      const base = normalizedHash('line one\nline two\n');
      expect(normalizedHash('line one\r\nline two\r\n')).toBe(base);
      expect(normalizedHash('\uFEFFline one\nline two\n')).toBe(base);
      expect(normalizedHash('line one   \nline two\t\n')).toBe(base);
    });

    it('내용 차이는 다른 해시', () => {
      expect(normalizedHash('line one\n')).not.toBe(normalizedHash('line 1\n'));
      expect(normalizedHash('x')).not.toBe(normalizedHash('  x'));
    });

    it('UTF-8 바이트는 같은 텍스트 문자열과 같은 해시', () => {
      const bytes = Buffer.from('\uFEFFline one\r\nline two \r\n', 'utf-8');
      expect(normalizedHash(bytes)).toBe(normalizedHash('line one\nline two\n'));
    });

    it('should hash invalid UTF-8 as raw bytes without normalization', () => {
      const bytes = Buffer.from([0x41, 0xff, 0x0d, 0x0a]);
      const expected = 'sha256:' + createHash('sha256').update(bytes).digest('hex');

      expect(normalizedHash(bytes)).toBe(expected);
      expect(normalizedHash(bytes)).not.toBe(normalizedHash(Buffer.from([0x41, 0xff, 0x0a])));
    });

    it('서로 다른 바이너리는 다른 해시', () => {
      expect(normalizedHash(Buffer.from([0x41, 0xff, 0x0a]))).not.toBe(
        normalizedHash(Buffer.from([0x41, 0xfe, 0x0a])),
      );
    });
  });

  describe('decodeText', () => {
    it('should decode valid UTF-8 and reject anything else', () => {
      expect(decodeText(Buffer.from('한글 text', 'utf-8'))).toBe('한글 text');
      expect(decodeText(Buffer.from('89504e47fffe008081', 'hex'))).toBeNull();
      expect(decodeText('already text')).toBe('already text');
    });
  });

  describe('hashesEqual', () => {
    const h = normalizedHash('same');

    it('should be true for identical hashes', () => {
      expect(hashesEqual(h, normalizedHash('same'))).toBe(true);
    });

    it('부재는 동일함이 아님 (null == null 포함)', () => {
      expect(hashesEqual(null, null)).toBe(false);
      expect(hashesEqual(h, null)).toBe(false);
      expect(hashesEqual(null, h)).toBe(false);
    });
  });

  describe('fileHash', () => {
    let testDir: string;

    beforeEach(() => {
      testDir = mkdtempSync(join(tmpdir(), 'stencil-fingerprint-test-'));
    });

    afterEach(() => {
      rmSync(testDir, { recursive: true, force: true });
    });

    it('should return null when the file does not exist', () => {
      expect(fileHash(join(testDir, 'missing.md'))).toBeNull();
    });

    it('should hash the normalized file content', () => {
      writeFileSync(join(testDir, 'doc.md'), '# Title\r\n');
      expect(fileHash(join(testDir, 'doc.md'))).toBe(normalizedHash('# Title\n'));
    });

    it('should hash binary files by their bytes', () => {
      const bytes = Buffer.from([0x00, 0xfe, 0xff, 0x80]);
      writeFileSync(join(testDir, 'blob.bin'), bytes);
      expect(fileHash(join(testDir, 'blob.bin'))).toBe(normalizedHash(bytes));
    });
  });
});
