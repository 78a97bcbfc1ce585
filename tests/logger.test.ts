import { describe, it, expect, beforeEach } from 'vitest';
import { formatEntry, logger } from '../src/utils/logger.js';

describe('logger', () => {
  beforeEach(() => {
    logger.clear();
  });

  it('should buffer messages with level prefixes until flush', () => {
    logger.info('시작');
    logger.ok('완료');
    logger.fileAction('backup', '.stencil/backups/x');

    expect(logger.flush()).toBe('[INFO] 시작\n[OK] 완료\n  B .stencil/backups/x');
    expect(logger.flush()).toBe('');
  });

  it('drain()은 레벨 정보를 유지한 채 비움', () => {
    logger.warn('주의');
    logger.error('실패');

    const entries = logger.drain();

    expect(entries).toEqual([
      { level: 'warn', text: '주의' },
      { level: 'error', text: '실패' },
    ]);
    expect(entries.map(formatEntry)).toEqual(['[WARN] 주의', '[ERROR] 실패']);
    expect(logger.toText()).toBe('');
  });

  it('toText() does not clear the buffer', () => {
    logger.fileAction('custom', '.claude/mine.md');
    expect(logger.toText()).toBe('  * .claude/mine.md');
    expect(logger.toText()).toBe('  * .claude/mine.md');
  });
});
