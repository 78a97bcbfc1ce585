import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { isInTrackedDir, isProtectedPath, loadConfig } from '../../src/core/config.js';
import { ConfigError } from '../../src/core/errors.js';
import { configPath } from '../../src/core/project-paths.js';
import { DEFAULT_CONFIG } from '../../src/types/config.js';
import { makeConfig } from '../helpers/fixtures.js';

describe('config', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'stencil-config-test-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  function writeConfig(raw: unknown): void {
    writeFileSync(configPath(testDir), typeof raw === 'string' ? raw : JSON.stringify(raw));
  }

  describe('loadConfig', () => {
    it('should return defaults when the config file is missing', () => {
      expect(loadConfig(testDir)).toEqual(DEFAULT_CONFIG);
    });

    it('기본값 사본을 반환 (공유 객체 변경 없음)', () => {
      loadConfig(testDir).trackedDirs.push('.other');
      expect(DEFAULT_CONFIG.trackedDirs).toEqual(['.claude', '.agent']);
    });

    it('should fill missing fields with defaults', () => {
      writeConfig({ trackedDirs: ['.cursor/'] });
      expect(loadConfig(testDir)).toEqual({
        trackedDirs: ['.cursor'],
        backup: { enabled: true, retention: 5 },
        protectedPaths: [],
      });
    });

    it('should throw ConfigError on invalid JSON', () => {
      writeConfig('{ broken');
      expect(() => loadConfig(testDir)).toThrow(ConfigError);
    });

    it.each([
      ['absolute path', { trackedDirs: ['/etc'] }],
      ['parent escape', { trackedDirs: ['../outside'] }],
      ['project root', { trackedDirs: ['.'] }],
      ['stencil state dir', { trackedDirs: ['.stencil'] }],
      ['zero retention', { backup: { retention: 0 } }],
      ['empty trackedDirs', { trackedDirs: [] }],
    ])('should reject %s', (_label, raw) => {
      writeConfig(raw);
      expect(() => loadConfig(testDir)).toThrow(ConfigError);
    });

    it('중첩되거나 중복된 추적 디렉토리는 거부', () => {
      writeConfig({ trackedDirs: ['.claude', '.claude/commands'] });
      expect(() => loadConfig(testDir)).toThrow('trackedDirs.1: 추적 디렉토리가 중첩됩니다: .claude, .claude/commands');

      writeConfig({ trackedDirs: ['.claude', '.claude/'] });
      expect(() => loadConfig(testDir)).toThrow('trackedDirs.1: 중복된 추적 디렉토리: .claude');
    });

    it('should allow sibling directories sharing a name prefix', () => {
      writeConfig({ trackedDirs: ['.claude', '.claude-extra'] });
      expect(loadConfig(testDir).trackedDirs).toEqual(['.claude', '.claude-extra']);
    });

    it('should read every field of a full config file', () => {
      const config = makeConfig({ protectedPaths: ['.claude/settings.json'], templatesDir: 'vendor/templates' });
      writeConfig(config);
      expect(loadConfig(testDir)).toEqual(config);
    });
  });

  describe('path predicates', () => {
    const config = makeConfig({ trackedDirs: ['.claude', '.agent'], protectedPaths: ['.claude/local/', '.agent/memory.md'] });

    it('isProtectedPath matches the file itself and anything under a directory', () => {
      expect(isProtectedPath(config, '.agent/memory.md')).toBe(true);
      expect(isProtectedPath(config, '.claude/local/notes.md')).toBe(true);
      expect(isProtectedPath(config, '.claude/localized.md')).toBe(false);
    });

    it('isInTrackedDir requires a path under a tracked directory', () => {
      expect(isInTrackedDir(config, '.claude/commands/plan.md')).toBe(true);
      expect(isInTrackedDir(config, '.claude')).toBe(false);
      expect(isInTrackedDir(config, '.claudex/a.md')).toBe(false);
    });
  });
});
