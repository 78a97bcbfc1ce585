import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  executePlan,
  inspectProject,
  needsApply,
  planSync,
  rescan,
  UNSYNCED_VERSION,
} from '../../src/core/sync-session.js';
import { findTrackedFile, loadManifest } from '../../src/core/state-store.js';
import { normalizedHash } from '../../src/core/fingerprint.js';
import { PrerequisiteError } from '../../src/core/errors.js';
import { logger } from '../../src/utils/logger.js';
import { makeConfig, release, StaticUpstreamProvider, writeFiles } from '../helpers/fixtures.js';

const config = makeConfig();
const provider = new StaticUpstreamProvider([
  release('1.0.0', {
    '.claude/commands/plan.md': 'plan v1\n',
    '.claude/commands/new.md': 'new v1\n',
  }),
]);

describe('sync-session', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'stencil-session-test-'));
    logger.clear();
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('first sync', () => {
    beforeEach(() => {
      writeFiles(testDir, {
        '.claude/commands/plan.md': 'plan v1\n',
        '.claude/mine.md': 'mine\n',
      });
    });

    it('plan은 manifest를 메모리에만 만들고 아무것도 기록하지 않음', () => {
      const plan = planSync(testDir, { config, provider });

      expect(plan.isNewManifest).toBe(true);
      expect(plan.manifest.distributionVersion).toBe(UNSYNCED_VERSION);
      expect(plan.result.states.map((s) => [s.path, s.action])).toEqual([
        ['.claude/commands/plan.md', 'merge'],
        ['.claude/mine.md', 'preserve'],
        ['.claude/commands/new.md', 'add'],
      ]);
      expect(plan.result.customFiles).toEqual(['.claude/mine.md']);
      expect(needsApply(plan)).toBe(true);
      expect(existsSync(join(testDir, '.stencil'))).toBe(false);
    });

    it('적용 시 오탐을 해소하고 사용자 파일은 customized로 유지', () => {
      const outcome = executePlan(planSync(testDir, { config, provider }));

      expect(outcome.falsePositives).toEqual(['.claude/commands/plan.md']);
      expect(outcome.added).toEqual(['.claude/commands/new.md']);

      const manifest = loadManifest(testDir);
      expect(manifest?.distributionVersion).toBe('1.0.0');
      expect(manifest && findTrackedFile(manifest, '.claude/commands/plan.md')).toEqual({
        path: '.claude/commands/plan.md',
        originalHash: normalizedHash('plan v1\n'),
        customized: false,
        isOfficial: true,
      });
      expect(manifest && findTrackedFile(manifest, '.claude/mine.md')).toEqual({
        path: '.claude/mine.md',
        originalHash: null,
        customized: true,
        isOfficial: false,
      });
      expect(readFileSync(join(testDir, '.claude/mine.md'), 'utf-8')).toBe('mine\n');
    });

    it('should need no apply once the same version is committed', () => {
      executePlan(planSync(testDir, { config, provider }));
      const again = planSync(testDir, { config, provider });

      expect(again.isNewManifest).toBe(false);
      expect(needsApply(again)).toBe(false);
    });
  });

  describe('inspectProject', () => {
    it('should report files still carrying conflict markers', () => {
      writeFiles(testDir, { '.claude/commands/plan.md': 'my own plan\n' });
      executePlan(planSync(testDir, { config, provider }));

      const status = inspectProject(testDir);

      expect(status.manifest?.distributionVersion).toBe('1.0.0');
      expect(status.backups).toHaveLength(1);
      expect(status.unresolvedConflicts).toEqual(['.claude/commands/plan.md']);
    });

    it('should report an unsynced project', () => {
      expect(inspectProject(testDir)).toEqual({ manifest: null, backups: [], unresolvedConflicts: [] });
    });
  });

  describe('rescan', () => {
    it('should require an existing manifest', () => {
      expect(() => rescan(testDir)).toThrow(PrerequisiteError);
    });

    it('현재 내용을 기준선으로 기록하고 resetCustomized면 플래그도 해제', () => {
      writeFiles(testDir, { '.claude/commands/plan.md': 'my own plan\n' });
      executePlan(planSync(testDir, { config, provider }));
      writeFiles(testDir, { '.claude/commands/plan.md': 'resolved plan\n' });

      const kept = rescan(testDir);
      expect(findTrackedFile(kept, '.claude/commands/plan.md')).toEqual({
        path: '.claude/commands/plan.md',
        originalHash: normalizedHash('resolved plan\n'),
        customized: true,
        isOfficial: true,
      });

      const reset = rescan(testDir, { resetCustomized: true });
      expect(findTrackedFile(reset, '.claude/commands/plan.md')?.customized).toBe(false);
      expect(loadManifest(testDir)).toEqual(reset);
    });
  });
});
