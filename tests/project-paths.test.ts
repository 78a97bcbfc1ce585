import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { backupPath, backupsDir, configPath, manifestPath, stencilDir } from '../src/core/project-paths.js';

const ROOT = '/project';

describe('project-paths', () => {
  it('should return .stencil/ 경로', () => {
    expect(stencilDir(ROOT)).toBe(join(ROOT, '.stencil'));
  });

  it('should return .stencil/manifest.json', () => {
    expect(manifestPath(ROOT)).toBe(join(ROOT, '.stencil', 'manifest.json'));
  });

  it('should return .stencil/backups/<name>', () => {
    expect(backupsDir(ROOT)).toBe(join(ROOT, '.stencil', 'backups'));
    expect(backupPath(ROOT, '2026-10-18T00-00-00-000Z__1.0.0__1.1.0')).toBe(
      join(ROOT, '.stencil', 'backups', '2026-10-18T00-00-00-000Z__1.0.0__1.1.0'),
    );
  });

  it('should put the config file at the project root', () => {
    expect(configPath(ROOT)).toBe(join(ROOT, 'stencil-sync.config.json'));
  });
});
