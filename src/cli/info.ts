import chalk from 'chalk';
import { loadConfig } from '../core/config.js';
import { inspectProject } from '../core/sync-session.js';
import { getProjectRoot, resolveTemplatesDir } from '../utils/paths.js';
import { getPackageVersion } from '../utils/version.js';
import { printFailure, printHeader, printTable } from './output.js';

export async function infoCommand(): Promise<void> {
  const projectRoot = getProjectRoot();
  try {
    const config = loadConfig(projectRoot);
    const status = inspectProject(projectRoot);

    printHeader('stencil-sync 정보');
    printTable([
      ['패키지 버전', getPackageVersion()],
      ['배포 버전', status.manifest ? status.manifest.distributionVersion : '미동기화'],
      ['관리 디렉토리', config.trackedDirs.join(', ')],
      ['템플릿 위치', resolveTemplatesDir(projectRoot, config)],
      ['백업', config.backup.enabled ? `사용 (보존 ${config.backup.retention}개)` : '사용 안 함'],
      ['보호 경로', config.protectedPaths.join(', ') || '없음'],
    ]);

    if (!status.manifest) {
      console.log('');
      console.log(chalk.cyan('[INFO] manifest가 없습니다. stencil-sync update로 첫 동기화를 실행하세요.'));
      return;
    }

    const files = status.manifest.trackedFiles;
    console.log('');
    printTable([
      ['추적 파일', `${files.length}개`],
      ['공식 파일', `${files.filter((file) => file.isOfficial).length}개`],
      ['커스텀 표시', `${files.filter((file) => file.customized).length}개`],
      ['백업 수', `${status.backups.length}개`],
      ['마지막 업데이트', status.manifest.updatedAt],
    ]);

    if (status.unresolvedConflicts.length > 0) {
      console.log('');
      console.log(chalk.yellow(`[WARN] 충돌 마커가 남은 파일 ${status.unresolvedConflicts.length}개:`));
      for (const path of status.unresolvedConflicts) {
        console.log(`  ${chalk.red('!')} ${path}`);
      }
    }
  } catch (err) {
    printFailure('정보 조회 실패', err);
  }
}
