import chalk from 'chalk';
import { listBackups } from '../core/backup-manager.js';
import { getProjectRoot } from '../utils/paths.js';
import { printFailure, printHeader, printTable } from './output.js';

export async function backupsCommand(): Promise<void> {
  const projectRoot = getProjectRoot();
  try {
    const backups = listBackups(projectRoot);
    printHeader('stencil-sync 백업');
    if (backups.length === 0) {
      console.log(chalk.dim('  백업이 없습니다.'));
      return;
    }
    printTable(
      backups.map((backup): [string, string] => [
        backup.name,
        chalk.dim(`${backup.timestamp} (${backup.sourceVersion} → ${backup.targetVersion})`),
      ]),
    );
  } catch (err) {
    printFailure('백업 목록 조회 실패', err);
  }
}
