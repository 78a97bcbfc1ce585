import chalk from 'chalk';
import { loadConfig } from '../core/config.js';
import { findBackup, listBackups } from '../core/backup-manager.js';
import { rollbackTo } from '../core/apply-coordinator.js';
import { getProjectRoot } from '../utils/paths.js';
import { confirmRollback } from '../prompts/confirm-prompts.js';
import { printFailure, printHeader, printLog } from './output.js';

export interface RollbackOptions {
  yes?: boolean;
}

export async function rollbackCommand(name: string | undefined, options: RollbackOptions): Promise<void> {
  const projectRoot = getProjectRoot();
  try {
    const config = loadConfig(projectRoot);
    const backup = name ? findBackup(projectRoot, name) : listBackups(projectRoot)[0];
    if (!backup) {
      console.error(chalk.red(name ? `[ERROR] 백업을 찾을 수 없습니다: ${name}` : '[ERROR] 되돌릴 백업이 없습니다.'));
      process.exitCode = 1;
      return;
    }

    printHeader('stencil-sync 롤백');
    if (!options.yes && !(await confirmRollback(backup))) {
      console.log(chalk.dim('취소되었습니다.'));
      return;
    }

    rollbackTo(projectRoot, config, backup);
    printLog();
  } catch (err) {
    printFailure('롤백 실패', err);
  }
}
