import chalk from 'chalk';
import { loadConfig } from '../core/config.js';
import { listBackups, pruneBackups, selectPrunable } from '../core/backup-manager.js';
import { getProjectRoot } from '../utils/paths.js';
import { confirmPrune } from '../prompts/confirm-prompts.js';
import { printFailure, printHeader, printLog } from './output.js';

export interface PruneCommandOptions {
  keep?: string;
  yes?: boolean;
}

export async function pruneCommand(options: PruneCommandOptions): Promise<void> {
  const projectRoot = getProjectRoot();
  try {
    const config = loadConfig(projectRoot);
    const keep = options.keep !== undefined ? Number(options.keep) : config.backup.retention;
    if (!Number.isInteger(keep) || keep < 0) {
      throw new RangeError(`--keep은 0 이상의 정수여야 합니다: ${options.keep}`);
    }

    printHeader('stencil-sync 백업 정리');
    const doomed = selectPrunable(listBackups(projectRoot), keep);
    if (doomed.length === 0) {
      console.log(chalk.green(`[OK] 삭제할 백업이 없습니다 (보존 ${keep}개).`));
      return;
    }

    const approved = options.yes === true || (await confirmPrune(doomed));
    const result = pruneBackups(projectRoot, { keep, confirm: () => approved });
    printLog();
    if (!result.confirmed) {
      console.log(chalk.dim('취소되었습니다.'));
    }
  } catch (err) {
    printFailure('백업 정리 실패', err);
  }
}
