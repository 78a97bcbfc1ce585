import chalk from 'chalk';
import { rescan } from '../core/sync-session.js';
import { getProjectRoot } from '../utils/paths.js';
import { confirmRescan } from '../prompts/confirm-prompts.js';
import { printFailure, printHeader, printLog } from './output.js';

export interface RescanCommandOptions {
  reset?: boolean;
  yes?: boolean;
}

export async function rescanCommand(options: RescanCommandOptions): Promise<void> {
  const projectRoot = getProjectRoot();
  try {
    printHeader('stencil-sync 기준선 재기록');
    if (!options.yes && !(await confirmRescan(options.reset === true))) {
      console.log(chalk.dim('취소되었습니다.'));
      return;
    }
    const manifest = rescan(projectRoot, { resetCustomized: options.reset });
    printLog();
    console.log(chalk.green(`[OK] ${manifest.trackedFiles.length}개 파일의 기준 해시를 기록했습니다.`));
  } catch (err) {
    printFailure('rescan 실패', err);
  }
}
