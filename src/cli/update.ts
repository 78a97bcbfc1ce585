import chalk from 'chalk';
import { executePlan, needsApply, planSync } from '../core/sync-session.js';
import { listBackups, selectPrunable } from '../core/backup-manager.js';
import { getProjectRoot } from '../utils/paths.js';
import { confirmApply, confirmPrune } from '../prompts/confirm-prompts.js';
import { printPlan } from './status.js';
import { printFailure, printHeader, printLog, printTable } from './output.js';

export interface UpdateOptions {
  version?: string;
  dryRun?: boolean;
  allowDowngrade?: boolean;
  /** commander의 --no-backup */
  backup?: boolean;
  prune?: boolean;
  yes?: boolean;
}

export async function updateCommand(options: UpdateOptions): Promise<void> {
  const projectRoot = getProjectRoot();
  try {
    const plan = planSync(projectRoot, { version: options.version, allowDowngrade: options.allowDowngrade });

    printHeader('stencil-sync 업데이트');
    printPlan(plan, options.dryRun === true);

    if (options.dryRun) {
      console.log('');
      console.log(chalk.cyan('[INFO] dry-run: 아무것도 기록하지 않았습니다.'));
      return;
    }

    if (!needsApply(plan)) {
      console.log('');
      console.log(chalk.green('[OK] 모든 파일이 최신 상태입니다.'));
      return;
    }

    if (!options.yes) {
      const custom = new Set(plan.result.customFiles);
      const changeCount = plan.result.states.filter(
        (state) => state.action !== 'skip' && state.action !== 'preserve' && !custom.has(state.path),
      ).length;
      console.log('');
      const ok = await confirmApply(plan.result.sourceVersion, plan.result.targetVersion, changeCount);
      if (!ok) {
        console.log(chalk.dim('취소되었습니다. 변경된 파일이 없습니다.'));
        return;
      }
    }

    // prune 확인은 비동기 프롬프트라서 apply 전에 받아 둠
    const keep = plan.config.backup.retention;
    let pruneApproved = false;
    if (options.prune) {
      // 이번 백업이 하나 더 생기므로 keep - 1개 이후가 삭제 대상
      const doomed = selectPrunable(listBackups(projectRoot), Math.max(keep - 1, 0));
      pruneApproved = doomed.length === 0 || options.yes === true || (await confirmPrune(doomed));
    }

    console.log('');
    const outcome = executePlan(plan, {
      backup: options.backup === false ? false : undefined,
      prune: options.prune ? { keep, confirm: () => pruneApproved } : undefined,
    });
    printLog();

    printHeader('업데이트 결과');
    printTable([
      ['배포 버전', outcome.distributionVersion],
      ['백업', outcome.backup ? outcome.backup.name : '없음'],
      ['추가', `${outcome.added.length}개`],
      ['업데이트', `${outcome.updated.length + outcome.falsePositives.length}개`],
      ['삭제', `${outcome.removed.length}개`],
      ['보존', `${outcome.preserved.length}개`],
      ['충돌', `${outcome.conflicts.length}개`],
    ]);

    if (outcome.conflicts.length > 0) {
      console.log('');
      console.log(chalk.yellow('[WARN] 충돌 마커가 기록된 파일을 직접 정리하세요:'));
      for (const path of outcome.conflicts) {
        console.log(`  ${chalk.red('!')} ${path}`);
      }
    }
  } catch (err) {
    printFailure('업데이트 실패', err);
  }
}
