import chalk from 'chalk';
import { planSync } from '../core/sync-session.js';
import { generateDiff, isUpToDate, summarizeActions } from '../core/reconcile-engine.js';
import type { SyncPlan } from '../core/sync-session.js';
import { getProjectRoot } from '../utils/paths.js';
import { printAction, printFailure, printHeader, printLog, printSummary, printTable } from './output.js';

export interface StatusOptions {
  version?: string;
  diff?: boolean;
  allowDowngrade?: boolean;
}

export async function statusCommand(options: StatusOptions): Promise<void> {
  const projectRoot = getProjectRoot();
  try {
    const plan = planSync(projectRoot, { version: options.version, allowDowngrade: options.allowDowngrade });
    printHeader('stencil-sync 상태');
    printPlan(plan, options.diff === true);
    console.log('');
    if (isUpToDate(plan.result)) {
      console.log(chalk.green('[OK] 적용할 변경이 없습니다.'));
    } else {
      console.log(chalk.cyan('[INFO] stencil-sync update로 적용할 수 있습니다.'));
    }
    printLog();
  } catch (err) {
    printFailure('상태 확인 실패', err);
  }
}

/** update 확인 전 미리보기에도 사용 */
export function printPlan(plan: SyncPlan, showDiff: boolean): void {
  const { result, release, projectRoot } = plan;
  const custom = new Set(result.customFiles);

  printTable([
    ['현재 버전', result.sourceVersion],
    ['대상 버전', result.targetVersion],
    ['manifest', plan.isNewManifest ? '없음 (최초 동기화)' : '있음'],
  ]);
  console.log('');
  printSummary(summarizeActions(result.states));

  const pending = result.states.filter((state) => state.action !== 'skip' && !custom.has(state.path));
  if (pending.length > 0) {
    console.log('');
    for (const state of pending) {
      printAction(state.action, state.path);
      if (showDiff && state.action !== 'remove' && state.action !== 'preserve') {
        console.log(chalk.dim(generateDiff(projectRoot, state.path, release.files.get(state.path) ?? null)));
      }
    }
  }

  if (result.customFiles.length > 0) {
    console.log('');
    console.log(chalk.cyan(`[INFO] 사용자 파일 ${result.customFiles.length}개 (변경하지 않음):`));
    for (const path of result.customFiles) {
      console.log(`  ${chalk.dim('*')} ${path}`);
    }
  }
}
