import type { McpResponseBuilder } from '../types/mcp.js';
import type { SyncPlan } from '../core/sync-session.js';
import { generateDiff, summarizeActions } from '../core/reconcile-engine.js';

/** reconcile 결과를 응답에 기록합니다. skip 상태는 생략합니다 */
export function writePlanReport(res: McpResponseBuilder, plan: SyncPlan, showDiff: boolean): void {
  const { result, release, projectRoot } = plan;
  const custom = new Set(result.customFiles);

  res.table([
    ['현재 버전', result.sourceVersion],
    ['대상 버전', result.targetVersion],
    ['manifest', plan.isNewManifest ? '없음 (최초 동기화)' : '있음'],
  ]);
  res.blank();
  res.actionSummary(summarizeActions(result.states));

  const pending = result.states.filter((state) => state.action !== 'skip' && !custom.has(state.path));
  if (pending.length > 0) {
    res.blank();
    for (const state of pending) {
      res.fileAction(state.action, state.path);
      if (showDiff && (state.action === 'add' || state.action === 'update' || state.action === 'merge')) {
        res.line(generateDiff(projectRoot, state.path, release.files.get(state.path) ?? null));
      }
    }
  }

  if (result.customFiles.length > 0) {
    res.blank();
    res.info(`사용자 파일 ${result.customFiles.length}개 (변경하지 않음):`);
    for (const path of result.customFiles) {
      res.fileAction('custom', path);
    }
  }
}
