import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { executePlan, needsApply, planSync } from '../core/sync-session.js';
import { describeError } from '../core/errors.js';
import { logger } from '../utils/logger.js';
import { McpResponseBuilder, errorResult } from '../types/mcp.js';
import { writePlanReport } from './plan-report.js';

export function registerUpdateTool(server: McpServer): void {
  server.tool(
    'stencil_update',
    '백업 후 upstream 배포본을 적용합니다. 실패하면 백업으로 자동 복원합니다',
    {
      projectRoot: z.string().describe('프로젝트 루트 경로'),
      version: z.string().optional().describe('적용할 배포 버전 (기본: 최신)'),
      dryRun: z.boolean().optional().describe('diff만 표시'),
      allowDowngrade: z.boolean().optional().describe('현재보다 낮은 버전 적용 허용'),
      skipBackup: z.boolean().optional().describe('백업 없이 적용 (실패 시 복원 불가)'),
      pruneBackups: z.boolean().optional().describe('적용 후 보존 개수를 넘는 오래된 백업 삭제'),
    },
    async ({ projectRoot, version, dryRun, allowDowngrade, skipBackup, pruneBackups }) => {
      logger.clear();
      try {
        const res = new McpResponseBuilder();
        const plan = planSync(projectRoot, { version, allowDowngrade });

        res.header('stencil-sync 업데이트');
        writePlanReport(res, plan, dryRun === true);

        if (dryRun) {
          res.blank();
          res.info('dry-run: 아무것도 기록하지 않았습니다.');
          return res.toResult();
        }

        if (!needsApply(plan)) {
          res.blank();
          res.ok('모든 파일이 최신 상태입니다.');
          return res.toResult();
        }

        const outcome = executePlan(plan, {
          backup: skipBackup ? false : undefined,
          prune: pruneBackups
            ? { keep: plan.config.backup.retention, confirm: () => true }
            : undefined,
        });

        const coreLog = logger.flush();
        if (coreLog) {
          res.blank();
          res.line(coreLog);
        }

        res.blank();
        res.header('업데이트 결과');
        res.table([
          ['배포 버전', outcome.distributionVersion],
          ['백업', outcome.backup ? outcome.backup.name : '없음'],
          ['추가', `${outcome.added.length}개`],
          ['업데이트', `${outcome.updated.length + outcome.falsePositives.length}개`],
          ['삭제', `${outcome.removed.length}개`],
          ['보존', `${outcome.preserved.length}개`],
          ['충돌', `${outcome.conflicts.length}개`],
        ]);

        if (outcome.conflicts.length > 0) {
          res.blank();
          res.warn('충돌 마커가 기록된 파일을 직접 정리하세요:');
          for (const path of outcome.conflicts) {
            res.fileAction('conflict', path);
          }
        }
        if (outcome.prune && outcome.prune.deleted.length > 0) {
          res.info(`오래된 백업 ${outcome.prune.deleted.length}개 삭제`);
        }

        return res.toResult();
      } catch (err) {
        const coreLog = logger.flush();
        return errorResult(`업데이트 실패: ${describeError(err)}${coreLog ? `\n\n${coreLog}` : ''}`);
      }
    },
  );
}
