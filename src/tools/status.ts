import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { planSync } from '../core/sync-session.js';
import { isUpToDate } from '../core/reconcile-engine.js';
import { describeError } from '../core/errors.js';
import { logger } from '../utils/logger.js';
import { McpResponseBuilder, errorResult } from '../types/mcp.js';
import { writePlanReport } from './plan-report.js';

export function registerStatusTool(server: McpServer): void {
  server.tool(
    'stencil_status',
    '로컬 파일과 upstream 배포본을 비교해 적용될 액션을 보여줍니다 (아무것도 기록하지 않음)',
    {
      projectRoot: z.string().describe('프로젝트 루트 경로'),
      version: z.string().optional().describe('비교할 배포 버전 (기본: 최신)'),
      showDiff: z.boolean().optional().describe('add/update/merge 파일의 diff 포함'),
      allowDowngrade: z.boolean().optional().describe('현재보다 낮은 버전과 비교 허용'),
    },
    async ({ projectRoot, version, showDiff, allowDowngrade }) => {
      try {
        logger.clear();
        const res = new McpResponseBuilder();
        const plan = planSync(projectRoot, { version, allowDowngrade });

        res.header('stencil-sync 상태');
        writePlanReport(res, plan, showDiff === true);

        res.blank();
        if (isUpToDate(plan.result)) {
          res.ok('적용할 변경이 없습니다.');
        } else {
          res.info('stencil_update로 적용할 수 있습니다.');
        }

        const coreLog = logger.flush();
        if (coreLog) {
          res.blank();
          res.line(coreLog);
        }
        return res.toResult();
      } catch (err) {
        return errorResult(`상태 확인 실패: ${describeError(err)}`);
      }
    },
  );
}
