import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { loadConfig } from '../core/config.js';
import { findBackup, listBackups } from '../core/backup-manager.js';
import { rollbackTo } from '../core/apply-coordinator.js';
import { describeError } from '../core/errors.js';
import { logger } from '../utils/logger.js';
import { McpResponseBuilder, errorResult } from '../types/mcp.js';

export function registerRollbackTool(server: McpServer): void {
  server.tool(
    'stencil_rollback',
    '지정한 백업 시점으로 관리 디렉토리와 manifest를 되돌립니다',
    {
      projectRoot: z.string().describe('프로젝트 루트 경로'),
      backupName: z.string().optional().describe('백업 이름 (기본: 가장 최근 백업)'),
    },
    async ({ projectRoot, backupName }) => {
      logger.clear();
      try {
        const res = new McpResponseBuilder();
        const config = loadConfig(projectRoot);
        const backup = backupName ? findBackup(projectRoot, backupName) : listBackups(projectRoot)[0];

        if (!backup) {
          return errorResult(
            backupName ? `백업을 찾을 수 없습니다: ${backupName}` : '되돌릴 백업이 없습니다.',
          );
        }

        res.header('stencil-sync 롤백');
        rollbackTo(projectRoot, config, backup);

        const coreLog = logger.flush();
        if (coreLog) {
          res.line(coreLog);
        }
        return res.toResult();
      } catch (err) {
        const coreLog = logger.flush();
        return errorResult(`롤백 실패: ${describeError(err)}${coreLog ? `\n\n${coreLog}` : ''}`);
      }
    },
  );
}
