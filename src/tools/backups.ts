import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { listBackups } from '../core/backup-manager.js';
import { describeError } from '../core/errors.js';
import { McpResponseBuilder, errorResult } from '../types/mcp.js';

export function registerBackupsTool(server: McpServer): void {
  server.tool(
    'stencil_backups',
    '보관 중인 백업 목록을 최신순으로 보여줍니다',
    {
      projectRoot: z.string().describe('프로젝트 루트 경로'),
    },
    async ({ projectRoot }) => {
      try {
        const res = new McpResponseBuilder();
        const backups = listBackups(projectRoot);

        res.header('stencil-sync 백업');
        if (backups.length === 0) {
          res.info('백업이 없습니다.');
          return res.toResult();
        }

        res.table(
          backups.map((backup): [string, string] => [
            backup.name,
            `${backup.timestamp} (${backup.sourceVersion} → ${backup.targetVersion})`,
          ]),
        );
        res.blank();
        res.info('stencil_rollback({ backupName })으로 해당 시점으로 되돌릴 수 있습니다.');
        return res.toResult();
      } catch (err) {
        return errorResult(`백업 목록 조회 실패: ${describeError(err)}`);
      }
    },
  );
}
