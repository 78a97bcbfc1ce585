import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerStatusTool } from './status.js';
import { registerUpdateTool } from './update.js';
import { registerBackupsTool } from './backups.js';
import { registerRollbackTool } from './rollback.js';

export function registerAllTools(server: McpServer): void {
  registerStatusTool(server);
  registerUpdateTool(server);
  registerBackupsTool(server);
  registerRollbackTool(server);
}
