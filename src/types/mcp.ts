import type { TextContent } from '@modelcontextprotocol/sdk/types.js';
import type { ActionSummary, FileAction } from './common.js';
import { FILE_ACTIONS } from './common.js';
import type { LoggedFileAction } from '../utils/logger.js';
import { FILE_ACTION_ICONS } from '../utils/logger.js';

export interface ToolResult {
  [key: string]: unknown;
  content: TextContent[];
  isError?: boolean;
}

const ACTION_LABELS: Record<FileAction, string> = {
  add: '추가',
  update: '업데이트',
  remove: '삭제',
  preserve: '보존',
  merge: '충돌',
  skip: '변경 없음',
};

export class McpResponseBuilder {
  private lines: string[] = [];

  header(title: string): this {
    this.lines.push('', `--- ${title} ---`, '');
    return this;
  }

  info(msg: string): this {
    this.lines.push(`ℹ ${msg}`);
    return this;
  }

  ok(msg: string): this {
    this.lines.push(`✓ ${msg}`);
    return this;
  }

  warn(msg: string): this {
    this.lines.push(`⚠ ${msg}`);
    return this;
  }

  table(rows: [string, string][]): this {
    if (rows.length === 0) return this;
    const maxKey = Math.max(...rows.map(([k]) => k.length));
    for (const [key, value] of rows) {
      this.lines.push(`  ${key.padEnd(maxKey)} : ${value}`);
    }
    return this;
  }

  fileAction(action: LoggedFileAction, path: string): this {
    this.lines.push(`  ${FILE_ACTION_ICONS[action]} ${path}`);
    return this;
  }

  /** 0이 아닌 액션만 표로 출력 */
  actionSummary(summary: ActionSummary): this {
    const rows = FILE_ACTIONS
      .filter((action) => summary[action] > 0)
      .map((action): [string, string] => [ACTION_LABELS[action], `${summary[action]}개`]);
    return this.table(rows);
  }

  line(msg: string): this {
    this.lines.push(msg);
    return this;
  }

  blank(): this {
    this.lines.push('');
    return this;
  }

  toText(): string {
    return this.lines.join('\n');
  }

  toResult(): ToolResult {
    return textResult(this.toText(), false);
  }
}

function textResult(text: string, isError: boolean): ToolResult {
  return {
    content: [{ type: 'text' as const, text }],
    isError,
  };
}

export function errorResult(message: string): ToolResult {
  return textResult(`✗ ${message}`, true);
}
