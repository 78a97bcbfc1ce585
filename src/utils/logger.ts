/**
 * StencilLogger: 메시지 수집기 패턴
 * MCP 서버에서는 stdout을 JSON-RPC 프로토콜이 사용하므로
 * console.log 대신 메시지를 내부 버퍼에 수집한 뒤 flush()로 일괄 반환합니다.
 * CLI는 drain()으로 레벨별 항목을 받아 색을 입혀 출력합니다.
 */

import type { FileAction } from '../types/common.js';

export type LogLevel = 'info' | 'ok' | 'warn' | 'error' | 'file';

export type LoggedFileAction = FileAction | 'conflict' | 'custom' | 'backup' | 'restore';

export interface LogEntry {
  level: LogLevel;
  text: string;
}

const LEVEL_PREFIX: Record<Exclude<LogLevel, 'file'>, string> = {
  info: '[INFO]',
  ok: '[OK]',
  warn: '[WARN]',
  error: '[ERROR]',
};

export const FILE_ACTION_ICONS: Record<LoggedFileAction, string> = {
  add: '+',
  update: '~',
  remove: '-',
  preserve: '=',
  merge: '!',
  conflict: '!',
  skip: ' ',
  custom: '*',
  backup: 'B',
  restore: 'R',
};

class StencilLogger {
  private entries: LogEntry[] = [];

  info(msg: string): void {
    this.entries.push({ level: 'info', text: msg });
  }

  ok(msg: string): void {
    this.entries.push({ level: 'ok', text: msg });
  }

  warn(msg: string): void {
    this.entries.push({ level: 'warn', text: msg });
  }

  error(msg: string): void {
    this.entries.push({ level: 'error', text: msg });
  }

  fileAction(action: LoggedFileAction, path: string): void {
    this.entries.push({ level: 'file', text: `  ${FILE_ACTION_ICONS[action]} ${path}` });
  }

  /** 버퍼의 모든 메시지를 하나의 문자열로 반환하고 비움 */
  flush(): string {
    const text = this.toText();
    this.entries = [];
    return text;
  }

  /** 버퍼의 항목을 그대로 꺼내고 비움 */
  drain(): LogEntry[] {
    const entries = this.entries;
    this.entries = [];
    return entries;
  }

  /** 버퍼를 비우지 않고 현재 내용 반환 */
  toText(): string {
    return this.entries.map(formatEntry).join('\n');
  }

  clear(): void {
    this.entries = [];
  }
}

export function formatEntry(entry: LogEntry): string {
  return entry.level === 'file' ? entry.text : `${LEVEL_PREFIX[entry.level]} ${entry.text}`;
}

export const logger = new StencilLogger();
