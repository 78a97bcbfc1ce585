import chalk from 'chalk';
import type { LogEntry } from '../utils/logger.js';
import { formatEntry, logger } from '../utils/logger.js';
import type { ActionSummary, FileAction } from '../types/common.js';
import { FILE_ACTIONS } from '../types/common.js';
import { describeError, isStencilError, RollbackFailedError } from '../core/errors.js';

const ACTION_COLORS: Record<FileAction, (text: string) => string> = {
  add: chalk.green,
  update: chalk.yellow,
  remove: chalk.red,
  preserve: chalk.blue,
  merge: chalk.magenta,
  skip: chalk.dim,
};

function colorEntry(entry: LogEntry): string {
  const text = formatEntry(entry);
  switch (entry.level) {
    case 'info':
      return chalk.cyan(text);
    case 'ok':
      return chalk.green(text);
    case 'warn':
      return chalk.yellow(text);
    case 'error':
      return chalk.red(text);
    case 'file':
      return text;
  }
}

/** core 모듈이 버퍼에 쌓은 메시지를 색을 입혀 출력 */
export function printLog(): void {
  for (const entry of logger.drain()) {
    console.log(colorEntry(entry));
  }
}

export function printHeader(title: string): void {
  console.log('');
  console.log(chalk.bold(`## ${title}`));
  console.log(chalk.dim('─'.repeat(title.length + 3)));
}

export function printTable(rows: [string, string][]): void {
  if (rows.length === 0) return;
  const maxKey = Math.max(...rows.map(([k]) => k.length));
  for (const [key, value] of rows) {
    console.log(`  ${chalk.bold(key.padEnd(maxKey))}  ${value}`);
  }
}

export function printAction(action: FileAction, path: string): void {
  console.log(`  ${ACTION_COLORS[action](`[${action}]`)} ${path}`);
}

export function printSummary(summary: ActionSummary): void {
  printTable(
    FILE_ACTIONS.filter((action) => summary[action] > 0).map((action): [string, string] => [
      action,
      `${summary[action]}개`,
    ]),
  );
}

/** 실패 보고. 복원 실패는 수동 복구 경로를 별도로 강조 */
export function printFailure(context: string, err: unknown): void {
  printLog();
  const code = isStencilError(err) ? ` [${err.code}]` : '';
  console.error(chalk.red(`[ERROR] ${context}${code}: ${describeError(err)}`));
  if (err instanceof RollbackFailedError) {
    console.error(chalk.bgRed.white(` 수동 복구 필요: ${err.backupPath} `));
  }
  process.exitCode = 1;
}
