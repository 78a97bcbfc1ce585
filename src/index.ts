#!/usr/bin/env node
import { Command } from 'commander';
import { getPackageVersion } from './utils/version.js';
import { statusCommand } from './cli/status.js';
import { updateCommand } from './cli/update.js';
import { backupsCommand } from './cli/backups.js';
import { rollbackCommand } from './cli/rollback.js';
import { pruneCommand } from './cli/prune.js';
import { rescanCommand } from './cli/rescan.js';
import { infoCommand } from './cli/info.js';

const program = new Command();

program
  .name('stencil-sync')
  .description('템플릿 배포본 조정 + 백업/롤백 기반 트랜잭션 적용 CLI')
  .version(getPackageVersion());

program
  .command('status')
  .description('적용될 액션 미리보기 (아무것도 기록하지 않음)')
  .option('--target <version>', '비교할 배포 버전 (기본: 최신)')
  .option('--diff', 'add/update/merge 파일의 diff 표시')
  .option('--allow-downgrade', '현재보다 낮은 버전과 비교 허용')
  .action((options: { target?: string; diff?: boolean; allowDowngrade?: boolean }) =>
    statusCommand({ version: options.target, diff: options.diff, allowDowngrade: options.allowDowngrade }),
  );

program
  .command('update')
  .description('백업 후 배포본 적용, 실패 시 자동 복원')
  .option('--target <version>', '적용할 배포 버전 (기본: 최신)')
  .option('--dry-run', 'diff만 표시')
  .option('--allow-downgrade', '현재보다 낮은 버전 적용 허용')
  .option('--no-backup', '백업 없이 적용 (실패 시 복원 불가)')
  .option('--prune', '적용 후 보존 개수를 넘는 오래된 백업 정리')
  .option('--yes', '비대화형 (모든 확인 수락)')
  .action(
    (options: {
      target?: string;
      dryRun?: boolean;
      allowDowngrade?: boolean;
      backup?: boolean;
      prune?: boolean;
      yes?: boolean;
    }) => updateCommand({ ...options, version: options.target }),
  );

program
  .command('backups')
  .description('백업 목록 (최신순)')
  .action(backupsCommand);

program
  .command('rollback [name]')
  .description('백업 시점으로 되돌리기 (기본: 가장 최근 백업)')
  .option('--yes', '확인 생략')
  .action(rollbackCommand);

program
  .command('prune')
  .description('오래된 백업 정리')
  .option('--keep <n>', '보존할 최신 백업 개수 (기본: 설정의 retention)')
  .option('--yes', '확인 생략')
  .action(pruneCommand);

program
  .command('rescan')
  .description('현재 파일 내용으로 기준 해시 재기록')
  .option('--reset', '커스텀 표시까지 해제')
  .option('--yes', '확인 생략')
  .action(rescanCommand);

program
  .command('info')
  .description('현재 동기화 상태 표시')
  .action(infoCommand);

await program.parseAsync();
