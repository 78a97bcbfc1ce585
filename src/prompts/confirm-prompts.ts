import type { Backup } from '../types/backup.js';

async function confirm(message: string, defaultValue: boolean): Promise<boolean> {
  const inquirer = await import('inquirer');
  const { ok } = await inquirer.default.prompt<{ ok: boolean }>([
    {
      type: 'confirm',
      name: 'ok',
      message,
      default: defaultValue,
    },
  ]);
  return ok;
}

export function confirmApply(sourceVersion: string, targetVersion: string, changeCount: number): Promise<boolean> {
  return confirm(`${sourceVersion} → ${targetVersion}: ${changeCount}개 파일 변경을 적용하시겠습니까?`, true);
}

export function confirmPrune(doomed: Backup[]): Promise<boolean> {
  const names = doomed.map((backup) => `  - ${backup.name}`).join('\n');
  return confirm(`오래된 백업 ${doomed.length}개를 삭제하시겠습니까?\n${names}\n`, false);
}

export function confirmRollback(backup: Backup): Promise<boolean> {
  return confirm(
    `${backup.name} 시점(${backup.sourceVersion})으로 되돌리시겠습니까? 이후 변경 내용은 사라집니다.`,
    false,
  );
}

export function confirmRescan(resetCustomized: boolean): Promise<boolean> {
  return confirm(
    resetCustomized
      ? '현재 파일 내용을 배포 원본으로 간주하고 커스텀 표시까지 해제하시겠습니까?'
      : '현재 파일 내용으로 기준 해시를 다시 기록하시겠습니까?',
    false,
  );
}
