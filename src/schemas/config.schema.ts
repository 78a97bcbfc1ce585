import { z } from 'zod';
import { DEFAULT_CONFIG, DEFAULT_RETENTION } from '../types/config.js';
import { STENCIL_DIR } from '../types/common.js';

const relativeDirSchema = z
  .string()
  .min(1)
  .transform((dir) => dir.replace(/\\/g, '/').replace(/\/+$/, ''))
  .refine((dir) => dir !== '' && dir !== '.', { message: '프로젝트 루트 전체는 추적할 수 없습니다' })
  .refine((dir) => !dir.startsWith('/') && !/^[A-Za-z]:/.test(dir), { message: '상대 경로여야 합니다' })
  .refine((dir) => !dir.split('/').includes('..'), { message: '".."를 포함할 수 없습니다' })
  .refine((dir) => dir !== STENCIL_DIR && !dir.startsWith(`${STENCIL_DIR}/`), {
    message: `${STENCIL_DIR}/ 는 추적 디렉토리가 될 수 없습니다`,
  });

/** 같은 파일이 두 디렉토리에 동시에 속하면 manifest 경로가 중복되므로 금지 */
const trackedDirsSchema = z
  .array(relativeDirSchema)
  .min(1)
  .superRefine((dirs, ctx) => {
    dirs.forEach((dir, index) => {
      for (const other of dirs.slice(0, index)) {
        if (dir === other) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index], message: `중복된 추적 디렉토리: ${dir}` });
        } else if (dir.startsWith(`${other}/`) || other.startsWith(`${dir}/`)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index],
            message: `추적 디렉토리가 중첩됩니다: ${other}, ${dir}`,
          });
        }
      }
    });
  });

export const configSchema = z.object({
  trackedDirs: trackedDirsSchema.default(() => [...DEFAULT_CONFIG.trackedDirs]),
  templatesDir: z.string().min(1).optional(),
  backup: z
    .object({
      enabled: z.boolean().default(true),
      retention: z.number().int().min(1).default(DEFAULT_RETENTION),
    })
    .default({}),
  protectedPaths: z.array(z.string()).default(() => []),
});
