import { z } from 'zod';

export const trackedFileSchema = z.object({
  path: z.string().min(1),
  originalHash: z.string().nullable(),
  customized: z.boolean(),
  isOfficial: z.boolean(),
});

export const manifestSchema = z
  .object({
    schemaVersion: z.string(),
    distributionVersion: z.string(),
    createdAt: z.string(),
    updatedAt: z.string(),
    trackedFiles: z.array(trackedFileSchema),
  })
  .superRefine((manifest, ctx) => {
    const seen = new Set<string>();
    manifest.trackedFiles.forEach((file, index) => {
      if (seen.has(file.path)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['trackedFiles', index, 'path'],
          message: `중복 경로: ${file.path}`,
        });
      }
      seen.add(file.path);
    });
  });
