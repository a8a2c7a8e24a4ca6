import { z } from 'zod';

export const GetSnapshotArgsSchema = z.object({
  limit: z.number().int().min(1).max(1000).default(50),
  minConfidence: z.number().min(0).max(1).default(0),
});

export const LookupCodeArgsSchema = z.object({
  code: z.string().trim().min(1, 'code is required'),
});

export type GetSnapshotArgs = z.infer<typeof GetSnapshotArgsSchema>;
export type LookupCodeArgs = z.infer<typeof LookupCodeArgsSchema>;
