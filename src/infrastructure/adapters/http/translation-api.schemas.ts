import { z } from 'zod';

/**
 * Response shapes of the translation API, as far as the harness reads them.
 * Unknown fields are ignored.
 */

export const healthResponseSchema = z.object({
  status: z.string(),
});

export const submitTaskResponseSchema = z.object({
  task_id: z.union([z.string(), z.number()]).nullish(),
  status: z.string().nullish(),
});

const count = z.number().int().min(0).nullish();

export const taskStatusResponseSchema = z.object({
  status: z.string(),
  progress: z.number().finite().nullish(),
  processed_files: count,
  total_files: count,
  error_message: z.string().nullish(),
});

export const resultUrlResponseSchema = z.object({
  download_url: z.string().trim().min(1),
  expires_in: z.number().finite().min(0),
});

export function describeIssues(error: z.ZodError): string {
  return error.errors
    .map((issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`)
    .join('; ');
}
