import { z } from 'zod';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
  GIT_BIN: z.string().default('git'),
  /** Working directory; when set the repository prompt is skipped */
  VIDEO_SHARE_REPO: optionalString,
  /** Hosting base URL; when set the remote is not consulted */
  PAGES_BASE_URL: optionalString.pipe(z.string().url().optional()),
});

export const config = envSchema.parse(process.env);
export type Config = z.infer<typeof envSchema>;
