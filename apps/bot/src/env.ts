import { ConfigError } from '@linklog/core';
import { z } from 'zod';

const parseCommaList = (value?: string) =>
  value
    ?.split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0) ?? [];

const envSchema = z.object({
  CLIENT_ID: z.string().min(1),
  SECRET: z.string().min(1),
  BROADCASTER_ID: z.string().min(1),
  CHANNEL_NAME: z
    .string()
    .transform((value) => value.trim().replace(/^#/, '').toLowerCase())
    .pipe(z.string().min(1)),
  SPREADSHEET_ID: z.string().min(1),
  GOOGLE_CREDENTIALS_FILE: z.string().min(1),
  PRIVILEGED_USERS: z.string().optional().transform(parseCommaList),
  SHEET_RANGE: z.string().min(1).default('Sheet1!A1:D'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
});

export type AppEnv = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv): AppEnv {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const keys = Array.from(new Set(parsed.error.issues.map((issue) => issue.path.join('.'))));
    throw new ConfigError(keys, `Invalid configuration: ${keys.join(', ')}`);
  }
  return parsed.data;
}
