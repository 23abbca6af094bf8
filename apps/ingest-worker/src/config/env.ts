import { z } from 'zod';
import { isIsoDate } from '../lib/dates';
import { PLANS } from './datasets';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value : undefined));

export const ingestEnvSchema = z
  .object({
    JQUANTS_MAIL_ADDRESS: z.string().min(1, 'JQUANTS_MAIL_ADDRESS is required'),
    JQUANTS_PASSWORD: z.string().min(1, 'JQUANTS_PASSWORD is required'),
    JQUANTS_API_BASE: optionalString,
    JQUANTS_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    JQUANTS_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(500),
    JQUANTS_TIMEOUT_MS: z.coerce.number().int().min(1).default(30_000),
    JQUANTS_MAX_RPS: z.coerce.number().positive().optional(),
    JQUANTS_PLAN: z.enum(PLANS).default('premium'),

    STORE_KIND: z.enum(['local', 'supabase']).default('local'),
    DATA_DIR: z.string().min(1).default('data'),
    SUPABASE_URL: optionalString,
    SUPABASE_SERVICE_ROLE_KEY: optionalString,
    TIME_SERIES_SYMBOL: z.string().min(1).default('jquants_api'),

    MARKET_TIMEZONE: z.string().min(1).default('Asia/Tokyo'),
    AVAILABILITY_CUTOFF_HOUR: z.coerce.number().int().min(0).max(24).default(19),
    INITIAL_START_DATE: z
      .string()
      .refine(isIsoDate, 'INITIAL_START_DATE must be YYYY-MM-DD')
      .default('2024-01-01'),
    RANGE_CONCURRENCY: z.coerce.number().int().min(1).default(1),
    FETCH_CACHE_DIR: optionalString,

    DISCORD_WEBHOOK_URL: optionalString,
    LINE_NOTIFY_TOKEN: optionalString,
  })
  .superRefine((env, ctx) => {
    if (env.STORE_KIND === 'supabase' && (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_ROLE_KEY)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['STORE_KIND'],
        message: 'STORE_KIND=supabase requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY',
      });
    }
  });

export type IngestEnv = z.infer<typeof ingestEnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): IngestEnv {
  const parsed = ingestEnvSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}
