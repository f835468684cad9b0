import { z } from 'zod';
import { logger } from '../utils/logger.js';

const flag = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off'])
  .optional()
  .transform((v) => v === '1' || v === 'true' || v === 'yes' || v === 'on');

const envSchemaBase = z.object({
  PORT: z.coerce.number().int().optional().default(3001),
  NODE_ENV: z.enum(['development', 'test', 'production']).optional().default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),

  APP_URL: z.string().url().optional().default('http://localhost:3001'),
  DATABASE_URL: z.string().url().optional(),
  REDIS_URL: z.string().min(1).optional(),

  IMAGE_STORAGE: z.enum(['local', 'local_secure', 's3']).optional().default('local'),
  STORAGE_URL: z.string().url().optional(),
  SECURE_IMAGES: flag,
  PUBLIC_DIR: z.string().min(1).optional().default('./public'),
  SECURE_STORAGE_DIR: z.string().min(1).optional().default('./storage'),
  MAX_FILE_SIZE: z.coerce.number().int().positive().optional().default(50 * 1024 * 1024),

  S3_BUCKET: z.string().min(1).optional(),
  S3_REGION: z.string().min(1).optional().default('us-east-1'),
  S3_ENDPOINT: z.string().url().optional(),
  S3_ACCESS_KEY_ID: z.string().min(1).optional(),
  S3_SECRET_ACCESS_KEY: z.string().min(1).optional(),
  S3_FORCE_PATH_STYLE: flag,

  AVATAR_URL: z.string().optional(),
  DISABLE_EXTERNAL_SERVICES: flag,
  AVATAR_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().optional().default(10_000),

  MAINTENANCE_TOKEN: z.string().min(16).optional(),

  IMAGE_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().optional(),
  IMAGE_SWEEP_DELETE: flag,
  IMAGE_SWEEP_CHECK_REVISIONS: z
    .enum(['1', '0', 'true', 'false'])
    .optional()
    .transform((v) => v === undefined || v === '1' || v === 'true'),
});

const envSchema = envSchemaBase.superRefine((env, ctx) => {
  if (env.IMAGE_STORAGE === 's3') {
    for (const key of ['S3_BUCKET', 'S3_ACCESS_KEY_ID', 'S3_SECRET_ACCESS_KEY'] as const) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${key} is required when IMAGE_STORAGE=s3`,
          path: [key],
        });
      }
    }
  }

  if (env.NODE_ENV !== 'production') return;

  if (!env.DATABASE_URL) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'DATABASE_URL is required in production',
      path: ['DATABASE_URL'],
    });
  }
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

export function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    logger.error('env.invalid', { errors: result.error.format() });
    process.exit(1);
  }
  return result.data;
}
