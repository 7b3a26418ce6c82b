import { z } from 'zod';

const booleanString = z
  .union([z.enum(['true', 'false']), z.undefined()])
  .transform((value) => value !== 'false');

const envSchema = z
  .object({
    API_BASE_URL: z
      .string()
      .url({ message: 'API_BASE_URL must be a valid URL' })
      .default('http://localhost:8081')
      .transform((value) => value.replace(/\/+$/, '')),
    NODE_ENV: z
      .enum(['development', 'staging', 'production', 'test'], {
        errorMap: () => ({ message: 'NODE_ENV must be development, staging, production or test' }),
      })
      .default('development'),
    AUTH_REQUIRED: booleanString,
    REQUEST_TIMEOUT_MS: z.coerce
      .number({ invalid_type_error: 'REQUEST_TIMEOUT_MS must be a number' })
      .positive('REQUEST_TIMEOUT_MS must be greater than 0')
      .default(15000),
    UPLOAD_TIMEOUT_MS: z.coerce
      .number({ invalid_type_error: 'UPLOAD_TIMEOUT_MS must be a number' })
      .positive('UPLOAD_TIMEOUT_MS must be greater than 0')
      .default(120000),
    READ_RETRIES: z.coerce
      .number({ invalid_type_error: 'READ_RETRIES must be a number' })
      .int('READ_RETRIES must be an integer')
      .min(0, 'READ_RETRIES cannot be negative')
      .default(2),
    RETRY_DELAY_MS: z.coerce
      .number({ invalid_type_error: 'RETRY_DELAY_MS must be a number' })
      .min(0, 'RETRY_DELAY_MS cannot be negative')
      .default(300),
    JOBS_PAGE_LIMIT: z.coerce
      .number({ invalid_type_error: 'JOBS_PAGE_LIMIT must be a number' })
      .int('JOBS_PAGE_LIMIT must be an integer')
      .positive('JOBS_PAGE_LIMIT must be greater than 0')
      .default(20),
    JOBS_REFRESH_LIMIT: z.coerce
      .number({ invalid_type_error: 'JOBS_REFRESH_LIMIT must be a number' })
      .int('JOBS_REFRESH_LIMIT must be an integer')
      .positive('JOBS_REFRESH_LIMIT must be greater than 0')
      .default(300),
    JOB_POLL_INTERVAL_MS: z.coerce
      .number({ invalid_type_error: 'JOB_POLL_INTERVAL_MS must be a number' })
      .positive('JOB_POLL_INTERVAL_MS must be greater than 0')
      .default(2000),
    JOB_POLL_MAX_BACKOFF_MS: z.coerce
      .number({ invalid_type_error: 'JOB_POLL_MAX_BACKOFF_MS must be a number' })
      .positive('JOB_POLL_MAX_BACKOFF_MS must be greater than 0')
      .default(30000),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  })
  .superRefine((data, ctx) => {
    if (data.UPLOAD_TIMEOUT_MS < data.REQUEST_TIMEOUT_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'UPLOAD_TIMEOUT_MS cannot be shorter than REQUEST_TIMEOUT_MS',
        path: ['UPLOAD_TIMEOUT_MS'],
      });
    }

    if (data.JOBS_PAGE_LIMIT > data.JOBS_REFRESH_LIMIT) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'JOBS_PAGE_LIMIT cannot exceed JOBS_REFRESH_LIMIT',
        path: ['JOBS_PAGE_LIMIT'],
      });
    }

    if (data.JOB_POLL_MAX_BACKOFF_MS < data.JOB_POLL_INTERVAL_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'JOB_POLL_MAX_BACKOFF_MS cannot be shorter than JOB_POLL_INTERVAL_MS',
        path: ['JOB_POLL_MAX_BACKOFF_MS'],
      });
    }
  });

export type Env = ReturnType<typeof loadEnv>;
export type LogLevel = Env['LOG_LEVEL'];

export function loadEnv(customEnv: NodeJS.ProcessEnv = process.env) {
  try {
    const parsed = envSchema.parse(customEnv);

    return Object.freeze({
      API_BASE_URL: parsed.API_BASE_URL,
      NODE_ENV: parsed.NODE_ENV,
      AUTH_REQUIRED: parsed.AUTH_REQUIRED,
      REQUEST_TIMEOUT_MS: parsed.REQUEST_TIMEOUT_MS,
      UPLOAD_TIMEOUT_MS: parsed.UPLOAD_TIMEOUT_MS,
      READ_RETRIES: parsed.READ_RETRIES,
      RETRY_DELAY_MS: parsed.RETRY_DELAY_MS,
      JOBS_PAGE_LIMIT: parsed.JOBS_PAGE_LIMIT,
      JOBS_REFRESH_LIMIT: parsed.JOBS_REFRESH_LIMIT,
      JOB_POLL_INTERVAL_MS: parsed.JOB_POLL_INTERVAL_MS,
      JOB_POLL_MAX_BACKOFF_MS: parsed.JOB_POLL_MAX_BACKOFF_MS,
      LOG_LEVEL: parsed.LOG_LEVEL,
      IS_PRODUCTION: parsed.NODE_ENV === 'production',
    } as const);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
      throw new Error(`Invalid environment configuration. Fix the following: ${issues.join('; ')}`);
    }

    throw error;
  }
}

export const env = loadEnv();
