import { z } from 'zod';
import { worstCaseRetryMs } from '../llm/retry-coordinator';

const envSchema = z.object({
  DATABASE_URL: z.string().url().optional(),
  SESSION_SECRET: z.string().min(32),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(5000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGIN: z.string().optional(),

  // Interpreter retry discipline
  ROUTER_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  ROUTER_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(800),
  ROUTER_MAX_DELAY_MS: z.coerce.number().int().positive().default(10_000),
  ROUTER_ATTEMPT_TIMEOUT_MS: z.coerce.number().int().positive().default(8_000),
  ROUTER_DEADLINE_MS: z.coerce.number().int().positive().default(30_000),
  ROUTER_HISTORY_WINDOW: z.coerce.number().int().nonnegative().default(6),
  ROUTER_MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.35),

  // Tool parameter bounds
  TOOL_TOP_N_MAX: z.coerce.number().int().positive().default(50),
  TOOL_MAX_REVIEWS_MIN: z.coerce.number().int().positive().default(5),
  TOOL_MAX_REVIEWS_MAX: z.coerce.number().int().positive().default(50),

  ACCESS_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(5000),
  TRACE_QUERY_MAX_LIMIT: z.coerce.number().int().positive().default(200),
}).refine((env) => env.TOOL_MAX_REVIEWS_MIN <= env.TOOL_MAX_REVIEWS_MAX, {
  message: 'TOOL_MAX_REVIEWS_MIN must not exceed TOOL_MAX_REVIEWS_MAX',
  path: ['TOOL_MAX_REVIEWS_MIN'],
}).refine((env) => env.ROUTER_DEADLINE_MS >= worstCaseRetryMs({
  maxAttempts: env.ROUTER_MAX_ATTEMPTS,
  baseDelayMs: env.ROUTER_BASE_DELAY_MS,
  maxDelayMs: env.ROUTER_MAX_DELAY_MS,
  attemptTimeoutMs: env.ROUTER_ATTEMPT_TIMEOUT_MS,
  deadlineMs: env.ROUTER_DEADLINE_MS,
}), {
  message: 'ROUTER_DEADLINE_MS must cover ROUTER_MAX_ATTEMPTS timed-out attempts plus their backoff',
  path: ['ROUTER_DEADLINE_MS'],
});

export type Env = z.infer<typeof envSchema>;

let validatedEnv: Env | undefined;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment variables: ${issues}`);
  }

  return result.data;
}

export function getEnv(): Env {
  if (!validatedEnv) {
    validatedEnv = parseEnv(process.env);
  }
  return validatedEnv;
}
