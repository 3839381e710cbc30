import { z } from 'zod';
import { ConfigError } from '@/core/domain/readiness/errors/config.error';

// Kubernetes manifests often template unset values as empty strings.
const blankAsUnset = <S extends z.ZodTypeAny>(schema: S) =>
  z.preprocess((value) => (typeof value === 'string' && value.trim() === '' ? undefined : value), schema);

const port = (fallback: number) =>
  blankAsUnset(z.coerce.number().int().positive().max(65_535).default(fallback));
const milliseconds = (fallback: number) =>
  blankAsUnset(z.coerce.number().int().positive().default(fallback));
const optionalText = blankAsUnset(z.string().trim().optional());

export const envSchema = z
  .object({
    // Application
    NODE_ENV: blankAsUnset(z.enum(['development', 'test', 'production']).default('production')),
    LOG_LEVEL: blankAsUnset(z.enum(['debug', 'info', 'warn', 'error']).default('info')),

    // Wait loop
    WAIT_INTERVAL_MS: milliseconds(2_000),
    WAIT_TIMEOUT_MS: milliseconds(300_000),
    PROBE_TIMEOUT_MS: milliseconds(5_000),

    // Consul
    CONSUL_HOST: blankAsUnset(z.string().trim().default('localhost')),
    CONSUL_PORT: port(8500),
    CONSUL_SCHEME: blankAsUnset(z.enum(['http', 'https']).default('http')),
    CONSUL_TOKEN: optionalText,
    CONSUL_PREFIX: optionalText,
    CONSUL_MANDATORY_KEYS: optionalText,
    CONSUL_OPTIONAL_KEYS: optionalText,
    CONSUL_CONNECTION_CHECK_KEY: optionalText,

    // PostgreSQL
    DATABASE_URL: blankAsUnset(
      z
        .string()
        .url()
        .regex(/^postgres(ql)?:\/\//, 'Must use the postgres:// or postgresql:// scheme')
        .optional(),
    ),

    // Redis
    REDIS_HOST: optionalText,
    REDIS_PORT: port(6379),
    REDIS_PASSWORD: optionalText,
    REDIS_DB: blankAsUnset(z.coerce.number().int().min(0).default(0)),

    // RabbitMQ
    RABBITMQ_HOST: optionalText,
    RABBITMQ_PORT: port(5672),
    RABBITMQ_USERNAME: optionalText,
    RABBITMQ_PASSWORD: optionalText,
    RABBITMQ_VHOST: blankAsUnset(z.string().default('/')),
  })
  .superRefine((env, ctx) => {
    if (env.CONSUL_PREFIX) {
      for (const key of ['CONSUL_MANDATORY_KEYS', 'CONSUL_CONNECTION_CHECK_KEY'] as const) {
        if (!env[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: 'Required when CONSUL_PREFIX is set',
          });
        }
      }
      return;
    }
    for (const key of ['CONSUL_MANDATORY_KEYS', 'CONSUL_OPTIONAL_KEYS'] as const) {
      if (env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: 'Has no effect without CONSUL_PREFIX',
        });
      }
    }
  });

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(env: Record<string, unknown> = process.env): EnvConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(
      `Environment validation failed:\n${issues.map((issue) => `  ${issue}`).join('\n')}`,
      issues,
    );
  }
  return result.data;
}
