import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  DATABASE_URL: z.string().min(1).optional(),
  PGSSLMODE: z.string().optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  SSE_HEARTBEAT_MS: z.coerce.number().int().positive().default(25_000),
  SSE_MAX_BACKLOG: z.coerce.number().int().positive().default(100),
});

export type AppConfig = {
  port: number;
  databaseUrl: string | null;
  pgSslMode: string | undefined;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  heartbeatMs: number;
  maxBacklog: number;
};

export const loadConfig = (env: Record<string, string | undefined> = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment: ${problems.join('; ')}`);
  }
  const data = parsed.data;
  return {
    port: data.PORT,
    databaseUrl: data.DATABASE_URL ?? null,
    pgSslMode: data.PGSSLMODE,
    logLevel: data.LOG_LEVEL,
    heartbeatMs: data.SSE_HEARTBEAT_MS,
    maxBacklog: data.SSE_MAX_BACKLOG,
  };
};
