import { z } from 'zod';
import { ValidationError } from './errors.js';

const EnvSchema = z.object({
  DATABASE_PATH: z.string().min(1).default('./data/bookshift.db'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  FRONTEND_URL: z.string().url().default('http://localhost:5173'),
  INTAKE_OVERFLOW_POLICY: z.enum(['clamp', 'reject']).default('clamp'),
  REPORT_LINE_LIMIT: z.coerce.number().int().positive().default(50),
});

export type IntakeOverflowPolicy = z.infer<typeof EnvSchema>['INTAKE_OVERFLOW_POLICY'];
export type LogLevel = z.infer<typeof EnvSchema>['LOG_LEVEL'];

export interface AppConfig {
  databasePath: string;
  port: number;
  host: string;
  logLevel: LogLevel;
  frontendUrl: string;
  intakeOverflowPolicy: IntakeOverflowPolicy;
  reportLineLimit: number;
}

/**
 * Build the process configuration from an environment map.
 * Call once at startup and pass the result down; nothing else reads the environment.
 * Throws ValidationError naming every invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const invalid = parsed.error.issues.map((issue) => ({
      variable: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError(
      `Invalid configuration: ${invalid.map((i) => i.variable).join(', ')}`,
      { invalid }
    );
  }

  const vars = parsed.data;
  return {
    databasePath: vars.DATABASE_PATH,
    port: vars.PORT,
    host: vars.HOST,
    logLevel: vars.LOG_LEVEL,
    frontendUrl: vars.FRONTEND_URL,
    intakeOverflowPolicy: vars.INTAKE_OVERFLOW_POLICY,
    reportLineLimit: vars.REPORT_LINE_LIMIT,
  };
}
