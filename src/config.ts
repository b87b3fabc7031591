import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const ConfigSchema = z.object({
  workspacePath: z.string().min(1),
  boardPath: z.string().min(1),
  databaseUrl: z.string().url().optional(),
  poolMax: z.coerce.number().int().min(1).max(100).default(20),
  acquireTimeoutMs: z.coerce.number().int().min(1).default(5000),
  connectTimeoutSec: z.coerce.number().int().min(1).default(30),
  logLevel: LogLevelSchema.default('info')
});

export type AppConfig = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

function argValue(argv: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = argv.find((a) => a.startsWith(prefix));
  return arg?.slice(prefix.length);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim().length > 0 ? value.trim() : undefined;
}

export function getWorkspacePath(argv: string[] = process.argv, env: Env = process.env): string {
  return nonEmpty(argValue(argv, 'workspace')) ?? nonEmpty(env.TASKBOARD_WORKSPACE) ?? process.cwd();
}

/** `--flag=value` arguments win over environment variables. */
export function loadConfig(argv: string[] = process.argv, env: Env = process.env): AppConfig {
  return ConfigSchema.parse({
    workspacePath: getWorkspacePath(argv, env),
    boardPath: nonEmpty(argValue(argv, 'board')) ?? nonEmpty(env.TASKBOARD_BOARD_PATH) ?? '.taskboard/board.json',
    databaseUrl: nonEmpty(argValue(argv, 'database-url')) ?? nonEmpty(env.DATABASE_URL),
    poolMax: nonEmpty(env.DB_POOL_MAX),
    acquireTimeoutMs: nonEmpty(env.DB_ACQUIRE_TIMEOUT_MS),
    connectTimeoutSec: nonEmpty(env.DB_CONNECT_TIMEOUT_SEC),
    logLevel: nonEmpty(env.LOG_LEVEL)
  });
}
