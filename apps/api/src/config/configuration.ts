// 설정 로딩. 우선순위: 커맨드라인 플래그 > 환경변수(.env 포함) > 기본값
import { resolve } from 'node:path';
import { parseArgs } from 'node:util';
import { z } from 'zod';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

const bool = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  GRPC_PORT: z.coerce.number().int().min(1).max(65535).default(50051),
  GLOBAL_PREFIX: z.string().default('v1'),
  DB_HOST: z.string().min(1).default('localhost'),
  DB_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  DB_USER: z.string().min(1).default('postgres'),
  DB_PASSWORD: z.string().default('postgres'),
  DB_NAME: z.string().min(1).default('quotes'),
  DB_SSLMODE: z.enum(['disable', 'require', 'verify-full']).default('disable'),
  DB_MIGRATE: bool.default('true'),
  DB_MIGRATIONS_DIR: z.string().default(resolve(__dirname, '../../migrations')),
  UPSTREAM_BASE_URL: z.string().url().default('https://grinex.io'),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  UPSTREAM_USER_AGENT: z.string().min(1).default('QuoteService/1.0'),
  UPSTREAM_TRADES_LIMIT: z.coerce.number().int().min(1).max(1000).default(100),
  TRADING_PAIR: z
    .string()
    .regex(/^[A-Za-z0-9]+\/[A-Za-z0-9]+$/, 'expected BASE/QUOTE, e.g. USDT/RUB')
    .default('USDT/RUB'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  SHUTDOWN_GRACE_MS: z.coerce.number().int().positive().default(30_000),
  THROTTLE_TTL_MS: z.coerce.number().int().positive().default(60_000),
  THROTTLE_LIMIT: z.coerce.number().int().positive().default(120),
});

// 플래그 이름 → 환경변수 이름
const FLAGS = {
  port: 'PORT',
  'grpc-port': 'GRPC_PORT',
  'db-host': 'DB_HOST',
  'db-port': 'DB_PORT',
  'db-user': 'DB_USER',
  'db-password': 'DB_PASSWORD',
  'db-name': 'DB_NAME',
  'db-sslmode': 'DB_SSLMODE',
  'upstream-base-url': 'UPSTREAM_BASE_URL',
  'upstream-timeout': 'UPSTREAM_TIMEOUT_MS',
  'trading-pair': 'TRADING_PAIR',
  'log-level': 'LOG_LEVEL',
} as const satisfies Record<string, keyof z.input<typeof EnvSchema>>;

export type AppConfig = {
  http: { port: number; globalPrefix: string };
  grpc: { port: number };
  database: {
    host: string;
    port: number;
    user: string;
    password: string;
    name: string;
    sslMode: 'disable' | 'require' | 'verify-full';
    migrate: boolean;
    migrationsDir: string;
  };
  upstream: {
    baseUrl: string;
    timeoutMs: number;
    userAgent: string;
    tradesLimit: number;
  };
  tradingPair: string;
  market: string;
  logLevel: LogLevelName;
  shutdownGraceMs: number;
  throttle: { ttlMs: number; limit: number };
};

export class ConfigValidationError extends Error {
  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

function flagValues(argv: readonly string[]): Record<string, string> {
  const { values } = parseArgs({
    args: [...argv],
    options: Object.fromEntries(
      Object.keys(FLAGS).map((name) => [name, { type: 'string' as const }]),
    ),
    strict: false,
    allowPositionals: true,
  });

  const out: Record<string, string> = {};
  for (const [flag, envKey] of Object.entries(FLAGS)) {
    const v = values[flag];
    if (typeof v === 'string' && v !== '') out[envKey] = v;
  }
  return out;
}

function nonEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v !== '') out[k] = v;
  }
  return out;
}

/** USDT/RUB → usdtrub (거래소 market 파라미터 형식) */
export function toMarketId(pair: string): string {
  return pair.replace('/', '').toLowerCase();
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: readonly string[] = process.argv.slice(2),
): AppConfig {
  const parsed = EnvSchema.safeParse({ ...nonEmpty(env), ...flagValues(argv) });
  if (!parsed.success) {
    throw new ConfigValidationError(
      parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    );
  }
  const e = parsed.data;
  const tradingPair = e.TRADING_PAIR.toUpperCase();

  return {
    http: { port: e.PORT, globalPrefix: e.GLOBAL_PREFIX },
    grpc: { port: e.GRPC_PORT },
    database: {
      host: e.DB_HOST,
      port: e.DB_PORT,
      user: e.DB_USER,
      password: e.DB_PASSWORD,
      name: e.DB_NAME,
      sslMode: e.DB_SSLMODE,
      migrate: e.DB_MIGRATE,
      migrationsDir: e.DB_MIGRATIONS_DIR,
    },
    upstream: {
      baseUrl: e.UPSTREAM_BASE_URL.replace(/\/+$/, ''),
      timeoutMs: e.UPSTREAM_TIMEOUT_MS,
      userAgent: e.UPSTREAM_USER_AGENT,
      tradesLimit: e.UPSTREAM_TRADES_LIMIT,
    },
    tradingPair,
    market: toMarketId(tradingPair),
    logLevel: e.LOG_LEVEL,
    shutdownGraceMs: e.SHUTDOWN_GRACE_MS,
    throttle: { ttlMs: e.THROTTLE_TTL_MS, limit: e.THROTTLE_LIMIT },
  };
}
