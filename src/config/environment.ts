import { z } from 'zod';

const optionalTimeOfDay = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string()
    .regex(/^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/)
    .optional(),
);

const envSchema = z.object({
  // Server Configuration
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().transform(Number).pipe(z.number().int().nonnegative()).default('8765'),
  HOST: z.string().default('0.0.0.0'),
  PUSHER_WS_PATH: z.string().startsWith('/').default('/'),

  // Upstream push feed
  UPSTREAM_WS_HOST: z.string().default('localhost'),
  UPSTREAM_WS_PORT: z
    .string()
    .transform(Number)
    .pipe(z.number().int().positive())
    .default('8766'),
  UPSTREAM_HEARTBEAT_MS: z
    .string()
    .transform(Number)
    .pipe(z.number().int().positive())
    .default('15000'),
  UPSTREAM_RECONNECT_BASE_MS: z
    .string()
    .transform(Number)
    .pipe(z.number().int().positive())
    .default('1000'),
  UPSTREAM_RECONNECT_MAX_MS: z
    .string()
    .transform(Number)
    .pipe(z.number().int().positive())
    .default('30000'),

  // Downstream fan-out
  BROADCAST_SEND_TIMEOUT_MS: z
    .string()
    .transform(Number)
    .pipe(z.number().int().positive())
    .default('5000'),

  // Instrument universe
  INSTRUMENTS_FILE: z.string().default('config/instruments.json'),

  // Trading session
  MARKET_END_TIME: optionalTimeOfDay,

  // Logging
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
});

export type Environment = z.infer<typeof envSchema>;

let _env: Environment | null = null;

export function loadEnvironment(): Environment {
  if (_env) {
    return _env;
  }

  const parsed = envSchema.safeParse(process.env);

  if (!parsed.success) {
    console.error('Invalid environment variables:');
    console.error(parsed.error.format());
    throw new Error('Invalid environment configuration');
  }

  _env = parsed.data;
  return _env;
}

export function getEnvironment(): Environment {
  if (!_env) {
    throw new Error('Environment not loaded. Call loadEnvironment() first.');
  }
  return _env;
}
