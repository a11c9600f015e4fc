import { z } from 'zod';
import { ConfigError } from './errors';

const booleanString = z
  .string()
  .optional()
  .transform((v) => (v ?? '').toLowerCase() === 'true');

const percent = z.coerce.number().gt(0).lte(100);

const configSchema = z.object({
  TRADING_SYMBOL: z.string().min(1).default('BTC/USDT'),
  EXCHANGE: z.enum(['alpaca', 'binance', 'binanceus', 'okx']).default('okx'),
  PAPER_TRADING: z.string().default('true'),
  EXCHANGE_TESTNET: z.string().default('true'),
  INITIAL_CAPITAL: z.coerce.number().positive().default(10000),
  POSITION_SIZE_PERCENT: percent.default(5),
  DAILY_LOSS_LIMIT_PERCENT: percent.default(15),
  KILL_SWITCH_PERCENT: percent.default(50),
  STOP_LOSS_PERCENT: z.coerce.number().gt(0).lt(100).default(5),
  CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(100).default(70),
  POLL_INTERVAL_MS: z.coerce.number().int().positive().default(300000),
  ERROR_BACKOFF_MS: z.coerce.number().int().positive().default(60000),
  CANDLE_INTERVAL: z.string().default('1h'),
  CANDLE_LIMIT: z.coerce.number().int().min(1).max(500).default(100),
  PAPER_REFERENCE_PRICE: z.coerce.number().positive().default(50000),
  STRATEGIES: z.string().default('technical-indicators'),
  DB_PATH: z.string().default('data/sentinel.sqlite'),
  DATABASE_URL: z.string().optional(),
  PORT: z.coerce.number().int().positive().default(5000),
  LOG_LEVEL: z.string().default('info'),
  ENABLE_HTTP: z.string().default('true'),
  OKX_API_KEY: z.string().optional(),
  OKX_API_SECRET: z.string().optional(),
  OKX_API_PASSPHRASE: z.string().optional(),
  BINANCE_API_KEY: z.string().optional(),
  BINANCE_API_SECRET: z.string().optional(),
  ALPACA_API_KEY_ID: z.string().optional(),
  ALPACA_API_SECRET_KEY: z.string().optional(),
  LLM_PROVIDER: z.enum(['openai', 'openrouter', 'mock']).optional(),
  LLM_MODEL: z.string().optional(),
  LLM_API_KEY: z.string().optional(),
  LLM_MIN_CALL_INTERVAL_MS: z.coerce.number().int().min(0).default(300000),
});

export type Venue = z.infer<typeof configSchema>['EXCHANGE'];

export type AppConfig = z.infer<typeof configSchema> & {
  paperTrading: boolean;
  testnet: boolean;
  httpEnabled: boolean;
  strategyList: string[];
  strategyWeights: Record<string, number>;
};

/** `STRATEGY_TECHNICAL_INDICATORS_WEIGHT` for `technical-indicators`. */
export function strategyWeightKey(name: string): string {
  return `STRATEGY_${name.toUpperCase().replace(/[^A-Z0-9]+/g, '_')}_WEIGHT`;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  const cfg = parsed.data;
  const strategyList = Array.from(
    new Set(
      cfg.STRATEGIES.split(',')
        .map((s) => s.trim().toLowerCase())
        .filter(Boolean),
    ),
  );
  const strategyWeights: Record<string, number> = {};
  for (const name of strategyList) {
    const raw = env[strategyWeightKey(name)];
    if (raw === undefined || raw === '') continue;
    const weight = Number(raw);
    if (!Number.isFinite(weight) || weight < 0 || weight > 1) {
      throw new ConfigError(`Invalid configuration: ${strategyWeightKey(name)} must be between 0 and 1`);
    }
    strategyWeights[name] = weight;
  }
  return {
    ...cfg,
    paperTrading: booleanString.parse(cfg.PAPER_TRADING),
    testnet: booleanString.parse(cfg.EXCHANGE_TESTNET),
    httpEnabled: booleanString.parse(cfg.ENABLE_HTTP),
    strategyList,
    strategyWeights,
  };
}
