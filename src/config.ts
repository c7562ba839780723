import { z } from 'zod';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from './ai/retryPolicy';
import { DEFAULT_MAX_ROUNDS, type ExplorationPolicy } from './ai/toolLoop';
import type { Variant } from './core/types';
import { cachedLexicon, DEFAULT_MIN_LENGTH, type Lexicon } from './dictionary/dictionaryService';
import { LexiconJudge } from './dictionary/judge';
import { createLogger, type Logger, type LogLevel } from './logger';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface AppConfig {
  policy: RetryPolicy;
  exploration: ExplorationPolicy;
  maxToolRounds: number;
  requireScoringAttempt: boolean;
  variant: Variant;
  /** Word list or JSON entries, optionally gzipped. */
  lexiconPath: string | null;
  minWordLength: number;
  logLevel: LogLevel;
}

const count = (fallback: number) => z.coerce.number().int().min(0).default(fallback);
const positive = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('false')
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  SCRABBLE_SESSION_TIMEOUT_MS: positive(DEFAULT_RETRY_POLICY.sessionTimeoutMs),
  SCRABBLE_ROUND_TIMEOUT_MS: positive(DEFAULT_RETRY_POLICY.perRoundTimeoutMs),
  SCRABBLE_MAX_ATTEMPTS: positive(DEFAULT_RETRY_POLICY.maxAttempts),
  SCRABBLE_MIN_RETRY_WINDOW_MS: count(DEFAULT_RETRY_POLICY.minRetryWindowMs),
  SCRABBLE_MIN_WORD_VALIDATIONS: count(0),
  SCRABBLE_MIN_SCORED_CANDIDATES: count(0),
  SCRABBLE_MAX_TOOL_ROUNDS: positive(DEFAULT_MAX_ROUNDS),
  SCRABBLE_REQUIRE_SCORING_ATTEMPT: flag,
  SCRABBLE_VARIANT: z.enum(['en', 'ru']).default('en'),
  SCRABBLE_LEXICON_PATH: z.string().optional(),
  SCRABBLE_MIN_WORD_LENGTH: positive(DEFAULT_MIN_LENGTH),
  SCRABBLE_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info')
});

type EnvKey = keyof z.input<typeof envSchema>;
const ENV_KEYS = Object.keys(envSchema.shape).filter((key): key is EnvKey => key in envSchema.shape);

/** Blank variables count as unset. */
function pickEnv(env: NodeJS.ProcessEnv): Partial<Record<EnvKey, string>> {
  const picked: Partial<Record<EnvKey, string>> = {};
  for (const key of ENV_KEYS) {
    const value = env[key]?.trim();
    if (value) picked[key] = value;
  }
  return picked;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(pickEnv(env));
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  if (values.SCRABBLE_ROUND_TIMEOUT_MS > values.SCRABBLE_SESSION_TIMEOUT_MS) {
    throw new ConfigError('Invalid configuration: SCRABBLE_ROUND_TIMEOUT_MS exceeds SCRABBLE_SESSION_TIMEOUT_MS');
  }

  return {
    policy: {
      maxAttempts: values.SCRABBLE_MAX_ATTEMPTS,
      perRoundTimeoutMs: values.SCRABBLE_ROUND_TIMEOUT_MS,
      sessionTimeoutMs: values.SCRABBLE_SESSION_TIMEOUT_MS,
      minRetryWindowMs: values.SCRABBLE_MIN_RETRY_WINDOW_MS
    },
    exploration: {
      minWordValidations: values.SCRABBLE_MIN_WORD_VALIDATIONS,
      minScoredCandidates: values.SCRABBLE_MIN_SCORED_CANDIDATES
    },
    maxToolRounds: values.SCRABBLE_MAX_TOOL_ROUNDS,
    requireScoringAttempt: values.SCRABBLE_REQUIRE_SCORING_ATTEMPT,
    variant: values.SCRABBLE_VARIANT,
    lexiconPath: values.SCRABBLE_LEXICON_PATH ?? null,
    minWordLength: values.SCRABBLE_MIN_WORD_LENGTH,
    logLevel: values.SCRABBLE_LOG_LEVEL
  };
}

export function configLogger(config: AppConfig, scope = 'scrabble'): Logger {
  return createLogger(scope, { level: config.logLevel });
}

/** Judge over the configured lexicon, filed under the configured variant. */
export async function judgeFromConfig(config: AppConfig, logger: Logger = configLogger(config)): Promise<LexiconJudge> {
  if (!config.lexiconPath) throw new ConfigError('SCRABBLE_LEXICON_PATH is not set');
  const lexicon = await cachedLexicon(config.lexiconPath, { minLength: config.minWordLength }, logger.child('dictionary'));
  const lexicons: Partial<Record<Variant, Lexicon>> = {};
  lexicons[config.variant] = lexicon;
  return new LexiconJudge(lexicons, logger.child('judge'));
}
