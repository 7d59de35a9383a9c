import { join } from 'node:path';
import { z } from 'zod';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../domain/errors.js';

export interface AppConfig {
  runId: string;
  filterYear: number;
  timeoutMs: number;
  headless: boolean;
  maxCompanies: number | null;
  companiesCsv: string | null;
  paths: {
    outputDir: string;
    checkpointDir: string;
    contractsDir: string;
    downloadDir: string;
  };
  portal: {
    url: string;
    gazetteUrl: string;
    settleMs: number;
    pollIntervalMs: number;
    maxRowPasses: number;
    /** Installed browser to drive (e.g. `chrome`); null uses the Playwright-managed Chromium. */
    browserChannel: string | null;
  };
  captcha: {
    autoAttempts: number;
    manualTimeoutMs: number;
  };
  conformity: {
    deadlineDays: number;
  };
  extraction: {
    maxAttempts: number;
    baseDelayMs: number;
    multiplier: number;
    maxDelayMs: number;
    jitter: number;
    apiKey: string | null;
    model: string | null;
    /** Langfuse label the prompts are fetched under. */
    promptLabel: string;
  };
  langfuse: {
    publicKey: string;
    secretKey: string;
    baseUrl: string;
  } | null;
  databaseUrl: string | null;
  controlPort: number | null;
}

export const configOverridesSchema = z.object({
  runId: z.string().trim().min(1).optional(),
  filterYear: z.number().int().min(2000).max(2100).optional(),
  headless: z.boolean().optional(),
  maxCompanies: z.number().int().positive().optional(),
  companiesCsv: z.string().trim().min(1).optional(),
});

export type ConfigOverrides = z.infer<typeof configOverridesSchema>;

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

/** Unset and blank (`KEY=` in .env) both read as absent. */
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  RUN_ID: optionalText,
  FILTER_YEAR: z.coerce.number().int().min(2000).max(2100).optional(),
  TIMEOUT_SECONDS: z.coerce.number().int().positive().default(20),
  HEADLESS: booleanFlag.default('true'),
  MAX_COMPANIES: z.coerce.number().int().positive().optional(),
  COMPANIES_CSV: optionalText,

  OUTPUT_DIR: z.string().default(join('data', 'outputs')),
  CONTRACTS_DIR: z.string().default(join('data', 'contracts')),
  DOWNLOAD_DIR: z.string().default(join('data', 'tmp')),

  PORTAL_URL: z
    .string()
    .url()
    .default('https://contasrio.rio.rj.gov.br/ContasRio/#!Contratos/Contrato%20por%20Favorecido'),
  GAZETTE_URL: z.string().url().default('https://doweb.rio.rj.gov.br'),
  SETTLE_MS: z.coerce.number().int().nonnegative().default(2000),
  POLL_INTERVAL_MS: z.coerce.number().int().positive().default(250),
  MAX_ROW_PASSES: z.coerce.number().int().min(3).default(60),
  BROWSER_CHANNEL: optionalText,

  CAPTCHA_AUTO_ATTEMPTS: z.coerce.number().int().nonnegative().default(3),
  CAPTCHA_MANUAL_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(300),

  PUBLICATION_DEADLINE_DAYS: z.coerce.number().int().positive().default(20),

  EXTRACTION_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(5),
  EXTRACTION_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(4000),
  EXTRACTION_BACKOFF_MULTIPLIER: z.coerce.number().min(1).default(2),
  EXTRACTION_MAX_DELAY_MS: z.coerce.number().int().positive().default(120_000),
  EXTRACTION_JITTER: z.coerce.number().min(0).max(1).default(0.5),
  GROQ_API_KEY: optionalText,
  GROQ_MODEL: optionalText,

  LANGFUSE_PUBLIC_KEY: optionalText,
  LANGFUSE_SECRET_KEY: optionalText,
  LANGFUSE_BASE_URL: z.string().url().default('https://cloud.langfuse.com'),
  LANGFUSE_PROMPT_LABEL: z.string().trim().min(1).default('production'),

  DATABASE_URL: optionalText,
  CONTROL_PORT: z.coerce.number().int().positive().optional(),
});

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

/**
 * Builds the run configuration from environment variables plus command-line overrides.
 * The returned object is frozen and is passed explicitly to every component.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
  now: Date = new Date(),
): Result<Readonly<AppConfig>, AppError> {
  const parsedEnv = envSchema.safeParse(env);
  if (!parsedEnv.success) {
    return err(createAppError(ErrorCode.CONFIG_INVALID, 'Invalid environment configuration', false, formatIssues(parsedEnv.error)));
  }

  const parsedOverrides = configOverridesSchema.safeParse(overrides);
  if (!parsedOverrides.success) {
    return err(createAppError(ErrorCode.CONFIG_INVALID, 'Invalid command-line options', false, formatIssues(parsedOverrides.error)));
  }

  const e = parsedEnv.data;
  const o = parsedOverrides.data;
  const filterYear = o.filterYear ?? e.FILTER_YEAR ?? now.getFullYear();
  const outputDir = e.OUTPUT_DIR;

  const config: AppConfig = {
    runId: o.runId ?? e.RUN_ID ?? `contracts-${filterYear}`,
    filterYear,
    timeoutMs: e.TIMEOUT_SECONDS * 1000,
    headless: o.headless ?? e.HEADLESS,
    maxCompanies: o.maxCompanies ?? e.MAX_COMPANIES ?? null,
    companiesCsv: o.companiesCsv ?? e.COMPANIES_CSV ?? null,
    paths: {
      outputDir,
      checkpointDir: join(outputDir, 'checkpoints'),
      contractsDir: e.CONTRACTS_DIR,
      downloadDir: e.DOWNLOAD_DIR,
    },
    portal: {
      url: e.PORTAL_URL,
      gazetteUrl: e.GAZETTE_URL,
      settleMs: e.SETTLE_MS,
      pollIntervalMs: e.POLL_INTERVAL_MS,
      maxRowPasses: e.MAX_ROW_PASSES,
      browserChannel: e.BROWSER_CHANNEL ?? null,
    },
    captcha: {
      autoAttempts: e.CAPTCHA_AUTO_ATTEMPTS,
      manualTimeoutMs: e.CAPTCHA_MANUAL_TIMEOUT_SECONDS * 1000,
    },
    conformity: {
      deadlineDays: e.PUBLICATION_DEADLINE_DAYS,
    },
    extraction: {
      maxAttempts: e.EXTRACTION_MAX_ATTEMPTS,
      baseDelayMs: e.EXTRACTION_BASE_DELAY_MS,
      multiplier: e.EXTRACTION_BACKOFF_MULTIPLIER,
      maxDelayMs: e.EXTRACTION_MAX_DELAY_MS,
      jitter: e.EXTRACTION_JITTER,
      apiKey: e.GROQ_API_KEY ?? null,
      model: e.GROQ_MODEL ?? null,
      promptLabel: e.LANGFUSE_PROMPT_LABEL,
    },
    langfuse: e.LANGFUSE_PUBLIC_KEY && e.LANGFUSE_SECRET_KEY
      ? { publicKey: e.LANGFUSE_PUBLIC_KEY, secretKey: e.LANGFUSE_SECRET_KEY, baseUrl: e.LANGFUSE_BASE_URL }
      : null,
    databaseUrl: e.DATABASE_URL ?? null,
    controlPort: e.CONTROL_PORT ?? null,
  };

  return ok(deepFreeze(config));
}
