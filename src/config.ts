import { z } from 'zod';
import { ConfigError } from './core/errors.js';
import { DEFAULT_RANGE_PADDING } from './utils/range.js';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'none']);

const chartSchema = z
  .object({
    /** Narrowest sparkline, in columns */
    minWidth: z.number().int().min(1).default(15),
    /** Widest sparkline, in columns */
    maxWidth: z.number().int().min(1).default(140),
    /** Columns taken by label, value, stats and frame around the sparkline */
    reservedColumns: z.number().int().min(0).default(60),
  })
  .default({})
  .superRefine((chart, ctx) => {
    if (chart.minWidth > chart.maxWidth) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minWidth'],
        message: `minWidth (${chart.minWidth}) exceeds maxWidth (${chart.maxWidth})`,
      });
    }
  });

export const configSchema = z.object({
  /** Samples kept per sensor (600 = ten minutes at 1s polling) */
  historySize: z.number().int().min(1).default(600),
  pollIntervalMs: z.number().int().min(100).default(1000),
  /** Degrees added above and below the observed extremes */
  rangePadding: z.number().min(0).default(DEFAULT_RANGE_PADDING),
  chart: chartSchema,
  /** Slots skipped by H/L in the history browser */
  scrubStep: z.number().int().min(1).default(60),
  logLevel: logLevelSchema.default('none'),
});

export type ThermolineConfig = z.infer<typeof configSchema>;
export type ThermolineConfigInput = z.input<typeof configSchema>;
export type ChartConfig = ThermolineConfig['chart'];

function parseConfig(raw: unknown): ThermolineConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const paths = result.error.issues.map((issue) => issue.path.join('.'));
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`, paths);
  }
  return result.data;
}

/**
 * Validate user settings and fill in defaults
 *
 * @throws {ConfigError} listing every rejected setting
 */
export function defineConfig(input: ThermolineConfigInput = {}): ThermolineConfig {
  return parseConfig(input);
}

const numberFromEnv = (raw: string | undefined): number | undefined =>
  raw === undefined || raw.trim() === '' ? undefined : Number(raw);

/**
 * Build a configuration from THERMOLINE_* variables, then apply overrides.
 * `DEBUG=thermoline` forces the debug log level.
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ThermolineConfigInput = {}
): ThermolineConfig {
  const fromEnv: Record<string, unknown> = {
    historySize: numberFromEnv(env.THERMOLINE_HISTORY_SIZE),
    pollIntervalMs: numberFromEnv(env.THERMOLINE_POLL_INTERVAL),
    logLevel: env.THERMOLINE_LOG_LEVEL || undefined,
  };
  if ((env.DEBUG || '').includes('thermoline')) {
    fromEnv.logLevel = 'debug';
  }

  const defined = Object.fromEntries(Object.entries(fromEnv).filter(([, v]) => v !== undefined));
  return parseConfig({ ...defined, ...overrides });
}
