/**
 * Sweep configuration: environment (.env via dotenv) merged under CLI overrides,
 * validated into one explicit structure
 */

import path from 'path';
import { z } from 'zod';
import { DEFAULT_ACCEPT_INDICATORS, DEFAULT_REJECT_INDICATORS } from './detections';
import { ConfigError } from './errors';
import { BrowserName, SweepConfig } from './types';
import { normalizeSiteUrl } from './utils';

export interface ConfigOverrides {
  baseCode?: string;
  patternIndex?: number;
  positions?: number[];
  siteUrl?: string;
  couponParam?: string;
  timeoutMs?: number;
  dwellMs?: number;
  pauseMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  headless?: boolean;
  browser?: BrowserName;
  blockImages?: boolean;
  disableJavaScript?: boolean;
  screenshots?: boolean;
  outputDir?: string;
  stateFile?: string;
  logFile?: string;
}

type Env = Record<string, string | undefined>;

const flag = z.union([
  z.boolean(),
  z
    .string()
    .toLowerCase()
    .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
    .transform(v => v === 'true' || v === '1' || v === 'yes'),
]);

const millis = z.coerce.number().int().nonnegative();

const configSchema = z
  .object({
    baseCodes: z.array(z.string().min(1)).min(1, 'set SWEEP_BASE_CODE (or SWEEP_BASE_CODES) or pass --base'),
    patternIndex: z.coerce.number().int().nonnegative().default(0),
    positions: z.array(z.number().int().nonnegative()).optional(),
    siteUrl: z
      .string({ required_error: 'set SWEEP_SITE_URL or pass --site' })
      .min(1)
      .refine(isValidSiteUrl, 'must be an http(s) URL or a bare host name'),
    couponParam: z.string().min(1).default('cpn'),
    timeoutMs: z.coerce.number().int().positive().default(10000),
    dwellMs: millis.default(2000),
    pauseMs: millis.default(500),
    maxRetries: z.coerce.number().int().min(0).max(10).default(3),
    retryDelayMs: millis.default(1000),
    headless: flag.default(true),
    browser: z.enum(['chromium', 'firefox', 'webkit']).default('chromium'),
    blockImages: flag.default(true),
    disableJavaScript: flag.default(false),
    screenshots: flag.default(true),
    outputDir: z.string().min(1).default('output'),
    stateFile: z.string().min(1).optional(),
    logFile: z.string().min(1).optional(),
    acceptIndicators: z.array(z.string().min(1)).min(1).default(DEFAULT_ACCEPT_INDICATORS),
    rejectIndicators: z.array(z.string().min(1)).default(DEFAULT_REJECT_INDICATORS),
    minAcceptMatches: z.coerce.number().int().positive().default(2),
  })
  .superRefine((c, ctx) => {
    if (c.patternIndex >= c.baseCodes.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          `pattern index ${c.patternIndex} is past the end of the ${c.baseCodes.length} configured base code(s); ` +
          'only SWEEP_BASE_CODES lists several, --base and SWEEP_BASE_CODE name one',
        path: ['patternIndex'],
      });
    }
  });

/**
 * --base wins outright. A pattern index points into SWEEP_BASE_CODES, so the
 * list takes priority over SWEEP_BASE_CODE whenever an index is given.
 */
function selectBaseCodes(env: Env, baseOverride: string | undefined, indexed: boolean): string[] {
  if (baseOverride !== undefined) return [baseOverride];
  const listed = list(read(env, 'SWEEP_BASE_CODES'));
  const single = read(env, 'SWEEP_BASE_CODE');
  if (listed && (indexed || single === undefined)) return listed;
  return single !== undefined ? [single] : [];
}

/**
 * Build the sweep configuration. Pure: pass `process.env` after dotenv has loaded it.
 */
export function loadConfig(env: Env, overrides: ConfigOverrides = {}): SweepConfig {
  const patternIndex = overrides.patternIndex ?? read(env, 'SWEEP_PATTERN_INDEX');
  const baseCodes = selectBaseCodes(env, overrides.baseCode, patternIndex !== undefined);
  const positions = overrides.positions ?? parsePositions(read(env, 'SWEEP_POSITIONS'));

  const parsed = configSchema.safeParse({
    baseCodes,
    patternIndex,
    positions,
    siteUrl: overrides.siteUrl ?? read(env, 'SWEEP_SITE_URL'),
    couponParam: overrides.couponParam ?? read(env, 'SWEEP_COUPON_PARAM'),
    timeoutMs: overrides.timeoutMs ?? read(env, 'SWEEP_TIMEOUT_MS'),
    dwellMs: overrides.dwellMs ?? read(env, 'SWEEP_DWELL_MS'),
    pauseMs: overrides.pauseMs ?? read(env, 'SWEEP_PAUSE_MS'),
    maxRetries: overrides.maxRetries ?? read(env, 'SWEEP_MAX_RETRIES'),
    retryDelayMs: overrides.retryDelayMs ?? read(env, 'SWEEP_RETRY_DELAY_MS'),
    headless: overrides.headless ?? read(env, 'SWEEP_HEADLESS'),
    browser: overrides.browser ?? read(env, 'SWEEP_BROWSER'),
    blockImages: overrides.blockImages ?? read(env, 'SWEEP_BLOCK_IMAGES'),
    disableJavaScript: overrides.disableJavaScript ?? read(env, 'SWEEP_DISABLE_JS'),
    screenshots: overrides.screenshots ?? read(env, 'SWEEP_SCREENSHOTS'),
    outputDir: overrides.outputDir ?? read(env, 'SWEEP_OUTPUT_DIR'),
    stateFile: overrides.stateFile ?? read(env, 'SWEEP_STATE_FILE'),
    logFile: overrides.logFile ?? read(env, 'SWEEP_LOG_FILE'),
    acceptIndicators: list(read(env, 'SWEEP_ACCEPT_INDICATORS')),
    rejectIndicators: list(read(env, 'SWEEP_REJECT_INDICATORS')),
    minAcceptMatches: read(env, 'SWEEP_MIN_ACCEPT_MATCHES'),
  });

  if (!parsed.success) {
    throw new ConfigError(
      'Invalid configuration',
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }

  const c = parsed.data;
  return {
    baseCode: c.baseCodes[c.patternIndex],
    positions: c.positions,
    siteUrl: normalizeSiteUrl(c.siteUrl),
    couponParam: c.couponParam,
    timeoutMs: c.timeoutMs,
    pauseMs: c.pauseMs,
    maxRetries: c.maxRetries,
    retryDelayMs: c.retryDelayMs,
    outputDir: c.outputDir,
    stateFile: c.stateFile ?? path.join(c.outputDir, 'state.json'),
    logFile: c.logFile ?? path.join(c.outputDir, 'results.jsonl'),
    driver: {
      browser: c.browser,
      headless: c.headless,
      blockImages: c.blockImages,
      disableJavaScript: c.disableJavaScript,
      dwellMs: c.dwellMs,
      screenshots: c.screenshots,
      screenshotDir: path.join(c.outputDir, 'screens'),
      rules: {
        acceptIndicators: c.acceptIndicators,
        rejectIndicators: c.rejectIndicators,
        minAcceptMatches: c.minAcceptMatches,
      },
    },
  };
}

/**
 * Parse a comma-separated list of indices, e.g. "28,29,30,31"
 */
export function parsePositions(value: string | undefined): number[] | undefined {
  const items = list(value);
  if (!items) return undefined;
  return items.map(item => {
    const index = Number(item);
    if (!Number.isInteger(index) || index < 0) {
      throw new ConfigError(`Invalid position '${item}': expected a non-negative integer`);
    }
    return index;
  });
}

export function printConfig(config: SweepConfig): void {
  console.log('Configuration Settings:');
  console.log(`  Base code: ${config.baseCode}`);
  console.log(`  Site URL: ${config.siteUrl} (param: ${config.couponParam})`);
  console.log(`  Page load timeout: ${config.timeoutMs}ms, dwell: ${config.driver.dwellMs}ms, pause: ${config.pauseMs}ms`);
  console.log(`  Max retries: ${config.maxRetries} (delay ${config.retryDelayMs}ms)`);
  console.log(`  Browser: ${config.driver.browser} (headless: ${config.driver.headless})`);
  console.log(`  State file: ${config.stateFile}`);
  console.log(`  Results log: ${config.logFile}`);
}

function read(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function list(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const items = value.split(',').map(item => item.trim()).filter(item => item.length > 0);
  return items.length > 0 ? items : undefined;
}

function isValidSiteUrl(value: string): boolean {
  try {
    const url = new URL(normalizeSiteUrl(value));
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}
