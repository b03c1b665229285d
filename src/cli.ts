#!/usr/bin/env node
/**
 * Command-line entry point for the coupon sweeper
 */

import path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import dotenv from 'dotenv';

import { ConfigOverrides, loadConfig, parsePositions, printConfig } from './config';
import { ConfigError, describeError, isSweepError } from './errors';
import { describePattern, isExhausted, preview } from './generator';
import { PlaywrightProbeDriver } from './probe';
import { FileResultsLog, writeCodeList } from './results-log';
import { Runner } from './runner';
import { FileStateStore, resumeOrInitialize } from './state-store';
import { BrowserName, GeneratorState, RunSummary, SweepConfig } from './types';
import { formatCount } from './utils';

dotenv.config();

interface CommonOptions {
  base?: string;
  patternIndex?: number;
  positions?: string;
  site?: string;
  param?: string;
  outputDir?: string;
  stateFile?: string;
}

interface RunOptions extends CommonOptions {
  fresh?: boolean;
  maxProbes?: number;
  timeout?: number;
  dwell?: number;
  pause?: number;
  retries?: number;
  retryDelay?: number;
  browser?: BrowserName;
  headed?: boolean;
  showImages?: boolean;
  disableJs?: boolean;
  skipScreenshots?: boolean;
  logFile?: string;
  quiet?: boolean;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function parseBrowser(value: string): BrowserName {
  if (value === 'chromium' || value === 'firefox' || value === 'webkit') {
    return value;
  }
  throw new InvalidArgumentError('Expected chromium, firefox or webkit.');
}

function commonOverrides(opts: CommonOptions): ConfigOverrides {
  return {
    baseCode: opts.base,
    patternIndex: opts.patternIndex,
    positions: parsePositions(opts.positions),
    siteUrl: opts.site,
    couponParam: opts.param,
    outputDir: opts.outputDir,
    stateFile: opts.stateFile,
  };
}

function runOverrides(opts: RunOptions): ConfigOverrides {
  return {
    ...commonOverrides(opts),
    timeoutMs: opts.timeout,
    dwellMs: opts.dwell,
    pauseMs: opts.pause,
    maxRetries: opts.retries,
    retryDelayMs: opts.retryDelay,
    browser: opts.browser,
    headless: opts.headed ? false : undefined,
    blockImages: opts.showImages ? false : undefined,
    disableJavaScript: opts.disableJs ? true : undefined,
    screenshots: opts.skipScreenshots ? false : undefined,
    logFile: opts.logFile,
  };
}

function printPatternInfo(state: GeneratorState): void {
  const info = describePattern(state);
  console.log(`Pattern: ${info.pattern} (${info.totalLength} chars)`);
  console.log(
    `Mutable positions: ${info.mutablePositions} (${info.digitPositions} digits, ${info.letterPositions} letters)`
  );
  console.log(`Total possible combinations: ${formatCount(info.totalCombinations)}`);
  console.log(`Already tested: ${formatCount(info.produced)}`);
  console.log(`Remaining to test: ${formatCount(info.remaining)}`);
}

function printSummary(summary: RunSummary, config: SweepConfig): void {
  console.log('\nSummary:');
  console.log(`  Run: ${summary.runId} (${summary.endReason})`);
  console.log(`  Probed this session: ${summary.probed}`);
  console.log(
    `  ✅ Accepted: ${summary.counts.accepted}  ❌ Rejected: ${summary.counts.rejected}  ❓ Inconclusive: ${summary.counts.inconclusive}`
  );
  console.log(`  Last code tested: ${summary.lastCode ?? 'None'}`);
  for (const code of summary.acceptedCodes) {
    console.log(`  🎉 Accepted: ${code}`);
  }
  console.log(`  Results log: ${config.logFile}`);
}

async function runCommand(opts: RunOptions): Promise<void> {
  const config = loadConfig(process.env, runOverrides(opts));
  printConfig(config);

  const store = new FileStateStore(config.stateFile);
  const { state, resumed } = await resumeOrInitialize(store, config.baseCode, config.positions, opts.fresh);
  console.log(resumed ? `\n♻️ Resuming from ${config.stateFile}` : '\n🆕 Starting a fresh sweep');
  printPatternInfo(state);

  if (isExhausted(state)) {
    console.log('All possible combinations have been tested. Pass --fresh to start over.');
    return;
  }
  console.log('Press Ctrl+C to stop\n');

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      console.log(`\nReceived ${signal} again. Exiting now.`);
      process.exit(130);
    }
    console.log(`\nReceived ${signal}. Finishing the current probe, then stopping...`);
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  const runner = new Runner({
    settings: config,
    driver: new PlaywrightProbeDriver(config.driver),
    store,
    log: new FileResultsLog(config.logFile),
    maxProbes: opts.maxProbes,
    quiet: opts.quiet,
  });

  let summary: RunSummary;
  try {
    summary = await runner.run(state, controller.signal);
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }

  if (summary.testedCodes.length > 0) {
    await writeCodeList(path.join(config.outputDir, 'tested_codes.txt'), summary.testedCodes);
    console.log(`Tested codes saved to ${path.join(config.outputDir, 'tested_codes.txt')}`);
  }
  if (summary.acceptedCodes.length > 0) {
    await writeCodeList(path.join(config.outputDir, 'accepted_codes.txt'), summary.acceptedCodes);
  }
  if (summary.endReason === 'exhausted') {
    console.log('All possible combinations have been tested.');
  }
  printSummary(summary, config);
}

async function infoCommand(opts: CommonOptions): Promise<void> {
  const config = loadConfig(process.env, commonOverrides(opts));
  const { state, resumed } = await resumeOrInitialize(
    new FileStateStore(config.stateFile),
    config.baseCode,
    config.positions
  );
  console.log(resumed ? `Saved state: ${config.stateFile}` : 'No saved state yet');
  printPatternInfo(state);
}

async function previewCommand(opts: CommonOptions & { count: number }): Promise<void> {
  const config = loadConfig(process.env, commonOverrides(opts));
  const { state } = await resumeOrInitialize(
    new FileStateStore(config.stateFile),
    config.baseCode,
    config.positions
  );
  for (const code of preview(state, opts.count)) {
    console.log(code);
  }
}

function withCommonOptions(command: Command): Command {
  return command
    .option('-b, --base <code>', 'Base code to enumerate around (overrides SWEEP_BASE_CODE)')
    .option('--pattern-index <n>', 'Pick one of SWEEP_BASE_CODES', parseInteger)
    .option('-p, --positions <list>', 'Comma-separated mutable positions (default: every digit and lowercase letter)')
    .option('-s, --site <url>', 'Site URL the code is appended to (overrides SWEEP_SITE_URL)')
    .option('--param <name>', 'Query parameter carrying the code')
    .option('-o, --output-dir <dir>', 'Directory for state, results and screenshots')
    .option('--state-file <file>', 'Saved generator state');
}

const program = new Command();

program
  .name('coupon-sweep')
  .description('Enumerate coupon codes near a base code and probe a site with each one')
  .version('1.0.0');

withCommonOptions(program.command('run'))
  .description('Run a sweep, resuming from saved state when present')
  .option('--fresh', 'Discard saved state and start from the base code')
  .option('--max-probes <n>', 'Stop after this many probes', parseInteger)
  .option('--timeout <ms>', 'Page load timeout', parseInteger)
  .option('--dwell <ms>', 'Time to stay on a loaded page before reading it', parseInteger)
  .option('--pause <ms>', 'Pause between probes', parseInteger)
  .option('--retries <n>', 'Reattempts for a failing probe', parseInteger)
  .option('--retry-delay <ms>', 'Delay between reattempts', parseInteger)
  .option('--browser <name>', 'chromium, firefox or webkit', parseBrowser)
  .option('--headed', 'Show the browser window')
  .option('--show-images', 'Load images')
  .option('--disable-js', 'Disable page scripts')
  .option('--skip-screenshots', 'Do not screenshot accepted pages')
  .option('--log-file <file>', 'Append-only results log')
  .option('-q, --quiet', 'Only print retries and the summary')
  .action(async (opts: RunOptions) => {
    await runCommand(opts);
  });

withCommonOptions(program.command('info'))
  .description('Show pattern size and progress')
  .action(async (opts: CommonOptions) => {
    await infoCommand(opts);
  });

withCommonOptions(program.command('preview'))
  .description('Print the next candidates without probing')
  .option('-n, --count <n>', 'How many candidates', parseInteger, 10)
  .action(async (opts: CommonOptions & { count: number }) => {
    await previewCommand(opts);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`❌ ${isSweepError(error) ? error.message : describeError(error)}`);
  process.exitCode = error instanceof ConfigError ? 2 : 1;
});
