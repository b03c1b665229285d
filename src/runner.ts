/**
 * Sweep runner - drives generator -> probe driver in a loop
 *
 * Phases: idle -> running -> (draining | exhausted) -> stopped.
 * Cancellation is cooperative and only observed between probes, so a probe
 * that has started always finishes (or times out) first.
 */

import { v4 as uuidv4 } from 'uuid';
import { advance, remaining } from './generator';
import { describeError } from './errors';
import { ProbeDriver } from './probe';
import { ResultsLog, countOutcomes } from './results-log';
import { StateStore } from './state-store';
import {
  GeneratorState,
  ProbeResult,
  ProbeVerdict,
  RunSummary,
  RunnerPhase,
  SweepConfig,
} from './types';
import { buildProbeUrl, formatCount, sleep } from './utils';

export type RunnerSettings = Pick<
  SweepConfig,
  'siteUrl' | 'couponParam' | 'timeoutMs' | 'pauseMs' | 'maxRetries' | 'retryDelayMs'
>;

export interface RunnerOptions {
  settings: RunnerSettings;
  driver: ProbeDriver;
  store: StateStore;
  log: ResultsLog;
  /** Stop (as interrupted) after this many probes in this session */
  maxProbes?: number;
  quiet?: boolean;
  runId?: string;
  now?: () => Date;
  onPhaseChange?: (phase: RunnerPhase) => void;
}

const OUTCOME_ICONS = {
  accepted: '✅',
  rejected: '❌',
  inconclusive: '❓',
} as const;

export class Runner {
  readonly runId: string;
  private currentPhase: RunnerPhase = 'idle';
  private readonly now: () => Date;

  constructor(private readonly options: RunnerOptions) {
    this.runId = options.runId ?? uuidv4();
    this.now = options.now ?? (() => new Date());
  }

  get phase(): RunnerPhase {
    return this.currentPhase;
  }

  /**
   * Probe candidates from `initial` until exhausted or `signal` aborts.
   * Persistence failures are fatal and propagate after the browser is released.
   */
  async run(initial: GeneratorState, signal?: AbortSignal): Promise<RunSummary> {
    if (this.currentPhase !== 'idle') {
      throw new Error(`Runner ${this.runId} has already run`);
    }

    const { settings, driver, store, log, maxProbes } = this.options;
    const results: ProbeResult[] = [];
    let state = initial;
    let endReason: RunSummary['endReason'] = 'interrupted';

    this.setPhase('running');
    try {
      await driver.open();

      for (;;) {
        if (signal?.aborted || (maxProbes !== undefined && results.length >= maxProbes)) {
          this.setPhase('draining');
          await store.save(state);
          endReason = 'interrupted';
          break;
        }

        const step = advance(state);
        if (step.done) {
          this.setPhase('exhausted');
          endReason = 'exhausted';
          break;
        }

        const url = buildProbeUrl(settings.siteUrl, settings.couponParam, step.code);
        const result = await this.probeWithRetry(step.code, url, step.state.produced, signal);
        results.push(result);

        await log.append(result);
        await store.save(step.state);
        state = step.state;

        if (!this.options.quiet) {
          const icon = OUTCOME_ICONS[result.outcome];
          const detail = result.reason ? ` (${result.reason})` : '';
          console.log(
            `${icon} ${step.code} ${result.outcome}${detail} [${formatCount(state.produced)}/${formatCount(state.total)}]`
          );
        }

        if (settings.pauseMs > 0 && !signal?.aborted) {
          await sleep(settings.pauseMs);
        }
      }
    } finally {
      await driver.close();
      this.setPhase('stopped');
    }

    const summary: RunSummary = {
      runId: this.runId,
      endReason,
      counts: countOutcomes(results),
      probed: results.length,
      lastCode: results.length > 0 ? results[results.length - 1].code : null,
      testedCodes: results.map(r => r.code),
      acceptedCodes: results.filter(r => r.outcome === 'accepted').map(r => r.code),
    };
    if (endReason === 'interrupted') {
      console.log(`⏸ Stopped with ${formatCount(remaining(state))} candidates left; rerun to resume`);
    }
    return summary;
  }

  /**
   * Probe once, retrying failures a bounded number of times.
   * A candidate that keeps failing is recorded inconclusive. Once `signal`
   * aborts, a failed attempt is not retried.
   */
  private async probeWithRetry(
    code: string,
    url: string,
    ordinal: bigint,
    signal?: AbortSignal
  ): Promise<ProbeResult> {
    const { settings, driver } = this.options;
    const allowed = settings.maxRetries + 1;
    let lastFailure = 'no attempt made';

    for (let attempt = 1; attempt <= allowed; attempt++) {
      try {
        const verdict = await driver.probe(url, settings.timeoutMs, code);
        return this.record(code, url, ordinal, verdict, attempt);
      } catch (error) {
        lastFailure = describeError(error);
        console.warn(`  ⚠ Attempt ${attempt}/${allowed} failed for ${code}: ${lastFailure}`);

        if (signal?.aborted) {
          return this.record(
            code,
            url,
            ordinal,
            { outcome: 'inconclusive', reason: lastFailure, evidence: [] },
            attempt
          );
        }

        if (!driver.isAlive()) {
          await this.reacquireSession();
        }
        if (attempt < allowed && settings.retryDelayMs > 0) {
          await sleep(settings.retryDelayMs);
        }
      }
    }

    return this.record(code, url, ordinal, { outcome: 'inconclusive', reason: lastFailure, evidence: [] }, allowed);
  }

  /**
   * Replace a dead browser. A failed relaunch is reported and surfaces
   * again as a crash on the next attempt.
   */
  private async reacquireSession(): Promise<void> {
    const { driver } = this.options;
    console.log('🔄 Browser session lost, relaunching...');
    try {
      await driver.close();
      await driver.open();
    } catch (error) {
      console.error(`  ✗ Relaunch failed: ${describeError(error)}`);
    }
  }

  private record(
    code: string,
    url: string,
    ordinal: bigint,
    verdict: ProbeVerdict,
    attempts: number
  ): ProbeResult {
    return Object.freeze({
      runId: this.runId,
      ordinal: ordinal.toString(),
      code,
      url,
      outcome: verdict.outcome,
      ...(verdict.reason !== undefined ? { reason: verdict.reason } : {}),
      evidence: Object.freeze([...verdict.evidence]),
      attempts,
      timestamp: this.now().toISOString(),
    });
  }

  private setPhase(phase: RunnerPhase): void {
    this.currentPhase = phase;
    this.options.onPhaseChange?.(phase);
  }
}
