/**
 * Core type definitions for the coupon sweeper
 */

export type CharClass = 'digit' | 'lower';

export interface MutablePosition {
  index: number;
  charClass: CharClass;
}

export interface GeneratorState {
  base: string;
  positions: MutablePosition[];
  current: string;
  produced: bigint;  // odometer ordinal: candidates emitted so far
  total: bigint;
}

export type AdvanceResult =
  | { done: false; code: string; state: GeneratorState }
  | { done: true; state: GeneratorState };

/**
 * JSON shape of a persisted generator state (bigints as decimal strings)
 */
export interface GeneratorSnapshot {
  version: 1;
  base: string;
  positions: MutablePosition[];
  current: string;
  produced: string;
  total: string;
  updatedAt: string;
}

export interface PatternInfo {
  pattern: string;
  totalLength: number;
  mutablePositions: number;
  digitPositions: number;
  letterPositions: number;
  totalCombinations: bigint;
  produced: bigint;
  remaining: bigint;
}

export type ProbeOutcome = 'accepted' | 'rejected' | 'inconclusive';

export interface ProbeVerdict {
  outcome: ProbeOutcome;
  reason?: string;
  evidence: string[];
}

export interface ProbeResult {
  readonly runId: string;
  readonly ordinal: string;
  readonly code: string;
  readonly url: string;
  readonly outcome: ProbeOutcome;
  readonly reason?: string;
  readonly evidence: readonly string[];
  readonly attempts: number;
  readonly timestamp: string;
}

export interface DetectionRules {
  acceptIndicators: string[];
  rejectIndicators: string[];
  minAcceptMatches: number;
}

export type BrowserName = 'chromium' | 'firefox' | 'webkit';

export interface DriverConfig {
  browser: BrowserName;
  headless: boolean;
  blockImages: boolean;
  disableJavaScript: boolean;
  dwellMs: number;
  screenshots: boolean;
  screenshotDir: string;
  rules: DetectionRules;
}

export interface SweepConfig {
  baseCode: string;
  positions?: number[];
  siteUrl: string;
  couponParam: string;
  timeoutMs: number;
  pauseMs: number;
  maxRetries: number;
  retryDelayMs: number;
  outputDir: string;
  stateFile: string;
  logFile: string;
  driver: DriverConfig;
}

export type RunnerPhase = 'idle' | 'running' | 'draining' | 'exhausted' | 'stopped';

export interface OutcomeCounts {
  accepted: number;
  rejected: number;
  inconclusive: number;
}

export interface RunSummary {
  runId: string;
  endReason: 'exhausted' | 'interrupted';
  counts: OutcomeCounts;
  probed: number;
  lastCode: string | null;
  testedCodes: string[];
  acceptedCodes: string[];
}
