/**
 * Detection rules: classify a loaded page as accepting or rejecting the coupon
 */

import { DetectionRules, ProbeVerdict } from './types';
import { extractCouponTokens } from './utils';

export const DEFAULT_ACCEPT_INDICATORS = [
  'use coupon code given below',
  'coupon applied',
  'copy code',
  'start shopping',
];

export const DEFAULT_REJECT_INDICATORS = [
  'invalid coupon',
  'coupon expired',
  'coupon is not valid',
  'already been used',
];

export const DEFAULT_RULES: DetectionRules = {
  acceptIndicators: DEFAULT_ACCEPT_INDICATORS,
  rejectIndicators: DEFAULT_REJECT_INDICATORS,
  minAcceptMatches: 2,
};

/**
 * Indicators (lowercased) that appear in the page text
 */
export function matchIndicators(domText: string, indicators: readonly string[]): string[] {
  const haystack = domText.toLowerCase();
  return indicators
    .map(indicator => indicator.toLowerCase())
    .filter(indicator => indicator.length > 0 && haystack.includes(indicator));
}

/**
 * Rules-based page classification.
 * Reject indicators win over accept indicators; an empty body proves nothing.
 */
export function classifyPage(domText: string, rules: DetectionRules = DEFAULT_RULES): ProbeVerdict {
  if (domText.trim().length === 0) {
    return {
      outcome: 'inconclusive',
      reason: 'page body was empty',
      evidence: [],
    };
  }

  const rejected = matchIndicators(domText, rules.rejectIndicators);
  if (rejected.length > 0) {
    return {
      outcome: 'rejected',
      evidence: rejected.slice(0, 6),
    };
  }

  const accepted = matchIndicators(domText, rules.acceptIndicators);
  if (accepted.length >= rules.minAcceptMatches) {
    return {
      outcome: 'accepted',
      evidence: [...accepted, ...extractCouponTokens(domText)].slice(0, 6),
    };
  }

  return {
    outcome: 'rejected',
    reason: `matched ${accepted.length} of ${rules.minAcceptMatches} required indicators`,
    evidence: accepted,
  };
}
