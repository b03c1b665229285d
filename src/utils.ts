/**
 * Utility functions for the coupon sweeper
 */

import path from 'path';
import fs from 'fs';

/**
 * Ensure a directory exists and return it
 */
export function ensureDir(dir: string): string {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  return dir;
}

/**
 * Get the screenshot path for a probed code
 */
export function getScreenshotPath(screenshotDir: string, code: string): string {
  const dir = ensureDir(screenshotDir);
  return path.join(dir, `${sanitizeFilename(code)}.jpg`);
}

/**
 * Normalize site URL
 */
export function normalizeSiteUrl(siteUrl: string): string {
  if (!siteUrl.startsWith('http://') && !siteUrl.startsWith('https://')) {
    siteUrl = 'https://' + siteUrl;
  }
  return siteUrl;
}

/**
 * Build the probe URL: `<site>?<param>=<code>`, keeping any existing query
 */
export function buildProbeUrl(siteUrl: string, couponParam: string, code: string): string {
  const url = new URL(normalizeSiteUrl(siteUrl));
  url.searchParams.set(couponParam, code);
  return url.toString();
}

/**
 * Pull coupon-like tokens (8-15 alphanumerics) out of page text
 */
export function extractCouponTokens(domText: string): string[] {
  const tokens: string[] = [];
  const pattern = /\b[A-Za-z0-9]{8,15}\b/g;

  for (const match of domText.matchAll(pattern)) {
    const token = match[0];
    // Plain words and plain numbers are not coupons
    if (/\d/.test(token) && /[A-Za-z]/.test(token)) {
      tokens.push(token.toUpperCase());
    }
  }

  // Remove duplicates and limit
  return Array.from(new Set(tokens)).slice(0, 3);
}

/**
 * Sleep for N milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Sanitize filename
 */
export function sanitizeFilename(filename: string): string {
  return filename.replace(/[^a-z0-9]/gi, '_').toLowerCase();
}

/**
 * Format a bigint with thousands separators
 */
export function formatCount(value: bigint | number): string {
  return value.toLocaleString('en-US');
}
