/**
 * Append-only probe results log (one JSON object per line)
 */

import path from 'path';
import fs from 'fs';
import { PersistenceFailureError } from './errors';
import { OutcomeCounts, ProbeResult } from './types';

export interface ResultsLog {
  append(result: ProbeResult): Promise<void>;
}

export class FileResultsLog implements ResultsLog {
  constructor(readonly filePath: string) {}

  async append(result: ProbeResult): Promise<void> {
    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.appendFile(this.filePath, JSON.stringify(result) + '\n', 'utf8');
    } catch (error) {
      throw new PersistenceFailureError(this.filePath, { cause: error });
    }
  }
}

/**
 * Tally outcomes of a list of results
 */
export function countOutcomes(results: Iterable<Pick<ProbeResult, 'outcome'>>): OutcomeCounts {
  const counts: OutcomeCounts = { accepted: 0, rejected: 0, inconclusive: 0 };
  for (const result of results) {
    counts[result.outcome]++;
  }
  return counts;
}

/**
 * Write one code per line, replacing the file
 */
export async function writeCodeList(filePath: string, codes: readonly string[]): Promise<void> {
  try {
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(filePath, codes.map(code => `${code}\n`).join(''), 'utf8');
  } catch (error) {
    throw new PersistenceFailureError(filePath, { cause: error });
  }
}
