/**
 * Generator state persistence - one JSON file, replaced atomically after every probe
 */

import path from 'path';
import fs from 'fs';
import { initializeGenerator, restoreState, serializeState } from './generator';
import { PersistenceFailureError, StateMismatchError, describeError } from './errors';
import { GeneratorState } from './types';

export interface StateStore {
  load(): Promise<GeneratorState | null>;
  save(state: GeneratorState): Promise<void>;
  clear(): Promise<void>;
}

export class FileStateStore implements StateStore {
  constructor(readonly filePath: string) {}

  /**
   * Load the saved state, or null when nothing has been saved yet
   */
  async load(): Promise<GeneratorState | null> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw new StateMismatchError(`Could not read ${this.filePath}: ${describeError(error)}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new StateMismatchError(`${this.filePath} is not valid JSON: ${describeError(error)}`);
    }
    return restoreState(json);
  }

  /**
   * Write to a temp file then rename, so a crash never leaves a half-written state
   */
  async save(state: GeneratorState): Promise<void> {
    const tempPath = `${this.filePath}.tmp`;
    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.writeFile(tempPath, JSON.stringify(serializeState(state), null, 2) + '\n', 'utf8');
      await fs.promises.rename(tempPath, this.filePath);
    } catch (error) {
      throw new PersistenceFailureError(this.filePath, { cause: error });
    }
  }

  async clear(): Promise<void> {
    try {
      await fs.promises.rm(this.filePath, { force: true });
    } catch (error) {
      throw new PersistenceFailureError(this.filePath, { cause: error });
    }
  }
}

/**
 * Resume from the saved state when it belongs to the same base code and
 * positions; otherwise start a fresh enumeration (only when asked to).
 */
export async function resumeOrInitialize(
  store: StateStore,
  baseCode: string,
  positions: number[] | undefined,
  fresh = false
): Promise<{ state: GeneratorState; resumed: boolean }> {
  const initial = initializeGenerator(baseCode, positions);
  if (fresh) {
    await store.clear();
    return { state: initial, resumed: false };
  }

  const saved = await store.load();
  if (!saved) {
    return { state: initial, resumed: false };
  }

  const sameLayout =
    saved.base === initial.base &&
    saved.positions.length === initial.positions.length &&
    saved.positions.every((p, i) => p.index === initial.positions[i].index);
  if (!sameLayout) {
    throw new StateMismatchError(
      `Saved state is for base '${saved.base}' at positions [${saved.positions.map(p => p.index).join(', ')}]; ` +
        'pass --fresh to discard it and start over'
    );
  }
  return { state: saved, resumed: true };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
