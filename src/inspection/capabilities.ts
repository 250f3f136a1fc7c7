/**
 * Capability Prober
 *
 * Decides whether an installation ships a compiler by looking for
 * `bin/javac` (or `bin\javac.exe`) under its home directory.
 */

import os from 'node:os';
import path from 'node:path';
import { getExecutableName, pathExists } from '../utils.js';
import { logger } from '../logger.js';
import type { Capability } from '../types/index.js';

export const COMPILER_EXECUTABLE = 'javac';

const NO_CAPABILITIES: ReadonlySet<Capability> = new Set<Capability>();

/**
 * Wrap a supplier so it runs at most once; later calls return the first result
 */
export function memoize<T>(supplier: () => T): () => T {
  let state: { done: false } | { done: true; value: T } = { done: false };

  return () => {
    if (!state.done) {
      state = { done: true, value: supplier() };
    }
    return state.value;
  };
}

export function compilerPath(javaHome: string, platform: NodeJS.Platform = os.platform()): string {
  return path.join(javaHome, 'bin', getExecutableName(COMPILER_EXECUTABLE, platform));
}

/**
 * Probe an installation home for its capabilities.
 *
 * Unreadable paths count as missing, so this never throws.
 */
export function probeCapabilities(javaHome: string, platform: NodeJS.Platform = os.platform()): ReadonlySet<Capability> {
  const compiler = compilerPath(javaHome, platform);
  const found = pathExists(compiler);

  logger.debug(`Compiler ${found ? 'found' : 'not found'} at ${compiler}`);

  if (found) {
    return new Set<Capability>(['COMPILER']);
  }
  return NO_CAPABILITIES;
}
