/**
 * Structured Java language versions
 */

import type { JavaVersion } from '../types/index.js';

function assertComponent(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new TypeError(`Invalid Java version ${name}: ${value}`);
  }
}

/**
 * Build a version from already-parsed components
 *
 * @throws {TypeError} If a component is negative or not an integer
 */
export function javaVersion(major: number, minor: number = 0, patch: number = 0): JavaVersion {
  assertComponent('major', major);
  assertComponent('minor', minor);
  assertComponent('patch', patch);
  return { major, minor, patch };
}

export function formatJavaVersion(version: JavaVersion): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

/**
 * Compare two versions: returns -1, 0, or 1
 */
export function compareJavaVersions(a: JavaVersion, b: JavaVersion): -1 | 0 | 1 {
  if (a.major !== b.major) {
    return a.major > b.major ? 1 : -1;
  }
  if (a.minor !== b.minor) {
    return a.minor > b.minor ? 1 : -1;
  }
  if (a.patch !== b.patch) {
    return a.patch > b.patch ? 1 : -1;
  }
  return 0;
}
