/**
 * Platform Detection & Filesystem Helpers
 */

import fs from 'node:fs';
import os from 'node:os';

/**
 * True when anything (file, directory, link target) exists at the path
 */
export function pathExists(targetPath: string): boolean {
  try {
    return fs.existsSync(targetPath);
  } catch {
    return false;
  }
}

export function getEnv(name: string): string | null {
  const value = process.env[name];
  return value !== undefined ? value : null;
}

/**
 * Platform-specific executable file name (`javac` → `javac.exe` on Windows)
 */
export function getExecutableName(baseName: string, platform: NodeJS.Platform = os.platform()): string {
  if (platform === 'win32' && !baseName.toLowerCase().endsWith('.exe')) {
    return `${baseName}.exe`;
  }
  return baseName;
}
