/**
 * Tests for the public entry point
 * @module tests/index.test
 */

import { describe, it, expect } from 'vitest';
import * as api from '../src/index.js';

describe('public API', () => {
  it('should classify installations end to end', () => {
    const broken = api.fromFailure('/opt/missing', 'home directory does not exist');

    expect(broken.displayName).toBe('Invalid installation: home directory does not exist');
    expect(api.isInvalidInstallation(broken)).toBe(true);
    expect(api.resolveVendor('Oracle Corporation').knownVendor).toBe('ORACLE');
    expect(api.getExecutableName('javac', 'win32')).toBe('javac.exe');
  });

  it('should expose report and logging helpers', () => {
    expect(typeof api.formatInstallationReport).toBe('function');
    expect(typeof api.printInstallationReport).toBe('function');
    expect(typeof api.logger.debug).toBe('function');
    expect(api.LOG_LEVEL_ENV).toBe('JVM_INSPECTION_LOG_LEVEL');
  });
});
