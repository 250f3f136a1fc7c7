/**
 * Tests for Java version helpers
 * @module tests/version.test
 */

import { describe, it, expect } from 'vitest';
import { javaVersion, formatJavaVersion, compareJavaVersions } from '../src/inspection/version.js';

describe('version', () => {
  describe('javaVersion', () => {
    it('should build a full version', () => {
      expect(javaVersion(17, 0, 2)).toEqual({ major: 17, minor: 0, patch: 2 });
    });

    it('should default minor and patch to zero', () => {
      expect(javaVersion(21)).toEqual({ major: 21, minor: 0, patch: 0 });
      expect(javaVersion(11, 0)).toEqual({ major: 11, minor: 0, patch: 0 });
    });

    it('should reject negative components', () => {
      expect(() => javaVersion(-1)).toThrow(TypeError);
      expect(() => javaVersion(17, 0, -2)).toThrow('Invalid Java version patch: -2');
    });

    it('should reject fractional components', () => {
      expect(() => javaVersion(1.8)).toThrow('Invalid Java version major: 1.8');
      expect(() => javaVersion(17, Number.NaN)).toThrow(TypeError);
    });
  });

  describe('formatJavaVersion', () => {
    it('should join components with dots', () => {
      expect(formatJavaVersion(javaVersion(17, 0, 2))).toBe('17.0.2');
      expect(formatJavaVersion(javaVersion(8))).toBe('8.0.0');
    });
  });

  describe('compareJavaVersions', () => {
    it('should compare major versions first', () => {
      expect(compareJavaVersions(javaVersion(17), javaVersion(11, 9, 9))).toBe(1);
      expect(compareJavaVersions(javaVersion(8, 9), javaVersion(11))).toBe(-1);
    });

    it('should fall back to minor and patch', () => {
      expect(compareJavaVersions(javaVersion(17, 1), javaVersion(17, 0, 9))).toBe(1);
      expect(compareJavaVersions(javaVersion(17, 0, 1), javaVersion(17, 0, 2))).toBe(-1);
    });

    it('should return 0 for equal versions', () => {
      expect(compareJavaVersions(javaVersion(21, 0, 1), javaVersion(21, 0, 1))).toBe(0);
    });
  });
});
