/**
 * Core Type Definitions for JVM Inspection
 */

// ─────────────────────────────────────────────────────────────
// Installation Types
// ─────────────────────────────────────────────────────────────

/**
 * Structured language version of an installation (`17.0.2` → 17, 0, 2)
 */
export interface JavaVersion {
  major: number;
  minor: number;
  patch: number;
}

/** Feature flags an installation may carry */
export type Capability = 'COMPILER';

/** Normalized vendor classification */
export type KnownVendor =
  | 'ADOPTIUM'
  | 'ADOPTOPENJDK'
  | 'AMAZON'
  | 'APPLE'
  | 'AZUL'
  | 'BELLSOFT'
  | 'GRAAL_VM'
  | 'HEWLETT_PACKARD'
  | 'IBM_SEMERU'
  | 'IBM'
  | 'MICROSOFT'
  | 'ORACLE'
  | 'SAP'
  | 'UNKNOWN';

/**
 * Vendor resolved from the free-text string reported by the runtime
 */
export interface JvmVendor {
  /** Vendor string as reported (e.g. "Oracle Corporation") */
  rawVendor: string;
  /** Classification */
  knownVendor: KnownVendor;
  /** Label used in display names */
  displayName: string;
}

/** Options accepted when building a valid installation */
export interface InstallationOptions {
  /** Platform used to name the compiler executable (defaults to the host) */
  platform?: NodeJS.Platform;
}

/**
 * Plain, JSON-safe view of an installation for reporting
 */
export type InstallationSummary =
  | {
      valid: true;
      javaHome: string;
      displayName: string;
      version: string;
      vendor: KnownVendor;
      capabilities: Capability[];
      isJdk: boolean;
    }
  | {
      valid: false;
      javaHome: string;
      displayName: string;
      errorMessage: string;
    };

/** Counts across a set of inspected installations */
export interface InstallationStats {
  total: number;
  valid: number;
  invalid: number;
  jdks: number;
  jres: number;
}
