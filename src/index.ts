/**
 * JVM Inspection
 *
 * Classifies discovered Java installation homes: language version, vendor,
 * JDK vs JRE, and a display name such as "Eclipse Temurin JDK 17".
 *
 * Usage:
 *   const jdk = fromSuccess('/opt/jdk-17', javaVersion(17, 0, 2), 'Eclipse Adoptium', 'OpenJDK 64-Bit Server VM');
 *   jdk.displayName; // "Eclipse Temurin JDK 17"
 *
 *   const broken = fromFailure('/opt/missing', 'home directory does not exist');
 *   broken.displayName; // "Invalid installation: home directory does not exist"
 */

export * from './inspection/index.js';
export { UnsupportedOperationError, isUnsupportedOperationError } from './errors.js';
export {
  toSummary,
  sortInstallations,
  summarizeInstallations,
  formatInstallationReport,
  printInstallationReport,
} from './report.js';
export { logger, setLogLevel, getLogLevel, getLogLevelFromEnv, LOG_LEVEL_ENV } from './logger.js';
export type { LogLevel } from './logger.js';
export { getExecutableName } from './utils.js';
export type {
  Capability,
  InstallationOptions,
  InstallationStats,
  InstallationSummary,
  JavaVersion,
  JvmVendor,
  KnownVendor,
} from './types/index.js';
