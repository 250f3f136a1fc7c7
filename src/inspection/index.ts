/**
 * JVM installation inspection
 */

export {
  fromSuccess,
  fromFailure,
  isValidInstallation,
  isInvalidInstallation,
  hasCapability,
  ValidInstallationMetadata,
  InvalidInstallationMetadata,
} from './metadata.js';
export type { InstallationMetadata } from './metadata.js';
export { probeCapabilities, compilerPath, memoize, COMPILER_EXECUTABLE } from './capabilities.js';
export { resolveVendor, vendorDisplayName, UNKNOWN_VENDOR_LABEL } from './vendor.js';
export {
  formatDisplayName,
  formatInvalidDisplayName,
  determineVendorLabel,
  determineInstallationType,
  INVALID_INSTALLATION_PREFIX,
} from './display-name.js';
export type { DisplayNameInput } from './display-name.js';
export { javaVersion, formatJavaVersion, compareJavaVersions } from './version.js';
