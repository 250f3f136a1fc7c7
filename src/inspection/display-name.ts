/**
 * Display names for valid installations, e.g. "Eclipse Temurin JDK 17"
 */

import type { Capability, JavaVersion, JvmVendor } from '../types/index.js';

export interface DisplayNameInput {
  vendor: JvmVendor;
  implementationName: string;
  capabilities: ReadonlySet<Capability>;
  languageVersion: JavaVersion;
}

export const INVALID_INSTALLATION_PREFIX = 'Invalid installation: ';

/**
 * Oracle publishes both its own builds and OpenJDK builds under the same
 * vendor string; the VM implementation name tells them apart.
 */
export function determineVendorLabel(vendor: JvmVendor, implementationName: string): string {
  if (vendor.knownVendor === 'ORACLE' && implementationName.includes('OpenJDK')) {
    return 'OpenJDK';
  }
  return vendor.displayName;
}

export function determineInstallationType(vendorLabel: string, capabilities: ReadonlySet<Capability>): string {
  if (!capabilities.has('COMPILER')) {
    return ' JRE';
  }
  // "OpenJDK 17" rather than "OpenJDK JDK 17"
  return vendorLabel.toLowerCase().includes('jdk') ? '' : ' JDK';
}

export function formatDisplayName(input: DisplayNameInput): string {
  const label = determineVendorLabel(input.vendor, input.implementationName);
  const installationType = determineInstallationType(label, input.capabilities);
  return `${label}${installationType} ${input.languageVersion.major}`;
}

export function formatInvalidDisplayName(errorMessage: string): string {
  return `${INVALID_INSTALLATION_PREFIX}${errorMessage}`;
}
