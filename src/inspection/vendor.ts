/**
 * Vendor Resolver
 *
 * Maps the free-text `java.vendor` value reported by a runtime onto a
 * closed set of known vendors.
 */

import type { JvmVendor, KnownVendor } from '../types/index.js';

interface VendorEntry {
  vendor: Exclude<KnownVendor, 'UNKNOWN'>;
  /** Lower-case keywords searched for in the raw string */
  indicators: string[];
  displayName: string;
}

export const UNKNOWN_VENDOR_LABEL = 'Unknown Vendor';

// Order matters: the first entry with a matching indicator wins.
const VENDORS: VendorEntry[] = [
  { vendor: 'ADOPTIUM', indicators: ['temurin', 'adoptium', 'eclipse foundation'], displayName: 'Eclipse Temurin' },
  { vendor: 'ADOPTOPENJDK', indicators: ['adoptopenjdk'], displayName: 'AdoptOpenJDK' },
  { vendor: 'AMAZON', indicators: ['amazon'], displayName: 'Amazon Corretto' },
  { vendor: 'APPLE', indicators: ['apple'], displayName: 'Apple' },
  { vendor: 'AZUL', indicators: ['azul'], displayName: 'Zulu' },
  { vendor: 'BELLSOFT', indicators: ['bellsoft'], displayName: 'BellSoft Liberica' },
  { vendor: 'GRAAL_VM', indicators: ['graalvm community'], displayName: 'GraalVM Community' },
  { vendor: 'HEWLETT_PACKARD', indicators: ['hewlett-packard'], displayName: 'HP-UX' },
  { vendor: 'IBM_SEMERU', indicators: ['semeru'], displayName: 'IBM Semeru' },
  { vendor: 'IBM', indicators: ['ibm', 'international business machines'], displayName: 'IBM' },
  { vendor: 'MICROSOFT', indicators: ['microsoft'], displayName: 'Microsoft' },
  { vendor: 'ORACLE', indicators: ['oracle'], displayName: 'Oracle' },
  { vendor: 'SAP', indicators: ['sap se', 'sapmachine'], displayName: 'SAP SapMachine' },
];

/**
 * Default display label of a vendor classification
 */
export function vendorDisplayName(vendor: KnownVendor): string {
  if (vendor === 'UNKNOWN') {
    return UNKNOWN_VENDOR_LABEL;
  }
  const entry = VENDORS.find((e) => e.vendor === vendor);
  return entry ? entry.displayName : UNKNOWN_VENDOR_LABEL;
}

/**
 * Classify a raw vendor string. Every input, including the empty string,
 * resolves to exactly one vendor; unmatched strings keep their own text
 * as the display label.
 */
export function resolveVendor(vendorRaw: string): JvmVendor {
  const normalized = vendorRaw.toLowerCase();

  for (const entry of VENDORS) {
    if (entry.indicators.some((indicator) => normalized.includes(indicator))) {
      return { rawVendor: vendorRaw, knownVendor: entry.vendor, displayName: entry.displayName };
    }
  }

  const label = vendorRaw.trim();
  return {
    rawVendor: vendorRaw,
    knownVendor: 'UNKNOWN',
    displayName: label || UNKNOWN_VENDOR_LABEL,
  };
}
