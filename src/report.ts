/**
 * Installation Report
 *
 * Summaries and terminal listings of inspected installations.
 */

import { c, bold, dim } from './colors.js';
import { compareJavaVersions, formatJavaVersion } from './inspection/version.js';
import { isValidInstallation } from './inspection/metadata.js';
import type { InstallationMetadata } from './inspection/metadata.js';
import type { InstallationStats, InstallationSummary } from './types/index.js';

/**
 * Plain object view of an installation, safe to pass to JSON.stringify
 */
export function toSummary(metadata: InstallationMetadata): InstallationSummary {
  if (!isValidInstallation(metadata)) {
    return {
      valid: false,
      javaHome: metadata.javaHome,
      displayName: metadata.displayName,
      errorMessage: metadata.errorMessage,
    };
  }

  const capabilities = [...metadata.capabilities];
  return {
    valid: true,
    javaHome: metadata.javaHome,
    displayName: metadata.displayName,
    version: formatJavaVersion(metadata.languageVersion),
    vendor: metadata.vendor.knownVendor,
    capabilities,
    isJdk: capabilities.includes('COMPILER'),
  };
}

// Code-unit order, independent of the host locale
function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Valid installations newest first, invalid ones after them in input order
 */
export function sortInstallations(installations: InstallationMetadata[]): InstallationMetadata[] {
  const valid = installations.filter(isValidInstallation);
  const invalid = installations.filter((inst) => !isValidInstallation(inst));

  valid.sort(
    (a, b) => compareJavaVersions(b.languageVersion, a.languageVersion) || compareNames(a.displayName, b.displayName)
  );

  return [...valid, ...invalid];
}

export function summarizeInstallations(installations: InstallationMetadata[]): InstallationStats {
  const stats: InstallationStats = { total: installations.length, valid: 0, invalid: 0, jdks: 0, jres: 0 };

  for (const inst of installations) {
    if (!isValidInstallation(inst)) {
      stats.invalid++;
      continue;
    }
    stats.valid++;
    if (inst.capabilities.has('COMPILER')) {
      stats.jdks++;
    } else {
      stats.jres++;
    }
  }

  return stats;
}

function formatLine(inst: InstallationMetadata): string {
  if (!isValidInstallation(inst)) {
    return `  ${c('red', '✗')} ${c('red', inst.displayName)}  ${dim(inst.javaHome)}`;
  }
  const version = formatJavaVersion(inst.languageVersion);
  return `  ${c('green', '✓')} ${bold(inst.displayName)} ${dim(`(${version})`)}  ${dim(inst.javaHome)}`;
}

/**
 * Terminal lines listing every installation, followed by a summary line
 */
export function formatInstallationReport(installations: InstallationMetadata[]): string[] {
  if (installations.length === 0) {
    return [`  ${c('yellow', 'No Java installations found.')}`];
  }

  const lines = sortInstallations(installations).map(formatLine);
  const stats = summarizeInstallations(installations);

  let summary = `  ${stats.valid} valid (${stats.jdks} JDK, ${stats.jres} JRE)`;
  if (stats.invalid > 0) {
    summary += `, ${c('red', `${stats.invalid} invalid`)}`;
  }

  lines.push('', summary);
  return lines;
}

export function printInstallationReport(installations: InstallationMetadata[]): void {
  for (const line of formatInstallationReport(installations)) {
    console.log(line);
  }
}
