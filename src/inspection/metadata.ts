/**
 * Installation Metadata
 *
 * Result of inspecting a JVM home. An installation is either valid (the
 * upstream probe reported a version and vendor) or invalid (the probe
 * failed and only an error message is known). Callers branch on `kind`
 * before reading variant-specific fields; reading a field of the other
 * variant throws UnsupportedOperationError.
 */

import os from 'node:os';
import { UnsupportedOperationError } from '../errors.js';
import { memoize, probeCapabilities } from './capabilities.js';
import { formatDisplayName, formatInvalidDisplayName } from './display-name.js';
import { resolveVendor } from './vendor.js';
import type { Capability, InstallationOptions, JavaVersion, JvmVendor } from '../types/index.js';

export class ValidInstallationMetadata {
  readonly kind = 'valid' as const;
  readonly javaHome: string;
  readonly languageVersion: JavaVersion;
  readonly vendor: JvmVendor;
  /** VM name, e.g. "OpenJDK 64-Bit Server VM"; may be empty */
  readonly implementationName: string;
  private readonly capabilitiesCell: () => ReadonlySet<Capability>;

  constructor(
    javaHome: string,
    languageVersion: JavaVersion,
    vendorRaw: string,
    implementationName: string,
    options: InstallationOptions = {}
  ) {
    const platform = options.platform ?? os.platform();
    this.javaHome = javaHome;
    this.languageVersion = languageVersion;
    this.vendor = resolveVendor(vendorRaw);
    this.implementationName = implementationName;
    this.capabilitiesCell = memoize(() => probeCapabilities(javaHome, platform));
  }

  /** Vendor string as reported by the runtime */
  get vendorRaw(): string {
    return this.vendor.rawVendor;
  }

  /**
   * Probed on first access and cached for the lifetime of the instance
   */
  get capabilities(): ReadonlySet<Capability> {
    return this.capabilitiesCell();
  }

  get displayName(): string {
    return formatDisplayName({
      vendor: this.vendor,
      implementationName: this.implementationName,
      capabilities: this.capabilities,
      languageVersion: this.languageVersion,
    });
  }

  get errorMessage(): never {
    throw new UnsupportedOperationError('errorMessage', this.kind);
  }

  isValid(): boolean {
    return true;
  }
}

export class InvalidInstallationMetadata {
  readonly kind = 'invalid' as const;
  readonly javaHome: string;
  readonly errorMessage: string;

  constructor(javaHome: string, errorMessage: string) {
    this.javaHome = javaHome;
    this.errorMessage = errorMessage;
  }

  get displayName(): string {
    return formatInvalidDisplayName(this.errorMessage);
  }

  get languageVersion(): never {
    throw this.unsupported('languageVersion');
  }

  get vendor(): never {
    throw this.unsupported('vendor');
  }

  get vendorRaw(): never {
    throw this.unsupported('vendorRaw');
  }

  get implementationName(): never {
    throw this.unsupported('implementationName');
  }

  get capabilities(): never {
    throw this.unsupported('capabilities');
  }

  isValid(): boolean {
    return false;
  }

  private unsupported(accessor: string): UnsupportedOperationError {
    return new UnsupportedOperationError(
      accessor,
      this.kind,
      `Installation is not valid. Original error message: ${this.errorMessage}`
    );
  }
}

export type InstallationMetadata = ValidInstallationMetadata | InvalidInstallationMetadata;

/**
 * Metadata for a home the upstream probe inspected successfully
 */
export function fromSuccess(
  javaHome: string,
  languageVersion: JavaVersion,
  vendorRaw: string,
  implementationName: string,
  options: InstallationOptions = {}
): ValidInstallationMetadata {
  return new ValidInstallationMetadata(javaHome, languageVersion, vendorRaw, implementationName, options);
}

/**
 * Metadata for a home the upstream probe could not inspect
 */
export function fromFailure(javaHome: string, errorMessage: string): InvalidInstallationMetadata {
  return new InvalidInstallationMetadata(javaHome, errorMessage);
}

export function isValidInstallation(metadata: InstallationMetadata): metadata is ValidInstallationMetadata {
  return metadata.kind === 'valid';
}

export function isInvalidInstallation(metadata: InstallationMetadata): metadata is InvalidInstallationMetadata {
  return metadata.kind === 'invalid';
}

export function hasCapability(metadata: ValidInstallationMetadata, capability: Capability): boolean {
  return metadata.capabilities.has(capability);
}
