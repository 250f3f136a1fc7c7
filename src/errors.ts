/**
 * Error Types
 */

import type { InstallationMetadata } from './inspection/metadata.js';

/**
 * Thrown when an accessor is read on the wrong installation variant,
 * e.g. `languageVersion` on an invalid installation.
 *
 * This signals a programming error, not a probe failure.
 */
export class UnsupportedOperationError extends Error {
  readonly accessor: string;
  readonly variant: InstallationMetadata['kind'];

  constructor(accessor: string, variant: InstallationMetadata['kind'], message?: string) {
    super(message ?? `'${accessor}' is not supported on a ${variant} installation`);
    this.name = 'UnsupportedOperationError';
    this.accessor = accessor;
    this.variant = variant;
  }
}

export function isUnsupportedOperationError(err: unknown): err is UnsupportedOperationError {
  return err instanceof UnsupportedOperationError;
}
