import { Endpoint } from '../types/index.js';

export type ErrorKind =
  | 'SetupError'
  | 'AuthError'
  | 'DirectoryError'
  | 'SelectionError'
  | 'RegistrationError'
  | 'WriteError';

/**
 * Base class for every failure the provisioning run knows how to report.
 * Fatal errors abort the run; the others skip one region or endpoint.
 */
export abstract class ProvisioningError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly fatal: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SetupError extends ProvisioningError {
  readonly kind = 'SetupError';
  readonly fatal = true;
}

export class AuthError extends ProvisioningError {
  readonly kind = 'AuthError';
  readonly fatal = true;
}

export class DirectoryError extends ProvisioningError {
  readonly kind = 'DirectoryError';
  readonly fatal = true;
}

export class MalformedDirectory extends DirectoryError {}

export class SelectionError extends ProvisioningError {
  readonly kind = 'SelectionError';
  readonly fatal = false;
}

export class SelectionOutOfRange extends SelectionError {
  constructor(readonly index: number, readonly size: number) {
    super(`Selection ${index} is out of range (0-${size - 1})`);
  }
}

export class NoReachableCandidate extends SelectionError {
  constructor(readonly regionId: string) {
    super(`No usable server available in region ${regionId}`);
  }
}

export class RegistrationError extends ProvisioningError {
  readonly kind = 'RegistrationError';
  readonly fatal = false;

  constructor(readonly endpoint: Endpoint, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class RegistrationRejected extends RegistrationError {
  constructor(endpoint: Endpoint, readonly reason: string) {
    super(endpoint, `Key registration rejected by ${endpoint.hostname} (${endpoint.ip}): ${reason}`);
  }
}

export class RegistrationUnreachable extends RegistrationError {
  constructor(endpoint: Endpoint, cause?: unknown) {
    super(endpoint, `Registration service on ${endpoint.hostname} (${endpoint.ip}) is unreachable: ${toMessage(cause)}`, { cause });
  }
}

export class MalformedRegistrationResponse extends RegistrationError {
  constructor(endpoint: Endpoint, detail: string) {
    super(endpoint, `Malformed registration response from ${endpoint.hostname} (${endpoint.ip}): ${detail}`);
  }
}

export class WriteError extends ProvisioningError {
  readonly kind = 'WriteError';
  readonly fatal = false;

  constructor(readonly path: string, cause?: unknown) {
    super(`Failed to write ${path}: ${toMessage(cause)}`, { cause });
  }
}

export function isProvisioningError(error: unknown): error is ProvisioningError {
  return error instanceof ProvisioningError;
}

export function toMessage(error: unknown): string {
  if (error === undefined) return 'unknown error';
  return error instanceof Error ? error.message : String(error);
}
