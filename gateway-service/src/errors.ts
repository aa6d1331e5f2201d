// Typed failures the gateway distinguishes between.

/** The state database cannot be created, opened, or used. Fatal at startup. */
export class StorageUnavailableError extends Error {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : cause ? String(cause) : 'closed';
    super(`state database unavailable (${path}): ${detail}`, { cause });
    this.name = 'StorageUnavailableError';
    this.path = path;
  }
}

/** Configuration is missing or malformed. Fatal at startup. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * A destination identifier or base URL failed validation. Fatal for the send
 * attempt that raised it only; no request is issued.
 */
export class InvalidDestinationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidDestinationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
