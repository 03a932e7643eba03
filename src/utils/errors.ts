/**
 * Fatal error taxonomy
 * Per-recipe failures are outcome values and never use these classes
 */

export class MigrationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MigrationError";
  }
}

/**
 * Source container unreadable, unknown or empty
 */
export class FormatError extends MigrationError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "FormatError";
  }
}

/**
 * Target unreachable, timed out, or credentials rejected
 */
export class TransportError extends MigrationError {
  constructor(
    message: string,
    public readonly status: number | null,
    public readonly retryable: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TransportError";
  }
}

export class ConfigError extends MigrationError {
  constructor(
    message: string,
    public readonly missing: string[] = [],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
