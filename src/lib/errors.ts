/**
 * Error types and error formatting for the stitching pipeline
 */

export class StitchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StitchError';
  }
}

/** Raised when the mosaic assembler is handed no blocks. */
export class EmptyInputError extends StitchError {
  constructor(message = 'No blocks found to stitch') {
    super(message);
    this.name = 'EmptyInputError';
  }
}

/** A matched tile file could not be decoded. Aborts the run. */
export class TileDecodeError extends StitchError {
  readonly tilePath: string;

  constructor(tilePath: string, cause?: unknown) {
    super(`Unable to decode tile ${tilePath}`, { cause });
    this.name = 'TileDecodeError';
    this.tilePath = tilePath;
  }
}

export class ConfigError extends StitchError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

// ==========================================
// FORMATTING
// ==========================================

const DEBUG_ERRORS =
  process.env.DEBUG_ERRORS === '1' ||
  process.env.DEBUG_ERRORS === 'true' ||
  process.env.DEBUG_ERRORS === 'yes';

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    const parts: string[] = [];
    parts.push(`${error.name || 'Error'}: ${error.message || String(error)}`);
    if ('code' in error && error.code !== undefined) parts.push(`code=${String(error.code)}`);
    if (error.cause !== undefined) {
      parts.push(`cause=${formatError(error.cause)}`);
    }
    return parts.join(' | ');
  }
  return safeStringify(error);
}

export function logErrorDetails(prefix: string, error: unknown): void {
  console.error(prefix + formatError(error));
  if (DEBUG_ERRORS && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
}
