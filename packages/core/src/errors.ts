/**
 * Error codes surfaced to front ends
 */
export type ResourceToolErrorCode = 'CONFIGURATION' | 'SCAN' | 'PARSE';

/**
 * Base class for every fatal condition raised by a move or remove run
 */
export class ResourceToolError extends Error {
  readonly code: ResourceToolErrorCode;

  constructor(code: ResourceToolErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ResourceToolError';
    this.code = code;
  }
}

/**
 * Invalid run options. Raised before any file is touched.
 */
export class ConfigurationError extends ResourceToolError {
  constructor(message: string) {
    super('CONFIGURATION', message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A source or markup file could not be read while scanning for references
 */
export class ScanError extends ResourceToolError {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super('SCAN', `Failed to scan ${filePath}: ${describeCause(cause)}`, { cause });
    this.name = 'ScanError';
    this.filePath = filePath;
  }
}

/**
 * A resource document is not well-formed markup
 */
export class DocumentParseError extends ResourceToolError {
  readonly filePath: string;

  constructor(filePath: string, reason: string) {
    super('PARSE', `Failed to parse ${filePath}: ${reason}`);
    this.name = 'DocumentParseError';
    this.filePath = filePath;
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
