/**
 * Error taxonomy for the dashboard core.
 * Each error carries a stable `code` for logs and API responses.
 */

export type DashboardErrorCode =
  | 'EXTRACTION_SKIP'
  | 'SPAWN_FAILED'
  | 'CONFIG_INVALID'
  | 'IO_FAILED'
  | 'DATABASE_LOAD_FAILED';

export class DashboardError extends Error {
  readonly code: DashboardErrorCode;

  constructor(code: DashboardErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DashboardError';
    this.code = code;
  }
}

/** A malformed database subtree that was skipped */
export class ExtractionSkip extends DashboardError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super('EXTRACTION_SKIP', `Skipped database subtree at ${path}: ${errorMessage(cause)}`, { cause });
    this.name = 'ExtractionSkip';
    this.path = path;
  }
}

export class SpawnError extends DashboardError {
  readonly command: string;
  readonly osCode: string | null;

  constructor(command: string, reason: string, options?: { osCode?: string | null; cause?: unknown }) {
    super('SPAWN_FAILED', `Failed to start ${command}: ${reason}`, { cause: options?.cause });
    this.name = 'SpawnError';
    this.command = command;
    this.osCode = options?.osCode ?? null;
  }
}

export class ConfigValidationError extends DashboardError {
  readonly field: string;

  constructor(field: string, message: string) {
    super('CONFIG_INVALID', message);
    this.name = 'ConfigValidationError';
    this.field = field;
  }
}

export class IOError extends DashboardError {
  readonly path: string;
  readonly operation: 'read' | 'append' | 'truncate' | 'open';

  constructor(operation: IOError['operation'], path: string, cause: unknown) {
    super('IO_FAILED', `Log ${operation} failed for ${path}: ${errorMessage(cause)}`, { cause });
    this.name = 'IOError';
    this.path = path;
    this.operation = operation;
  }
}

export class DatabaseLoadError extends DashboardError {
  readonly path: string;

  constructor(path: string, reason: string, cause?: unknown) {
    super('DATABASE_LOAD_FAILED', `Could not load product database ${path}: ${reason}`, { cause });
    this.name = 'DatabaseLoadError';
    this.path = path;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Node system errors carry a string `code` such as ENOENT */
export function systemErrorCode(error: unknown): string | null {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}
