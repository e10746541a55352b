import { ErrorType } from '../types';

/**
 * Base class for every error raised by envsync
 */
export class EnvSyncError extends Error {
  readonly type: ErrorType;
  readonly recoverable: boolean;

  constructor(message: string, type: ErrorType, recoverable: boolean, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.type = type;
    this.recoverable = recoverable;
  }
}

/**
 * Malformed static catalog: unresolved, self-referential or multi-level dependency
 */
export class CatalogError extends EnvSyncError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid resource catalog: ${problems.join('; ')}`, 'catalog', false);
    this.problems = problems;
  }
}

export class ConfigurationError extends EnvSyncError {
  constructor(message: string, cause?: unknown) {
    super(message, 'configuration', false, cause);
  }
}

/**
 * Filesystem failure that aborts the operation which triggered it
 */
export class PersistenceError extends EnvSyncError {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, 'persistence', false, cause);
    this.path = path;
  }
}

export interface BackendErrorContext {
  resourceType: string;
  command: string;
  status?: number;
  identifier?: string;
}

/**
 * Failed list, get, create or associate call
 */
export class BackendError extends EnvSyncError {
  readonly resourceType: string;
  readonly command: string;
  readonly status?: number;
  readonly identifier?: string;

  constructor(message: string, context: BackendErrorContext, cause?: unknown) {
    super(message, 'backend', true, cause);
    this.resourceType = context.resourceType;
    this.command = context.command;
    this.status = context.status;
    this.identifier = context.identifier;
  }

  /**
   * The target rejected the write because the object already exists
   */
  isConflict(): boolean {
    return this.status === 409;
  }
}

export interface ResolutionContext {
  resourceType?: string;
  identifier?: string;
  location?: string;
}

/**
 * A single item could not be located, parsed or translated
 */
export class ResolutionWarning extends EnvSyncError {
  readonly resourceType?: string;
  readonly identifier?: string;
  readonly location?: string;

  constructor(message: string, context: ResolutionContext = {}) {
    super(message, 'resolution', true);
    this.resourceType = context.resourceType;
    this.identifier = context.identifier;
    this.location = context.location;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
