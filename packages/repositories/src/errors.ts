// Data access error types

/**
 * Base class for all tablekit errors.
 * Provides a stable `code` for callers that branch on error kind.
 */
export class TableKitError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TableKitError';
    this.code = code;
  }
}

/**
 * Something that was asked for does not exist: a file behind a logical
 * path, or a record behind a key.
 */
export class NotFoundError extends TableKitError {
  constructor(message: string) {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

/**
 * A logical path does not resolve to any content.
 */
export class FileNotFoundError extends NotFoundError {
  readonly path: string;
  readonly resolvedPath?: string;

  constructor(path: string, resolvedPath?: string) {
    super(`File not found: ${resolvedPath ?? path}`);
    this.name = 'FileNotFoundError';
    this.path = path;
    this.resolvedPath = resolvedPath;
  }
}

/**
 * A key lookup missed.
 */
export class RecordNotFoundError extends NotFoundError {
  readonly table: string;
  readonly key: string | number;

  constructor(table: string, key: string | number) {
    super(`Record not found in ${table}: ${String(key)}`);
    this.name = 'RecordNotFoundError';
    this.table = table;
    this.key = key;
  }
}

/**
 * Where in a source a data error was found
 */
export type DataErrorLocation = {
  line?: number;
  record?: number;
  field?: string;
};

/**
 * Structural or schema failure while parsing a source.
 */
export class MalformedDataError extends TableKitError {
  readonly path: string;
  readonly line?: number;
  readonly record?: number;
  readonly field?: string;

  constructor(
    path: string,
    reason: string,
    location: DataErrorLocation = {},
    options?: { code?: string; cause?: Error }
  ) {
    super(
      options?.code ?? 'MALFORMED_DATA',
      `Malformed data in ${describeLocation(path, location)}: ${reason}`,
      options?.cause ? { cause: options.cause } : undefined
    );
    this.name = 'MalformedDataError';
    this.path = path;
    this.line = location.line;
    this.record = location.record;
    this.field = location.field;
  }
}

/**
 * Two records of one source share a primary key.
 */
export class DuplicateKeyError extends MalformedDataError {
  readonly key: string | number;

  constructor(path: string, key: string | number, location: DataErrorLocation = {}) {
    super(path, `duplicate key ${JSON.stringify(key)}`, location, { code: 'DUPLICATE_KEY' });
    this.name = 'DuplicateKeyError';
    this.key = key;
  }
}

/**
 * No serializer is registered for a format or extension.
 */
export class UnsupportedFormatError extends TableKitError {
  readonly format: string;

  constructor(format: string, detail?: string) {
    super(
      'UNSUPPORTED_FORMAT',
      detail ? `Unsupported format "${format}": ${detail}` : `Unsupported format "${format}"`
    );
    this.name = 'UnsupportedFormatError';
    this.format = format;
  }
}

export type IOOperation = 'read' | 'write' | 'delete' | 'list';

/**
 * Reading or writing through a storage provider failed for a reason other
 * than missing content (permissions, disk full, closed provider).
 */
export class IOFailureError extends TableKitError {
  readonly path: string;
  readonly operation: IOOperation;

  constructor(path: string, operation: IOOperation, reason: string, cause?: Error) {
    super('IO_FAILURE', `Failed to ${operation} ${path}: ${reason}`, cause ? { cause } : undefined);
    this.name = 'IOFailureError';
    this.path = path;
    this.operation = operation;
  }
}

export type RepositoryOperation = 'load' | 'save';

/**
 * A repository failed inside a context-wide load or save.
 * Wraps the original error with the repository's identity.
 */
export class RepositoryOperationError extends TableKitError {
  readonly contextName: string;
  readonly repository: string;
  readonly path: string;
  readonly operation: RepositoryOperation;

  constructor(options: {
    contextName: string;
    repository: string;
    path: string;
    operation: RepositoryOperation;
    cause: Error;
  }) {
    super(
      'REPOSITORY_OPERATION_FAILED',
      `${options.contextName}: failed to ${options.operation} ${options.repository} (${options.path}): ${options.cause.message}`,
      { cause: options.cause }
    );
    this.name = 'RepositoryOperationError';
    this.contextName = options.contextName;
    this.repository = options.repository;
    this.path = options.path;
    this.operation = options.operation;
  }
}

/**
 * A load or save stopped because its batch was cancelled.
 */
export class OperationCancelledError extends TableKitError {
  readonly target: string;

  constructor(target: string) {
    super('OPERATION_CANCELLED', `Operation cancelled: ${target}`);
    this.name = 'OperationCancelledError';
    this.target = target;
  }
}

/**
 * A context was used before a successful loadAll.
 */
export class ContextNotLoadedError extends TableKitError {
  readonly contextName: string;
  readonly state: string;

  constructor(contextName: string, state: string) {
    super('CONTEXT_NOT_LOADED', `${contextName} is not loaded (state: ${state})`);
    this.name = 'ContextNotLoadedError';
    this.contextName = contextName;
    this.state = state;
  }
}

/**
 * Invalid context configuration or declaration.
 */
export class ConfigurationError extends TableKitError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CONFIGURATION_ERROR', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

function describeLocation(path: string, location: DataErrorLocation): string {
  const parts = [path];
  if (location.line !== undefined) parts.push(`line ${location.line}`);
  if (location.record !== undefined) parts.push(`record ${location.record}`);
  if (location.field !== undefined) parts.push(`field "${location.field}"`);
  return parts.join(', ');
}

/**
 * Throw when a signal has been aborted. Cancellation is cooperative:
 * callers check between steps.
 */
export function throwIfCancelled(signal: AbortSignal | undefined, target: string): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(target);
  }
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
