import createError from '@fastify/error';

// ---------------------------------------------------------------------------
// Error kinds
// ---------------------------------------------------------------------------

export const ErrorKind = {
  NotFound: 'NotFound',
  AlreadyExists: 'AlreadyExists',
  PermissionDenied: 'PermissionDenied',
  InvalidInput: 'InvalidInput',
  Unsupported: 'Unsupported',
  RateLimited: 'RateLimited',
  Conflict: 'Conflict',
  ConditionNotMatch: 'ConditionNotMatch',
  Closed: 'Closed',
  InvalidState: 'InvalidState',
  IsADirectory: 'IsADirectory',
  NotADirectory: 'NotADirectory',
  Cancelled: 'Cancelled',
  Unexpected: 'Unexpected',
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

const ERROR_KINDS: ReadonlySet<string> = new Set(Object.values(ErrorKind));

export function isKnownErrorKind(value: string): value is ErrorKind {
  return ERROR_KINDS.has(value);
}

// ---------------------------------------------------------------------------
// Storage errors (STORAGE_*)
// ---------------------------------------------------------------------------

export const NotFoundError = createError<[string]>('STORAGE_NOT_FOUND', 'Not found: %s', 404);

export const AlreadyExistsError = createError<[string]>(
  'STORAGE_ALREADY_EXISTS',
  'Already exists: %s',
  409
);

export const PermissionDeniedError = createError<[string]>(
  'STORAGE_PERMISSION_DENIED',
  'Permission denied: %s',
  403
);

export const InvalidInputError = createError<[string]>(
  'STORAGE_INVALID_INPUT',
  'Invalid input: %s',
  400
);

export const UnsupportedError = createError<[string]>(
  'STORAGE_UNSUPPORTED',
  'Unsupported: %s',
  501
);

/** Backend throttling; kept apart from Unsupported so retry layers can special-case it */
export const RateLimitedError = createError<[string]>(
  'STORAGE_RATE_LIMITED',
  'Rate limited: %s',
  429
);

export const ConflictError = createError<[string]>('STORAGE_CONFLICT', 'Conflict: %s', 409);

export const ConditionNotMatchError = createError<[string]>(
  'STORAGE_CONDITION_NOT_MATCH',
  'Condition not matched: %s',
  412
);

export const ClosedError = createError<[string]>('STORAGE_CLOSED', 'Closed: %s', 400);

export const InvalidStateError = createError<[string]>(
  'STORAGE_INVALID_STATE',
  'Invalid state: %s',
  409
);

export const IsADirectoryError = createError<[string]>(
  'STORAGE_IS_A_DIRECTORY',
  'Is a directory: %s',
  400
);

export const NotADirectoryError = createError<[string]>(
  'STORAGE_NOT_A_DIRECTORY',
  'Not a directory: %s',
  400
);

export const CancelledError = createError<[string]>('STORAGE_CANCELLED', 'Cancelled: %s', 499);

/** Catch-all for unmapped backend failures */
export const UnexpectedError = createError<[string]>(
  'STORAGE_UNEXPECTED',
  'Unexpected error: %s',
  500
);

const CONSTRUCTORS = {
  NotFound: NotFoundError,
  AlreadyExists: AlreadyExistsError,
  PermissionDenied: PermissionDeniedError,
  InvalidInput: InvalidInputError,
  Unsupported: UnsupportedError,
  RateLimited: RateLimitedError,
  Conflict: ConflictError,
  ConditionNotMatch: ConditionNotMatchError,
  Closed: ClosedError,
  InvalidState: InvalidStateError,
  IsADirectory: IsADirectoryError,
  NotADirectory: NotADirectoryError,
  Cancelled: CancelledError,
  Unexpected: UnexpectedError,
} satisfies Record<ErrorKind, unknown>;

// ---------------------------------------------------------------------------
// StorageError shape
// ---------------------------------------------------------------------------

export interface ErrorContext {
  operation?: string;
  path?: string;
  scheme?: string;
  attempts?: number;
  [key: string]: string | number | boolean | undefined;
}

export type StorageError = InstanceType<(typeof CONSTRUCTORS)[ErrorKind]> & {
  kind: ErrorKind;
  /** Hint for retry layers: the same call may succeed later */
  temporary: boolean;
  context: ErrorContext;
};

export interface StorageErrorOptions {
  cause?: unknown;
  temporary?: boolean;
  context?: ErrorContext;
}

/**
 * Build a storage error of the given kind.
 *
 * The original backend error, if any, is kept on `cause` for diagnostics.
 * RateLimited errors are always temporary.
 */
export function storageError(
  kind: ErrorKind,
  message: string,
  options: StorageErrorOptions = {}
): StorageError {
  const Ctor = CONSTRUCTORS[kind];
  const error = Object.assign(new Ctor(message), {
    kind,
    temporary: options.temporary ?? kind === ErrorKind.RateLimited,
    context: { ...options.context },
  });
  if (options.cause !== undefined) {
    error.cause = options.cause;
  }
  return error;
}

export function isStorageError(error: unknown): error is StorageError {
  return (
    error instanceof Error &&
    'kind' in error &&
    typeof error.kind === 'string' &&
    isKnownErrorKind(error.kind) &&
    'temporary' in error &&
    typeof error.temporary === 'boolean' &&
    'context' in error
  );
}

export function isErrorKind(error: unknown, kind: ErrorKind): boolean {
  return isStorageError(error) && error.kind === kind;
}

/**
 * Normalize anything thrown into a StorageError.
 * Errors already in the taxonomy pass through untouched.
 */
export function toStorageError(error: unknown, context: ErrorContext = {}): StorageError {
  if (isStorageError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return storageError(ErrorKind.Unexpected, message, { cause: error, context });
}

/** Merge extra context fields into an error, keeping fields already set closer to the backend. */
export function withContext(error: StorageError, context: ErrorContext): StorageError {
  for (const [key, value] of Object.entries(context)) {
    if (value !== undefined && error.context[key] === undefined) {
      error.context[key] = value;
    }
  }
  return error;
}

// ---------------------------------------------------------------------------
// Configuration errors (CONFIG_*)
// ---------------------------------------------------------------------------

export const ConfigInvalidError = createError<[string]>(
  'CONFIG_INVALID',
  'Invalid configuration: %s',
  500
);

export const ConfigMissingError = createError<[string]>(
  'CONFIG_MISSING',
  'Missing configuration file: %s',
  500
);

export const ConfigParseError = createError<[string]>(
  'CONFIG_PARSE_ERROR',
  'Failed to parse configuration: %s',
  500
);
