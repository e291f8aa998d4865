/**
 * Codes the instrumentation API writes into its error envelope, and the
 * ones this client raises for transport failures
 */
export type InstrumentationErrorCode =
  | 'VALIDATION_ERROR'
  | 'BAD_REQUEST'
  | 'CONSTRAINT_VIOLATION'
  | 'NOT_FOUND'
  | 'UNAUTHENTICATED'
  | 'INTERNAL_ERROR'
  | 'TIMEOUT'
  | 'ABORTED'
  | 'INVALID_RESPONSE'
  | `HTTP_${number}`;

export interface InstrumentationErrorContext {
  status: number;
  code: InstrumentationErrorCode | (string & {});
  details?: unknown;
  headers?: Record<string, string>;
}

/** One rejected field of a VALIDATION_ERROR payload */
export interface FieldIssue {
  path: Array<string | number>;
  message: string;
}

/** An instrument name refused on create */
export interface NameConflict {
  projectId: string | null;
  name: string;
  reason: 'exists' | 'duplicate_in_payload';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readFieldIssues(details: unknown): FieldIssue[] {
  if (!Array.isArray(details)) return [];
  return details.flatMap((issue): FieldIssue[] => {
    if (!isRecord(issue) || !Array.isArray(issue.path) || typeof issue.message !== 'string') {
      return [];
    }
    const path = issue.path.filter(
      (part): part is string | number => typeof part === 'string' || typeof part === 'number',
    );
    return [{ path, message: issue.message }];
  });
}

function readNameConflicts(details: unknown): NameConflict[] {
  if (!Array.isArray(details)) return [];
  return details.flatMap((conflict): NameConflict[] => {
    if (!isRecord(conflict) || typeof conflict.name !== 'string') return [];
    const { project_id: projectId, reason } = conflict;
    if (reason !== 'exists' && reason !== 'duplicate_in_payload') return [];
    return [
      {
        projectId: typeof projectId === 'string' ? projectId : null,
        name: conflict.name,
        reason,
      },
    ];
  });
}

export class InstrumentationError extends Error {
  readonly status: number;
  readonly code: InstrumentationErrorContext['code'];
  readonly details?: unknown;
  readonly headers: Record<string, string>;

  constructor(message: string, context: InstrumentationErrorContext) {
    super(message);
    this.name = 'InstrumentationError';
    this.status = context.status;
    this.code = context.code;
    this.details = context.details;
    this.headers = context.headers ?? {};
  }
}

/** 401 UNAUTHENTICATED: missing or rejected token or application key */
export class InstrumentationAuthError extends InstrumentationError {
  override name = 'InstrumentationAuthError';
}

export class InstrumentationNotFoundError extends InstrumentationError {
  override name = 'InstrumentationNotFoundError';
}

/**
 * 400 from the API. Field issues and instrument name conflicts are read
 * out of `details` when the server sent them.
 */
export class InstrumentationValidationError extends InstrumentationError {
  override name = 'InstrumentationValidationError';
  readonly issues: FieldIssue[];
  readonly nameConflicts: NameConflict[];

  constructor(message: string, context: InstrumentationErrorContext) {
    super(message, context);
    this.issues = context.code === 'VALIDATION_ERROR' ? readFieldIssues(context.details) : [];
    this.nameConflicts = context.code === 'BAD_REQUEST' ? readNameConflicts(context.details) : [];
  }
}

/** The write collided with stored data, such as a unique constraint */
export class InstrumentationConstraintError extends InstrumentationValidationError {
  override name = 'InstrumentationConstraintError';
  readonly constraint?: string;

  constructor(message: string, context: InstrumentationErrorContext) {
    super(message, context);
    const { details } = context;
    if (isRecord(details) && typeof details.constraint === 'string') {
      this.constraint = details.constraint;
    }
  }
}

/** 5xx, or a request that timed out, was aborted or got no JSON back */
export class InstrumentationServerError extends InstrumentationError {
  override name = 'InstrumentationServerError';
}

export function createInstrumentationError(
  message: string,
  context: InstrumentationErrorContext,
): InstrumentationError {
  const { status, code } = context;

  if (code === 'CONSTRAINT_VIOLATION') {
    return new InstrumentationConstraintError(message, context);
  }
  if (status === 401 || status === 403) {
    return new InstrumentationAuthError(message, context);
  }
  if (status === 404) {
    return new InstrumentationNotFoundError(message, context);
  }
  if (status === 400) {
    return new InstrumentationValidationError(message, context);
  }
  if (status >= 500) {
    return new InstrumentationServerError(message, context);
  }
  return new InstrumentationError(message, context);
}
