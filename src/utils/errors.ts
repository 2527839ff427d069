import type { z } from 'zod';

export type KnowledgeErrorKind = 'ValidationError' | 'InvalidQuery' | 'NotFound';

export interface ValidationIssue {
  path: string;
  message: string;
}

export interface ErrorBody {
  error: {
    kind: KnowledgeErrorKind | 'InternalError';
    message: string;
    issues?: ValidationIssue[];
  };
}

/**
 * Base class for errors a caller can act on. Anything else reaching the
 * transport is an internal failure.
 */
export abstract class KnowledgeBaseError extends Error {
  abstract readonly kind: KnowledgeErrorKind;

  toBody(): ErrorBody {
    return { error: { kind: this.kind, message: this.message } };
  }
}

export class ValidationError extends KnowledgeBaseError {
  readonly kind = 'ValidationError';

  constructor(
    message: string,
    public readonly issues: ValidationIssue[] = []
  ) {
    super(message);
    this.name = 'ValidationError';
  }

  static fromZod(error: z.ZodError, message = 'Invalid input'): ValidationError {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const detail = issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message));
    return new ValidationError(`${message}: ${detail.join('; ')}`, issues);
  }

  override toBody(): ErrorBody {
    return { error: { kind: this.kind, message: this.message, issues: this.issues } };
  }
}

export class InvalidQueryError extends KnowledgeBaseError {
  readonly kind = 'InvalidQuery';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidQueryError';
  }
}

export class NotFoundError extends KnowledgeBaseError {
  readonly kind = 'NotFound';

  constructor(public readonly path: string) {
    super(`No knowledge indexed for path: ${path}`);
    this.name = 'NotFoundError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Body reported to clients for any failure. Errors outside the domain
 * hierarchy are reported as InternalError.
 */
export function toErrorBody(error: unknown): ErrorBody {
  if (error instanceof KnowledgeBaseError) {
    return error.toBody();
  }
  return { error: { kind: 'InternalError', message: errorMessage(error) } };
}
