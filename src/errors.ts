export type GradebookErrorCode =
  | 'DUPLICATE'
  | 'NOT_FOUND'
  | 'INVALID_SCORE'
  | 'VALIDATION'
  | 'IO'
  | 'FORMAT';

export class GradebookError extends Error {
  readonly code: GradebookErrorCode;

  constructor(code: GradebookErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class DuplicateError extends GradebookError {
  constructor(readonly studentName: string) {
    super('DUPLICATE', `Student '${studentName}' already exists`);
  }
}

export class NotFoundError extends GradebookError {
  constructor(readonly studentName: string) {
    super('NOT_FOUND', `Student '${studentName}' not found`);
  }
}

export class InvalidScoreError extends GradebookError {
  constructor(readonly score: unknown) {
    super('INVALID_SCORE', `Score must be a number, got ${String(score)}`);
  }
}

export class ValidationError extends GradebookError {
  constructor(message: string) {
    super('VALIDATION', message);
  }
}

export class IOError extends GradebookError {
  constructor(readonly path: string, cause: unknown) {
    super('IO', `Cannot access ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export class FormatError extends GradebookError {
  constructor(readonly path: string, detail: string, cause?: unknown) {
    super('FORMAT', `Invalid gradebook file ${path}: ${detail}`, { cause });
  }
}
