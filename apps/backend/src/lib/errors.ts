export class KeepsakeError extends Error {
  constructor(public readonly message: string, public readonly code = 'INTERNAL_ERROR', public readonly details?: unknown) {
    super(message);
    this.name = 'KeepsakeError';
  }
}

export class NotFoundError extends KeepsakeError {
  constructor(message = 'Resource not found', details?: unknown) {
    super(message, 'NOT_FOUND', details);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends KeepsakeError {
  constructor(message = 'Validation failed', details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class DuplicateSlugError extends KeepsakeError {
  constructor(slug: string) {
    super(`Slug "${slug}" is already taken`, 'DUPLICATE_SLUG', { slug });
    this.name = 'DuplicateSlugError';
  }
}

export class UnauthorizedError extends KeepsakeError {
  constructor(message = 'Authentication required', details?: unknown) {
    super(message, 'UNAUTHORIZED', details);
    this.name = 'UnauthorizedError';
  }
}

export class UpstreamError extends KeepsakeError {
  constructor(message = 'Upstream service failed', details?: unknown) {
    super(message, 'UPSTREAM_FAILURE', details);
    this.name = 'UpstreamError';
  }
}

export class ServiceUnavailableError extends KeepsakeError {
  constructor(message = 'Service unavailable', details?: unknown) {
    super(message, 'SERVICE_UNAVAILABLE', details);
    this.name = 'ServiceUnavailableError';
  }
}

export class PageSaveError extends KeepsakeError {
  constructor(message = 'Could not save page changes', details?: unknown) {
    super(message, 'PAGE_SAVE_FAILED', details);
    this.name = 'PageSaveError';
  }
}
