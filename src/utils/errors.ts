export class NoteboxError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'NoteboxError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class StorageError extends NoteboxError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'STORAGE_ERROR', options);
    this.name = 'StorageError';
  }
}

export class NotFoundError extends NoteboxError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'NOT_FOUND', options);
    this.name = 'NotFoundError';
  }
}

export class IndexCorruptionError extends NoteboxError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'INDEX_CORRUPTION', options);
    this.name = 'IndexCorruptionError';
  }
}

export class CaptureError extends NoteboxError {
  public readonly retryable: boolean;

  constructor(message: string, retryable: boolean, options?: ErrorOptions) {
    super(message, 'CAPTURE_ERROR', options);
    this.name = 'CaptureError';
    this.retryable = retryable;
  }
}

export class ValidationError extends NoteboxError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'VALIDATION_ERROR', options);
    this.name = 'ValidationError';
  }
}

export class AttachmentStateError extends NoteboxError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'ATTACHMENT_STATE', options);
    this.name = 'AttachmentStateError';
  }
}

export class ShuttingDownError extends NoteboxError {
  constructor(message = 'Service is shutting down', options?: ErrorOptions) {
    super(message, 'SHUTTING_DOWN', options);
    this.name = 'ShuttingDownError';
  }
}

export class ConfigError extends NoteboxError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
